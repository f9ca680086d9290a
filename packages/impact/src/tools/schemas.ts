import * as z from "zod/v4";
import type { CodeSymbol } from "@api-drift/symbols";

import type { BreakingChange, Impact, Reference } from "../core/model.js";

export const SymbolKindSchema = z.enum([
  "function",
  "method",
  "class",
  "interface",
  "struct",
  "variable",
  "constant",
  "type",
  "import",
]);

export const SymbolSchema = z.object({
  name: z.string(),
  kind: SymbolKindSchema,
  startLine: z.number(),
  endLine: z.number(),
  signature: z.string(),
  exported: z.boolean(),
  parameters: z.array(z.string()),
  returnType: z.string(),
  parent: z.string(),
  filePath: z.string(),
});

export const ReferenceSchema = z.object({
  filePath: z.string(),
  line: z.number(),
  context: z.string(),
});

export const BreakingChangeSchema = z.object({
  type: z.enum([
    "removal",
    "signature_change",
    "type_change",
    "visibility_change",
    "parameter_change",
    "return_type_change",
    "required_parameter",
    "behavior_change",
  ]),
  symbol: z.string(),
  kind: SymbolKindSchema,
  line: z.number(),
  severity: z.enum(["warning", "error", "critical"]),
  description: z.string(),
  oldValue: z.string(),
  newValue: z.string(),
  suggestion: z.string().optional(),
});

export const ImpactSchema = z.object({
  symbol: z.string(),
  kind: SymbolKindSchema,
  changeType: z.enum(["added", "removed", "modified"]),
  severity: z.enum(["low", "medium", "high", "critical"]),
  description: z.string(),
  references: z.array(ReferenceSchema),
  affectedFiles: z.array(z.string()),
  affectedSymbols: z.array(z.string()),
});

export type SymbolOutput = z.infer<typeof SymbolSchema>;
export type ReferenceOutput = z.infer<typeof ReferenceSchema>;
export type BreakingChangeOutput = z.infer<typeof BreakingChangeSchema>;
export type ImpactOutput = z.infer<typeof ImpactSchema>;

export function toSymbolOutput(symbol: CodeSymbol): SymbolOutput {
  return { ...symbol, parameters: [...symbol.parameters] };
}

export function toReferenceOutput(ref: Reference): ReferenceOutput {
  return { filePath: ref.filePath, line: ref.line, context: ref.context };
}

export function toBreakingChangeOutput(change: BreakingChange): BreakingChangeOutput {
  return {
    type: change.type,
    symbol: change.symbol.name,
    kind: change.symbol.kind,
    line: change.line,
    severity: change.severity,
    description: change.description,
    oldValue: change.oldValue,
    newValue: change.newValue,
    suggestion: change.suggestion,
  };
}

/**
 * Qualified display name: "Parent.name" for methods.
 */
export function displayName(symbol: CodeSymbol): string {
  return symbol.parent ? `${symbol.parent}.${symbol.name}` : symbol.name;
}

export function toImpactOutput(impact: Impact): ImpactOutput {
  return {
    symbol: displayName(impact.changedSymbol),
    kind: impact.changedSymbol.kind,
    changeType: impact.changeType,
    severity: impact.severity,
    description: impact.description,
    references: impact.references.map(toReferenceOutput),
    affectedFiles: impact.affectedFiles,
    affectedSymbols: impact.affectedSymbols.map((s) => `${s.filePath}:${displayName(s)}`),
  };
}
