/**
 * Breaking-Change Detector - compares two revisions of one file's public surface.
 */

import { Result, map, mapErr, unwrapOr } from "@api-drift/core";
import type { CodeSymbol, SymbolExtractor } from "@api-drift/symbols";
import { detectLanguage } from "@api-drift/symbols";

import type { BreakingChange, BreakingChangeReport, BreakingSeverity } from "../model.js";
import { DiffOptions, diffSymbols } from "../symbolDiff.js";

const SUGGESTIONS = {
  removal: "If this removal is intentional, consider deprecating first or updating documentation",
  visibility: "This breaks all external consumers. Consider keeping it exported or deprecating first",
  requiredParameter: "Consider making new parameters optional or provide a new overload",
  removedParameter: "Verify callers don't rely on removed parameters",
  parameter: "Consider if this change is backward compatible",
  returnType: "Consider if this change is backward compatible or create a new function",
  signature: "Review if this change affects callers",
} as const;

export class BreakingChangeDetector {
  constructor(private readonly extractor: SymbolExtractor) {}

  /**
   * Detect breaking changes between two revisions of `filePath`.
   *
   * An old revision that fails to parse counts as an empty file. A new
   * revision that fails to parse is an error.
   */
  async detect(oldText: string, newText: string, filePath: string): Promise<Result<BreakingChangeReport, Error>> {
    const oldSymbols = unwrapOr(await this.extractor.extract(filePath, oldText), []);
    const newSymbols = mapErr(
      await this.extractor.extract(filePath, newText),
      (error) => new Error(`failed to parse new content of ${filePath}: ${error.message}`, { cause: error })
    );

    const options = { overloading: detectLanguage(filePath)?.overloading ?? false };
    return map(newSymbols, (symbols) => buildReport(filePath, compareSymbols(oldSymbols, symbols, filePath, options)));
  }
}

/**
 * Classify the differences between two symbol lists as breaking changes.
 */
export function compareSymbols(
  oldSymbols: readonly CodeSymbol[],
  newSymbols: readonly CodeSymbol[],
  filePath: string,
  options: DiffOptions
): BreakingChange[] {
  const diff = diffSymbols(oldSymbols, newSymbols, options);
  const changes: BreakingChange[] = [];

  for (const removed of diff.removed) {
    if (!removed.exported) continue;

    const renamed = newSymbols.find(
      (s) => s.kind === removed.kind && s.name !== removed.name && s.name.toLowerCase() === removed.name.toLowerCase()
    );
    if (renamed) {
      changes.push({
        type: "visibility_change",
        symbol: renamed,
        oldValue: "exported",
        newValue: "unexported",
        filePath,
        line: renamed.startLine,
        severity: "critical",
        description: `${removed.kind} '${removed.name}' changed from exported to unexported (renamed to '${renamed.name}')`,
        suggestion: SUGGESTIONS.visibility,
      });
    } else {
      changes.push({
        type: "removal",
        symbol: removed,
        oldValue: removed.signature,
        newValue: "",
        filePath,
        line: removed.startLine,
        severity: "critical",
        description: `Exported ${removed.kind} '${removed.name}' was removed`,
        suggestion: SUGGESTIONS.removal,
      });
    }
  }

  for (const { old: oldSymbol, new: newSymbol } of diff.common) {
    if (!oldSymbol.exported && !newSymbol.exported) continue;

    if (oldSymbol.exported && !newSymbol.exported) {
      changes.push({
        type: "visibility_change",
        symbol: newSymbol,
        oldValue: "exported",
        newValue: "unexported",
        filePath,
        line: newSymbol.startLine,
        severity: "critical",
        description: `${newSymbol.kind} '${newSymbol.name}' changed from exported to unexported`,
        suggestion: SUGGESTIONS.visibility,
      });
      continue;
    }

    const parameterChanges = compareParameters(oldSymbol, newSymbol, filePath);
    changes.push(...parameterChanges);

    let returnTypeChanged = false;
    if (oldSymbol.returnType !== newSymbol.returnType && oldSymbol.returnType !== "" && newSymbol.returnType !== "") {
      returnTypeChanged = true;
      changes.push({
        type: "return_type_change",
        symbol: newSymbol,
        oldValue: oldSymbol.returnType,
        newValue: newSymbol.returnType,
        filePath,
        line: newSymbol.startLine,
        severity: "error",
        description: `${newSymbol.kind} '${newSymbol.name}' return type changed from '${oldSymbol.returnType}' to '${newSymbol.returnType}'`,
        suggestion: SUGGESTIONS.returnType,
      });
    }

    if (
      parameterChanges.length === 0 &&
      !returnTypeChanged &&
      oldSymbol.signature !== newSymbol.signature &&
      oldSymbol.signature !== "" &&
      newSymbol.signature !== ""
    ) {
      changes.push({
        type: "signature_change",
        symbol: newSymbol,
        oldValue: oldSymbol.signature,
        newValue: newSymbol.signature,
        filePath,
        line: newSymbol.startLine,
        severity: "warning",
        description: `${newSymbol.kind} '${newSymbol.name}' signature changed`,
        suggestion: SUGGESTIONS.signature,
      });
    }
  }

  return changes;
}

function compareParameters(oldSymbol: CodeSymbol, newSymbol: CodeSymbol, filePath: string): BreakingChange[] {
  const oldParams = oldSymbol.parameters;
  const newParams = newSymbol.parameters;
  const changes: BreakingChange[] = [];
  const base = { symbol: newSymbol, filePath, line: newSymbol.startLine };
  const label = `${newSymbol.kind} '${newSymbol.name}'`;

  if (newParams.length > oldParams.length) {
    changes.push({
      ...base,
      type: "required_parameter",
      oldValue: `${oldParams.length} parameters`,
      newValue: `${newParams.length} parameters`,
      severity: "error",
      description: `${label} added ${newParams.length - oldParams.length} required parameter(s)`,
      suggestion: SUGGESTIONS.requiredParameter,
    });
  } else if (newParams.length < oldParams.length) {
    changes.push({
      ...base,
      type: "parameter_change",
      oldValue: `${oldParams.length} parameters`,
      newValue: `${newParams.length} parameters`,
      severity: "warning",
      description: `${label} removed ${oldParams.length - newParams.length} parameter(s)`,
      suggestion: SUGGESTIONS.removedParameter,
    });
  }

  const overlap = Math.min(oldParams.length, newParams.length);
  for (let i = 0; i < overlap; i++) {
    if (oldParams[i] !== newParams[i]) {
      changes.push({
        ...base,
        type: "parameter_change",
        oldValue: oldParams[i],
        newValue: newParams[i],
        severity: "error",
        description: `${label} parameter ${i + 1} changed from '${oldParams[i]}' to '${newParams[i]}'`,
        suggestion: SUGGESTIONS.parameter,
      });
    }
  }

  return changes;
}

/**
 * Aggregate changes into a report with per-severity counts and a summary line.
 */
export function buildReport(filePath: string, changes: BreakingChange[]): BreakingChangeReport {
  const count = (severity: BreakingSeverity) => changes.filter((c) => c.severity === severity).length;
  const criticalCount = count("critical");
  const errorCount = count("error");
  const warningCount = count("warning");

  return {
    filePath,
    totalChanges: changes.length,
    criticalCount,
    errorCount,
    warningCount,
    changes,
    hasBreaking: criticalCount > 0 || errorCount > 0,
    summary: summarize(changes.length, criticalCount, errorCount, warningCount),
  };
}

function summarize(total: number, critical: number, error: number, warning: number): string {
  if (total === 0) {
    return "No breaking changes detected";
  }

  const parts: string[] = [];
  if (critical > 0) parts.push(`${critical} critical`);
  if (error > 0) parts.push(`${error} error`);
  if (warning > 0) parts.push(`${warning} warning`);

  return `Found ${total} breaking changes: ${parts.join(", ")}`;
}
