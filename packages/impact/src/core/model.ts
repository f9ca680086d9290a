/**
 * Domain types for breaking-change detection and impact analysis.
 */

import type { CodeSymbol } from "@api-drift/symbols";

export type BreakingChangeType =
  | "removal"
  | "signature_change"
  | "type_change"
  | "visibility_change"
  | "parameter_change"
  | "return_type_change"
  | "required_parameter"
  | "behavior_change";

export type BreakingSeverity = "warning" | "error" | "critical";

/**
 * One incompatibility between two revisions of a file.
 */
export interface BreakingChange {
  type: BreakingChangeType;
  symbol: CodeSymbol;
  oldValue: string;
  newValue: string;
  filePath: string;
  line: number;
  severity: BreakingSeverity;
  description: string;
  suggestion?: string;
}

export interface BreakingChangeReport {
  filePath: string;
  totalChanges: number;
  criticalCount: number;
  errorCount: number;
  warningCount: number;
  changes: BreakingChange[];
  /** True when any change is critical or error; warnings alone never set it */
  hasBreaking: boolean;
  summary: string;
}

/**
 * An occurrence of a symbol name outside its own definition line.
 */
export interface Reference {
  filePath: string;
  /** 1-indexed */
  line: number;
  /** The source line, trimmed */
  context: string;
}

/** Impact scale, distinct from BreakingSeverity. */
export type ImpactSeverity = "low" | "medium" | "high" | "critical";

export const IMPACT_SEVERITY_ORDER: readonly ImpactSeverity[] = ["low", "medium", "high", "critical"];

export function maxImpactSeverity(a: ImpactSeverity, b: ImpactSeverity): ImpactSeverity {
  return IMPACT_SEVERITY_ORDER.indexOf(a) >= IMPACT_SEVERITY_ORDER.indexOf(b) ? a : b;
}

export type ChangeType = "added" | "removed" | "modified";

/**
 * Cross-file consequence of one changed symbol.
 */
export interface Impact {
  /** The new symbol, or the old one when it was removed */
  changedSymbol: CodeSymbol;
  changeType: ChangeType;
  /** Files holding references, other than the symbol's own file */
  affectedFiles: string[];
  /** Indexed declarations whose bodies contain a reference */
  affectedSymbols: CodeSymbol[];
  references: Reference[];
  severity: ImpactSeverity;
  description: string;
}

export interface FileImpact {
  filePath: string;
  changedSymbols: CodeSymbol[];
  impacts: Impact[];
  totalReferences: number;
  affectedFiles: string[];
  /** Maximum of the impact severities, "low" when there are none */
  overallSeverity: ImpactSeverity;
}

export interface ReferenceEscalation {
  /** More references than this bumps a medium impact to high */
  high: number;
  /** More references than this makes any impact critical */
  critical: number;
}

export interface ImpactAnalyzerOptions {
  /** Trimmed-line prefixes that mark a line as a comment */
  commentMarkers?: readonly string[];
  referenceEscalation?: ReferenceEscalation;
}

export const DEFAULT_COMMENT_MARKERS: readonly string[] = ["//", "#", "/*"];

export const DEFAULT_REFERENCE_ESCALATION: ReferenceEscalation = { high: 10, critical: 50 };

export interface IndexStats {
  files: number;
  symbols: number;
  references: number;
}
