/**
 * Impact Analyzer - cross-file consequences of a change to one file.
 */

import { Err, Ok, Result, mapErr, unwrapOr } from "@api-drift/core";
import type { CodeSymbol, SymbolExtractor } from "@api-drift/symbols";
import { detectLanguage, symbolKey } from "@api-drift/symbols";

import {
  ChangeType,
  DEFAULT_COMMENT_MARKERS,
  DEFAULT_REFERENCE_ESCALATION,
  FileImpact,
  Impact,
  ImpactAnalyzerOptions,
  ImpactSeverity,
  IndexStats,
  Reference,
  ReferenceEscalation,
  maxImpactSeverity,
} from "../model.js";
import { diffSymbols, parametersEqual, symbolChanged } from "../symbolDiff.js";
import { SymbolIndex } from "./SymbolIndex.js";

export interface SymbolChange {
  symbol: CodeSymbol;
  changeType: ChangeType;
  /** Previous revision, for modified symbols */
  previous?: CodeSymbol;
}

/**
 * An analysis session: owns one symbol index for its lifetime.
 *
 * Index writes are applied one at a time in call order. `analyzeImpact`
 * waits for writes issued before it. After `close()` the index is released,
 * writes and analyses fail and queries return nothing.
 */
export class ImpactAnalyzer {
  private readonly index: SymbolIndex;
  private readonly escalation: ReferenceEscalation;
  private writes: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(
    private readonly extractor: SymbolExtractor,
    options: ImpactAnalyzerOptions = {}
  ) {
    this.index = new SymbolIndex(options.commentMarkers ?? DEFAULT_COMMENT_MARKERS);
    this.escalation = options.referenceEscalation ?? DEFAULT_REFERENCE_ESCALATION;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Extract a file's symbols and add the file to the index, replacing any
   * earlier version of it. On failure the index keeps the earlier version.
   */
  indexFile(filePath: string, content: string): Promise<Result<CodeSymbol[], Error>> {
    if (this.closed) {
      return Promise.resolve(Err(sessionClosed()));
    }

    const write = this.writes.then(async (): Promise<Result<CodeSymbol[], Error>> => {
      if (this.closed) {
        return Err(sessionClosed());
      }

      const extracted = await this.extractor.extract(filePath, content);
      if (this.closed) {
        return Err(sessionClosed());
      }
      if (!extracted.ok) {
        return Err(new Error(`failed to parse ${filePath}: ${extracted.error.message}`, { cause: extracted.error }));
      }

      this.index.put(filePath, content, extracted.value);
      return Ok(extracted.value);
    });

    // Keep the queue alive after a failed write; the caller still sees the rejection.
    this.writes = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  /**
   * Compare two revisions of `filePath` and look up who references each changed symbol.
   */
  async analyzeImpact(oldContent: string, newContent: string, filePath: string): Promise<Result<FileImpact, Error>> {
    if (this.closed) {
      return Err(sessionClosed());
    }
    await this.writes;

    const oldSymbols = unwrapOr(await this.extractor.extract(filePath, oldContent), []);
    const newSymbols = mapErr(
      await this.extractor.extract(filePath, newContent),
      (error) => new Error(`failed to parse new content of ${filePath}: ${error.message}`, { cause: error })
    );
    if (!newSymbols.ok) {
      return newSymbols;
    }

    const changes = this.classify(oldSymbols, newSymbols.value, filePath);
    const impacts = changes.map((change) => this.assess(change));

    const affectedFiles = new Set<string>();
    let totalReferences = 0;
    let overallSeverity: ImpactSeverity = "low";
    for (const impact of impacts) {
      totalReferences += impact.references.length;
      overallSeverity = maxImpactSeverity(overallSeverity, impact.severity);
      for (const file of impact.affectedFiles) {
        if (file !== filePath) affectedFiles.add(file);
      }
    }

    return Ok({
      filePath,
      changedSymbols: changes.map((c) => c.symbol),
      impacts,
      totalReferences,
      affectedFiles: [...affectedFiles],
      overallSeverity,
    });
  }

  getSymbolsInFile(filePath: string): CodeSymbol[] {
    return this.closed ? [] : this.index.symbolsInFile(filePath);
  }

  getSymbolReferences(name: string): Reference[] {
    return this.closed ? [] : this.index.references(name);
  }

  findSymbol(name: string): CodeSymbol[] {
    return this.closed ? [] : this.index.findSymbol(name);
  }

  /**
   * Files that reference a symbol declared in `filePath`.
   */
  getDependents(filePath: string): string[] {
    return this.closed ? [] : this.index.dependents(filePath);
  }

  stats(): IndexStats {
    return this.closed ? { files: 0, symbols: 0, references: 0 } : this.index.stats();
  }

  close(): void {
    this.closed = true;
    this.index.clear();
  }

  private classify(oldSymbols: CodeSymbol[], newSymbols: CodeSymbol[], filePath: string): SymbolChange[] {
    const diff = diffSymbols(oldSymbols, newSymbols, { overloading: detectLanguage(filePath)?.overloading ?? false });
    const changes = diff.removed.map((symbol): SymbolChange => ({ symbol, changeType: "removed" }));

    for (const pair of diff.common) {
      if (symbolChanged(pair.old, pair.new)) {
        changes.push({ symbol: pair.new, changeType: "modified", previous: pair.old });
      }
    }
    for (const symbol of diff.added) {
      changes.push({ symbol, changeType: "added" });
    }
    return changes;
  }

  private assess(change: SymbolChange): Impact {
    const { symbol } = change;
    const references = this.index.references(symbol.name);
    const affectedFiles = [...new Set(references.map((r) => r.filePath).filter((f) => f !== symbol.filePath))];
    const { severity, description } = describeChange(change);

    return {
      changedSymbol: symbol,
      changeType: change.changeType,
      affectedFiles,
      affectedSymbols: this.affectedSymbols(symbol, references),
      references,
      severity: escalate(severity, references.length, this.escalation),
      description,
    };
  }

  private affectedSymbols(changed: CodeSymbol, references: Reference[]): CodeSymbol[] {
    const changedIdentity = identity(changed);
    const seen = new Set<string>();
    const affected: CodeSymbol[] = [];

    for (const ref of references) {
      const owner = this.index.enclosingSymbol(ref.filePath, ref.line);
      if (!owner || identity(owner) === changedIdentity) continue;

      const key = `${identity(owner)}@${owner.startLine}`;
      if (seen.has(key)) continue;
      seen.add(key);
      affected.push(owner);
    }
    return affected;
  }
}

function identity(symbol: CodeSymbol): string {
  return `${symbol.filePath}#${symbolKey(symbol)}`;
}

function sessionClosed(): Error {
  return new Error("impact analysis session is closed");
}

/**
 * Base severity and description of one change, before reference escalation.
 */
export function describeChange(change: SymbolChange): { severity: ImpactSeverity; description: string } {
  const { symbol, previous } = change;

  if (change.changeType === "removed") {
    return symbol.exported
      ? { severity: "critical", description: `Symbol '${symbol.name}' was removed (was exported/public)` }
      : { severity: "high", description: `Symbol '${symbol.name}' was removed` };
  }

  if (change.changeType === "added" || !previous) {
    return { severity: "low", description: `New symbol '${symbol.name}' added` };
  }

  let severity: ImpactSeverity = "medium";
  const parts: string[] = [];

  if (previous.signature !== symbol.signature) {
    parts.push("signature");
  }
  if (!parametersEqual(previous.parameters, symbol.parameters)) {
    parts.push("parameters");
    if (previous.parameters.length !== symbol.parameters.length) severity = "high";
  }
  if (previous.returnType !== symbol.returnType) {
    parts.push("return type");
    severity = "high";
  }
  if (previous.exported !== symbol.exported) {
    parts.push("visibility");
    if (previous.exported) severity = "critical";
  }

  return { severity, description: `Symbol '${symbol.name}' modified: ${parts.join(", ")}` };
}

/**
 * Raise a severity by reference volume: past `critical` references it is
 * critical outright, past `high` a medium impact becomes high.
 */
export function escalate(severity: ImpactSeverity, referenceCount: number, thresholds: ReferenceEscalation): ImpactSeverity {
  if (referenceCount > thresholds.critical) {
    return "critical";
  }
  if (referenceCount > thresholds.high && severity === "medium") {
    return "high";
  }
  return severity;
}
