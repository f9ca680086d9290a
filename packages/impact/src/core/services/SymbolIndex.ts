/**
 * Symbol Index - declarations and word occurrences of every indexed file.
 */

import type { CodeSymbol } from "@api-drift/symbols";

import type { IndexStats, Reference } from "../model.js";

const WORD = /[\p{L}\p{N}_]+/gu;

interface IndexedFile {
  filePath: string;
  symbols: CodeSymbol[];
  lines: string[];
  /** word -> ascending 1-indexed lines containing it */
  postings: Map<string, number[]>;
}

/**
 * Inverted index over indexed files.
 *
 * Each file contributes its symbols and a word -> lines posting list. Putting
 * a file that is already indexed replaces its previous contribution, so the
 * index always reflects the latest content of every file. References are
 * resolved at query time and do not depend on indexing order.
 */
export class SymbolIndex {
  private readonly files = new Map<string, IndexedFile>();
  private readonly byName = new Map<string, CodeSymbol[]>();

  constructor(private readonly commentMarkers: readonly string[]) {}

  put(filePath: string, content: string, symbols: CodeSymbol[]): void {
    this.remove(filePath);

    const lines = content.split("\n");
    this.files.set(filePath, { filePath, symbols, lines, postings: this.tokenize(lines) });

    for (const symbol of symbols) {
      const named = this.byName.get(symbol.name);
      if (named) {
        named.push(symbol);
      } else {
        this.byName.set(symbol.name, [symbol]);
      }
    }
  }

  /**
   * Drop a file's symbols and occurrences. Returns false if it was not indexed.
   */
  remove(filePath: string): boolean {
    const existing = this.files.get(filePath);
    if (!existing) return false;

    this.files.delete(filePath);
    for (const symbol of existing.symbols) {
      const remaining = (this.byName.get(symbol.name) ?? []).filter((s) => s.filePath !== filePath);
      if (remaining.length > 0) {
        this.byName.set(symbol.name, remaining);
      } else {
        this.byName.delete(symbol.name);
      }
    }
    return true;
  }

  has(filePath: string): boolean {
    return this.files.has(filePath);
  }

  symbolsInFile(filePath: string): CodeSymbol[] {
    return this.files.get(filePath)?.symbols ?? [];
  }

  findSymbol(name: string): CodeSymbol[] {
    return this.byName.get(name) ?? [];
  }

  /**
   * Lines that mention a defined name, one per (file, line), skipping the
   * name's own definition lines. Unknown names have no references.
   */
  references(name: string): Reference[] {
    const definitions = this.byName.get(name);
    if (!definitions) return [];

    const references: Reference[] = [];
    for (const file of this.files.values()) {
      const lines = file.postings.get(name);
      if (!lines) continue;

      for (const line of lines) {
        const isDefinition = definitions.some((s) => s.filePath === file.filePath && s.startLine === line);
        if (!isDefinition) {
          references.push({ filePath: file.filePath, line, context: file.lines[line - 1].trim() });
        }
      }
    }
    return references;
  }

  /**
   * Other files that reference any symbol declared in `filePath`.
   */
  dependents(filePath: string): string[] {
    const names = new Set(this.symbolsInFile(filePath).map((s) => s.name));
    const files = new Set<string>();
    for (const name of names) {
      for (const ref of this.references(name)) {
        if (ref.filePath !== filePath) {
          files.add(ref.filePath);
        }
      }
    }
    return [...files];
  }

  /**
   * Innermost declaration in `filePath` whose line range contains `line`.
   */
  enclosingSymbol(filePath: string, line: number): CodeSymbol | undefined {
    let best: CodeSymbol | undefined;
    for (const symbol of this.symbolsInFile(filePath)) {
      if (symbol.startLine <= line && line <= symbol.endLine) {
        if (!best || symbol.endLine - symbol.startLine < best.endLine - best.startLine) {
          best = symbol;
        }
      }
    }
    return best;
  }

  stats(): IndexStats {
    let symbols = 0;
    for (const file of this.files.values()) {
      symbols += file.symbols.length;
    }

    let references = 0;
    for (const name of this.byName.keys()) {
      references += this.references(name).length;
    }

    return { files: this.files.size, symbols, references };
  }

  clear(): void {
    this.files.clear();
    this.byName.clear();
  }

  private tokenize(lines: readonly string[]): Map<string, number[]> {
    const postings = new Map<string, number[]>();

    lines.forEach((text, i) => {
      const trimmed = text.trim();
      if (this.commentMarkers.some((marker) => trimmed.startsWith(marker))) return;

      const line = i + 1;
      for (const [word] of text.matchAll(WORD)) {
        const list = postings.get(word);
        if (!list) {
          postings.set(word, [line]);
        } else if (list[list.length - 1] !== line) {
          list.push(line);
        }
      }
    });

    return postings;
  }
}
