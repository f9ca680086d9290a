/**
 * Shared helpers for the pattern-based extractors.
 * Every declaration form is one multiline regex scanned over the whole file.
 */

import type { CodeSymbol } from "../../core/model.js";

/**
 * 1-indexed line of a character offset.
 */
export function lineAt(source: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < source.length; i++) {
    if (source.charCodeAt(i) === 10) line++;
  }
  return line;
}

/**
 * Collapse runs of whitespace to a single space.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Split a parameter list on top-level commas.
 * Commas nested in (), [], {} or <> stay inside their parameter.
 */
export function splitParameters(list: string): string[] {
  const params: string[] = [];
  let depth = 0;
  let current = "";

  for (const ch of list) {
    if (ch === "(" || ch === "[" || ch === "{" || ch === "<") depth++;
    else if (ch === ")" || ch === "]" || ch === "}" || ch === ">") depth = Math.max(0, depth - 1);

    if (ch === "," && depth === 0) {
      params.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  params.push(current);

  return params.map(collapseWhitespace).filter((p) => p.length > 0);
}

/**
 * Find the closing line of a brace-delimited block starting on `startLine`.
 * A `;` before the first `{` ends a bodiless declaration on its own line.
 * Falls back to `startLine` when no balanced block follows.
 */
export function findBlockEnd(lines: readonly string[], startLine: number): number {
  let depth = 0;
  let started = false;

  for (let i = startLine - 1; i < lines.length; i++) {
    for (const ch of lines[i]) {
      if (ch === "{") {
        depth++;
        started = true;
      } else if (ch === "}") {
        depth--;
        if (started && depth === 0) {
          return i + 1;
        }
      } else if (ch === ";" && !started) {
        return startLine;
      }
    }
  }

  return startLine;
}

/**
 * Leading whitespace of a line.
 */
export function indentOf(line: string): string {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0] : "";
}

/**
 * Find the last line of an indentation-delimited block (Python).
 * The block ends before the first non-blank line indented at or left of the header.
 */
export function findIndentedBlockEnd(lines: readonly string[], startLine: number): number {
  const headerIndent = indentOf(lines[startLine - 1] ?? "").length;
  let end = startLine;

  for (let i = startLine; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim() === "") continue;
    if (indentOf(line).length <= headerIndent) break;
    end = i + 1;
  }

  return end;
}

/**
 * A block that can own methods (class, impl, trait...).
 */
export interface Container {
  name: string;
  startLine: number;
  endLine: number;
  exported: boolean;
  /** Indentation of the block's direct members, when known */
  memberIndent?: string;
  /** Members are public through the container (trait impls) */
  membersPublic?: boolean;
}

/**
 * Innermost container whose body spans `line`.
 */
export function enclosingContainer(containers: readonly Container[], line: number): Container | undefined {
  let best: Container | undefined;
  for (const container of containers) {
    if (container.startLine < line && line <= container.endLine) {
      if (!best || container.startLine > best.startLine) {
        best = container;
      }
    }
  }
  return best;
}

/**
 * Build a symbol with the defaults pattern extractors share.
 */
export function patternSymbol(
  fields: Pick<CodeSymbol, "name" | "kind" | "startLine" | "exported" | "filePath"> & Partial<CodeSymbol>
): CodeSymbol {
  return {
    endLine: fields.startLine,
    signature: "",
    parameters: [],
    returnType: "",
    parent: "",
    ...fields,
  };
}

/**
 * Iterate the matches of a global regex together with their 1-indexed line.
 */
export function* scan(
  pattern: RegExp,
  source: string
): Generator<{ match: RegExpExecArray; line: number }> {
  const regex = new RegExp(pattern.source, pattern.flags.includes("g") ? pattern.flags : pattern.flags + "g");
  let match: RegExpExecArray | null;
  let lastOffset = 0;
  let lastLine = 1;

  while ((match = regex.exec(source)) !== null) {
    lastLine += lineAt(source.slice(lastOffset, match.index), match.index - lastOffset) - 1;
    lastOffset = match.index;
    yield { match, line: lastLine };

    if (match[0].length === 0) {
      regex.lastIndex++;
    }
  }
}
