/**
 * Pattern-based extraction for TypeScript and JavaScript.
 */

import { Ok, Result } from "@api-drift/core";

import type { CodeSymbol, Language, LanguageId } from "../../core/model.js";
import type { LanguageExtractor } from "../../core/ports/LanguageExtractor.js";
import {
  Container,
  collapseWhitespace,
  enclosingContainer,
  findBlockEnd,
  indentOf,
  patternSymbol,
  scan,
  splitParameters,
} from "./patterns.js";

const CLASS = /^(export\s+)?(?:default\s+)?(?:declare\s+)?(?:abstract\s+)?class\s+(\w+)/gm;
const INTERFACE = /^(export\s+)?(?:declare\s+)?interface\s+(\w+)/gm;
const FUNCTION =
  /^(export\s+)?(?:default\s+)?(?:declare\s+)?(?:async\s+)?function\s*\*?\s*(\w+)\s*(?:<[^>(]*>)?\s*\(([^)]*)\)(?:[ \t]*:[ \t]*([^{;\n]+))?/gm;
const ARROW =
  /^(export\s+)?(?:declare\s+)?const\s+(\w+)\s*(?::[^=\n]+)?=\s*(?:async\s+)?\(([^)]*)\)(?:[ \t]*:[ \t]*([^=\n]+?))?\s*=>/gm;
const TYPE_ALIAS = /^(export\s+)?(?:declare\s+)?type\s+(\w+)/gm;
const ENUM = /^(export\s+)?(?:declare\s+)?(?:const\s+)?enum\s+(\w+)/gm;
const CONST = /^(export\s+)?(?:declare\s+)?const\s+(?!enum\b)(\w+)/gm;
const METHOD =
  /^([ \t]+)((?:(?:public|private|protected|static|readonly|override|abstract|async|get|set)[ \t]+)*)(#?\w+)[ \t]*(?:<[^>(\n]*>)?[ \t]*\(([^)]*)\)(?:[ \t]*:[ \t]*([^{;\n]+?))?[ \t]*\{/gm;
const EXPORT_LIST = /^export\s*\{([^}]*)\}(?!\s*from)/gm;

const NOT_METHODS = new Set(["if", "for", "while", "switch", "catch", "with", "return", "function", "constructor"]);

export class TypeScriptPatternExtractor implements LanguageExtractor {
  readonly languages: readonly LanguageId[] = ["typescript", "javascript"];

  async extract(source: string, filePath: string, _language: Language): Promise<Result<CodeSymbol[], Error>> {
    const lines = source.split("\n");
    const symbols: CodeSymbol[] = [];
    const classes: Container[] = [];

    for (const { match, line } of scan(CLASS, source)) {
      const endLine = findBlockEnd(lines, line);
      classes.push({
        name: match[2],
        startLine: line,
        endLine,
        exported: match[1] !== undefined,
        memberIndent: firstMemberIndent(lines, line, endLine),
      });
      symbols.push(
        patternSymbol({ name: match[2], kind: "class", startLine: line, endLine, exported: match[1] !== undefined, filePath })
      );
    }

    for (const { match, line } of scan(INTERFACE, source)) {
      symbols.push(
        patternSymbol({
          name: match[2],
          kind: "interface",
          startLine: line,
          endLine: findBlockEnd(lines, line),
          exported: match[1] !== undefined,
          filePath,
        })
      );
    }

    for (const { match, line } of scan(FUNCTION, source)) {
      const parameters = splitParameters(match[3]);
      const returnType = collapseWhitespace(match[4] ?? "");
      symbols.push(
        patternSymbol({
          name: match[2],
          kind: "function",
          startLine: line,
          endLine: findBlockEnd(lines, line),
          exported: match[1] !== undefined,
          parameters,
          returnType,
          signature: `function ${match[2]}(${parameters.join(", ")})${returnType ? `: ${returnType}` : ""}`,
          filePath,
        })
      );
    }

    const arrowNames = new Set<string>();
    for (const { match, line } of scan(ARROW, source)) {
      const parameters = splitParameters(match[3]);
      const returnType = collapseWhitespace(match[4] ?? "");
      arrowNames.add(match[2]);
      symbols.push(
        patternSymbol({
          name: match[2],
          kind: "function",
          startLine: line,
          exported: match[1] !== undefined,
          parameters,
          returnType,
          signature: `const ${match[2]} = (${parameters.join(", ")})${returnType ? `: ${returnType}` : ""} =>`,
          filePath,
        })
      );
    }

    for (const { match, line } of scan(TYPE_ALIAS, source)) {
      symbols.push(patternSymbol({ name: match[2], kind: "type", startLine: line, exported: match[1] !== undefined, filePath }));
    }

    for (const { match, line } of scan(ENUM, source)) {
      symbols.push(
        patternSymbol({
          name: match[2],
          kind: "type",
          startLine: line,
          endLine: findBlockEnd(lines, line),
          exported: match[1] !== undefined,
          filePath,
        })
      );
    }

    for (const { match, line } of scan(CONST, source)) {
      if (arrowNames.has(match[2])) continue;
      symbols.push(patternSymbol({ name: match[2], kind: "constant", startLine: line, exported: match[1] !== undefined, filePath }));
    }

    for (const { match, line } of scan(METHOD, source)) {
      const name = match[3];
      if (NOT_METHODS.has(name)) continue;

      const owner = enclosingContainer(classes, line);
      if (!owner || owner.memberIndent !== match[1]) continue;

      const modifiers = match[2];
      const parameters = splitParameters(match[4]);
      const returnType = collapseWhitespace(match[5] ?? "");
      symbols.push(
        patternSymbol({
          name,
          kind: "method",
          startLine: line,
          endLine: findBlockEnd(lines, line),
          exported: owner.exported && !/\b(private|protected)\b/.test(modifiers) && !name.startsWith("#"),
          parameters,
          returnType,
          signature: `${name}(${parameters.join(", ")})${returnType ? `: ${returnType}` : ""}`,
          parent: owner.name,
          filePath,
        })
      );
    }

    return Ok(applyExportLists(source, symbols));
  }
}

/**
 * Mark top-level symbols named in `export { a, b as c }` as exported.
 */
function applyExportLists(source: string, symbols: CodeSymbol[]): CodeSymbol[] {
  const listed = new Set<string>();
  for (const { match } of scan(EXPORT_LIST, source)) {
    for (const entry of match[1].split(",")) {
      const local = entry.trim().replace(/^type\s+/, "").split(/\s+as\s+/)[0];
      if (local) listed.add(local);
    }
  }
  if (listed.size === 0) return symbols;

  return symbols.map((symbol) =>
    symbol.kind !== "method" && listed.has(symbol.name) ? { ...symbol, exported: true } : symbol
  );
}

/**
 * Indentation of the first non-blank line inside a class body.
 */
function firstMemberIndent(lines: readonly string[], startLine: number, endLine: number): string | undefined {
  for (let i = startLine; i < endLine - 1; i++) {
    if (lines[i].trim() !== "") {
      return indentOf(lines[i]);
    }
  }
  return undefined;
}
