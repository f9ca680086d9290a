/**
 * Pattern-based extraction for Python.
 * Visibility follows the leading-underscore convention.
 */

import { Ok, Result } from "@api-drift/core";

import type { CodeSymbol, Language, LanguageId } from "../../core/model.js";
import type { LanguageExtractor } from "../../core/ports/LanguageExtractor.js";
import {
  Container,
  collapseWhitespace,
  enclosingContainer,
  findIndentedBlockEnd,
  indentOf,
  patternSymbol,
  scan,
  splitParameters,
} from "./patterns.js";

const CLASS = /^class\s+(\w+)/gm;
const FUNCTION = /^(?:async\s+)?def\s+(\w+)\s*\(([^)]*)\)(?:\s*->\s*([^:\n]+))?/gm;
const METHOD = /^([ \t]+)(?:async\s+)?def\s+(\w+)\s*\(([^)]*)\)(?:\s*->\s*([^:\n]+))?/gm;
const CONSTANT = /^([A-Z][A-Z0-9_]*)\s*(?::[^=\n]+)?=(?!=)/gm;

/**
 * Public unless the name starts with an underscore, dunder names included.
 */
export function isPythonPublic(name: string): boolean {
  return !name.startsWith("_");
}

export class PythonPatternExtractor implements LanguageExtractor {
  readonly languages: readonly LanguageId[] = ["python"];

  async extract(source: string, filePath: string, _language: Language): Promise<Result<CodeSymbol[], Error>> {
    const lines = source.split("\n");
    const symbols: CodeSymbol[] = [];
    const classes: Container[] = [];

    for (const { match, line } of scan(CLASS, source)) {
      const endLine = findIndentedBlockEnd(lines, line);
      const exported = isPythonPublic(match[1]);
      classes.push({
        name: match[1],
        startLine: line,
        endLine,
        exported,
        memberIndent: endLine > line ? firstBodyIndent(lines, line) : undefined,
      });
      symbols.push(patternSymbol({ name: match[1], kind: "class", startLine: line, endLine, exported, filePath }));
    }

    for (const { match, line } of scan(FUNCTION, source)) {
      const parameters = splitParameters(match[2]);
      const returnType = collapseWhitespace(match[3] ?? "");
      symbols.push(
        patternSymbol({
          name: match[1],
          kind: "function",
          startLine: line,
          endLine: findIndentedBlockEnd(lines, line),
          exported: isPythonPublic(match[1]),
          parameters,
          returnType,
          signature: renderDef(match[1], parameters, returnType),
          filePath,
        })
      );
    }

    for (const { match, line } of scan(METHOD, source)) {
      const owner = enclosingContainer(classes, line);
      if (!owner || owner.memberIndent !== match[1]) continue;

      const parameters = dropReceiver(splitParameters(match[3]));
      const returnType = collapseWhitespace(match[4] ?? "");
      symbols.push(
        patternSymbol({
          name: match[2],
          kind: "method",
          startLine: line,
          endLine: findIndentedBlockEnd(lines, line),
          exported: owner.exported && isPythonPublic(match[2]),
          parameters,
          returnType,
          signature: renderDef(match[2], parameters, returnType),
          parent: owner.name,
          filePath,
        })
      );
    }

    for (const { match, line } of scan(CONSTANT, source)) {
      symbols.push(patternSymbol({ name: match[1], kind: "constant", startLine: line, exported: isPythonPublic(match[1]), filePath }));
    }

    return Ok(symbols);
  }
}

function renderDef(name: string, parameters: string[], returnType: string): string {
  return `def ${name}(${parameters.join(", ")})${returnType ? ` -> ${returnType}` : ""}`;
}

function dropReceiver(parameters: string[]): string[] {
  const first = parameters[0];
  if (first === "self" || first === "cls") {
    return parameters.slice(1);
  }
  return parameters;
}

function firstBodyIndent(lines: readonly string[], startLine: number): string | undefined {
  for (let i = startLine; i < lines.length; i++) {
    if (lines[i].trim() !== "") {
      return indentOf(lines[i]);
    }
  }
  return undefined;
}
