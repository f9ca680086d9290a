/**
 * Pattern-based extraction for Java.
 * Constructors are skipped: the method form requires a return type.
 */

import { Ok, Result } from "@api-drift/core";

import type { CodeSymbol, Language, LanguageId, SymbolKind } from "../../core/model.js";
import type { LanguageExtractor } from "../../core/ports/LanguageExtractor.js";
import {
  Container,
  collapseWhitespace,
  enclosingContainer,
  findBlockEnd,
  patternSymbol,
  scan,
  splitParameters,
} from "./patterns.js";

const MODIFIERS = String.raw`((?:(?:public|protected|private|abstract|final|static|sealed|non-sealed|strictfp)\s+)*)`;

const CLASS = new RegExp(String.raw`^[ \t]*${MODIFIERS}(?:class|record)\s+(\w+)`, "gm");
const INTERFACE = new RegExp(String.raw`^[ \t]*${MODIFIERS}interface\s+(\w+)`, "gm");
const ENUM = new RegExp(String.raw`^[ \t]*${MODIFIERS}enum\s+(\w+)`, "gm");
const METHOD =
  /^[ \t]+((?:(?:public|private|protected|static|final|abstract|synchronized|native|default)\s+)+)(?:<[^>]*>\s+)?([\w.]+(?:<[^>]*>)?(?:\[\])*)\s+(\w+)\s*\(([^)]*)\)/gm;

const TYPES: Array<[RegExp, SymbolKind]> = [
  [CLASS, "class"],
  [INTERFACE, "interface"],
  [ENUM, "type"],
];

export class JavaPatternExtractor implements LanguageExtractor {
  readonly languages: readonly LanguageId[] = ["java"];

  async extract(source: string, filePath: string, _language: Language): Promise<Result<CodeSymbol[], Error>> {
    const lines = source.split("\n");
    const symbols: CodeSymbol[] = [];
    const owners: Container[] = [];

    for (const [pattern, kind] of TYPES) {
      for (const { match, line } of scan(pattern, source)) {
        const endLine = findBlockEnd(lines, line);
        const exported = /\bpublic\b/.test(match[1]);
        symbols.push(patternSymbol({ name: match[2], kind, startLine: line, endLine, exported, filePath }));
        owners.push({ name: match[2], startLine: line, endLine, exported });
      }
    }

    for (const { match, line } of scan(METHOD, source)) {
      const owner = enclosingContainer(owners, line);
      if (!owner) continue;

      const name = match[3];
      const returnType = collapseWhitespace(match[2]);
      const parameters = splitParameters(match[4]);
      symbols.push(
        patternSymbol({
          name,
          kind: "method",
          startLine: line,
          endLine: findBlockEnd(lines, line),
          exported: /\bpublic\b/.test(match[1]),
          parameters,
          returnType,
          signature: `${returnType} ${name}(${parameters.join(", ")})`,
          parent: owner.name,
          filePath,
        })
      );
    }

    return Ok(symbols);
  }
}
