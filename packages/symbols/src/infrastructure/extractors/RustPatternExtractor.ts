/**
 * Pattern-based extraction for Rust.
 * `impl` and `trait` blocks are scanned for the methods they own.
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

const VIS = String.raw`(pub(?:\s*\([^)]*\))?\s+)?`;
const FN_HEAD = String.raw`(?:const\s+)?(?:async\s+)?(?:unsafe\s+)?(?:extern\s+"[^"]*"\s+)?fn\s+(\w+)\s*(?:<[^>]*>)?\s*\(([^)]*)\)(?:\s*->\s*([^{;\n]+))?`;

const STRUCT = new RegExp(String.raw`^${VIS}struct\s+(\w+)`, "gm");
const ENUM = new RegExp(String.raw`^${VIS}enum\s+(\w+)`, "gm");
const TRAIT = new RegExp(String.raw`^${VIS}(?:unsafe\s+)?trait\s+(\w+)`, "gm");
const CONST = new RegExp(String.raw`^${VIS}const\s+(\w+)`, "gm");
const STATIC = new RegExp(String.raw`^${VIS}static\s+(?:mut\s+)?(\w+)`, "gm");
const TYPE_ALIAS = new RegExp(String.raw`^${VIS}type\s+(\w+)`, "gm");
const FUNCTION = new RegExp(String.raw`^${VIS}${FN_HEAD}`, "gm");
const METHOD = new RegExp(String.raw`^[ \t]+${VIS}${FN_HEAD}`, "gm");
const IMPL = /^(?:unsafe\s+)?impl(?:\s*<[^>]*>)?\s+(?:([\w:]+)(?:<[^>]*>)?\s+for\s+)?(\w+)/gm;

const DECLARATIONS: Array<[RegExp, SymbolKind]> = [
  [STRUCT, "struct"],
  [ENUM, "type"],
  [TRAIT, "interface"],
  [TYPE_ALIAS, "type"],
  [CONST, "constant"],
  [STATIC, "variable"],
];

export class RustPatternExtractor implements LanguageExtractor {
  readonly languages: readonly LanguageId[] = ["rust"];

  async extract(source: string, filePath: string, _language: Language): Promise<Result<CodeSymbol[], Error>> {
    const lines = source.split("\n");
    const symbols: CodeSymbol[] = [];
    const owners: Container[] = [];

    for (const [pattern, kind] of DECLARATIONS) {
      for (const { match, line } of scan(pattern, source)) {
        const blockLike = kind === "struct" || kind === "interface" || pattern === ENUM;
        const endLine = blockLike ? findBlockEnd(lines, line) : line;
        const exported = match[1] !== undefined;
        symbols.push(patternSymbol({ name: match[2], kind, startLine: line, endLine, exported, filePath }));

        if (kind === "interface") {
          owners.push({ name: match[2], startLine: line, endLine, exported, membersPublic: true });
        }
      }
    }

    for (const { match, line } of scan(IMPL, source)) {
      owners.push({
        name: match[2],
        startLine: line,
        endLine: findBlockEnd(lines, line),
        exported: true,
        membersPublic: match[1] !== undefined,
      });
    }

    for (const { match, line } of scan(FUNCTION, source)) {
      const parameters = splitParameters(match[3]);
      const returnType = cleanReturnType(match[4]);
      symbols.push(
        patternSymbol({
          name: match[2],
          kind: "function",
          startLine: line,
          endLine: findBlockEnd(lines, line),
          exported: match[1] !== undefined,
          parameters,
          returnType,
          signature: renderFn(match[2], parameters, returnType),
          filePath,
        })
      );
    }

    for (const { match, line } of scan(METHOD, source)) {
      const owner = enclosingContainer(owners, line);
      if (!owner) continue;

      const parameters = dropSelf(splitParameters(match[3]));
      const returnType = cleanReturnType(match[4]);
      const exported = owner.membersPublic ? owner.exported : match[1] !== undefined;
      symbols.push(
        patternSymbol({
          name: match[2],
          kind: "method",
          startLine: line,
          endLine: findBlockEnd(lines, line),
          exported,
          parameters,
          returnType,
          signature: renderFn(match[2], parameters, returnType),
          parent: owner.name,
          filePath,
        })
      );
    }

    return Ok(symbols);
  }
}

function renderFn(name: string, parameters: string[], returnType: string): string {
  return `fn ${name}(${parameters.join(", ")})${returnType ? ` -> ${returnType}` : ""}`;
}

/**
 * Trim a captured return type and drop a trailing where-clause.
 */
function cleanReturnType(raw: string | undefined): string {
  if (!raw) return "";
  return collapseWhitespace(raw.replace(/\bwhere\b[\s\S]*$/, ""));
}

function dropSelf(parameters: string[]): string[] {
  const first = parameters[0];
  if (first !== undefined && /^(&\s*('\w+\s+)?)?(mut\s+)?self\b/.test(first)) {
    return parameters.slice(1);
  }
  return parameters;
}
