import { Err, Ok, Result, tryCatch, tryCatchAsync } from "@api-drift/core";
import Parser from "tree-sitter";

import { CodeSymbol, Language, LanguageId, ParseFailure, SymbolKind, SyntaxErrorLocation } from "../../core/model.js";
import type { LanguageExtractor } from "../../core/ports/LanguageExtractor.js";
import { receiverTypeName, renderParameters, renderResultSuffix, renderResults, renderTokens, renderType } from "./goRender.js";

type SyntaxNode = Parser.SyntaxNode;

// Tree-sitter language type (uses any in the typings)
type TreeSitterLanguage = unknown;

let grammar: Promise<TreeSitterLanguage> | undefined;

function loadGrammar(): Promise<TreeSitterLanguage> {
  grammar ??= import("tree-sitter-go").then((mod) => mod.default);
  return grammar;
}

const EXPORTED_NAME = /^\p{Lu}/u;

/** tree-sitter's own default; larger inputs need a buffer that holds the whole source. */
const MIN_BUFFER_SIZE = 32 * 1024;

/**
 * Go extraction over a tree-sitter syntax tree.
 *
 * Only top-level declarations are reported. Input with any syntax error is
 * rejected as a whole, so callers never see a partial symbol list.
 */
export class GoSyntaxExtractor implements LanguageExtractor {
  readonly languages: readonly LanguageId[] = ["go"];
  private readonly parser = new Parser();

  async extract(source: string, filePath: string, _language: Language): Promise<Result<CodeSymbol[], Error>> {
    const language = await tryCatchAsync(loadGrammar);
    if (!language.ok) {
      return language;
    }

    const parsed = tryCatch(() => {
      this.parser.setLanguage(language.value);
      return this.parser.parse(source, undefined, { bufferSize: Math.max(MIN_BUFFER_SIZE, source.length * 2) });
    });
    if (!parsed.ok) {
      return parsed;
    }
    const tree = parsed.value;

    const errors = extractErrors(tree.rootNode);
    if (errors.length > 0) {
      return Err(new ParseFailure(filePath, errors));
    }

    const symbols: CodeSymbol[] = [];
    for (const node of tree.rootNode.namedChildren) {
      switch (node.type) {
        case "function_declaration":
        case "method_declaration": {
          const symbol = extractFunction(node, filePath);
          if (symbol) symbols.push(symbol);
          break;
        }
        case "type_declaration":
          symbols.push(...extractTypes(node, filePath));
          break;
        case "const_declaration":
          symbols.push(...extractValues(node, "constant", filePath));
          break;
        case "var_declaration":
          symbols.push(...extractValues(node, "variable", filePath));
          break;
      }
    }

    return Ok(symbols);
  }
}

/**
 * Collect ERROR and MISSING nodes as 1-indexed locations.
 */
export function extractErrors(root: SyntaxNode): SyntaxErrorLocation[] {
  const errors: SyntaxErrorLocation[] = [];

  function traverse(n: SyntaxNode): void {
    if (n.type === "ERROR" || n.isMissing) {
      errors.push({
        line: n.startPosition.row + 1,
        column: n.startPosition.column + 1,
        message: n.isMissing ? `Missing ${n.type}` : "Syntax error",
      });
    }
    for (const child of n.children) {
      traverse(child);
    }
  }

  traverse(root);
  return errors;
}

function lineOf(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

function isExported(name: string): boolean {
  return EXPORTED_NAME.test(name);
}

function extractFunction(node: SyntaxNode, filePath: string): CodeSymbol | undefined {
  const nameNode = node.childForFieldName("name");
  if (!nameNode) return undefined;

  const name = nameNode.text;
  const parameters = renderParameters(node.childForFieldName("parameters"));
  const results = renderResults(node.childForFieldName("result"));
  const typeParameters = renderTokens(node.childForFieldName("type_parameters"));

  let parent = "";
  let receiver = "";
  const receiverList = node.childForFieldName("receiver");
  if (node.type === "method_declaration" && receiverList) {
    const decl = receiverList.namedChildren.find((c) => c.type === "parameter_declaration");
    if (decl) {
      parent = receiverTypeName(decl.childForFieldName("type"));
      receiver = `(${renderParameters(receiverList).join(", ")}) `;
    }
  }

  return {
    name,
    kind: parent ? "method" : "function",
    startLine: lineOf(node),
    endLine: node.endPosition.row + 1,
    signature: `func ${receiver}${name}${typeParameters}(${parameters.join(", ")})${renderResultSuffix(results)}`,
    exported: isExported(name),
    parameters,
    returnType: results.join(", "),
    parent,
    filePath,
  };
}

function typeKind(type: SyntaxNode | null): SymbolKind {
  if (type?.type === "struct_type") return "struct";
  if (type?.type === "interface_type") return "interface";
  return "type";
}

function extractTypes(node: SyntaxNode, filePath: string): CodeSymbol[] {
  const symbols: CodeSymbol[] = [];

  for (const spec of node.namedChildren) {
    if (spec.type !== "type_spec" && spec.type !== "type_alias") continue;

    const nameNode = spec.childForFieldName("name");
    if (!nameNode) continue;

    const name = nameNode.text;
    const type = spec.childForFieldName("type");
    const typeParameters = renderTokens(spec.childForFieldName("type_parameters"));
    const separator = spec.type === "type_alias" ? " = " : " ";

    symbols.push({
      name,
      kind: spec.type === "type_alias" ? "type" : typeKind(type),
      startLine: lineOf(spec),
      endLine: spec.endPosition.row + 1,
      signature: `type ${name}${typeParameters}${separator}${renderType(type)}`,
      exported: isExported(name),
      parameters: [],
      returnType: "",
      parent: "",
      filePath,
    });
  }

  return symbols;
}

function valueSpecs(node: SyntaxNode): SyntaxNode[] {
  const specs: SyntaxNode[] = [];
  for (const child of node.namedChildren) {
    if (child.type === "const_spec" || child.type === "var_spec") {
      specs.push(child);
    } else if (child.type === "var_spec_list") {
      specs.push(...child.namedChildren.filter((c) => c.type === "var_spec"));
    }
  }
  return specs;
}

function extractValues(node: SyntaxNode, kind: "constant" | "variable", filePath: string): CodeSymbol[] {
  const keyword = kind === "constant" ? "const" : "var";
  const symbols: CodeSymbol[] = [];

  for (const spec of valueSpecs(node)) {
    const type = renderType(spec.childForFieldName("type"));
    for (const nameNode of spec.namedChildren.filter((c) => c.type === "identifier")) {
      const name = nameNode.text;
      const line = lineOf(nameNode);
      symbols.push({
        name,
        kind,
        startLine: line,
        endLine: line,
        signature: type ? `${keyword} ${name} ${type}` : `${keyword} ${name}`,
        exported: isExported(name),
        parameters: [],
        returnType: "",
        parent: "",
        filePath,
      });
    }
  }

  return symbols;
}
