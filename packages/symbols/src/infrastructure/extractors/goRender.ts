/**
 * Canonical rendering of Go declarations from tree-sitter nodes.
 * Output depends only on tokens, so whitespace and comments never change it.
 */

import type Parser from "tree-sitter";

type SyntaxNode = Parser.SyntaxNode;

const STRING_LITERALS = new Set(["interpreted_string_literal", "raw_string_literal"]);

function members(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((child) => child.type !== "comment");
}

/**
 * Join the leaf tokens of a node with the minimum spacing needed to keep words apart.
 */
export function renderTokens(node: SyntaxNode | null): string {
  if (!node) return "";

  const tokens: string[] = [];
  const collect = (n: SyntaxNode): void => {
    if (n.type === "comment") return;
    if (n.childCount === 0 || STRING_LITERALS.has(n.type)) {
      tokens.push(n.text);
      return;
    }
    for (const child of n.children) {
      collect(child);
    }
  };
  collect(node);

  let out = "";
  for (const token of tokens) {
    if (out && (out.endsWith(",") || (/[\w"`]$/.test(out) && /^[\w"`]/.test(token)))) {
      out += " ";
    }
    out += token;
  }
  return out;
}

export function renderType(node: SyntaxNode | null): string {
  if (!node) return "";

  switch (node.type) {
    case "type_identifier":
    case "identifier":
    case "field_identifier":
    case "package_identifier":
      return node.text;
    case "pointer_type":
      return `*${renderType(node.namedChild(0))}`;
    case "parenthesized_type":
      return `(${renderType(node.namedChild(0))})`;
    case "slice_type":
      return `[]${renderType(node.childForFieldName("element"))}`;
    case "array_type":
      return `[${renderTokens(node.childForFieldName("length"))}]${renderType(node.childForFieldName("element"))}`;
    case "map_type":
      return `map[${renderType(node.childForFieldName("key"))}]${renderType(node.childForFieldName("value"))}`;
    case "channel_type":
      return `${channelPrefix(node.text)}${renderType(node.childForFieldName("value"))}`;
    case "generic_type": {
      const args = node.childForFieldName("type_arguments");
      const rendered = args ? members(args).map(renderType) : [];
      return `${renderType(node.childForFieldName("type"))}[${rendered.join(", ")}]`;
    }
    case "function_type":
      return `func(${renderParameters(node.childForFieldName("parameters")).join(", ")})${renderResultSuffix(
        renderResults(node.childForFieldName("result"))
      )}`;
    case "struct_type":
      return `struct{${structFields(node).join("; ")}}`;
    case "interface_type":
      return `interface{${members(node).map(renderInterfaceMember).join("; ")}}`;
    default:
      return renderTokens(node);
  }
}

function channelPrefix(text: string): string {
  if (text.startsWith("<-")) return "<-chan ";
  if (/^chan\s*<-/.test(text)) return "chan<- ";
  return "chan ";
}

function structFields(node: SyntaxNode): string[] {
  const list = node.namedChildren.find((child) => child.type === "field_declaration_list");
  if (!list) return [];

  return members(list).map((field) => {
    if (field.type !== "field_declaration") return renderTokens(field);

    const names = field.namedChildren.filter((c) => c.type === "field_identifier").map((c) => c.text);
    const embeddedPointer = names.length === 0 && field.children.some((c) => c.type === "*");
    const type = `${embeddedPointer ? "*" : ""}${renderType(field.childForFieldName("type"))}`;
    const tag = field.childForFieldName("tag");
    const declared = names.length > 0 ? `${names.join(", ")} ${type}` : type;
    return tag ? `${declared} ${tag.text}` : declared;
  });
}

function renderInterfaceMember(member: SyntaxNode): string {
  const name = member.childForFieldName("name");
  const parameters = member.childForFieldName("parameters");
  if (name && parameters) {
    return `${name.text}(${renderParameters(parameters).join(", ")})${renderResultSuffix(
      renderResults(member.childForFieldName("result"))
    )}`;
  }
  return renderTokens(member);
}

/**
 * Render a parameter list as "name type" entries, one per declared name.
 */
export function renderParameters(list: SyntaxNode | null): string[] {
  if (!list) return [];

  const params: string[] = [];
  for (const decl of members(list)) {
    if (decl.type === "parameter_declaration") {
      const type = renderType(decl.childForFieldName("type"));
      const names = decl.namedChildren.filter((c) => c.type === "identifier");
      if (names.length === 0) {
        params.push(type);
      } else {
        for (const name of names) {
          params.push(`${name.text} ${type}`);
        }
      }
    } else if (decl.type === "variadic_parameter_declaration") {
      const type = `...${renderType(decl.childForFieldName("type"))}`;
      const name = decl.childForFieldName("name");
      params.push(name ? `${name.text} ${type}` : type);
    }
  }
  return params;
}

/**
 * Render the result of a function: one type per declared result.
 */
export function renderResults(result: SyntaxNode | null): string[] {
  if (!result) return [];
  if (result.type !== "parameter_list") return [renderType(result)];

  const types: string[] = [];
  for (const decl of members(result)) {
    const type = renderType(decl.childForFieldName("type"));
    const count = decl.namedChildren.filter((c) => c.type === "identifier").length;
    for (let i = 0; i < Math.max(count, 1); i++) {
      types.push(type);
    }
  }
  return types;
}

export function renderResultSuffix(results: string[]): string {
  if (results.length === 0) return "";
  if (results.length === 1) return ` ${results[0]}`;
  return ` (${results.join(", ")})`;
}

/**
 * Name of the receiver's base type: `*Stack[T]` → `Stack`.
 */
export function receiverTypeName(type: SyntaxNode | null): string {
  let node = type;
  while (node && (node.type === "pointer_type" || node.type === "parenthesized_type")) {
    node = node.namedChild(0);
  }
  if (node && node.type === "generic_type") {
    node = node.childForFieldName("type");
  }
  return node ? node.text : "";
}
