/**
 * Core domain types for the symbols package.
 */

export type SymbolKind =
  | "function"
  | "method"
  | "class"
  | "interface"
  | "struct"
  | "variable"
  | "constant"
  | "type"
  | "import";

/** Kinds that take parameters. */
export const CALLABLE_KINDS: ReadonlySet<SymbolKind> = new Set(["function", "method"]);

/**
 * A named declaration found in source text.
 * Symbols are created by one extraction call and never mutated afterwards.
 */
export interface CodeSymbol {
  /** Declared name (e.g. "GetUser", "UserService") */
  name: string;
  kind: SymbolKind;
  /** 1-indexed first line of the declaration */
  startLine: number;
  /** 1-indexed last line; equals startLine when only the start is known */
  endLine: number;
  /** Rendered declaration, for display and coarse change detection */
  signature: string;
  /** Whether the symbol belongs to the file's public surface */
  exported: boolean;
  /** Ordered parameters, each "name type" or just "type" */
  parameters: string[];
  /** Return type; multiple results are joined with ", " */
  returnType: string;
  /** Owner type for methods, "" otherwise */
  parent: string;
  filePath: string;
}

export type LanguageId = "go" | "typescript" | "javascript" | "python" | "rust" | "java";

export interface Language {
  id: LanguageId;
  name: string;
  extensions: string[];
  /** "syntax" languages have a real parser and can fail on invalid input */
  strategy: "syntax" | "pattern";
  /** Whether one scope may declare several callables under the same name */
  overloading: boolean;
}

export const LANGUAGES: Record<LanguageId, Language> = {
  go: {
    id: "go",
    name: "Go",
    extensions: [".go"],
    strategy: "syntax",
    overloading: false,
  },
  typescript: {
    id: "typescript",
    name: "TypeScript",
    extensions: [".ts", ".tsx", ".mts", ".cts"],
    strategy: "pattern",
    overloading: true,
  },
  javascript: {
    id: "javascript",
    name: "JavaScript",
    extensions: [".js", ".jsx", ".mjs", ".cjs"],
    strategy: "pattern",
    overloading: false,
  },
  python: {
    id: "python",
    name: "Python",
    extensions: [".py", ".pyi"],
    strategy: "pattern",
    overloading: false,
  },
  rust: {
    id: "rust",
    name: "Rust",
    extensions: [".rs"],
    strategy: "pattern",
    overloading: false,
  },
  java: {
    id: "java",
    name: "Java",
    extensions: [".java"],
    strategy: "pattern",
    overloading: true,
  },
};

/**
 * Detect language from file path extension.
 */
export function detectLanguage(filePath: string): Language | undefined {
  const dot = filePath.lastIndexOf(".");
  if (dot < 0 || dot < filePath.lastIndexOf("/")) return undefined;

  const ext = filePath.slice(dot).toLowerCase();
  for (const lang of Object.values(LANGUAGES)) {
    if (lang.extensions.includes(ext)) {
      return lang;
    }
  }
  return undefined;
}

/**
 * Language id for a file, or "" when the extension is not supported.
 */
export function languageIdForFile(filePath: string): LanguageId | "" {
  return detectLanguage(filePath)?.id ?? "";
}

/**
 * Identity of a declaration across two revisions of a file.
 */
export function symbolKey(symbol: Pick<CodeSymbol, "name" | "kind" | "parent">): string {
  return `${symbol.name}:${symbol.kind}:${symbol.parent}`;
}

/**
 * 1-indexed position of a syntax error.
 */
export interface SyntaxErrorLocation {
  line: number;
  column: number;
  message: string;
}

/**
 * Raised (as an Err value) when a syntax-parsed language cannot be parsed.
 */
export class ParseFailure extends Error {
  constructor(
    readonly filePath: string,
    readonly locations: SyntaxErrorLocation[]
  ) {
    const first = locations[0];
    const where = first ? ` (first at ${first.line}:${first.column})` : "";
    super(`${filePath}: ${locations.length} syntax error(s)${where}`);
    this.name = "ParseFailure";
  }
}
