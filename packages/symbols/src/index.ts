import type { Result } from "@api-drift/core";

import type { CodeSymbol } from "./core/model.js";
import type { SymbolExtractor } from "./core/services/SymbolExtractor.js";
import { createSymbolExtractor } from "./infrastructure/index.js";

// Core types and utilities
export {
  CALLABLE_KINDS,
  LANGUAGES,
  ParseFailure,
  detectLanguage,
  languageIdForFile,
  symbolKey,
} from "./core/model.js";
export type { CodeSymbol, Language, LanguageId, SymbolKind, SyntaxErrorLocation } from "./core/model.js";
export type { LanguageExtractor } from "./core/ports/LanguageExtractor.js";
export { SymbolExtractor } from "./core/services/SymbolExtractor.js";

// Infrastructure implementations
export * from "./infrastructure/index.js";

let defaultExtractor: SymbolExtractor | undefined;

/**
 * Extract symbols from one file with the default extractor set.
 */
export function extractSymbols(filePath: string, source: string): Promise<Result<CodeSymbol[], Error>> {
  defaultExtractor ??= createSymbolExtractor();
  return defaultExtractor.extract(filePath, source);
}
