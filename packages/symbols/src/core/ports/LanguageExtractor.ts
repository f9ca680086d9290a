import type { Result } from "@api-drift/core";

import type { CodeSymbol, Language, LanguageId } from "../model.js";

/**
 * Port for turning the source of one file into symbols.
 *
 * A pattern-based implementation can be replaced by a syntax-based one for the
 * same language without touching the detector or the analyzer.
 */
export interface LanguageExtractor {
  /** Languages this extractor handles */
  readonly languages: readonly LanguageId[];

  /**
   * Extract symbols from source text.
   *
   * @param source - File contents
   * @param filePath - Recorded on every symbol
   * @param language - The detected language, one of `languages`
   */
  extract(source: string, filePath: string, language: Language): Promise<Result<CodeSymbol[], Error>>;
}
