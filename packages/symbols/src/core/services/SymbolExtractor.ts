/**
 * Symbol Extractor - routes a file to the extractor registered for its language.
 */

import { Ok, Result } from "@api-drift/core";

import { CodeSymbol, Language, LanguageId, detectLanguage } from "../model.js";
import type { LanguageExtractor } from "../ports/LanguageExtractor.js";

/**
 * Extracts symbols from source files of any supported language.
 *
 * Holds no per-file state, so one instance can serve concurrent callers.
 * Files with an unrecognized extension yield an empty list, never an error.
 */
export class SymbolExtractor {
  private readonly extractors = new Map<LanguageId, LanguageExtractor>();

  constructor(extractors: readonly LanguageExtractor[]) {
    for (const extractor of extractors) {
      this.register(extractor);
    }
  }

  /**
   * Register an extractor, replacing any previous one for the same languages.
   */
  register(extractor: LanguageExtractor): void {
    for (const id of extractor.languages) {
      this.extractors.set(id, extractor);
    }
  }

  async extract(filePath: string, source: string): Promise<Result<CodeSymbol[], Error>> {
    const language = this.detectLanguage(filePath);
    if (!language) {
      return Ok([]);
    }

    const extractor = this.extractors.get(language.id);
    if (!extractor) {
      return Ok([]);
    }

    return extractor.extract(source, filePath, language);
  }

  supportedLanguages(): LanguageId[] {
    return [...this.extractors.keys()];
  }

  /**
   * Detect the language of a file, if an extractor is registered for it.
   */
  detectLanguage(filePath: string): Language | undefined {
    const language = detectLanguage(filePath);
    if (!language || !this.extractors.has(language.id)) {
      return undefined;
    }
    return language;
  }
}
