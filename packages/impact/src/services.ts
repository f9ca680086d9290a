import { createSymbolExtractor } from "@api-drift/symbols";

import type { ImpactAnalyzerOptions } from "./core/model.js";
import { BreakingChangeDetector } from "./core/services/BreakingChangeDetector.js";
import { ImpactAnalyzer } from "./core/services/ImpactAnalyzer.js";
import { WorkspaceIndexer } from "./infrastructure/WorkspaceIndexer.js";
import type { Services } from "./tools/types.js";

/**
 * Wire a detector, an analyzer session and an indexer over one extractor.
 */
export function createServices(options: ImpactAnalyzerOptions = {}): Services {
  const extractor = createSymbolExtractor();
  const analyzer = new ImpactAnalyzer(extractor, options);

  return {
    detector: new BreakingChangeDetector(extractor),
    analyzer,
    indexer: new WorkspaceIndexer(analyzer),
  };
}

/**
 * Start a standalone analysis session with the default extractor set.
 */
export function createImpactAnalyzer(options: ImpactAnalyzerOptions = {}): ImpactAnalyzer {
  return new ImpactAnalyzer(createSymbolExtractor(), options);
}

export function createBreakingChangeDetector(): BreakingChangeDetector {
  return new BreakingChangeDetector(createSymbolExtractor());
}
