// Core types and utilities
export * from "./core/model.js";
export { diffSymbols, parametersEqual, symbolChanged } from "./core/symbolDiff.js";
export type { DiffOptions, SymbolDiff, SymbolPair } from "./core/symbolDiff.js";
export { formatBreakingChangeReport, formatImpactReport, getBreakingChanges, isBreaking } from "./core/format.js";

// Services
export { BreakingChangeDetector, buildReport, compareSymbols } from "./core/services/BreakingChangeDetector.js";
export { ImpactAnalyzer, describeChange, escalate } from "./core/services/ImpactAnalyzer.js";
export type { SymbolChange } from "./core/services/ImpactAnalyzer.js";
export { SymbolIndex } from "./core/services/SymbolIndex.js";
export { createBreakingChangeDetector, createImpactAnalyzer, createServices } from "./services.js";

// Infrastructure implementations
export { DEFAULT_INDEX_GLOB, DEFAULT_INDEX_IGNORE, WorkspaceIndexer } from "./infrastructure/WorkspaceIndexer.js";
export type { IndexFailure, WorkspaceIndexResult } from "./infrastructure/WorkspaceIndexer.js";

// Tool exports
export { registerAllTools } from "./tools/index.js";
export type { Services } from "./tools/index.js";
