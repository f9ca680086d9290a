import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { BreakingChangeDetector } from "../core/services/BreakingChangeDetector.js";
import type { ImpactAnalyzer } from "../core/services/ImpactAnalyzer.js";
import type { WorkspaceIndexer } from "../infrastructure/WorkspaceIndexer.js";

export interface Services {
  detector: BreakingChangeDetector;
  analyzer: ImpactAnalyzer;
  indexer: WorkspaceIndexer;
}

export interface ToolRegistrar {
  (server: McpServer, services: Services): void;
}
