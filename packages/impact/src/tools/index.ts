import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { registerAnalyzeImpact } from "./analyzeImpact.js";
import { registerDetectBreakingChanges } from "./detectBreakingChanges.js";
import { registerFindReferences } from "./findReferences.js";
import { registerGetFileSymbols } from "./getFileSymbols.js";
import { registerIndexFile } from "./indexFile.js";
import { registerIndexFiles } from "./indexFiles.js";
import type { Services } from "./types.js";

export type { Services, ToolRegistrar } from "./types.js";

export function registerAllTools(server: McpServer, services: Services): void {
  // Single-file comparison
  registerDetectBreakingChanges(server, services);

  // Index maintenance
  registerIndexFile(server, services);
  registerIndexFiles(server, services);

  // Cross-file queries (require an index)
  registerAnalyzeImpact(server, services);
  registerFindReferences(server, services.analyzer);
  registerGetFileSymbols(server, services);
}
