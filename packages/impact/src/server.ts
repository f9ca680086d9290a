#!/usr/bin/env node
/**
 * MCP server for breaking-change detection and impact analysis.
 */

import { resolve } from "path";

import { runServer } from "@api-drift/core";

import { DEFAULT_INDEX_GLOB } from "./infrastructure/WorkspaceIndexer.js";
import { createServices } from "./services.js";
import { Services, registerAllTools } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "api-drift:impact",
    version: "0.1.0",
  },
  createServices: () => createServices(),
  registerTools: registerAllTools,
  onStartup: async (services) => {
    const root = process.env.API_DRIFT_INDEX_ROOT;
    if (!root) return;

    const pattern = process.env.API_DRIFT_INDEX_GLOB || DEFAULT_INDEX_GLOB;
    const result = await services.indexer.indexDirectory(resolve(root), pattern);

    if (!result.ok) {
      console.error(`[impact] Startup indexing of ${root} failed:`, result.error.message);
      return;
    }

    const { indexed, failures } = result.value;
    console.error(`[impact] Indexed ${indexed.length} file(s) under ${root}`);
    for (const failure of failures) {
      console.error(`[impact] Skipped ${failure.filePath}: ${failure.error}`);
    }
  },
  onShutdown: (services) => {
    services.analyzer.close();
  },
});
