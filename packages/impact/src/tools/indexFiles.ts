import * as z from "zod/v4";
import { resultToStructuredResponse } from "@api-drift/core";

import { DEFAULT_INDEX_GLOB, IndexFailure } from "../infrastructure/WorkspaceIndexer.js";
import type { ToolRegistrar } from "./types.js";

interface IndexFilesInput {
  root?: string;
  pattern?: string;
}

interface IndexFilesOutput extends Record<string, unknown> {
  root: string;
  indexed: number;
  failures: IndexFailure[];
  files: number;
  symbols: number;
  references: number;
}

export const registerIndexFiles: ToolRegistrar = (server, { analyzer, indexer }) => {
  server.registerTool(
    "index_files",
    {
      title: "Index files",
      description: `Index every file matching a glob under a root directory.

node_modules, dist, .git, vendor and target directories are skipped. Paths are
recorded relative to the root. Files that fail to parse are reported and skipped.`,
      inputSchema: {
        root: z.string().optional().describe("Directory to scan (default: current working directory)"),
        pattern: z.string().optional().describe(`Glob relative to root (default: ${DEFAULT_INDEX_GLOB})`),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        root: z.string().optional(),
        indexed: z.number().optional(),
        failures: z.array(z.object({ filePath: z.string(), error: z.string() })).optional(),
        files: z.number().optional(),
        symbols: z.number().optional(),
        references: z.number().optional(),
      },
    },
    async (input: IndexFilesInput) => {
      const result = await indexer.indexDirectory(input.root ?? process.cwd(), input.pattern ?? DEFAULT_INDEX_GLOB);

      return resultToStructuredResponse(result, (summary) => {
        const stats = analyzer.stats();
        const lines = [`Indexed ${summary.indexed.length} file(s) under ${summary.root}`];
        for (const failure of summary.failures) {
          lines.push(`  failed: ${failure.filePath} - ${failure.error}`);
        }
        lines.push(`Index: ${stats.files} files, ${stats.symbols} symbols, ${stats.references} references`);

        return {
          text: lines.join("\n"),
          data: {
            root: summary.root,
            indexed: summary.indexed.length,
            failures: summary.failures,
            ...stats,
          } satisfies IndexFilesOutput,
        };
      });
    }
  );
};
