import { readFile } from "fs/promises";

import * as z from "zod/v4";
import { Ok, Result, resultToStructuredResponse, tryCatchAsync } from "@api-drift/core";

import { SymbolOutput, SymbolSchema, toSymbolOutput } from "./schemas.js";
import type { ToolRegistrar } from "./types.js";

interface IndexFileInput {
  file_path: string;
  content?: string;
}

interface IndexFileOutput extends Record<string, unknown> {
  filePath: string;
  symbolCount: number;
  symbols: SymbolOutput[];
}

async function loadContent(input: IndexFileInput): Promise<Result<string, Error>> {
  if (input.content !== undefined) {
    return Ok(input.content);
  }
  return tryCatchAsync(() => readFile(input.file_path, "utf-8"));
}

export const registerIndexFile: ToolRegistrar = (server, { analyzer }) => {
  server.registerTool(
    "index_file",
    {
      title: "Index file",
      description: `Add one file to the impact index, replacing any earlier version of it.

Pass content to index unsaved text; otherwise the file is read from disk.
Files in unsupported languages are indexed for references but contribute no symbols.`,
      inputSchema: {
        file_path: z.string().describe("Path recorded for the file"),
        content: z.string().optional().describe("File contents (default: read file_path from disk)"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        filePath: z.string().optional(),
        symbolCount: z.number().optional(),
        symbols: z.array(SymbolSchema).optional(),
      },
    },
    async (input: IndexFileInput) => {
      const content = await loadContent(input);
      const result = content.ok ? await analyzer.indexFile(input.file_path, content.value) : content;

      return resultToStructuredResponse(result, (symbols) => ({
        text: `Indexed ${input.file_path}: ${symbols.length} symbol(s)`,
        data: {
          filePath: input.file_path,
          symbolCount: symbols.length,
          symbols: symbols.map(toSymbolOutput),
        } satisfies IndexFileOutput,
      }));
    }
  );
};
