import * as z from "zod/v4";
import { ToolResponse, errorResponse } from "@api-drift/core";

import { SymbolOutput, SymbolSchema, displayName, toSymbolOutput } from "./schemas.js";
import type { ToolRegistrar } from "./types.js";

interface GetFileSymbolsInput {
  file_path: string;
}

interface GetFileSymbolsOutput extends Record<string, unknown> {
  success: boolean;
  error?: string;
  filePath?: string;
  symbols?: SymbolOutput[];
  dependents?: string[];
}

export const registerGetFileSymbols: ToolRegistrar = (server, { analyzer }) => {
  server.registerTool(
    "get_file_symbols",
    {
      title: "Get file symbols",
      description: `List the symbols an indexed file declares and the files that reference them.`,
      inputSchema: {
        file_path: z.string().describe("Path of an indexed file"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        filePath: z.string().optional(),
        symbols: z.array(SymbolSchema).optional(),
        dependents: z.array(z.string()).optional(),
      },
    },
    async (input: GetFileSymbolsInput): Promise<ToolResponse<GetFileSymbolsOutput>> => {
      if (analyzer.stats().files === 0) {
        return errorResponse("No files indexed. Call index_files or index_file first.");
      }

      const symbols = analyzer.getSymbolsInFile(input.file_path);
      const dependents = analyzer.getDependents(input.file_path);
      const lines = [`${input.file_path}: ${symbols.length} symbol(s)`];
      for (const symbol of symbols) {
        const visibility = symbol.exported ? "exported" : "internal";
        lines.push(`  L${symbol.startLine}-${symbol.endLine} ${symbol.kind} ${displayName(symbol)} (${visibility})`);
      }
      if (dependents.length > 0) {
        lines.push("", `Referenced from: ${dependents.join(", ")}`);
      }

      return {
        content: [{ type: "text", text: lines.join("\n") }],
        structuredContent: {
          success: true,
          filePath: input.file_path,
          symbols: symbols.map(toSymbolOutput),
          dependents,
        },
      };
    }
  );
};
