import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ToolResponse } from "@api-drift/core";

import type { ImpactAnalyzer } from "../core/services/ImpactAnalyzer.js";
import { ReferenceOutput, ReferenceSchema, SymbolOutput, SymbolSchema, toReferenceOutput, toSymbolOutput } from "./schemas.js";

interface FindReferencesInput {
  symbol_name: string;
}

interface FindReferencesOutput extends Record<string, unknown> {
  success: boolean;
  symbol: string;
  definitions: SymbolOutput[];
  totalReferences: number;
  references: ReferenceOutput[];
}

export function registerFindReferences(server: McpServer, analyzer: ImpactAnalyzer): void {
  server.registerTool(
    "find_references",
    {
      title: "Find references",
      description: `Find every indexed line that mentions a symbol, outside its own definition.

Only names declared by some indexed file have references. Matching is by whole
word; comment lines are skipped. One reference is reported per file and line.`,
      inputSchema: {
        symbol_name: z.string().describe("Name of the symbol"),
      },
      outputSchema: {
        success: z.boolean(),
        symbol: z.string(),
        definitions: z.array(SymbolSchema),
        totalReferences: z.number(),
        references: z.array(ReferenceSchema),
      },
    },
    async (input: FindReferencesInput): Promise<ToolResponse<FindReferencesOutput>> => {
      const definitions = analyzer.findSymbol(input.symbol_name);
      const references = analyzer.getSymbolReferences(input.symbol_name);

      const lines = [`Found ${references.length} reference(s) to "${input.symbol_name}"`];
      if (definitions.length > 0) {
        lines.push("", "Definitions:");
        for (const def of definitions) {
          lines.push(`  ${def.filePath}:${def.startLine} - ${def.kind} ${def.name}`);
        }
      }
      if (references.length > 0) {
        lines.push("", "References:");
        for (const ref of references) {
          lines.push(`  ${ref.filePath}:${ref.line} - ${ref.context}`);
        }
      }

      return {
        content: [{ type: "text", text: lines.join("\n") }],
        structuredContent: {
          success: true,
          symbol: input.symbol_name,
          definitions: definitions.map(toSymbolOutput),
          totalReferences: references.length,
          references: references.map(toReferenceOutput),
        },
      };
    }
  );
}
