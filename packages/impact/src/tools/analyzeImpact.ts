import * as z from "zod/v4";
import { resultToStructuredResponse } from "@api-drift/core";

import { formatImpactReport } from "../core/format.js";
import type { ImpactSeverity } from "../core/model.js";
import { ImpactOutput, ImpactSchema, toImpactOutput } from "./schemas.js";
import type { ToolRegistrar } from "./types.js";

interface AnalyzeImpactInput {
  file_path: string;
  old_content: string;
  new_content: string;
}

interface AnalyzeImpactOutput extends Record<string, unknown> {
  filePath: string;
  overallSeverity: ImpactSeverity;
  totalReferences: number;
  affectedFiles: string[];
  impacts: ImpactOutput[];
}

export const registerAnalyzeImpact: ToolRegistrar = (server, { analyzer }) => {
  server.registerTool(
    "analyze_impact",
    {
      title: "Analyze impact",
      description: `Find which indexed files are affected by a change to one file.

Compares the two revisions, then looks up references to every added, removed or
modified symbol in the index. Index the codebase first (index_files or index_file);
only indexed files contribute references.

Severity: removed exported symbols are critical, parameter-count and return-type
changes are high, other modifications medium, additions low. Widely referenced
symbols escalate (more than 10 references: medium -> high; more than 50: critical).`,
      inputSchema: {
        file_path: z.string().describe("Path of the changed file, as it was indexed"),
        old_content: z.string().describe("Previous file contents"),
        new_content: z.string().describe("Updated file contents"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        filePath: z.string().optional(),
        overallSeverity: z.enum(["low", "medium", "high", "critical"]).optional(),
        totalReferences: z.number().optional(),
        affectedFiles: z.array(z.string()).optional(),
        impacts: z.array(ImpactSchema).optional(),
      },
    },
    async (input: AnalyzeImpactInput) => {
      const result = await analyzer.analyzeImpact(input.old_content, input.new_content, input.file_path);

      return resultToStructuredResponse(result, (impact) => ({
        text: formatImpactReport(impact),
        data: {
          filePath: impact.filePath,
          overallSeverity: impact.overallSeverity,
          totalReferences: impact.totalReferences,
          affectedFiles: impact.affectedFiles,
          impacts: impact.impacts.map(toImpactOutput),
        } satisfies AnalyzeImpactOutput,
      }));
    }
  );
};
