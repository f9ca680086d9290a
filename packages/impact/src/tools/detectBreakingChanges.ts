import * as z from "zod/v4";
import { resultToStructuredResponse } from "@api-drift/core";

import { formatBreakingChangeReport } from "../core/format.js";
import { BreakingChangeOutput, BreakingChangeSchema, toBreakingChangeOutput } from "./schemas.js";
import type { ToolRegistrar } from "./types.js";

interface DetectBreakingChangesInput {
  file_path: string;
  old_content: string;
  new_content: string;
}

interface DetectBreakingChangesOutput extends Record<string, unknown> {
  filePath: string;
  hasBreaking: boolean;
  totalChanges: number;
  criticalCount: number;
  errorCount: number;
  warningCount: number;
  summary: string;
  changes: BreakingChangeOutput[];
}

export const registerDetectBreakingChanges: ToolRegistrar = (server, { detector }) => {
  server.registerTool(
    "detect_breaking_changes",
    {
      title: "Detect breaking changes",
      description: `Compare two revisions of one file and report changes to its public API.

Flags removed exported symbols, exported -> unexported visibility changes, added
required parameters, changed parameter and return types, and other signature changes.
Additions are never breaking. Unexported symbols are ignored.

The old revision may be empty or invalid (treated as a new file); the new revision must parse.`,
      inputSchema: {
        file_path: z.string().describe("Path of the file; its extension selects the language"),
        old_content: z.string().describe("Previous file contents"),
        new_content: z.string().describe("Updated file contents"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        filePath: z.string().optional(),
        hasBreaking: z.boolean().optional(),
        totalChanges: z.number().optional(),
        criticalCount: z.number().optional(),
        errorCount: z.number().optional(),
        warningCount: z.number().optional(),
        summary: z.string().optional(),
        changes: z.array(BreakingChangeSchema).optional(),
      },
    },
    async (input: DetectBreakingChangesInput) => {
      const result = await detector.detect(input.old_content, input.new_content, input.file_path);

      return resultToStructuredResponse(result, (report) => ({
        text: formatBreakingChangeReport(report) || report.summary,
        data: {
          filePath: report.filePath,
          hasBreaking: report.hasBreaking,
          totalChanges: report.totalChanges,
          criticalCount: report.criticalCount,
          errorCount: report.errorCount,
          warningCount: report.warningCount,
          summary: report.summary,
          changes: report.changes.map(toBreakingChangeOutput),
        } satisfies DetectBreakingChangesOutput,
      }));
    }
  );
};
