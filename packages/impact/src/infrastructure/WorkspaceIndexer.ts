import { readFile } from "fs/promises";
import { join } from "path";

import { Err, Ok, Result, toError } from "@api-drift/core";
import { LANGUAGES } from "@api-drift/symbols";
import { glob } from "glob";

import type { ImpactAnalyzer } from "../core/services/ImpactAnalyzer.js";

/** Every extension a registered language claims. */
export const DEFAULT_INDEX_GLOB = `**/*.{${Object.values(LANGUAGES)
  .flatMap((language) => language.extensions.map((ext) => ext.slice(1)))
  .join(",")}}`;

export const DEFAULT_INDEX_IGNORE = ["**/node_modules/**", "**/dist/**", "**/.git/**", "**/vendor/**", "**/target/**"];

export interface IndexFailure {
  filePath: string;
  error: string;
}

export interface WorkspaceIndexResult {
  root: string;
  indexed: string[];
  failures: IndexFailure[];
}

/**
 * Feeds files from disk into an ImpactAnalyzer.
 * Paths are recorded relative to the scanned root, with forward slashes.
 */
export class WorkspaceIndexer {
  constructor(private readonly analyzer: ImpactAnalyzer) {}

  async indexDirectory(root: string, pattern: string = DEFAULT_INDEX_GLOB): Promise<Result<WorkspaceIndexResult, Error>> {
    let files: string[];
    try {
      files = await glob(pattern, { cwd: root, nodir: true, posix: true, ignore: DEFAULT_INDEX_IGNORE });
    } catch (error) {
      return Err(toError(error));
    }
    files.sort();

    const indexed: string[] = [];
    const failures: IndexFailure[] = [];

    for (const file of files) {
      let content: string;
      try {
        content = await readFile(join(root, file), "utf-8");
      } catch (error) {
        failures.push({ filePath: file, error: toError(error).message });
        continue;
      }

      const result = await this.analyzer.indexFile(file, content);
      if (result.ok) {
        indexed.push(file);
      } else {
        failures.push({ filePath: file, error: result.error.message });
      }
    }

    return Ok({ root, indexed, failures });
  }
}
