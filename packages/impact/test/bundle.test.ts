import { describe, it, expect } from "vitest";
import { readFile } from "fs/promises";
import config from "../tsup.config.js";

describe("server bundle", () => {
  it("inlines the workspace packages and keeps the native parser external", () => {
    expect(config).toMatchObject({
      entry: ["src/server.ts"],
      format: ["esm"],
      noExternal: [/^@api-drift\//],
      external: ["tree-sitter", "tree-sitter-go"],
    });
  });

  it("points the bin at the bundled server", async () => {
    const pkg: unknown = JSON.parse(await readFile(new URL("../package.json", import.meta.url), "utf-8"));
    expect(pkg).toMatchObject({
      bin: { "api-drift-impact": "./dist/server.js" },
      scripts: { build: "tsup" },
    });
  });
});
