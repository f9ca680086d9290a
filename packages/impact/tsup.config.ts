import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/server.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  sourcemap: true,
  // Workspace packages export TypeScript sources, so they are bundled in
  noExternal: [/^@api-drift\//],
  external: ["tree-sitter", "tree-sitter-go"],
});
