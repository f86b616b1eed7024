import { defineConfig } from "tsup";

export default defineConfig({
  entry: { cli: "src/index.ts" },
  format: ["esm"],
  outDir: "dist",
  target: "node20",
  clean: true,
  // Workspace packages ship TypeScript sources, so they are bundled in.
  noExternal: [/^@berthwatch\//],
  banner: {
    js: "#!/usr/bin/env node",
  },
  outExtension: () => ({ js: ".mjs" }),
});
