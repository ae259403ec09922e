import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/**/*.ts", "!src/**/*.d.ts"],
  format: ["esm"],
  dts: true,
  clean: true,
  splitting: false,
  // Unbundled so dist/qpack/static-table.js keeps finding ../../data/static-table.json
  bundle: false,
  outDir: "dist",
});
