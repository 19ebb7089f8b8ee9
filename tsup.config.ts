import { defineConfig } from "tsup";

// One bundle per entry: the library API and the generator script
export default defineConfig({
  entry: {
    index: "src/index.ts",
    "cli/index": "src/cli/index.ts",
  },
  format: ["esm"],
  dts: { entry: "src/index.ts" },
  sourcemap: true,
  clean: true,
  target: "node20",
  outDir: "dist",
});
