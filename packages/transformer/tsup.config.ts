import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    pipeline: "src/pipeline.ts",
  },
  format: ["cjs", "esm"],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: false,
  external: ["typescript", "@pickler/core", "@pickler/derive", "@pickler/runtime"],
  cjsInterop: true,
  shims: true,
});
