import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    window: "src/window.ts",
    estimator: "src/estimator.ts",
    adapters: "src/adapters.ts",
  },
  format: ["esm", "cjs"],
  dts: true,
  splitting: true,
  clean: true,
  treeshake: true,
  sourcemap: true,
  minify: false,
  target: "node20",
});
