import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm", "cjs"],
  platform: "node",
  sourcemap: true,
  dts: true,
  clean: true,
  treeshake: true,
  minify: false,
  target: "node20",
  outDir: "dist",
});
