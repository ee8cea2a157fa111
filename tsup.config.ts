import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/cli.ts"],
  format: ["esm"], // Build only ESM format
  dts: { entry: "src/index.ts" },
  splitting: true,
  sourcemap: true,
  clean: true,
});
