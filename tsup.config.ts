import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/cli.ts"],
  outDir: "dist",
  dts: { entry: "src/index.ts" },
  format: "esm",
  target: "node20",
  clean: true,
  banner: { js: "/* eslint-disable */" },
  footer: { js: "/* eslint-enable */" },
});
