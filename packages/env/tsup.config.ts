import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
  },
  format: ["esm"],
  target: "node20",
  dts: false,
  sourcemap: true,
  external: ["@env-accessor/core"],
  clean: true,
});
