import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@env-accessor/core": fromRoot("./packages/env-core/src/index.ts"),
      "@env-accessor/env": fromRoot("./packages/env/src/index.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.spec.ts", "packages/**/src/**/*.test.ts"],
    setupFiles: [fromRoot("./vitest.setup.ts")],
  },
});
