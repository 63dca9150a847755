import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // run against library sources; the package export points at dist/
    alias: {
      "@arbor/merkle": fileURLToPath(new URL("../merkle/src/index.ts", import.meta.url)),
    },
  },
  test: {
    name: "cli",
    include: ["tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts", "src/main.ts", "src/logger.ts"],
      thresholds: {
        statements: 85,
        branches: 75,
        functions: 85,
        lines: 85,
      },
    },
  },
});
