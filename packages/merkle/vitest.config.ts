import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "merkle",
    include: ["tests/**/*.test.ts"],
    // fast-check suites build many trees per run
    testTimeout: 20_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json"],
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts"],
      thresholds: {
        statements: 95,
        branches: 90,
        functions: 95,
        lines: 95,
      },
    },
  },
});
