import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // Only run unit tests (fast, no external services)
    include: ["apps/*/src/__tests__/unit/**/*.test.ts", "packages/*/src/__tests__/**/*.test.ts"],
    setupFiles: ["apps/fuzzer/test/setup-env.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["apps/*/src/**/*.ts", "packages/*/src/**/*.ts"],
      exclude: ["**/__tests__/**", "apps/fuzzer/src/index.ts"],
    },
  },
});
