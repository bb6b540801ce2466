import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    testTimeout: 10_000,
    env: { RUN_SQLITE_TESTS: "true" }
  }
});
