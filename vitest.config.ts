import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Clear pipeline env vars so tests resolve config from explicit overrides only.
    env: {
      DELAYBOARD_LINK_TEMPLATE: "",
      DELAYBOARD_ORPHAN_POLICY: "",
      DELAYBOARD_LOG_LEVEL: "",
      DATABASE_URL: "",
      DELAYBOARD_DATABASE_URL: "",
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      reporter: ["text", "text-summary", "lcov"],
    },
    // Isolate tests to avoid module state leaks
    pool: "forks",
    testTimeout: 10000,
  },
});
