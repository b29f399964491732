import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Keep provider credentials, the database URL and shell log settings out of test runs.
    env: {
      DUMPSYNC_LOG_LEVEL: "",
      DUMPSYNC_DEBUG: "",
      IGDB_CLIENT_ID: "",
      IGDB_CLIENT_SECRET: "",
      DATABASE_URL: "",
    },
    coverage: {
      provider: "v8",
      include: ["src/server/**/*.ts"],
      reporter: ["text", "text-summary", "lcov"],
    },
    pool: "forks",
    testTimeout: 10000,
  },
});
