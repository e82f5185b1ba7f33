import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const isCI = process.env.CI === "1" || process.env.CI === "true";
const pool = process.env.VITEST_POOL ?? (isCI ? "forks" : "threads");

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "prefecture-map-engine": fromRoot("./engine/src/index.ts"),
      "prefecture-map-ingestion": fromRoot("./ingestion/src/api.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["engine/tests/**/*.test.ts", "ingestion/tests/**/*.test.ts", "server/tests/**/*.test.ts"],
    pool,
    poolOptions: {
      threads: {
        singleThread: isCI,
      },
      forks: {
        singleFork: true,
      },
    },
    watch: false,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: isCI ? 30000 : 10000,
    slowTestThreshold: isCI ? 2000 : 1000,
  },
});
