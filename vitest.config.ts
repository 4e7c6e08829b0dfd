import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["services/*/test/**/*.test.ts"],
    environment: "node",
    pool: "threads",
    env: {
      LOG_LEVEL: "silent",
      USE_INMEMORY_STORE: "true"
    }
  }
});
