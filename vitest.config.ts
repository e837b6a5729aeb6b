import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // sharp is a native addon; keep it out of worker threads
    pool: "forks",
    env: {
      TAGFILL_DEBUG: "false",
    },
  },
});
