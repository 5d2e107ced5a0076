import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    // process.umask() is unavailable in worker threads
    pool: "forks",
  },
});
