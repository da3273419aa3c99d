import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    setupFiles: ["tests/setup.ts"],
    testTimeout: 30_000, // first pdfjs load is slow on cold CI
    pool: "forks",
    fileParallelism: false, // CLI tests touch process.exitCode and SIGINT listeners
  },
});
