import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "error",
    },
    // Run test files sequentially; DuckDB files are opened through a process-wide cache
    fileParallelism: false,
  },
});
