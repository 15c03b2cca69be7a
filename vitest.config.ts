import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    setupFiles: ["test/setup/unit.ts"],
    clearMocks: true,
    unstubEnvs: true,
    fileParallelism: false,
    pool: "threads",
    poolOptions: {
      threads: {
        singleThread: true
      }
    },
    coverage: {
      provider: "v8",
      all: true,
      reporter: ["text", "json-summary", "html"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.d.ts", "src/**/types.ts", "src/server.ts", "src/index.ts"],
      thresholds: {
        functions: 85,
        lines: 85,
        statements: 85,
        branches: 80
      }
    }
  }
});
