import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts", "tests/**/*.test.ts"],
    setupFiles: ["test/setup/unit.ts"],
    clearMocks: true,
    unstubEnvs: true,
    fileParallelism: false,
    env: {
      OPENAI_API_KEY: "test-key",
      NCBI_EMAIL: "test@example.com",
      LOG_LEVEL: "error"
    },
    pool: "threads",
    poolOptions: {
      threads: {
        singleThread: true
      }
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/types.ts", "src/server.ts"]
    }
  }
});
