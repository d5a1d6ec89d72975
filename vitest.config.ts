import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    setupFiles: ["test/setup/unit.ts"],
    env: {
      LOG_LEVEL: "error"
    },
    clearMocks: true,
    unstubEnvs: true,
    pool: "threads"
  }
});
