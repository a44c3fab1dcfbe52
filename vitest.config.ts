import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
      EMBEDDING_PROVIDER: "hashing"
    }
  }
});
