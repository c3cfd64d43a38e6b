import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    testTimeout: 30000,
    env: {
      ANONYMIZER_LOG_LEVEL: "error",
    },
  },
});
