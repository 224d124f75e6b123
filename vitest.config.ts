// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    include: ["test/**/*.test.ts"],
    setupFiles: ["test/setup.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "node_modules/",
        "examples/",
        "**/*.test.ts",
        "**/types.ts",
        "**/logger.ts",
      ],
    },
    // Increase timeout for cryptographic operations
    testTimeout: 10000,
  },
});
