import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    setupFiles: ["tests/setup.ts"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "text-summary"],
      reportsDirectory: "./coverage",
      exclude: ["node_modules/", "dist/", "**/*.d.ts", "**/*.config.ts", "tests/**"],
    },
    pool: "threads",
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
