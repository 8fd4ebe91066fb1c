import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    testTimeout: 10000,
    include: ["test/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**", "tmp/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      reportsDirectory: "./coverage",
      include: ["src/**/*.ts"],
      exclude: ["node_modules/**", "test/**", "dist/**"],
    },
  },
});
