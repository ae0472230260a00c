import { defineProject } from "vitest/config";

export default defineProject({
  resolve: {
    // Load sibling workspace packages from their TypeScript sources
    conditions: ["development"],
  },
  test: {
    name: "server",
    globals: true,
    environment: "node",
    include: ["src/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 10000,
  },
});
