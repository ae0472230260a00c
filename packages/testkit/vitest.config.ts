import { defineProject } from "vitest/config";

export default defineProject({
  resolve: {
    // Load sibling workspace packages from their TypeScript sources
    conditions: ["development"],
  },
  test: {
    name: "testkit",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
