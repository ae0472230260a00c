import { defineProject } from "vitest/config";

export default defineProject({
  resolve: {
    // Load sibling workspace packages from their TypeScript sources
    conditions: ["development"],
  },
  test: {
    name: "cli",
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    testTimeout: 10000,
  },
});
