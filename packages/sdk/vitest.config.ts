import { defineProject } from "vitest/config";

export default defineProject({
  test: {
    name: "sdk",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
