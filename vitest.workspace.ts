import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "packages/sdk",
  "packages/testkit",
  "packages/server",
  "packages/cli",
]);
