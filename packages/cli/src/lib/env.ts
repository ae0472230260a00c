/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" references are left alone
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the store root directory
 * Priority: CLI option > NAMEGROUPS_ROOT env var > default "./data"
 */
export function resolveRoot(cliRoot?: string, env: NodeJS.ProcessEnv = process.env): string {
  const root = cliRoot ?? env.NAMEGROUPS_ROOT ?? "./data";
  return path.resolve(expandTilde(root));
}

/**
 * Check if timing diagnostics are requested through the environment
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NAMEGROUPS_CLI_DEBUG === "1";
}
