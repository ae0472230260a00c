/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { GROUPING_STRATEGIES } from "@namegroups/sdk";
import type { GroupingStrategy } from "@namegroups/sdk";
import { CliError } from "./errors.js";

/**
 * Parse a positive integer option value (commander argParser)
 */
export function parsePositiveInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < 1 || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }

  return parsed;
}

/**
 * Parse a grouping strategy option value (commander argParser)
 */
export function parseStrategy(value: string): GroupingStrategy {
  const strategy = GROUPING_STRATEGIES.find((s) => s === value);
  if (strategy === undefined) {
    throw new InvalidArgumentError(`strategy must be one of: ${GROUPING_STRATEGIES.join(", ")}`);
  }
  return strategy;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new CliError(`Invalid JSON in ${source}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

/**
 * Turn parsed JSON into task input: `{ names, delimiter?, strategy? }` or a bare array of names
 */
export function toTaskInput(value: unknown, source: string): Record<string, unknown> {
  if (Array.isArray(value)) {
    return { names: value };
  }
  if (typeof value === "object" && value !== null) {
    return { ...value };
  }
  throw new CliError(`${source} must contain a JSON object or an array of names`);
}
