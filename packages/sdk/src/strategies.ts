/**
 * Grouping strategy lookup
 */

import type { Grouper, GroupingStrategy } from "./types.js";
import { groupNames } from "./grouper.js";
import { groupNamesByPrefix } from "./prefix-tree.js";

export const DEFAULT_STRATEGY: GroupingStrategy = "first-word";

export const GROUPING_STRATEGIES = ["first-word", "prefix-tree"] as const satisfies readonly GroupingStrategy[];

const GROUPERS: Record<GroupingStrategy, Grouper> = {
  "first-word": groupNames,
  "prefix-tree": groupNamesByPrefix,
};

/**
 * Grouping function for a strategy
 */
export function createGrouper(strategy: GroupingStrategy = DEFAULT_STRATEGY): Grouper {
  return GROUPERS[strategy];
}
