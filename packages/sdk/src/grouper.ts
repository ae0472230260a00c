/**
 * Grouping of names by the word before the first delimiter
 */

import type { Grouping, Name } from "./types.js";

export const DEFAULT_DELIMITER = "_";

/**
 * Group key of a name: everything before the first delimiter, or the whole
 * name when the delimiter does not occur
 */
export function groupKey(name: Name, delimiter: string = DEFAULT_DELIMITER): string {
  const index = name.indexOf(delimiter);
  return index === -1 ? name : name.slice(0, index);
}

/**
 * Group names by their first word
 *
 * Groups appear in order of first appearance and keep their names in input
 * order. Duplicate names stay as separate entries.
 *
 * @example
 * ```typescript
 * groupNames(["foo", "foo-bar", "xyz"], "-");
 * // Map { "foo" => ["foo", "foo-bar"], "xyz" => ["xyz"] }
 * ```
 */
export function groupNames(names: readonly Name[], delimiter: string = DEFAULT_DELIMITER): Grouping {
  const grouping: Grouping = new Map();

  for (const name of names) {
    const key = groupKey(name, delimiter);
    const group = grouping.get(key);
    if (group) {
      group.push(name);
    } else {
      grouping.set(key, [name]);
    }
  }

  return grouping;
}
