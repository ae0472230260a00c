/**
 * Moving names between groups of a grouping
 *
 * Invariants:
 * - The input grouping is never mutated; a new grouping is returned
 * - Groups never become empty: a source group losing its last name is removed
 * - A target group that does not exist is created holding only the moved name
 * - Invalid moves throw before anything changes
 */

import type { Grouping, Name } from "./types.js";
import { NameNotFoundInGroupError, SourceGroupNotFoundError } from "./errors.js";

/**
 * Move a name from one group to another
 *
 * Moving a name into the group it is already in succeeds without changes.
 * Callers must not assume group keys survive a move.
 *
 * @throws {SourceGroupNotFoundError} If `sourceGroup` is not in the grouping
 * @throws {NameNotFoundInGroupError} If `name` is not in `sourceGroup`
 *
 * @example
 * ```typescript
 * const grouping = new Map([["foo", ["foo", "foo-bar"]], ["xyz", ["xyz"]]]);
 * moveName(grouping, "xyz", "xyz", "foo");
 * // Map { "foo" => ["foo", "foo-bar", "xyz"] }
 * ```
 */
export function moveName(
  grouping: Grouping,
  name: Name,
  sourceGroup: string,
  targetGroup: string
): Grouping {
  const source = grouping.get(sourceGroup);
  if (source === undefined) {
    throw new SourceGroupNotFoundError(sourceGroup);
  }

  const index = source.indexOf(name);
  if (index === -1) {
    throw new NameNotFoundInGroupError(name, sourceGroup);
  }

  const next: Grouping = new Map();
  for (const [key, names] of grouping) {
    next.set(key, [...names]);
  }

  if (sourceGroup === targetGroup) {
    return next;
  }

  const remaining = [...source.slice(0, index), ...source.slice(index + 1)];
  if (remaining.length === 0) {
    next.delete(sourceGroup);
  } else {
    next.set(sourceGroup, remaining);
  }

  const target = next.get(targetGroup);
  if (target === undefined) {
    next.set(targetGroup, [name]);
  } else {
    target.push(name);
  }

  return next;
}
