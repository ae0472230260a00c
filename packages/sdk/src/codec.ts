/**
 * Conversions between a Grouping and its wire and storage forms
 */

import type {
  Grouping,
  GroupingEntries,
  GroupingRecord,
  GroupingTask,
  GroupingTaskView,
} from "./types.js";
import { ValidationError } from "./errors.js";

/**
 * Plain JSON object form (group key -> names)
 *
 * JSON objects list integer-like keys first, so the object form may not
 * keep group order; use the entry form where order matters.
 */
export function groupingToObject(grouping: Grouping): GroupingRecord {
  return Object.fromEntries(Array.from(grouping, ([key, names]): [string, string[]] => [key, [...names]]));
}

/**
 * Build a grouping from its plain object form
 * @throws {ValidationError} If a group is empty or holds non-string names
 */
export function groupingFromObject(record: GroupingRecord): Grouping {
  return groupingFromEntries(Object.entries(record));
}

/**
 * Entry-list form ([key, names] pairs in group order)
 */
export function groupingToEntries(grouping: Grouping): GroupingEntries {
  return Array.from(grouping, ([key, names]): [string, string[]] => [key, [...names]]);
}

/**
 * Build a grouping from entries
 * @throws {ValidationError} If a key repeats, a group is empty, or a name is not a string
 */
export function groupingFromEntries(entries: Iterable<readonly [string, readonly unknown[]]>): Grouping {
  const grouping: Grouping = new Map();
  let position = 0;

  for (const [key, names] of entries) {
    const pointer = `/${position}`;
    if (grouping.has(key)) {
      throw new ValidationError([
        { code: "custom", pointer, message: `duplicate group key: ${JSON.stringify(key)}` },
      ]);
    }
    if (names.length === 0) {
      throw new ValidationError([
        { code: "minLength", pointer, message: `group ${JSON.stringify(key)} must not be empty` },
      ]);
    }

    const copy: string[] = [];
    for (const name of names) {
      if (typeof name !== "string") {
        throw new ValidationError([
          { code: "type", pointer, message: `group ${JSON.stringify(key)} must contain only strings` },
        ]);
      }
      copy.push(name);
    }

    grouping.set(key, copy);
    position++;
  }

  return grouping;
}

/**
 * Public view of a task: the grouping as a plain object, input omitted
 */
export function taskToView(task: GroupingTask): GroupingTaskView {
  return {
    id: task.id,
    result: groupingToObject(task.result),
    createdAt: task.createdAt,
    completedAt: task.completedAt,
    updatedAt: task.updatedAt,
    version: task.version,
  };
}
