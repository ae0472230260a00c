/**
 * Name Groups SDK
 *
 * Groups names by shared prefix, moves names between groups, and keeps
 * grouping tasks in a file-backed store
 */

// Re-export types
export type {
  Name,
  Grouping,
  GroupingRecord,
  GroupingEntries,
  GroupingStrategy,
  Grouper,
  GroupingTaskInput,
  MoveNameRequest,
  GroupingTask,
  GroupingTaskView,
  ValidationIssueCode,
  ValidationIssue,
  ValidationResult,
  TaskStoreOptions,
  TaskStore,
} from "./types.js";

// Core operations
export { groupNames, groupKey, DEFAULT_DELIMITER } from "./grouper.js";
export { groupNamesByPrefix, WordTrie } from "./prefix-tree.js";
export type { WordTrieNode } from "./prefix-tree.js";
export { createGrouper, DEFAULT_STRATEGY, GROUPING_STRATEGIES } from "./strategies.js";
export { moveName } from "./editor.js";

// Conversions
export {
  groupingToObject,
  groupingFromObject,
  groupingToEntries,
  groupingFromEntries,
  taskToView,
} from "./codec.js";

// Input constraints
export {
  checkTaskInput,
  checkMoveRequest,
  assertValid,
  validateTaskId,
  toValidationIssues,
  MAX_NAMES,
} from "./validation.js";

// Errors
export {
  NameGroupsError,
  SourceGroupNotFoundError,
  NameNotFoundInGroupError,
  ValidationError,
  TaskNotFoundError,
  TaskReadError,
  TaskWriteError,
  DirectoryError,
  ListFilesError,
  VersionConflictError,
  LockTimeoutError,
} from "./errors.js";

// Logging
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogData } from "./observability/logs.js";

// Store
export { openTaskStore } from "./store.js";
