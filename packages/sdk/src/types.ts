/**
 * Core types for Name Groups
 */

/**
 * A name to be grouped (non-empty string)
 */
export type Name = string;

/**
 * Ordered mapping of group key to the names in that group
 *
 * A `Map` keeps insertion order for every key, including numeric-looking
 * keys that plain objects would reorder.
 */
export type Grouping = Map<string, Name[]>;

/**
 * Plain-object form of a grouping (wire representation)
 */
export type GroupingRecord = Record<string, Name[]>;

/**
 * Entry-list form of a grouping (storage representation)
 */
export type GroupingEntries = Array<[string, Name[]]>;

/**
 * How names are turned into groups
 * - "first-word": key is the name up to the first delimiter
 * - "prefix-tree": key is the most descriptive common prefix of whole words
 */
export type GroupingStrategy = "first-word" | "prefix-tree";

/**
 * Grouping function signature shared by all strategies
 */
export type Grouper = (names: readonly Name[], delimiter?: string) => Grouping;

/**
 * Validated input of a grouping task
 */
export interface GroupingTaskInput {
  names: Name[];
  delimiter: string;
  strategy: GroupingStrategy;
}

/**
 * Request to move a name between two groups of a task
 */
export interface MoveNameRequest {
  name: Name;
  sourceGroup: string;
  targetGroup: string;
  /** Reject the move unless the stored task is at this version */
  expectedVersion?: number;
}

/**
 * A persisted grouping task
 */
export interface GroupingTask {
  id: string;
  input: GroupingTaskInput;
  result: Grouping;
  /** ISO-8601 creation time */
  createdAt: string;
  /** ISO-8601 time the grouping was computed (null until then) */
  completedAt: string | null;
  /** ISO-8601 time of the last write */
  updatedAt: string;
  /** Starts at 1, incremented by every move */
  version: number;
}

/**
 * Public representation of a task (input omitted, grouping as a plain object)
 */
export interface GroupingTaskView {
  id: string;
  result: GroupingRecord;
  createdAt: string;
  completedAt: string | null;
  updatedAt: string;
  version: number;
}

/**
 * Validation issue codes
 */
export type ValidationIssueCode =
  | "required"
  | "type"
  | "enum"
  | "minLength"
  | "maxLength"
  | "minimum"
  | "maximum"
  | "custom";

/**
 * A single validation failure
 */
export interface ValidationIssue {
  code: ValidationIssueCode;
  /** JSON Pointer to the failing field (e.g., "/names/2"), "" for the root */
  pointer: string;
  message: string;
}

/**
 * Result of an input-constraints check
 */
export type ValidationResult<T> =
  | { ok: true; value: T; errors: [] }
  | { ok: false; errors: ValidationIssue[] };

/**
 * Configuration options for opening a task store
 */
export interface TaskStoreOptions {
  /** Root directory for the data store (e.g., ./data) */
  root: string;
  /** Number of spaces for JSON indentation (default: 2) */
  indent?: number;
  /** Maximum time to wait for a task lock in ms (default: 5000) */
  lockTimeoutMs?: number;
  /** Source of timestamps (default: () => new Date()) */
  clock?: () => Date;
}

/**
 * File-backed store of grouping tasks
 */
export interface TaskStore {
  /** Resolved store options */
  readonly options: Required<TaskStoreOptions>;

  /**
   * Create the store directory layout (idempotent)
   */
  init(): Promise<void>;

  /**
   * Create a task and compute its grouping
   * @throws {ValidationError} If the input breaks the task input constraints
   */
  create(input: unknown): Promise<GroupingTask>;

  /**
   * Get a task by ID (null if missing)
   */
  get(id: string): Promise<GroupingTask | null>;

  /**
   * Get a task by ID
   * @throws {TaskNotFoundError} If the task does not exist
   */
  require(id: string): Promise<GroupingTask>;

  /**
   * List all task IDs (sorted)
   */
  listIds(): Promise<string[]>;

  /**
   * List all tasks ordered by creation time
   */
  list(): Promise<GroupingTask[]>;

  /**
   * Move a name between groups of a stored task
   * @throws {SourceGroupNotFoundError} If the source group does not exist
   * @throws {NameNotFoundInGroupError} If the name is not in the source group
   * @throws {VersionConflictError} If expectedVersion does not match
   */
  move(id: string, request: unknown): Promise<GroupingTask>;

  /**
   * Release store resources
   */
  close(): Promise<void>;
}
