/**
 * File-backed store of grouping tasks
 */

import { randomUUID } from "node:crypto";
import * as path from "node:path";
import { z } from "zod";
import type { Grouping, GroupingTask, TaskStore, TaskStoreOptions } from "./types.js";
import { atomicWrite, ensureDirectory, listFiles, readDocument } from "./io.js";
import { stableStringify, parseJson } from "./format.js";
import { groupingFromEntries, groupingToEntries } from "./codec.js";
import { moveName } from "./editor.js";
import { createGrouper } from "./strategies.js";
import { FileLock } from "./lock.js";
import {
  TaskInputSchema,
  assertValid,
  checkMoveRequest,
  checkTaskInput,
  validateTaskId,
} from "./validation.js";
import { TaskNotFoundError, TaskReadError, VersionConflictError } from "./errors.js";
import { logger } from "./observability/logs.js";

const TASKS_DIR = "tasks";
const META_DIR = "_meta";

/**
 * Field order of stored task documents
 */
const TASK_KEY_ORDER = [
  "id",
  "version",
  "input",
  "result",
  "createdAt",
  "completedAt",
  "updatedAt",
] as const;

/**
 * On-disk shape of a task; the grouping is kept as ordered entries
 */
const StoredTaskSchema = z.object({
  id: z.string(),
  version: z.number().int().positive(),
  input: TaskInputSchema,
  result: z.array(z.tuple([z.string(), z.array(z.string())])),
  createdAt: z.string(),
  completedAt: z.string().nullable(),
  updatedAt: z.string(),
});

/**
 * Grouping task store
 *
 * Tasks live in `<root>/tasks/<id>.json`, written atomically with
 * deterministic formatting. Read-modify-write cycles on a task run under a
 * per-task FileLock in `<root>/_meta/locks/`.
 *
 * @example
 * ```typescript
 * const store = openTaskStore({ root: './data' });
 *
 * const task = await store.create({ names: ['foo', 'foo-bar', 'xyz'], delimiter: '-' });
 * // task.result: Map { 'foo' => ['foo', 'foo-bar'], 'xyz' => ['xyz'] }
 *
 * await store.move(task.id, { name: 'xyz', sourceGroup: 'xyz', targetGroup: 'foo' });
 * ```
 */
class GroupingTaskStore implements TaskStore {
  #options: Required<TaskStoreOptions>;
  #tasksDir: string;

  constructor(options: TaskStoreOptions) {
    const root = path.resolve(options.root);

    this.#options = {
      root,
      indent: options.indent ?? 2,
      lockTimeoutMs: options.lockTimeoutMs ?? 5000,
      clock: options.clock ?? (() => new Date()),
    };
    this.#tasksDir = path.join(root, TASKS_DIR);
  }

  get options(): Required<TaskStoreOptions> {
    return this.#options;
  }

  async init(): Promise<void> {
    await ensureDirectory(this.#tasksDir);
    await ensureDirectory(path.join(this.#options.root, META_DIR));
  }

  async create(input: unknown): Promise<GroupingTask> {
    const taskInput = assertValid(checkTaskInput(input));
    const now = this.#now();

    const task: GroupingTask = {
      id: randomUUID(),
      input: taskInput,
      result: new Map(),
      createdAt: now,
      completedAt: null,
      updatedAt: now,
      version: 1,
    };

    await this.#write(task);
    logger.debug("task.created", {
      taskId: task.id,
      version: task.version,
      details: { names: taskInput.names.length, strategy: taskInput.strategy },
    });

    // Grouping runs inline; a queue worker would call the same step
    return this.#process(task.id);
  }

  async get(id: string): Promise<GroupingTask | null> {
    validateTaskId(id);
    return this.#read(id);
  }

  async require(id: string): Promise<GroupingTask> {
    const task = await this.get(id);
    if (task === null) {
      throw new TaskNotFoundError(id);
    }
    return task;
  }

  async listIds(): Promise<string[]> {
    const files = await listFiles(this.#tasksDir, ".json");
    return files.map((file) => file.slice(0, -".json".length));
  }

  async list(): Promise<GroupingTask[]> {
    const tasks: GroupingTask[] = [];
    for (const id of await this.listIds()) {
      const task = await this.#read(id);
      // Skip files removed between listing and reading
      if (task !== null) {
        tasks.push(task);
      }
    }

    return tasks.sort((a, b) => {
      if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
      return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    });
  }

  async move(id: string, request: unknown): Promise<GroupingTask> {
    validateTaskId(id);
    const move = assertValid(checkMoveRequest(request));

    return this.#withTaskLock(id, async () => {
      const task = await this.require(id);

      if (move.expectedVersion !== undefined && move.expectedVersion !== task.version) {
        throw new VersionConflictError(id, move.expectedVersion, task.version);
      }

      const result = moveName(task.result, move.name, move.sourceGroup, move.targetGroup);

      // Moving into the current group changes nothing; keep the version
      if (move.sourceGroup === move.targetGroup) {
        return task;
      }

      const updated: GroupingTask = {
        ...task,
        result,
        updatedAt: this.#now(),
        version: task.version + 1,
      };
      await this.#write(updated);

      logger.debug("task.name_moved", {
        taskId: id,
        version: updated.version,
        details: { name: move.name, from: move.sourceGroup, to: move.targetGroup },
      });
      return updated;
    });
  }

  async close(): Promise<void> {
    // Nothing is held open between calls
  }

  /**
   * Compute the grouping of a task that has not been processed yet
   */
  async #process(id: string): Promise<GroupingTask> {
    return this.#withTaskLock(id, async () => {
      const task = await this.require(id);
      if (task.completedAt !== null) {
        logger.debug("task.already_processed", { taskId: id });
        return task;
      }

      const group = createGrouper(task.input.strategy);
      const now = this.#now();
      const processed: GroupingTask = {
        ...task,
        result: group(task.input.names, task.input.delimiter),
        completedAt: now,
        updatedAt: now,
      };
      await this.#write(processed);

      logger.debug("task.processed", {
        taskId: id,
        version: processed.version,
        details: { groups: processed.result.size },
      });
      return processed;
    });
  }

  #withTaskLock<T>(id: string, fn: () => Promise<T>): Promise<T> {
    return new FileLock(this.#options.root, id).withLock(fn, this.#options.lockTimeoutMs);
  }

  #now(): string {
    return this.#options.clock().toISOString();
  }

  #taskPath(id: string): string {
    return path.join(this.#tasksDir, `${id}.json`);
  }

  async #read(id: string): Promise<GroupingTask | null> {
    const filePath = this.#taskPath(id);
    const content = await readDocument(filePath);
    if (content === null) {
      return null;
    }

    let raw: unknown;
    try {
      raw = parseJson(content);
    } catch (err) {
      throw new TaskReadError(filePath, { cause: err });
    }

    const parsed = StoredTaskSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TaskReadError(filePath, { cause: parsed.error });
    }
    if (parsed.data.id !== id) {
      throw new TaskReadError(filePath, {
        cause: new Error(`Stored id "${parsed.data.id}" does not match file name`),
      });
    }

    let result: Grouping;
    try {
      result = groupingFromEntries(parsed.data.result);
    } catch (err) {
      throw new TaskReadError(filePath, { cause: err });
    }

    return { ...parsed.data, result };
  }

  async #write(task: GroupingTask): Promise<void> {
    const doc = { ...task, result: groupingToEntries(task.result) };
    const content = stableStringify(doc, this.#options.indent, TASK_KEY_ORDER);
    await atomicWrite(this.#taskPath(task.id), content);
  }
}

/**
 * Open a task store
 */
export function openTaskStore(options: TaskStoreOptions): TaskStore {
  return new GroupingTaskStore(options);
}
