/**
 * Grouping task service adapter
 * Wraps the @namegroups/sdk TaskStore with safety limits for tool callers
 */

import { createGrouper, openTaskStore } from "@namegroups/sdk";
import type { Grouping, GroupingTask, TaskStore } from "@namegroups/sdk";
import type { GroupNamesInput, CreateTaskInput } from "../schemas.js";
import { logger } from "../observability/logger.js";

// Maximum number of task IDs to return from list (prevent unbounded responses)
export const MAX_LIST_TASKS = 5000;

export interface MoveNameCommand {
  name: string;
  sourceGroup: string;
  targetGroup: string;
  expectedVersion?: number;
}

export class GroupingTaskService {
  #store: TaskStore;

  constructor(store: TaskStore) {
    this.#store = store;
  }

  get dataRoot(): string {
    return this.#store.options.root;
  }

  async init(): Promise<void> {
    await this.#store.init();
  }

  /**
   * Group names without storing anything
   */
  group(input: GroupNamesInput): Grouping {
    return createGrouper(input.strategy)(input.names, input.delimiter);
  }

  /**
   * Create a task and compute its grouping
   */
  async create(input: CreateTaskInput): Promise<GroupingTask> {
    const task = await this.#store.create(input);
    logger.debug("service.task.created", { task_id: task.id, groups: task.result.size });
    return task;
  }

  /**
   * Get a task by ID
   * Returns null if not found (not an error)
   */
  async get(id: string): Promise<GroupingTask | null> {
    return this.#store.get(id);
  }

  /**
   * List task IDs in creation order
   * Capped at MAX_LIST_TASKS
   */
  async list(): Promise<string[]> {
    const ids = (await this.#store.list()).map((task) => task.id);

    if (ids.length > MAX_LIST_TASKS) {
      logger.warn("service.list.capped", {
        total: ids.length,
        returned: MAX_LIST_TASKS,
      });
      return ids.slice(0, MAX_LIST_TASKS);
    }

    return ids;
  }

  /**
   * Move a name between groups of a stored task
   */
  async move(id: string, command: MoveNameCommand): Promise<GroupingTask> {
    const task = await this.#store.move(id, command);
    logger.debug("service.task.moved", { task_id: id, version: task.version });
    return task;
  }
}

/**
 * Service over a store rooted at `dataRoot`
 * (default: DATA_ROOT environment variable, then ./data)
 */
export function createGroupingTaskService(
  dataRoot: string = process.env.DATA_ROOT || "./data"
): GroupingTaskService {
  const service = new GroupingTaskService(openTaskStore({ root: dataRoot }));
  logger.info("service.init", { data_root: service.dataRoot });
  return service;
}
