/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openTaskStore } from "@namegroups/sdk";
import type { TaskStore, TaskStoreOptions } from "@namegroups/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "namegroups-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempStoreRoot(prefix = "namegroups-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with an initialized temporary task store, cleaning up after
 * @param options - Optional store options (root will be overridden)
 * @returns Result of fn
 */
export async function withTempStore<T>(
  fn: (store: TaskStore, root: string) => Promise<T>,
  options?: Omit<TaskStoreOptions, "root">
): Promise<T> {
  const root = await createTempStoreRoot();
  const store = openTaskStore({ ...options, root });

  let fnError: unknown;
  try {
    await store.init();
    return await fn(store, root);
  } catch (err) {
    fnError = err;
    throw err;
  } finally {
    let cleanupError: unknown;
    try {
      await store.close();
    } catch (err) {
      cleanupError = err;
    }
    try {
      await removeDir(root);
    } catch (err) {
      cleanupError ??= err;
    }
    if (fnError === undefined && cleanupError !== undefined) {
      // eslint-disable-next-line no-unsafe-finally
      throw cleanupError;
    }
  }
}

/**
 * Execute a function with a clean temp directory
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempStoreRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
