/**
 * File-based lock serializing writers of a single task
 * Uses exclusive file open to ensure only one writer at a time, across processes
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { LockTimeoutError } from "./errors.js";
import { errorCode } from "./io.js";
import { logger } from "./observability/logs.js";

/**
 * Simple file-based lock using exclusive open
 */
export class FileLock {
  #lockPath: string;
  #fd?: fs.FileHandle;
  #acquired = false;

  constructor(root: string, lockName: string) {
    this.#lockPath = path.join(root, "_meta", "locks", `${lockName}.lock`);
  }

  get path(): string {
    return this.#lockPath;
  }

  /**
   * Acquire the lock (blocking with retries)
   * @param timeoutMs - Maximum time to wait for lock
   * @param retryIntervalMs - Time between retry attempts
   * @throws {LockTimeoutError} If the lock is still held after timeoutMs
   */
  async acquire(timeoutMs = 5000, retryIntervalMs = 25): Promise<void> {
    if (this.#acquired) {
      throw new Error("Lock already acquired");
    }

    const startTime = Date.now();

    await fs.mkdir(path.dirname(this.#lockPath), { recursive: true });

    while (true) {
      let handle: fs.FileHandle;
      try {
        // Fails with EEXIST while another writer holds the lock
        handle = await fs.open(this.#lockPath, "wx");
      } catch (err) {
        if (errorCode(err) !== "EEXIST") {
          throw err;
        }

        if (Date.now() - startTime > timeoutMs) {
          throw new LockTimeoutError(this.#lockPath, timeoutMs);
        }

        await new Promise((resolve) => setTimeout(resolve, retryIntervalMs));
        continue;
      }

      try {
        // PID and timestamp help diagnose stale locks
        await handle.writeFile(
          JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }, null, 2)
        );
      } catch (err) {
        await this.#discard(handle);
        throw err;
      }

      this.#fd = handle;
      this.#acquired = true;
      return;
    }
  }

  /**
   * Close and remove a lock file this instance created but could not finish writing
   */
  async #discard(handle: fs.FileHandle): Promise<void> {
    try {
      await handle.close();
    } catch (closeErr) {
      logger.debug("lock.close_failed", { details: { lockPath: this.#lockPath, error: String(closeErr) } });
    }
    try {
      await fs.unlink(this.#lockPath);
    } catch (unlinkErr) {
      logger.warn("lock.discard_failed", {
        message: unlinkErr instanceof Error ? unlinkErr.message : String(unlinkErr),
        details: { lockPath: this.#lockPath },
      });
    }
  }

  /**
   * Release the lock
   */
  async release(): Promise<void> {
    if (!this.#acquired) {
      return;
    }

    try {
      if (this.#fd) {
        await this.#fd.close();
        this.#fd = undefined;
      }
      await fs.unlink(this.#lockPath);
    } catch (err) {
      if (errorCode(err) !== "ENOENT") {
        logger.warn("lock.release_failed", {
          message: err instanceof Error ? err.message : String(err),
          details: { lockPath: this.#lockPath },
        });
      }
    } finally {
      this.#acquired = false;
    }
  }

  isAcquired(): boolean {
    return this.#acquired;
  }

  /**
   * Execute a function with the lock held
   */
  async withLock<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }
}
