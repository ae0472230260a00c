/**
 * Atomic file I/O operations for crash-safe task writes
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; missing files read as null
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { DirectoryError, ListFilesError, TaskReadError, TaskWriteError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * errno-style code of a thrown value, if any
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(dirPath, {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

async function syncFile(fileHandle: fs.FileHandle): Promise<void> {
  try {
    await fileHandle.datasync();
  } catch (err) {
    // ENOTSUP/ENOSYS: not supported on this platform
    // EINVAL: some CIFS/FUSE mounts report this instead
    const code = errorCode(err);
    if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
      await fileHandle.sync();
    } else {
      throw err;
    }
  }
}

async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Directory fsync is best-effort; some platforms reject it outright
    const code = errorCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      logger.debug("io.dir_fsync_failed", {
        message: err instanceof Error ? err.message : String(err),
        details: { dir },
      });
    }
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @throws {TaskWriteError} If any step fails
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");
    await syncFile(fileHandle);

    await fileHandle.close();
    fileHandle = null;

    // Last writer wins; callers serialize writers per task with a FileLock
    await fs.rename(tmp, filePath);

    await syncDirectory(dir);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close_failed", { details: { tmp, error: String(closeErr) } });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      if (errorCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.tmp_cleanup_failed", { details: { tmp, error: String(unlinkErr) } });
      }
    });

    throw new TaskWriteError(filePath, { cause: err });
  }
}

/**
 * Read a UTF-8 file
 * @returns File contents, or null if the file does not exist
 * @throws {TaskReadError} For other read failures
 */
export async function readDocument(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw new TaskReadError(filePath, { cause: err });
  }
}

/**
 * List files in a directory, optionally filtering by extension
 * @param extension - File extension to filter by (e.g., ".json")
 * @returns Sorted array of filenames (not full paths); empty if the directory is missing
 */
export async function listFiles(dirPath: string, extension?: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    // Files only; temp files start with "."
    let files = entries
      .filter((entry) => entry.isFile() && !entry.name.startsWith("."))
      .map((entry) => entry.name);

    if (extension) {
      const ext = extension.startsWith(".") ? extension : `.${extension}`;
      files = files.filter((name) => name.endsWith(ext));
    }

    return files.sort();
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return [];
    }
    throw new ListFilesError(dirPath, { cause: err });
  }
}
