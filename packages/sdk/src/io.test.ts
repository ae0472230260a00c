import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, mkdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite, readDocument, ensureDirectory, listFiles, errorCode } from "./io.js";
import { TaskReadError, TaskWriteError, DirectoryError, ListFilesError } from "./errors.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "namegroups-io-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("atomicWrite and readDocument", () => {
    it("should write and read file successfully", async () => {
      const filePath = join(testDir, "task.json");
      const content = '{"names": ["foo"]}';

      await atomicWrite(filePath, content);

      expect(await readDocument(filePath)).toBe(content);
    });

    it("should not leave temp files after successful write", async () => {
      await atomicWrite(join(testDir, "task.json"), "{}");

      const files = await readdir(testDir);
      expect(files).toEqual(["task.json"]);
    });

    it("should overwrite existing file", async () => {
      const filePath = join(testDir, "task.json");

      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readDocument(filePath)).toBe("second");
    });

    it("should keep one complete write under concurrency (last-writer-wins)", async () => {
      const filePath = join(testDir, "concurrent.json");

      await Promise.all(Array.from({ length: 20 }, (_, i) => atomicWrite(filePath, `write-${i}`)));

      expect(await readDocument(filePath)).toMatch(/^write-\d+$/);
      const files = await readdir(testDir);
      expect(files.filter((f) => f.endsWith(".tmp"))).toHaveLength(0);
    });

    it("should create parent directories automatically", async () => {
      const filePath = join(testDir, "tasks", "nested", "task.json");

      await atomicWrite(filePath, "auto-created");

      expect(await readDocument(filePath)).toBe("auto-created");
    });

    it("should fail with DirectoryError when the parent is a file", async () => {
      const blocker = join(testDir, "blocker");
      await writeFile(blocker, "not a directory");

      await expect(atomicWrite(join(blocker, "task.json"), "x")).rejects.toThrow(DirectoryError);
    });

    it("should wrap write failures in TaskWriteError and clean up", async () => {
      const target = join(testDir, "occupied");
      await mkdir(target);
      await writeFile(join(target, "child"), "keeps the directory non-empty");

      await expect(atomicWrite(target, "x")).rejects.toThrow(TaskWriteError);
      const files = await readdir(testDir);
      expect(files).toEqual(["occupied"]);
    });
  });

  describe("readDocument", () => {
    it("should return null for a missing file", async () => {
      expect(await readDocument(join(testDir, "missing.json"))).toBeNull();
    });

    it("should throw TaskReadError for non-ENOENT errors", async () => {
      const dirPath = join(testDir, "is-a-directory");
      await mkdir(dirPath);

      try {
        await readDocument(dirPath);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(TaskReadError);
        if (err instanceof TaskReadError) {
          expect(err.message).toContain(dirPath);
          expect(errorCode(err.cause)).toBe("EISDIR");
        }
      }
    });
  });

  describe("ensureDirectory", () => {
    it("should create nested directories and tolerate existing ones", async () => {
      const dirPath = join(testDir, "a", "b", "c");

      await ensureDirectory(dirPath);
      await ensureDirectory(dirPath);

      await atomicWrite(join(dirPath, "x.json"), "x");
      expect(await readDocument(join(dirPath, "x.json"))).toBe("x");
    });

    it("should reject an empty path", async () => {
      try {
        await ensureDirectory("");
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(DirectoryError);
        if (err instanceof DirectoryError) {
          expect(err.cause).toBeInstanceOf(TypeError);
        }
      }
    });

    it("should throw DirectoryError when the path is a regular file", async () => {
      const filePath = join(testDir, "regular-file.txt");
      await writeFile(filePath, "content");

      await expect(ensureDirectory(filePath)).rejects.toThrow(DirectoryError);
    });
  });

  describe("listFiles", () => {
    it("should return a sorted list filtered by extension", async () => {
      await writeFile(join(testDir, "zebra.json"), "z");
      await writeFile(join(testDir, "apple.json"), "a");
      await writeFile(join(testDir, "notes.txt"), "n");

      expect(await listFiles(testDir, ".json")).toEqual(["apple.json", "zebra.json"]);
      expect(await listFiles(testDir, "json")).toEqual(["apple.json", "zebra.json"]);
      expect(await listFiles(testDir)).toEqual(["apple.json", "notes.txt", "zebra.json"]);
    });

    it("should skip directories and dotfiles", async () => {
      await writeFile(join(testDir, "task.json"), "1");
      await writeFile(join(testDir, ".task.json.abc.tmp"), "partial");
      await mkdir(join(testDir, "subdir"));

      expect(await listFiles(testDir)).toEqual(["task.json"]);
    });

    it("should return an empty array for a missing directory", async () => {
      expect(await listFiles(join(testDir, "missing"))).toEqual([]);
    });

    it("should throw ListFilesError for non-directory paths", async () => {
      const filePath = join(testDir, "regular-file.txt");
      await writeFile(filePath, "content");

      try {
        await listFiles(filePath);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ListFilesError);
        if (err instanceof ListFilesError) {
          expect(errorCode(err.cause)).toBe("ENOTDIR");
        }
      }
    });
  });
});
