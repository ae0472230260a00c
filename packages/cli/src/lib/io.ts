/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { parseJson } from "./arg.js";

/**
 * Writable end the CLI prints to (process.stdout/stderr, or a buffer in tests)
 */
export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export type InputStream = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Read a whole stream with size limit (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(stream: InputStream, maxBytes = 10 * 1024 * 1024): Promise<string> {
  const chunks: Buffer[] = [];
  let bytesRead = 0;

  for await (const chunk of stream) {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    bytesRead += bytes.length;

    // Enforce size limit during streaming to prevent memory exhaustion
    if (bytesRead > maxBytes) {
      throw new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`);
    }

    chunks.push(bytes);
  }

  // Decode once: a multibyte character may straddle two chunks
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Read JSON from a file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf8");
  return parseJson(content, `file ${filePath}`);
}

/**
 * Check if input is an interactive terminal (or missing)
 */
export function isInteractive(stream: InputStream | undefined): boolean {
  return stream === undefined || (stream.isTTY ?? false);
}
