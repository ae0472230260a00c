/**
 * Output rendering helpers
 */

import type { OutputStream } from "./io.js";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON
 */
export function printJson(out: OutputStream, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  out.write(json + "\n");
}

/**
 * Print lines (one per line)
 */
export function printLines(out: OutputStream, lines: readonly string[]): void {
  for (const line of lines) {
    out.write(line + "\n");
  }
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(text: string, color: Color, stream: OutputStream): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
