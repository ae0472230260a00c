/**
 * Telemetry and observability helpers
 */

import type { OutputStream } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

export interface TelemetryOptions {
  /** Where metric lines go (stderr) */
  sink: OutputStream;
  enabled: boolean;
}

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a `metric <key> k=v ...` line when telemetry is enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>, options: TelemetryOptions): void {
  if (!options.enabled) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  options.sink.write(parts.join(" ") + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  label: string,
  fn: () => Promise<T>,
  options: TelemetryOptions
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(label, { duration_ms: Date.now() - start, success }, options);
  }
}
