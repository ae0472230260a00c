/**
 * Deterministic clocks for task timestamps
 */

/**
 * Clock frozen at a single instant
 */
export function fixedClock(iso: string): () => Date {
  const time = Date.parse(iso);
  if (Number.isNaN(time)) {
    throw new RangeError(`Invalid timestamp: ${iso}`);
  }
  return () => new Date(time);
}

/**
 * Clock that advances by `stepMs` on every read, starting at `iso`
 */
export function steppingClock(iso: string, stepMs = 1000): () => Date {
  let time = Date.parse(iso);
  if (Number.isNaN(time)) {
    throw new RangeError(`Invalid timestamp: ${iso}`);
  }
  return () => {
    const now = new Date(time);
    time += stepMs;
    return now;
  };
}

/**
 * Wait for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
