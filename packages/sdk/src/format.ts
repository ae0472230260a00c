/**
 * Deterministic JSON formatting for stored tasks
 */

/**
 * Key ordering: "alpha", or an explicit list with remaining keys alphabetical
 */
export type KeyOrder = "alpha" | readonly string[];

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 *
 * Arrays keep their order; object keys are sorted at every level.
 *
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(value: unknown, indent = 2, order: KeyOrder = "alpha"): string {
  const seen = new WeakSet<object>();

  const rank = (key: string): number => (order === "alpha" ? -1 : order.indexOf(key));

  const sorter = (a: string, b: string): number => {
    const aIndex = rank(a);
    const bIndex = rank(b);
    if (aIndex !== -1 && bIndex !== -1) return aIndex - bIndex;
    if (aIndex !== -1) return -1;
    if (bIndex !== -1) return 1;
    return a < b ? -1 : a > b ? 1 : 0;
  };

  const normalize = (current: unknown): unknown => {
    if (current === null || typeof current !== "object") {
      return current;
    }

    if (seen.has(current)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(current);

    try {
      if (Array.isArray(current)) {
        return current.map(normalize);
      }

      const out: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(current).sort(([a], [b]) => sorter(a, b))) {
        out[key] = normalize(item);
      }
      return out;
    } finally {
      seen.delete(current);
    }
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}

/**
 * Parse JSON text, tolerating a leading byte-order mark
 * @throws {SyntaxError} If the text is not valid JSON
 */
export function parseJson(text: string): unknown {
  const cleaned = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  return JSON.parse(cleaned);
}
