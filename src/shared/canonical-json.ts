/**
 * Canonical JSON for machine-readable CLI reports.
 *
 *   1. Keys sorted lexicographically at every nesting level.
 *   2. `undefined` members omitted; null preserved.
 *   3. Arrays keep their order.
 *
 * Identical logical input → byte-identical output.
 */

export function canonicalJson(value: unknown): string {
  return JSON.stringify(toSortedValue(value));
}

function toSortedValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(toSortedValue);
  }

  if (typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    )) {
      if (v !== undefined) {
        sorted[key] = toSortedValue(v);
      }
    }
    return sorted;
  }

  return value;
}
