/**
 * Deterministic JSON: stable key ordering, trimmed strings.
 * `undefined` members are dropped the same way JSON.stringify drops them.
 */
export function canonicalize(value: unknown, space?: number): string {
  return JSON.stringify(sortKeys(value), replacer, space);
}

function sortKeys(input: unknown): unknown {
  if (Array.isArray(input)) {
    return input.map(sortKeys);
  } else if (input && typeof input === 'object') {
    const out: Record<string, unknown> = {};
    const entries: [string, unknown][] = Object.entries(input);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, value] of entries) {
      out[key] = sortKeys(value);
    }
    return out;
  }
  return input;
}

function replacer(_key: string, value: unknown) {
  if (typeof value === 'string') {
    return value.trim();
  }
  return value;
}
