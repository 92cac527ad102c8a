/**
 * better-sqlite3 binds numbers, strings, bigints, buffers and null only.
 * Booleans become 1/0, Dates ISO-8601 text and undefined NULL.
 */
export function normalizeBinding(value: unknown): unknown {
  if (value === undefined) {
    return null;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}

export function normalizeBindings(bindings: readonly unknown[]): unknown[] {
  return bindings.map(normalizeBinding);
}
