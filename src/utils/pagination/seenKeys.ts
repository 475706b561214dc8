// Explicit de-duplication state for a multi-page traversal. Callers own the
// set and thread it through; nothing here is module-level.
export type SeenKeys = ReadonlySet<string>;

export function dropSeen<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
  seen: SeenKeys
): { items: T[]; seen: SeenKeys } {
  const next = new Set(seen);
  const fresh: T[] = [];
  for (const item of items) {
    const key = keyOf(item);
    if (next.has(key)) continue;
    next.add(key);
    fresh.push(item);
  }
  return { items: fresh, seen: next };
}
