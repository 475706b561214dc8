import { OrderedItem, SortKey, TimestampKey } from '../../types/pagination';

export type Ordering = -1 | 0 | 1;

// Cross-type rank follows Firestore: null < boolean < number < timestamp < string
function typeRank(key: SortKey): number {
  if (key === null) return 0;
  if (typeof key === 'boolean') return 1;
  if (typeof key === 'number') return 2;
  if (typeof key === 'object') return 3;
  return 4;
}

function compareNumbers(a: number, b: number): Ordering {
  return a === b ? 0 : a < b ? -1 : 1;
}

function compareTimestamps(a: TimestampKey, b: TimestampKey): Ordering {
  return compareNumbers(a.seconds, b.seconds) || compareNumbers(a.nanoseconds, b.nanoseconds);
}

/**
 * Code point order, which is the UTF-8 byte order Firestore applies to
 * strings and document ids. Plain `<` compares UTF-16 code units and puts
 * astral characters (emoji) before U+E000..U+FFFF.
 */
export function compareStrings(a: string, b: string): Ordering {
  if (a === b) return 0;
  let i = 0;
  while (i < a.length && i < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(i) ?? 0;
    if (ca !== cb) return ca < cb ? -1 : 1;
    i += ca > 0xffff ? 2 : 1;
  }
  return a.length < b.length ? -1 : 1;
}

export function compareSortKeys(a: SortKey, b: SortKey): Ordering {
  const ra = typeRank(a);
  const rb = typeRank(b);
  if (ra !== rb) return ra < rb ? -1 : 1;
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a === b ? 0 : a ? 1 : -1;
  }
  if (typeof a === 'number' && typeof b === 'number') return compareNumbers(a, b);
  if (typeof a === 'string' && typeof b === 'string') return compareStrings(a, b);
  if (a !== null && typeof a === 'object' && b !== null && typeof b === 'object') return compareTimestamps(a, b);
  return 0;
}

// Total order over (sortKey, tieBreakId), ascending.
export function compareItems(a: OrderedItem, b: OrderedItem): Ordering {
  return compareSortKeys(a.sortKey, b.sortKey) || compareStrings(a.tieBreakId, b.tieBreakId);
}
