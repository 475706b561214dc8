import {
  DocumentScanner,
  OrderedItem,
  PageDirection,
  PaginationCursor,
  Predicate,
  RawRecord,
  SortOrder,
  SortSpec,
} from '../types/pagination';

// Single-scan read cap
export const MAX_SCAN_LIMIT = 100;

/**
 * A paginated collection: where to scan, what to order by, and how a raw
 * document becomes an orderable item.
 */
export interface FeedSource<T extends OrderedItem> {
  name: string;
  scanner: DocumentScanner;
  sortField: string;
  // Feed order; absent means ascending
  sortOrder?: SortOrder;
  toItem(record: RawRecord): T;
}

/**
 * How many candidates to ask the store for. Without a cursor one extra item
 * is enough to detect another page. With a cursor the store's boundary is
 * approximate, so fetch a wider margin that survives correction.
 */
export function overFetchLimit(pageSize: number, hasCursor: boolean): number {
  if (!hasCursor) return pageSize + 1;
  return Math.max(pageSize + 1, Math.min(pageSize * 3, MAX_SCAN_LIMIT));
}

export function feedOrder<T extends OrderedItem>(source: FeedSource<T>): SortOrder {
  return source.sortOrder ?? 'asc';
}

/**
 * One range scan in fetch order: the feed's order for next, its reverse for
 * prev. No cursor starts at the natural beginning (next) or end (prev).
 */
export async function fetchCandidates<T extends OrderedItem>(
  source: FeedSource<T>,
  filters: Predicate[],
  cursor: PaginationCursor | null,
  direction: PageDirection,
  limit: number
): Promise<T[]> {
  const order = feedOrder(source);
  const reversed: SortOrder = order === 'asc' ? 'desc' : 'asc';
  const sort: SortSpec = { field: source.sortField, order: direction === 'next' ? order : reversed };
  const rangeHint = cursor ? { sortKey: cursor.sortKey, tieBreakId: cursor.id } : null;
  const records = await source.scanner.scan(filters, sort, rangeHint, limit);
  return records.slice(0, limit).map((record) => source.toItem(record));
}
