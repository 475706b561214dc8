import { OrderedItem, PageDirection, PaginationCursor, SortOrder } from '../../types/pagination';
import { compareItems } from './compareItems';

/**
 * Keep only candidates strictly after (next) or strictly before (prev) the
 * cursor in the feed's order. The store's range hint is approximate; this is
 * the exact check.
 */
export function filterByCursor<T extends OrderedItem>(
  candidates: readonly T[],
  cursor: PaginationCursor,
  direction: PageDirection,
  order: SortOrder = 'asc'
): T[] {
  const boundary: OrderedItem = { sortKey: cursor.sortKey, tieBreakId: cursor.id };
  const wanted = (direction === 'next') === (order === 'asc') ? 1 : -1;
  return candidates.filter((candidate) => compareItems(candidate, boundary) === wanted);
}
