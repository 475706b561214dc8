export type PageDirection = 'next' | 'prev';

export const PAGE_DIRECTIONS: readonly PageDirection[] = ['next', 'prev'];

// A stored Timestamp, kept apart from ISO strings so it resumes as a timestamp
export interface TimestampKey {
  seconds: number;
  nanoseconds: number;
}

// Orderable sort key. Cross-type order: null < boolean < number < timestamp < string
export type SortKey = string | number | boolean | TimestampKey | null;

export type FieldScalar = string | number | boolean | null;

export interface PaginationCursor {
  sortKey: SortKey;
  id: string;
}

// Anything the engine can place in the (sortKey, tieBreakId) order
export interface OrderedItem {
  sortKey: SortKey;
  tieBreakId: string;
}

export type RangeOperator = '>=' | '<=';

export type Predicate =
  | { kind: 'equals'; field: string; value: FieldScalar }
  | { kind: 'arrayContains'; field: string; value: FieldScalar }
  | { kind: 'range'; field: string; op: RangeOperator; value: string | number };

export type SortOrder = 'asc' | 'desc';

export interface SortSpec {
  field: string;
  order: SortOrder;
}

/**
 * Best-effort "start strictly after this position in scan order".
 * Stores may ignore any part they cannot express.
 */
export interface RangeHint {
  sortKey: SortKey;
  tieBreakId: string;
}

export interface StoredDocument {
  id: string;
  data: Record<string, unknown>;
}

// A scanned document plus its sort key, read by the store before any display normalization
export interface RawRecord extends StoredDocument {
  sortKey: SortKey;
}

/**
 * The only thing the engine needs from a backing store: a filtered, sorted,
 * range-bounded scan returning up to `limit` documents.
 */
export interface DocumentScanner {
  scan(filters: Predicate[], sort: SortSpec, rangeHint: RangeHint | null, limit: number): Promise<RawRecord[]>;
}

export interface PageRequest {
  cursorToken?: string | null;
  pageSize: number;
  direction: PageDirection;
  filters: Predicate[];
  timeoutMs?: number;
}

// Page parameters as the HTTP layer hands them to a feed service
export interface PageParams {
  cursor?: string;
  pageSize: number;
  direction: PageDirection;
  timeoutMs?: number;
}

export interface PageResult<T> {
  items: T[];
  nextCursorToken: string | null;
  prevCursorToken: string | null;
  hasNext: boolean;
  hasPrevious: boolean;
}

export interface PaginationMeta {
  next_cursor: string | null;
  prev_cursor: string | null;
  has_next: boolean;
  has_previous: boolean;
  page_size: number;
}

export interface PaginatedPayload<T> {
  items: T[];
  pagination: PaginationMeta;
}
