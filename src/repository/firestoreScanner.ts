import { DocumentData, FieldPath, OrderByDirection, Timestamp, WhereFilterOp } from 'firebase-admin/firestore';
import { DocumentScanner, Predicate, RangeHint, RawRecord, SortKey, SortSpec } from '../types/pagination';
import { StoreUnavailableError, UnsupportedFilterCombinationError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { toSortKey } from '../utils/recordFields';

// gRPC status codes surfaced by the Firestore client
const INVALID_ARGUMENT = 3;
const DEADLINE_EXCEEDED = 4;
const RESOURCE_EXHAUSTED = 8;
const FAILED_PRECONDITION = 9;
const ABORTED = 10;
const INTERNAL = 13;
const UNAVAILABLE = 14;

const UNSUPPORTED_CODES = new Set([INVALID_ARGUMENT, FAILED_PRECONDITION]);
const TRANSIENT_CODES = new Set([DEADLINE_EXCEEDED, RESOURCE_EXHAUSTED, ABORTED, INTERNAL, UNAVAILABLE]);

// The slice of the Firestore query API the scanner drives; a CollectionReference satisfies it
export interface ScannableQuery {
  where(fieldPath: string, opStr: WhereFilterOp, value: unknown): ScannableQuery;
  orderBy(fieldPath: string | FieldPath, directionStr?: OrderByDirection): ScannableQuery;
  startAfter(...fieldValues: unknown[]): ScannableQuery;
  limit(limit: number): ScannableQuery;
  get(): Promise<{ docs: Array<{ id: string; data(): DocumentData; get(fieldPath: string): unknown }> }>;
}

export interface ScannableCollection extends ScannableQuery {
  readonly path: string;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled predicate: ${JSON.stringify(value)}`);
}

export function describePredicate(predicate: Predicate): string {
  switch (predicate.kind) {
    case 'equals':
      return `${predicate.field} == ${JSON.stringify(predicate.value)}`;
    case 'arrayContains':
      return `${predicate.field} array-contains ${JSON.stringify(predicate.value)}`;
    case 'range':
      return `${predicate.field} ${predicate.op} ${JSON.stringify(predicate.value)}`;
    default:
      return assertNever(predicate);
  }
}

function applyPredicate(query: ScannableQuery, predicate: Predicate): ScannableQuery {
  switch (predicate.kind) {
    case 'equals':
      return query.where(predicate.field, '==', predicate.value);
    case 'arrayContains':
      return query.where(predicate.field, 'array-contains', predicate.value);
    case 'range':
      return query.where(predicate.field, predicate.op, predicate.value);
    default:
      return assertNever(predicate);
  }
}

function toIso(value: unknown): unknown {
  return value instanceof Timestamp ? value.toDate().toISOString() : value;
}

// Timestamps stay timestamps in the sort key so a cursor resumes on the stored type
export function storeSortKey(value: unknown): SortKey {
  if (value instanceof Timestamp) return { seconds: value.seconds, nanoseconds: value.nanoseconds };
  return toSortKey(value);
}

function toCursorValue(key: SortKey): unknown {
  if (key !== null && typeof key === 'object') return new Timestamp(key.seconds, key.nanoseconds);
  return key;
}

function normalizeData(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = toIso(value);
  }
  return out;
}

function errorCode(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function classifyStoreError(err: unknown, filters: Predicate[], sort: SortSpec): unknown {
  const code = errorCode(err);
  if (code !== undefined && UNSUPPORTED_CODES.has(code)) {
    return new UnsupportedFilterCombinationError(errorMessage(err), {
      filters: filters.map(describePredicate),
      sortField: sort.field,
    });
  }
  if (code !== undefined && TRANSIENT_CODES.has(code)) {
    return new StoreUnavailableError();
  }
  return err;
}

/**
 * Firestore adapter for the pagination engine. The range hint becomes a
 * `startAfter` on (sortField, documentId), null boundary keys included.
 * Timestamp sort values travel as timestamp keys, never as ISO strings.
 * Documents without the sort field never match an orderBy, so they are
 * outside every feed.
 */
export function createFirestoreScanner(collection: ScannableCollection): DocumentScanner {
  return {
    async scan(filters: Predicate[], sort: SortSpec, rangeHint: RangeHint | null, limit: number): Promise<RawRecord[]> {
      try {
        let query: ScannableQuery = collection;
        for (const predicate of filters) {
          query = applyPredicate(query, predicate);
        }
        query = query.orderBy(sort.field, sort.order).orderBy(FieldPath.documentId(), sort.order);
        if (rangeHint) {
          query = query.startAfter(toCursorValue(rangeHint.sortKey), rangeHint.tieBreakId);
        }

        const snap = await query.limit(limit).get();
        return snap.docs.map((doc) => ({
          id: doc.id,
          data: normalizeData(doc.data()),
          sortKey: storeSortKey(doc.get(sort.field)),
        }));
      } catch (err) {
        const classified = classifyStoreError(err, filters, sort);
        logger.warn(
          { collection: collection.path, sortField: sort.field, code: errorCode(err), err: errorMessage(err) },
          '[firestoreScanner] Scan failed'
        );
        throw classified;
      }
    },
  };
}
