import { env } from '../config/env';
import { FeedSource, feedOrder, fetchCandidates, overFetchLimit } from '../repository/pageFetcher';
import {
  OrderedItem,
  PAGE_DIRECTIONS,
  PageDirection,
  PageRequest,
  PageResult,
  PaginatedPayload,
  PaginationCursor,
} from '../types/pagination';
import { CursorCodec, createCursorCodec } from '../utils/cursorUtils';
import { InvalidPageRequestError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { filterByCursor } from '../utils/pagination/boundaryFilter';
import { SeenKeys, dropSeen } from '../utils/pagination/seenKeys';
import { withTimeout } from '../utils/withTimeout';

export interface PaginationServiceOptions {
  codec: CursorCodec;
  maxPageSize: number;
  defaultTimeoutMs: number;
}

export interface PaginationService {
  paginate<T extends OrderedItem>(source: FeedSource<T>, request: PageRequest): Promise<PageResult<T>>;
  traversePages<T extends OrderedItem>(
    source: FeedSource<T>,
    request: PageRequest,
    options?: { maxPages?: number }
  ): AsyncGenerator<PageResult<T>, void, undefined>;
}

function isDirection(value: unknown): value is PageDirection {
  return PAGE_DIRECTIONS.some((direction) => direction === value);
}

function toCursor(item: OrderedItem): PaginationCursor {
  return { sortKey: item.sortKey, id: item.tieBreakId };
}

export function createPaginationService(options: PaginationServiceOptions): PaginationService {
  const { codec, maxPageSize, defaultTimeoutMs } = options;

  function validate(request: PageRequest): void {
    const { pageSize, direction, timeoutMs } = request;
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > maxPageSize) {
      throw new InvalidPageRequestError(`page_size must be an integer between 1 and ${maxPageSize}`, { pageSize });
    }
    if (!isDirection(direction)) {
      throw new InvalidPageRequestError("direction must be 'next' or 'prev'", { direction });
    }
    if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
      throw new InvalidPageRequestError('timeout must be a positive number of milliseconds', { timeoutMs });
    }
  }

  async function paginate<T extends OrderedItem>(source: FeedSource<T>, request: PageRequest): Promise<PageResult<T>> {
    validate(request);
    const { pageSize, direction, filters } = request;

    const cursor = codec.decode(request.cursorToken);
    if (request.cursorToken && !cursor) {
      logger.debug({ feed: source.name }, '[pagination] Malformed cursor, serving first page');
    }
    const hasCursor = cursor !== null;

    const limit = overFetchLimit(pageSize, hasCursor);
    const fetched = await withTimeout(
      fetchCandidates(source, filters, cursor, direction, limit),
      request.timeoutMs ?? defaultTimeoutMs
    );

    const corrected = cursor ? filterByCursor(fetched, cursor, direction, feedOrder(source)) : fetched;
    // prev scans run against the feed order; flip back to display order
    const ordered = direction === 'prev' ? [...corrected].reverse() : corrected;

    const hasMore = ordered.length > pageSize;
    const items = direction === 'next' ? ordered.slice(0, pageSize) : ordered.slice(-pageSize);

    const hasNext = direction === 'next' ? hasMore : hasCursor;
    const hasPrevious = direction === 'next' ? hasCursor : hasMore;

    const first = items[0];
    const last = items[items.length - 1];
    const result: PageResult<T> = {
      items,
      nextCursorToken: last && hasNext ? codec.encode(toCursor(last)) : null,
      prevCursorToken: first && hasPrevious ? codec.encode(toCursor(first)) : null,
      hasNext,
      hasPrevious,
    };

    logger.debug(
      { feed: source.name, direction, pageSize, fetched: fetched.length, kept: corrected.length, hasNext, hasPrevious },
      '[pagination] Page served'
    );
    return result;
  }

  async function* traversePages<T extends OrderedItem>(
    source: FeedSource<T>,
    request: PageRequest,
    traverseOptions: { maxPages?: number } = {}
  ): AsyncGenerator<PageResult<T>, void, undefined> {
    const maxPages = traverseOptions.maxPages ?? Number.POSITIVE_INFINITY;
    let seen: SeenKeys = new Set<string>();
    let token = request.cursorToken ?? null;

    for (let served = 0; served < maxPages; served++) {
      const page = await paginate(source, { ...request, cursorToken: token });
      const fresh = dropSeen(page.items, (item) => item.tieBreakId, seen);
      seen = fresh.seen;
      yield { ...page, items: fresh.items };

      token = request.direction === 'next' ? page.nextCursorToken : page.prevCursorToken;
      if (!token) return;
    }
  }

  return { paginate, traversePages };
}

export function toPaginatedPayload<T extends OrderedItem, R>(
  page: PageResult<T>,
  pageSize: number,
  present: (item: T) => R
): PaginatedPayload<R> {
  return {
    items: page.items.map(present),
    pagination: {
      next_cursor: page.nextCursorToken,
      prev_cursor: page.prevCursorToken,
      has_next: page.hasNext,
      has_previous: page.hasPrevious,
      page_size: pageSize,
    },
  };
}

export const paginationService = createPaginationService({
  codec: createCursorCodec({ secret: env.cursorSigningSecret }),
  maxPageSize: env.paginationMaxPageSize,
  defaultTimeoutMs: env.paginationTimeoutMs,
});
