import { FeedSource } from '../repository/pageFetcher';
import { EventFeedItem, EventFeedQuery, EventFilters, EventRecord } from '../types/event';
import { PageParams, PaginatedPayload, Predicate } from '../types/pagination';
import { PaginationService, toPaginatedPayload } from './paginationService';

const notArchived: Predicate = { kind: 'equals', field: 'isArchived', value: false };

function equals(field: string, value: string | boolean): Predicate {
  return { kind: 'equals', field, value };
}

function contains(field: string, value: string): Predicate {
  return { kind: 'arrayContains', field, value };
}

function locationPredicates(city?: string, state?: string): Predicate[] {
  const out: Predicate[] = [];
  if (city) out.push(equals('location.city', city));
  if (state) out.push(equals('location.state', state));
  return out;
}

/**
 * Query filters in the order the composite indexes were declared:
 * location, online, creator, category, then the startTime range.
 */
export function buildFilterPredicates(filters: EventFilters): Predicate[] {
  const out: Predicate[] = [...locationPredicates(filters.city, filters.state)];
  if (filters.isOnline !== undefined) out.push(equals('isOnline', filters.isOnline));
  if (filters.creatorEmail) out.push(equals('createdByEmail', filters.creatorEmail));
  if (filters.category) out.push(contains('categories', filters.category));
  if (filters.startDate) out.push({ kind: 'range', field: 'startTime', op: '>=', value: filters.startDate });
  if (filters.endDate) out.push({ kind: 'range', field: 'startTime', op: '<=', value: filters.endDate });
  return out;
}

export function buildEventPredicates(query: EventFeedQuery): Predicate[] {
  switch (query.feed) {
    case 'all':
      return [notArchived, ...buildFilterPredicates(query.filters)];
    case 'nearby':
      return [notArchived, ...locationPredicates(query.city, query.state)];
    case 'external':
      return [notArchived, ...locationPredicates(query.city, query.state), equals('origin', 'external')];
    case 'createdBy':
      return [notArchived, equals('createdByEmail', query.email)];
    case 'organizedBy':
      return [notArchived, contains('organizers', query.email)];
    case 'moderatedBy':
      return [notArchived, contains('moderators', query.email)];
    case 'rsvpedBy':
      return [notArchived, contains('rsvpList', query.email)];
    case 'archived':
      return [
        equals('isArchived', true),
        ...(query.creatorEmail ? [equals('createdByEmail', query.creatorEmail)] : []),
      ];
  }
}

export interface EventFeedService {
  listEvents(query: EventFeedQuery, page: PageParams): Promise<PaginatedPayload<EventRecord>>;
}

export function createEventFeedService(deps: {
  source: FeedSource<EventFeedItem>;
  // archived events page by archivedAt, most recent first
  archivedSource: FeedSource<EventFeedItem>;
  pagination: PaginationService;
}): EventFeedService {
  return {
    async listEvents(query, page) {
      const source = query.feed === 'archived' ? deps.archivedSource : deps.source;
      const result = await deps.pagination.paginate(source, {
        cursorToken: page.cursor,
        pageSize: page.pageSize,
        direction: page.direction,
        filters: buildEventPredicates(query),
        timeoutMs: page.timeoutMs,
      });
      return toPaginatedPayload(result, page.pageSize, (item) => item.event);
    },
  };
}
