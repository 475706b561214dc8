import { EventFeedItem, EventLocation, EventOrigin, EventRecord } from '../types/event';
import { DocumentScanner, RawRecord, StoredDocument } from '../types/pagination';
import { asNullableString, asNumber, asRecord, asString, asStringArray } from '../utils/recordFields';
import { FeedSource } from './pageFetcher';

export const EVENT_SORT_FIELD = 'startTime';
export const ARCHIVE_SORT_FIELD = 'archivedAt';

function toOrigin(value: unknown): EventOrigin | undefined {
  return value === 'manual' || value === 'external' ? value : undefined;
}

function toLocation(value: unknown): EventLocation | undefined {
  const raw = asRecord(value);
  if (!raw) return undefined;
  return {
    name: asString(raw.name),
    city: asString(raw.city),
    state: asString(raw.state),
    country: asString(raw.country),
    latitude: asNumber(raw.latitude) ?? null,
    longitude: asNumber(raw.longitude) ?? null,
    formattedAddress: asString(raw.formattedAddress),
  };
}

export function toEventRecord(record: StoredDocument): EventRecord {
  const data = record.data;
  return {
    // The document id is the canonical event id; older documents disagree with their own eventId field
    eventId: record.id,
    eventName: asString(data.eventName) ?? 'Untitled Event',
    description: asString(data.description),
    startTime: asNullableString(data.startTime),
    duration: asNumber(data.duration),
    location: toLocation(data.location),
    categories: asStringArray(data.categories),
    isOnline: data.isOnline === true,
    origin: toOrigin(data.origin),
    joinLink: asNullableString(data.joinLink),
    imageURL: asNullableString(data.imageURL),
    createdBy: asString(data.createdBy),
    createdByEmail: asString(data.createdByEmail),
    organizers: asStringArray(data.organizers),
    moderators: asStringArray(data.moderators),
    rsvpCount: asStringArray(data.rsvpList).length,
    isArchived: data.isArchived === true,
    archivedAt: asNullableString(data.archivedAt),
    createdAt: asNullableString(data.createdAt),
  };
}

export function toEventFeedItem(record: RawRecord): EventFeedItem {
  return {
    sortKey: record.sortKey,
    tieBreakId: record.id,
    event: toEventRecord(record),
  };
}

export function createEventFeedSource(scanner: DocumentScanner): FeedSource<EventFeedItem> {
  return {
    name: 'events',
    scanner,
    sortField: EVENT_SORT_FIELD,
    toItem: toEventFeedItem,
  };
}

// Archive listing: most recently archived first
export function createArchivedEventFeedSource(scanner: DocumentScanner): FeedSource<EventFeedItem> {
  return {
    name: 'archivedEvents',
    scanner,
    sortField: ARCHIVE_SORT_FIELD,
    sortOrder: 'desc',
    toItem: toEventFeedItem,
  };
}
