import { OrderedItem } from './pagination';

export type EventOrigin = 'manual' | 'external';

export interface EventLocation {
  name?: string;
  city?: string;
  state?: string;
  country?: string;
  latitude?: number | null;
  longitude?: number | null;
  formattedAddress?: string;
}

export interface EventRecord {
  eventId: string;
  eventName: string;
  description?: string;
  startTime: string | null;
  duration?: number;
  location?: EventLocation;
  categories: string[];
  isOnline: boolean;
  origin?: EventOrigin;
  joinLink?: string | null;
  imageURL?: string | null;
  createdBy?: string;
  createdByEmail?: string;
  organizers: string[];
  moderators: string[];
  rsvpCount: number;
  isArchived: boolean;
  archivedAt?: string | null;
  createdAt?: string | null;
}

export interface EventFeedItem extends OrderedItem {
  event: EventRecord;
}

// Optional filters accepted by the all-events listing
export interface EventFilters {
  city?: string;
  state?: string;
  category?: string;
  isOnline?: boolean;
  creatorEmail?: string;
  startDate?: string;
  endDate?: string;
}

export type EventFeedQuery =
  | { feed: 'all'; filters: EventFilters }
  | { feed: 'nearby'; city: string; state?: string }
  | { feed: 'external'; city: string; state?: string }
  | { feed: 'createdBy'; email: string }
  | { feed: 'organizedBy'; email: string }
  | { feed: 'moderatedBy'; email: string }
  | { feed: 'rsvpedBy'; email: string }
  | { feed: 'archived'; creatorEmail?: string };
