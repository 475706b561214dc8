import { Request, Response, NextFunction } from 'express';
import { EventFeedService } from '../services/eventFeedService';
import { EventFeedQuery } from '../types/event';
import { formatApiResponse } from '../utils/formatApiResponse';
import { queryBoolean, queryString, readPageParams } from '../utils/pageParams';

type UserFeed = 'createdBy' | 'organizedBy' | 'moderatedBy' | 'rsvpedBy';

export function createEventFeedController(service: EventFeedService) {
  async function respond(query: EventFeedQuery, req: Request, res: Response, next: NextFunction) {
    try {
      const payload = await service.listEvents(query, readPageParams(req));
      return res.json(formatApiResponse('success', 'OK', payload));
    } catch (error) {
      return next(error);
    }
  }

  function listEvents(req: Request, res: Response, next: NextFunction) {
    return respond(
      {
        feed: 'all',
        filters: {
          city: queryString(req, 'city'),
          state: queryString(req, 'state'),
          category: queryString(req, 'category'),
          isOnline: queryBoolean(req, 'is_online'),
          creatorEmail: queryString(req, 'creator_email'),
          startDate: queryString(req, 'start_date'),
          endDate: queryString(req, 'end_date'),
        },
      },
      req,
      res,
      next
    );
  }

  function listNearbyEvents(req: Request, res: Response, next: NextFunction) {
    const city = queryString(req, 'city') ?? '';
    return respond({ feed: 'nearby', city, state: queryString(req, 'state') }, req, res, next);
  }

  function listExternalEvents(req: Request, res: Response, next: NextFunction) {
    const city = queryString(req, 'city') ?? '';
    return respond({ feed: 'external', city, state: queryString(req, 'state') }, req, res, next);
  }

  function listArchivedEvents(req: Request, res: Response, next: NextFunction) {
    return respond({ feed: 'archived', creatorEmail: queryString(req, 'creator_email') }, req, res, next);
  }

  function listUserEvents(feed: UserFeed) {
    return (req: Request, res: Response, next: NextFunction) =>
      respond({ feed, email: req.params.email }, req, res, next);
  }

  return {
    listEvents,
    listNearbyEvents,
    listExternalEvents,
    listArchivedEvents,
    listCreatedEvents: listUserEvents('createdBy'),
    listOrganizedEvents: listUserEvents('organizedBy'),
    listModeratedEvents: listUserEvents('moderatedBy'),
    listRsvpedEvents: listUserEvents('rsvpedBy'),
  };
}

export type EventFeedController = ReturnType<typeof createEventFeedController>;
