import { Router } from 'express';
import { EventFeedController } from '../controllers/eventFeedController';
import {
  handleValidationErrors,
  validateListArchivedEvents,
  validateListEvents,
  validateListLocalEvents,
} from '../middlewares/validateListings';

export default function createEventRoutes(controller: EventFeedController): Router {
  const router = Router();

  // All non-archived events, optional city/state/category/is_online/creator_email/date filters
  router.get('/', validateListEvents, handleValidationErrors, controller.listEvents);

  // Community + external events in a city
  router.get('/nearby', validateListLocalEvents, handleValidationErrors, controller.listNearbyEvents);

  // Ingested (external) events in a city
  router.get('/external', validateListLocalEvents, handleValidationErrors, controller.listExternalEvents);

  router.get('/archived', validateListArchivedEvents, handleValidationErrors, controller.listArchivedEvents);

  return router;
}
