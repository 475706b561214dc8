import { Router } from 'express';
import { EventFeedController } from '../controllers/eventFeedController';
import { UserDirectoryController } from '../controllers/userDirectoryController';
import { handleValidationErrors, validateListUserEvents, validateListUsers } from '../middlewares/validateListings';

export default function createUserRoutes(
  users: UserDirectoryController,
  events: EventFeedController
): Router {
  const router = Router();

  // Directory sorted by name, optional role/profession filters
  router.get('/', validateListUsers, handleValidationErrors, users.listUsers);

  // Events related to one user
  router.get('/:email/events/created', validateListUserEvents, handleValidationErrors, events.listCreatedEvents);
  router.get('/:email/events/organized', validateListUserEvents, handleValidationErrors, events.listOrganizedEvents);
  router.get('/:email/events/moderated', validateListUserEvents, handleValidationErrors, events.listModeratedEvents);
  router.get('/:email/events/rsvped', validateListUserEvents, handleValidationErrors, events.listRsvpedEvents);

  return router;
}
