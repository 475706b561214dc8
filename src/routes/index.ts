import { Router } from 'express';
import { createEventFeedController } from '../controllers/eventFeedController';
import { createUserDirectoryController } from '../controllers/userDirectoryController';
import { EventFeedService } from '../services/eventFeedService';
import { UserDirectoryService } from '../services/userDirectoryService';
import createEventRoutes from './events';
import createUserRoutes from './users';

export interface RouteDependencies {
  eventFeedService: EventFeedService;
  userDirectoryService: UserDirectoryService;
}

export default function createRoutes(deps: RouteDependencies): Router {
  const router = Router();
  const eventController = createEventFeedController(deps.eventFeedService);
  const userController = createUserDirectoryController(deps.userDirectoryService);

  router.use('/events', createEventRoutes(eventController));
  router.use('/users', createUserRoutes(userController, eventController));

  return router;
}
