import dotenv from 'dotenv';
import path from 'path';

// Load .env file from project root before anything reads process.env
const envPath = path.resolve(process.cwd(), '.env');
dotenv.config({ path: envPath });

// Imported after dotenv so configuration sees the .env values
import type { Server as HttpServer } from 'http';
import { env } from './config/env';
import { adminDb } from './config/firebaseAdmin';
import { createApp } from './app/app';
import { createFirestoreScanner } from './repository/firestoreScanner';
import { createArchivedEventFeedSource, createEventFeedSource } from './repository/eventFeedRepository';
import { createUserDirectorySource } from './repository/userDirectoryRepository';
import { paginationService } from './services/paginationService';
import { createEventFeedService } from './services/eventFeedService';
import { createUserDirectoryService } from './services/userDirectoryService';
import { logger } from './utils/logger';

const eventScanner = createFirestoreScanner(adminDb.collection(env.eventsCollection));

const app = createApp({
  eventFeedService: createEventFeedService({
    source: createEventFeedSource(eventScanner),
    archivedSource: createArchivedEventFeedSource(eventScanner),
    pagination: paginationService,
  }),
  userDirectoryService: createUserDirectoryService({
    source: createUserDirectorySource(createFirestoreScanner(adminDb.collection(env.usersCollection))),
    pagination: paginationService,
  }),
});

const server: HttpServer = app.listen(env.port, () => {
  logger.info({ port: env.port, events: env.eventsCollection, users: env.usersCollection }, 'Event feed API running');
});

function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down');
  server.close((err) => {
    if (err) {
      logger.error({ err }, 'Error while closing HTTP server');
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
