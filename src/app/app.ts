import express, { Express } from 'express';
import createRoutes, { RouteDependencies } from '../routes';
import { errorHandler } from '../utils/errorHandler';
import { formatApiResponse } from '../utils/formatApiResponse';
import { corsPolicy, gzipCompression, httpParamPollution, requestId, securityHeaders } from '../middlewares/security';
import { httpLogger } from '../middlewares/logger';
import { env } from '../config/env';

export type AppDependencies = RouteDependencies;

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Trust proxy settings (safe for rate limiting)
  app.set('trust proxy', env.nodeEnv === 'production' ? 1 : false);
  app.disable('x-powered-by');

  app.use(requestId);
  app.use(securityHeaders);
  app.use(corsPolicy);
  app.use(httpParamPollution);
  app.use(gzipCompression);
  app.use(httpLogger);

  app.get('/health', (_req, res) => {
    res.json(formatApiResponse('success', 'OK', { uptime: process.uptime() }));
  });

  app.use('/api', createRoutes(deps));

  app.use((_req, res) => {
    res.status(404).json(formatApiResponse('error', 'Not Found', null));
  });

  app.use(errorHandler);

  return app;
}
