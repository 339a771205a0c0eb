import express from 'express';
import helmet from 'helmet';

import { getConfig } from './config';
import { getAircraftRegistry, type AircraftRegistry } from './lib/registry';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { loggingMiddleware } from './middleware/logging';
import { createAircraftRouter } from './routes/api/aircraft';
import healthRouter from './routes/health';
import type { RabRefreshService } from './services/rabRefreshService';

type CreateAppOptions = {
  registry?: AircraftRegistry;
  refreshService?: Pick<RabRefreshService, 'getLatestStatus'>;
};

export const createApp = (options: CreateAppOptions = {}) => {
  const app = express();
  const config = getConfig();
  const registry = options.registry ?? getAircraftRegistry();

  app.set('trust proxy', config.nodeEnv === 'production');

  app.use(helmet());
  app.use(express.json());
  app.use(loggingMiddleware);

  app.use('/health', healthRouter);
  app.use(
    '/api/aircraft',
    createAircraftRouter({ registry, refreshService: options.refreshService }),
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
