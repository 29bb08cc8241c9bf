/**
 * Express Application
 * Escrow order book HTTP API
 */

import express, { type Express } from 'express';
import { metricsMiddleware } from '../monitoring';
import { config } from './config';
import {
  errorHandler,
  globalRateLimiter,
  notFoundHandler,
  validateBodyExists,
  validateContentType,
  writeRateLimiter,
} from './middleware';
import { createRoutes, type RouteServices } from './routes';

export function createApp(services: RouteServices): Express {
  const app = express();

  // Trust proxy (for rate limiting by IP when behind reverse proxy)
  app.set('trust proxy', 1);

  app.use(express.json());
  app.use(metricsMiddleware);

  app.use(globalRateLimiter);
  app.use(writeRateLimiter);
  app.use(validateContentType);
  app.use(validateBodyExists);

  app.use(config.apiPrefix, createRoutes(services));

  // Error handlers (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
