/**
 * API Routes
 * Route table for the escrow order book
 */

import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import type { OrderEngine } from '../../escrow/services/OrderEngine';
import type { HealthCheckService } from '../../monitoring/HealthCheckService';
import { authenticateJWT, requireIdempotency } from '../middleware';
import * as adminRoutes from './admin';
import { createMonitoringRoutes } from './monitoring';
import * as orderRoutes from './orders';

export interface RouteServices {
  engine: OrderEngine;
  healthCheckService: HealthCheckService;
}

type EngineHandler = (req: Request, res: Response, engine: OrderEngine) => Promise<void>;

/**
 * Bind a handler to the engine; rejections go to errorHandler
 */
function withEngine(handler: EngineHandler, engine: OrderEngine) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res, engine).catch(next);
  };
}

export function createRoutes(services: RouteServices): Router {
  const router = Router();
  const { engine } = services;

  // /orders/count is registered ahead of /orders/:id
  router.get('/orders', authenticateJWT, withEngine(orderRoutes.listOrders, engine));
  router.get('/orders/count', authenticateJWT, withEngine(orderRoutes.countOrders, engine));
  router.get('/orders/:id', authenticateJWT, withEngine(orderRoutes.getOrder, engine));

  // Writes act on behalf of the authenticated address
  router.post(
    '/orders',
    authenticateJWT,
    requireIdempotency,
    withEngine(orderRoutes.placeOrder, engine)
  );
  router.post(
    '/orders/:id/cancel',
    authenticateJWT,
    requireIdempotency,
    withEngine(orderRoutes.cancelOrder, engine)
  );
  router.post(
    '/orders/:id/execute',
    authenticateJWT,
    requireIdempotency,
    withEngine(orderRoutes.executeOrder, engine)
  );

  router.get('/admin/fee-recipient', authenticateJWT, withEngine(adminRoutes.getFeeRecipient, engine));
  router.put(
    '/admin/fee-recipient',
    authenticateJWT,
    requireIdempotency,
    withEngine(adminRoutes.setFeeRecipient, engine)
  );

  router.use('/', createMonitoringRoutes(services.healthCheckService));

  return router;
}
