/**
 * Monitoring Routes
 * Health checks and metrics endpoints
 */

import type { Request, Response } from 'express';
import { Router } from 'express';
import type { HealthCheckService, HealthStatus } from '../../monitoring/HealthCheckService';
import { register } from '../../monitoring/metrics';

function statusCodeFor(health: HealthStatus): number {
  return health.status === 'unhealthy' ? 503 : 200;
}

export function createMonitoringRoutes(healthCheckService: HealthCheckService): Router {
  const router = Router();

  /**
   * GET /health
   */
  router.get('/health', async (_req: Request, res: Response) => {
    try {
      const health = await healthCheckService.checkHealth();
      res.status(statusCodeFor(health)).json(health);
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  /**
   * GET /health/detailed
   * Adds open order count and notification queue depth
   */
  router.get('/health/detailed', async (_req: Request, res: Response) => {
    try {
      const health = await healthCheckService.checkDetailedHealth();
      res.status(statusCodeFor(health)).json(health);
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  /**
   * GET /metrics
   * Prometheus exposition format
   */
  router.get('/metrics', async (_req: Request, res: Response) => {
    try {
      res.set('Content-Type', register.contentType);
      res.send(await register.metrics());
    } catch (error) {
      res.status(500).json({
        error: 'Failed to collect metrics',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  return router;
}
