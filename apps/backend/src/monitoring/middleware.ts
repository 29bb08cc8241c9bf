/**
 * Metrics Middleware
 * Counts and times every HTTP request by route pattern
 */

import type { NextFunction, Request, Response } from 'express';
import { httpRequestCounter, httpRequestDuration } from './metrics';

/**
 * Route pattern (/orders/:id) rather than the concrete path, so ids do not
 * explode label cardinality
 */
function routeLabel(req: Request): string {
  const pattern: unknown = req.route?.path;
  if (typeof pattern === 'string') {
    return `${req.baseUrl}${pattern}`;
  }
  return 'unmatched';
}

export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const endTimer = httpRequestDuration.startTimer();

  res.on('finish', () => {
    const route = routeLabel(req);

    httpRequestCounter.inc({
      method: req.method,
      route,
      status_code: res.statusCode.toString(),
    });

    endTimer({ method: req.method, route });
  });

  next();
}
