/**
 * Error Handling Middleware
 * Escrow rejections keep their code and status; anything else is a 500
 */

import type { Request, Response, NextFunction } from 'express';
import { EscrowError, InsufficientFundsError } from '../../escrow/errors';
import { errorCounter } from '../../monitoring/metrics';

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
  });
}

export function errorHandler(err: Error, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof EscrowError) {
    if (err.statusCode >= 500) {
      errorCounter.inc({ type: err.code, service: 'escrow' });
      console.error('Escrow invariant violation:', err);
    }

    res.status(err.statusCode).json({
      error: err.code,
      message: err.message,
      ...(err instanceof InsufficientFundsError ? { reason: err.reason } : {}),
    });
    return;
  }

  errorCounter.inc({ type: err.name, service: 'api' });
  console.error('Unhandled error:', err);

  res.status(500).json({
    error: 'INTERNAL_SERVER_ERROR',
    message: 'An unexpected error occurred',
  });
}
