/**
 * Request Validation Middleware
 */

import type { Request, Response, NextFunction } from 'express';

export function validateContentType(req: Request, res: Response, next: NextFunction): void {
  if (req.method === 'POST' || req.method === 'PUT') {
    const contentType = req.headers['content-type'];

    if (!contentType || !contentType.includes('application/json')) {
      res.status(415).json({
        error: 'UNSUPPORTED_MEDIA_TYPE',
        message: 'Content-Type must be application/json for POST/PUT requests',
      });
      return;
    }
  }

  next();
}

/**
 * Cancel and execute carry everything in the path, so only PUT needs a body
 */
export function validateBodyExists(req: Request, res: Response, next: NextFunction): void {
  if (req.method === 'PUT') {
    const body: unknown = req.body;

    if (typeof body !== 'object' || body === null || Object.keys(body).length === 0) {
      res.status(400).json({
        error: 'INVALID_REQUEST',
        message: 'Request body is required for PUT requests',
      });
      return;
    }
  }

  next();
}
