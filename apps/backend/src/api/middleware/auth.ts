/**
 * Authentication Middleware
 * JWT bearer auth; the token subject is the caller's ledger address
 */

import type { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';
import { config } from '../config';

export interface JwtPayload {
  address: string;
}

/* eslint-disable @typescript-eslint/no-namespace */
declare global {
  namespace Express {
    interface Request {
      user?: JwtPayload;
    }
  }
}
/* eslint-enable @typescript-eslint/no-namespace */

function isJwtPayload(value: unknown): value is JwtPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'address' in value &&
    typeof value.address === 'string' &&
    value.address.length > 0
  );
}

/**
 * Verify JWT token and attach user to request
 */
export function authenticateJWT(req: Request, res: Response, next: NextFunction): void {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    res.status(401).json({
      error: 'UNAUTHORIZED',
      message: 'Missing or invalid Authorization header',
    });
    return;
  }

  const token = authHeader.substring(7);

  try {
    const decoded = jwt.verify(token, config.jwt.secret);

    if (!isJwtPayload(decoded)) {
      res.status(401).json({
        error: 'INVALID_TOKEN',
        message: 'JWT token does not carry an address',
      });
      return;
    }

    req.user = { address: decoded.address };
    next();
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      res.status(401).json({
        error: 'TOKEN_EXPIRED',
        message: 'JWT token has expired',
      });
      return;
    }

    if (error instanceof jwt.JsonWebTokenError) {
      res.status(401).json({
        error: 'INVALID_TOKEN',
        message: 'Invalid JWT token',
      });
      return;
    }

    res.status(401).json({
      error: 'UNAUTHORIZED',
      message: 'Authentication failed',
    });
  }
}

/**
 * Address of the authenticated caller; only valid behind authenticateJWT
 */
export function callerAddress(req: Request): string {
  if (!req.user) {
    throw new Error('callerAddress used on an unauthenticated route');
  }
  return req.user.address;
}
