/**
 * Idempotency Middleware
 * A replayed POST/PUT with the same Idempotency-Key gets the first response
 * back instead of moving funds a second time
 */

import type { Request, Response, NextFunction } from 'express';
import { getRedisClient, type RedisClient } from '@swapbook/shared';
import { config } from '../config';

interface IdempotencyRecord {
  status: number; // 0 while the first request is still running
  headers: Record<string, string>;
  body: unknown;
  timestamp: string;
}

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

function isValidIdempotencyKey(key: string): boolean {
  return UUID_V4.test(key);
}

function getIdempotencyKey(idempotencyKey: string, address: string): string {
  return `idempotency:${address}:${idempotencyKey}`;
}

function parseRecord(raw: string): IdempotencyRecord | null {
  const parsed: unknown = JSON.parse(raw);

  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'status' in parsed &&
    typeof parsed.status === 'number' &&
    'headers' in parsed &&
    typeof parsed.headers === 'object' &&
    parsed.headers !== null &&
    'body' in parsed &&
    'timestamp' in parsed &&
    typeof parsed.timestamp === 'string'
  ) {
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed.headers)) {
      if (typeof value === 'string') {
        headers[key] = value;
      }
    }
    return { status: parsed.status, headers, body: parsed.body, timestamp: parsed.timestamp };
  }

  return null;
}

async function replayOrReserve(
  redis: RedisClient,
  redisKey: string,
  res: Response,
  next: NextFunction
): Promise<void> {
  const cached = await redis.get(redisKey);
  const record = cached ? parseRecord(cached) : null;

  if (record && record.status === 0) {
    res.status(409).json({
      error: 'REQUEST_IN_PROGRESS',
      message: 'A request with this Idempotency-Key is still being processed',
    });
    return;
  }

  if (record) {
    res.status(record.status);
    Object.entries(record.headers).forEach(([key, value]) => {
      res.setHeader(key, value);
    });
    res.json(record.body);
    return;
  }

  const inProgress: IdempotencyRecord = {
    status: 0,
    headers: {},
    body: { processing: true },
    timestamp: new Date().toISOString(),
  };
  await redis.setex(redisKey, config.idempotency.ttlSeconds, JSON.stringify(inProgress));

  const originalJson = res.json.bind(res);

  res.json = function (body: unknown): Response {
    // Server errors are not final; let the client retry with the same key
    const write: Promise<unknown> =
      res.statusCode >= 500
        ? redis.del(redisKey)
        : redis.setex(
            redisKey,
            config.idempotency.ttlSeconds,
            JSON.stringify({
              status: res.statusCode,
              headers: {
                'content-type': res.getHeader('content-type')?.toString() || 'application/json',
              },
              body,
              timestamp: new Date().toISOString(),
            } satisfies IdempotencyRecord)
          );

    write.catch((err: unknown) => {
      console.error('Failed to store idempotent response:', err);
    });

    return originalJson(body);
  };

  next();
}

/**
 * Required for POST and PUT; must run after authenticateJWT
 */
export function requireIdempotency(req: Request, res: Response, next: NextFunction): void {
  if (req.method !== 'POST' && req.method !== 'PUT') {
    next();
    return;
  }

  const header = req.headers['idempotency-key'];
  const idempotencyKey = Array.isArray(header) ? header[0] : header;

  if (!idempotencyKey) {
    res.status(400).json({
      error: 'MISSING_IDEMPOTENCY_KEY',
      message: 'Idempotency-Key header is required for POST/PUT requests',
    });
    return;
  }

  if (!isValidIdempotencyKey(idempotencyKey)) {
    res.status(400).json({
      error: 'INVALID_IDEMPOTENCY_KEY',
      message: 'Idempotency-Key must be a valid UUID v4',
    });
    return;
  }

  if (!req.user) {
    res.status(401).json({
      error: 'UNAUTHORIZED',
      message: 'Authentication required for write operations',
    });
    return;
  }

  const redisKey = getIdempotencyKey(idempotencyKey, req.user.address);

  replayOrReserve(getRedisClient(), redisKey, res, next).catch((err: unknown) => {
    console.error('Redis error in idempotency middleware:', err);
    res.status(503).json({
      error: 'SERVICE_UNAVAILABLE',
      message: 'Idempotency service temporarily unavailable',
    });
  });
}
