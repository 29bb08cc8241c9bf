/**
 * Order Routes
 * HTTP endpoints for placing, listing, canceling and taking swap orders
 */

import type { ListSwapOrdersResponse, OrderCountResponse } from '@swapbook/shared';
import type { Request, Response } from 'express';
import type { OrderEngine } from '../../escrow/services/OrderEngine';
import { toNotificationPayload, toSwapOrderResponse } from '../../escrow/events/payload';
import { callerAddress } from '../middleware/auth';

/**
 * Decimal integer string → bigint; null when malformed
 */
function parseAmount(value: unknown): bigint | null {
  if (typeof value !== 'string' || !/^[0-9]+$/.test(value)) {
    return null;
  }
  return BigInt(value);
}

function parseAsset(value: unknown): string | null {
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }
  return value.trim();
}

function parsePageParam(value: unknown): number | undefined | null {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || !/^[0-9]+$/.test(value)) {
    return null;
  }
  return parseInt(value, 10);
}

function readField(body: unknown, field: string): unknown {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  const value: unknown = Object.prototype.hasOwnProperty.call(body, field)
    ? Reflect.get(body, field)
    : undefined;
  return value;
}

/**
 * POST /orders
 * Deposits the offered asset; the new id is in the returned notification
 */
export async function placeOrder(req: Request, res: Response, engine: OrderEngine): Promise<void> {
  const body: unknown = req.body;

  const offeredAsset = parseAsset(readField(body, 'offered_asset'));
  const requestedAsset = parseAsset(readField(body, 'requested_asset'));
  const offeredAmount = parseAmount(readField(body, 'offered_amount'));
  const requestedAmount = parseAmount(readField(body, 'requested_amount'));

  if (!offeredAsset || !requestedAsset || offeredAmount === null || requestedAmount === null) {
    res.status(400).json({
      error: 'VALIDATION_ERROR',
      message:
        'Required fields: offered_asset, requested_asset, and offered_amount / requested_amount as decimal integer strings',
    });
    return;
  }

  const notification = await engine.createOrder({
    maker: callerAddress(req),
    offeredAsset,
    offeredAmount,
    requestedAsset,
    requestedAmount,
  });

  res.status(201).json(toNotificationPayload(notification));
}

/**
 * GET /orders
 */
export async function listOrders(req: Request, res: Response, engine: OrderEngine): Promise<void> {
  const limit = parsePageParam(req.query.limit);
  const offset = parsePageParam(req.query.offset);

  if (limit === null || offset === null) {
    res.status(400).json({
      error: 'VALIDATION_ERROR',
      message: 'limit and offset must be non-negative integers',
    });
    return;
  }

  const page = await engine.getOrderPage(offset ?? 0, limit);

  const response: ListSwapOrdersResponse = {
    items: page.orders.map(toSwapOrderResponse),
    meta: { total: page.total, limit: page.limit, offset: page.offset },
  };
  res.json(response);
}

/**
 * GET /orders/count
 */
export async function countOrders(_req: Request, res: Response, engine: OrderEngine): Promise<void> {
  const response: OrderCountResponse = { count: await engine.getNumberOrders() };
  res.json(response);
}

/**
 * GET /orders/:id
 */
export async function getOrder(req: Request, res: Response, engine: OrderEngine): Promise<void> {
  const order = await engine.getOrder(req.params.id);
  res.json(toSwapOrderResponse(order));
}

/**
 * POST /orders/:id/cancel
 * Maker only; returns the deposit
 */
export async function cancelOrder(req: Request, res: Response, engine: OrderEngine): Promise<void> {
  const notification = await engine.cancelOrder(callerAddress(req), req.params.id);
  res.json(toNotificationPayload(notification));
}

/**
 * POST /orders/:id/execute
 * Caller becomes the taker and pays the requested asset
 */
export async function executeOrder(req: Request, res: Response, engine: OrderEngine): Promise<void> {
  const notification = await engine.executeOrder(callerAddress(req), req.params.id);
  res.json(toNotificationPayload(notification));
}
