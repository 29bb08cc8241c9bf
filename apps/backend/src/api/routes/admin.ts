/**
 * Admin Routes
 * Fee recipient management; the engine enforces the administrator check
 */

import type { FeeRecipientResponse } from '@swapbook/shared';
import type { Request, Response } from 'express';
import type { OrderEngine } from '../../escrow/services/OrderEngine';
import { callerAddress } from '../middleware/auth';

/**
 * GET /admin/fee-recipient
 */
export async function getFeeRecipient(_req: Request, res: Response, engine: OrderEngine): Promise<void> {
  const response: FeeRecipientResponse = { fee_recipient: await engine.getFeeRecipient() };
  res.json(response);
}

/**
 * PUT /admin/fee-recipient
 */
export async function setFeeRecipient(req: Request, res: Response, engine: OrderEngine): Promise<void> {
  const body: unknown = req.body;
  const recipient: unknown =
    typeof body === 'object' && body !== null && 'fee_recipient' in body ? body.fee_recipient : undefined;

  if (typeof recipient !== 'string') {
    res.status(400).json({
      error: 'VALIDATION_ERROR',
      message: 'fee_recipient must be a string',
    });
    return;
  }

  await engine.setFeeRecipient(callerAddress(req), recipient);

  const response: FeeRecipientResponse = { fee_recipient: await engine.getFeeRecipient() };
  res.json(response);
}
