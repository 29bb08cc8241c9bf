/**
 * Fee Schedule
 * Fees are taken off the top of each leg with truncating integer division
 */

import type { Address, FeeRate, FeeSchedule, Settlement, SwapOrder } from '@swapbook/shared';
import { InvalidInputError } from './errors';

export const FEE_DENOMINATOR = 10_000n;

export const DEFAULT_FEE_SCHEDULE: FeeSchedule = {
  makerFee: { numerator: 150n, denominator: FEE_DENOMINATOR }, // 1.5%
  takerFee: { numerator: 80n, denominator: FEE_DENOMINATOR }, // 0.8%
};

export function validateFeeRate(rate: FeeRate, label: string): void {
  if (rate.denominator <= 0n) {
    throw new InvalidInputError(`${label} denominator must be greater than 0`);
  }
  if (rate.numerator < 0n || rate.numerator > rate.denominator) {
    throw new InvalidInputError(`${label} must be between 0 and 1`);
  }
}

/**
 * bigint division truncates, which is floor for non-negative operands
 */
export function applyFeeRate(amount: bigint, rate: FeeRate): bigint {
  return (amount * rate.numerator) / rate.denominator;
}

/**
 * Split both legs of an order into fee + payout
 */
export function computeSettlement(
  order: Pick<SwapOrder, 'offeredAmount' | 'requestedAmount'>,
  schedule: FeeSchedule,
  feeRecipient: Address
): Settlement {
  const requestedFee = applyFeeRate(order.requestedAmount, schedule.makerFee);
  const offeredFee = applyFeeRate(order.offeredAmount, schedule.takerFee);

  return {
    requestedFee,
    requestedPayout: order.requestedAmount - requestedFee,
    offeredFee,
    offeredPayout: order.offeredAmount - offeredFee,
    feeRecipient,
  };
}
