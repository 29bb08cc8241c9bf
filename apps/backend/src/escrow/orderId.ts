/**
 * Order Id Derivation
 * Deterministic 32-byte id from the engine nonce and order identity
 */

import { createHash } from 'node:crypto';
import type { Address, AssetId, OrderId } from '@swapbook/shared';

export interface OrderIdInput {
  nonce: bigint;
  maker: Address;
  timestamp: Date;
  offeredAsset: AssetId;
  requestedAsset: AssetId;
}

export function deriveOrderId(input: OrderIdInput): OrderId {
  const preimage = [
    input.nonce.toString(),
    input.maker,
    input.timestamp.getTime().toString(),
    input.offeredAsset,
    input.requestedAsset,
  ].join('|');

  return `0x${createHash('sha256').update(preimage).digest('hex')}`;
}
