/**
 * Order Id Tests
 */

import { createHash } from 'node:crypto';
import { deriveOrderId } from '../orderId';

const baseInput = {
  nonce: 0n,
  maker: '0x00000000000000000000000000000000000000b1',
  timestamp: new Date('2024-01-01T00:00:00Z'),
  offeredAsset: 'USDC',
  requestedAsset: 'WETH',
};

describe('deriveOrderId', () => {
  it('should hash the nonce and order identity', () => {
    const expected = createHash('sha256')
      .update('0|0x00000000000000000000000000000000000000b1|1704067200000|USDC|WETH')
      .digest('hex');

    expect(deriveOrderId(baseInput)).toBe(`0x${expected}`);
  });

  it('should produce 32-byte hex ids', () => {
    expect(deriveOrderId(baseInput)).toMatch(/^0x[0-9a-f]{64}$/);
  });

  it('should differ per nonce', () => {
    expect(deriveOrderId({ ...baseInput, nonce: 1n })).not.toBe(deriveOrderId(baseInput));
  });
});
