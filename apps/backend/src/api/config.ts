/**
 * API Configuration
 * Server, middleware and escrow engine settings read from the environment
 */

import type { Address, AssetId, FeeSchedule } from '@swapbook/shared';
import { DEFAULT_FEE_SCHEDULE } from '../escrow/fees';

/**
 * JWT secret; the development fallback is refused in production
 */
function getJwtSecret(): string {
  const secret = process.env.JWT_SECRET;

  if (!secret) {
    if (process.env.NODE_ENV === 'production') {
      throw new Error(
        'JWT_SECRET environment variable must be set in production. ' +
          'Generate one with: openssl rand -hex 32'
      );
    }
    return 'dev-secret-unsafe-for-production';
  }

  return secret;
}

/**
 * Allow-listed offer assets with their minimum amount in base units
 */
export const DEFAULT_MINIMUM_ORDER_AMOUNTS: Record<AssetId, bigint> = {
  USDC: 500n,
  USDT: 500n,
  DAI: 500n,
  WETH: 1n,
  WBTC: 1n,
};

/**
 * Parse "ASSET:amount,ASSET:amount" into a minimums table
 */
export function parseMinimumOrderAmounts(raw: string | undefined): Record<AssetId, bigint> {
  if (!raw || raw.trim() === '') {
    return { ...DEFAULT_MINIMUM_ORDER_AMOUNTS };
  }

  const minimums: Record<AssetId, bigint> = {};

  for (const entry of raw.split(',')) {
    const [asset, amount] = entry.split(':').map((part) => part.trim());

    if (!asset || !amount || !/^[0-9]+$/.test(amount)) {
      throw new Error(`Invalid ESCROW_MIN_ORDER_AMOUNTS entry: "${entry}"`);
    }

    minimums[asset] = BigInt(amount);
  }

  return minimums;
}

export interface EscrowConfig {
  adminAddress: Address;
  custodyAddress: Address;
  feeRecipient: Address;
  minimumOrderAmounts: Record<AssetId, bigint>;
  fees: FeeSchedule;
}

export const config = {
  port: parseInt(process.env.PORT || '3000', 10),
  apiPrefix: '/api/v1',
  nodeEnv: process.env.NODE_ENV || 'development',

  jwt: {
    secret: getJwtSecret(),
  },

  rateLimit: {
    windowMs: 60 * 1000, // 1 minute
    max: 100, // 100 requests per minute per IP
  },

  idempotency: {
    ttlSeconds: 24 * 60 * 60,
  },

  // Fee rates are fixed at startup, never per call
  escrow: {
    adminAddress: process.env.ESCROW_ADMIN_ADDRESS || '0x00000000000000000000000000000000000000a1',
    custodyAddress: process.env.ESCROW_CUSTODY_ADDRESS || '0x00000000000000000000000000000000000000c1',
    feeRecipient: process.env.ESCROW_FEE_RECIPIENT || '0x00000000000000000000000000000000000000f1',
    minimumOrderAmounts: parseMinimumOrderAmounts(process.env.ESCROW_MIN_ORDER_AMOUNTS),
    fees: DEFAULT_FEE_SCHEDULE,
  } satisfies EscrowConfig,
};
