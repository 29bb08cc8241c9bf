/**
 * Order Repository
 * Data access layer for escrow.orders. Writes take the session's client so
 * order rows commit in the same transaction as the funds behind them.
 */

import type { OrderId, SwapOrder } from '@swapbook/shared';
import type { Pool, PoolClient } from 'pg';
import type { ClosedOrderStatus } from '../custody/AssetTransfer';
import { OrderNotFoundError } from '../errors';

interface SwapOrderRow {
  id: string;
  nonce: string;
  maker: string;
  offered_asset: string;
  offered_amount: string;
  requested_asset: string;
  requested_amount: string;
  created_at: Date;
}

interface NextNonceRow {
  next_nonce: string;
}

export class OrderRepository {
  constructor(private readonly pool: Pool) {}

  /**
   * Insert an order in OPEN status
   */
  async createOpen(order: SwapOrder, nonce: bigint, client: PoolClient): Promise<void> {
    const query = `
      INSERT INTO escrow.orders (
        id, nonce, maker, offered_asset, offered_amount,
        requested_asset, requested_amount, status, created_at
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, 'OPEN', $8)
    `;

    await client.query(query, [
      order.id,
      nonce.toString(),
      order.maker,
      order.offeredAsset,
      order.offeredAmount.toString(),
      order.requestedAsset,
      order.requestedAmount.toString(),
      order.createdAt,
    ]);
  }

  /**
   * OPEN → CANCELED | EXECUTED
   */
  async close(id: OrderId, status: ClosedOrderStatus, client: PoolClient): Promise<void> {
    const query = `
      UPDATE escrow.orders
      SET status = $2, closed_at = NOW()
      WHERE id = $1 AND status = 'OPEN'
    `;

    const result = await client.query(query, [id, status]);

    if ((result.rowCount ?? 0) === 0) {
      throw new OrderNotFoundError(id);
    }
  }

  /**
   * Open orders oldest first
   */
  async findOpen(): Promise<SwapOrder[]> {
    const query = `
      SELECT
        id, nonce, maker, offered_asset, offered_amount,
        requested_asset, requested_amount, created_at
      FROM escrow.orders
      WHERE status = 'OPEN'
      ORDER BY nonce ASC
    `;

    const result = await this.pool.query<SwapOrderRow>(query);

    return result.rows.map((row) => this.mapRowToOrder(row));
  }

  /**
   * One past the highest nonce ever issued, closed orders included
   */
  async nextNonce(): Promise<bigint> {
    const result = await this.pool.query<NextNonceRow>(
      'SELECT COALESCE(MAX(nonce) + 1, 0)::TEXT AS next_nonce FROM escrow.orders'
    );

    const row = result.rows[0];
    return row ? BigInt(row.next_nonce) : 0n;
  }

  private mapRowToOrder(row: SwapOrderRow): SwapOrder {
    return {
      id: row.id,
      offeredAsset: row.offered_asset,
      offeredAmount: BigInt(row.offered_amount),
      requestedAsset: row.requested_asset,
      requestedAmount: BigInt(row.requested_amount),
      maker: row.maker,
      createdAt: new Date(row.created_at),
    };
  }
}
