/**
 * PostgreSQL Ledger
 * AssetTransfer over escrow.balances / escrow.allowances, with order rows in
 * escrow.orders. One session = one transaction on a dedicated pool client.
 */

import type { Address, AssetId, OrderId, SwapOrder } from '@swapbook/shared';
import type { Pool, PoolClient } from 'pg';
import { InsufficientFundsError, InvalidInputError } from '../errors';
import { OrderRepository } from '../repositories/OrderRepository';
import type { AssetTransfer, ClosedOrderStatus, OrderBookSnapshot, TransferSession } from './AssetTransfer';

interface AmountRow {
  amount: string;
}

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new InvalidInputError('Transfer amount must be greater than 0');
  }
}

class PgTransferSession implements TransferSession {
  constructor(
    private readonly client: PoolClient,
    private readonly custodyAddress: Address,
    private readonly orderRepository: OrderRepository
  ) {}

  async pull(asset: AssetId, from: Address, amount: bigint): Promise<void> {
    assertPositive(amount);
    await this.spendAllowance(asset, from, amount);
    await this.debit(asset, from, amount);
    await this.credit(asset, this.custodyAddress, amount);
  }

  async push(asset: AssetId, to: Address, amount: bigint): Promise<void> {
    assertPositive(amount);
    await this.debit(asset, this.custodyAddress, amount);
    await this.credit(asset, to, amount);
  }

  async transferFrom(asset: AssetId, from: Address, to: Address, amount: bigint): Promise<void> {
    assertPositive(amount);
    await this.spendAllowance(asset, from, amount);
    await this.debit(asset, from, amount);
    await this.credit(asset, to, amount);
  }

  async custodyBalance(asset: AssetId): Promise<bigint> {
    return this.lockBalance(asset, this.custodyAddress);
  }

  async recordOrderOpened(order: SwapOrder, nonce: bigint): Promise<void> {
    await this.orderRepository.createOpen(order, nonce, this.client);
  }

  async recordOrderClosed(id: OrderId, status: ClosedOrderStatus): Promise<void> {
    await this.orderRepository.close(id, status, this.client);
  }

  /**
   * Read and row-lock a balance for the rest of the transaction
   */
  private async lockBalance(asset: AssetId, holder: Address): Promise<bigint> {
    const result = await this.client.query<AmountRow>(
      `
      SELECT amount
      FROM escrow.balances
      WHERE holder = $1 AND asset = $2
      FOR UPDATE
    `,
      [holder, asset]
    );

    const row = result.rows[0];
    return row ? BigInt(row.amount) : 0n;
  }

  private async debit(asset: AssetId, holder: Address, amount: bigint): Promise<void> {
    const balance = await this.lockBalance(asset, holder);

    if (balance < amount) {
      throw new InsufficientFundsError(
        `Balance of ${holder} for ${asset} is ${balance}, needs ${amount}`,
        'BALANCE'
      );
    }

    await this.client.query(
      `
      UPDATE escrow.balances
      SET amount = amount - $3, updated_at = NOW()
      WHERE holder = $1 AND asset = $2
    `,
      [holder, asset, amount.toString()]
    );
  }

  private async credit(asset: AssetId, holder: Address, amount: bigint): Promise<void> {
    await this.client.query(
      `
      INSERT INTO escrow.balances (holder, asset, amount)
      VALUES ($1, $2, $3)
      ON CONFLICT (holder, asset)
      DO UPDATE SET amount = escrow.balances.amount + EXCLUDED.amount, updated_at = NOW()
    `,
      [holder, asset, amount.toString()]
    );
  }

  private async spendAllowance(asset: AssetId, holder: Address, amount: bigint): Promise<void> {
    const result = await this.client.query<AmountRow>(
      `
      SELECT amount
      FROM escrow.allowances
      WHERE holder = $1 AND spender = $2 AND asset = $3
      FOR UPDATE
    `,
      [holder, this.custodyAddress, asset]
    );

    const row = result.rows[0];
    const allowance = row ? BigInt(row.amount) : 0n;

    if (allowance < amount) {
      throw new InsufficientFundsError(
        `Allowance of ${holder} for ${asset} is ${allowance}, needs ${amount}`,
        'ALLOWANCE'
      );
    }

    await this.client.query(
      `
      UPDATE escrow.allowances
      SET amount = amount - $4, updated_at = NOW()
      WHERE holder = $1 AND spender = $2 AND asset = $3
    `,
      [holder, this.custodyAddress, asset, amount.toString()]
    );
  }
}

export class PgAssetLedger implements AssetTransfer {
  private readonly orderRepository: OrderRepository;

  constructor(
    private readonly pool: Pool,
    public readonly custodyAddress: Address
  ) {
    this.orderRepository = new OrderRepository(pool);
  }

  async atomically<T>(work: (session: TransferSession) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      const result = await work(new PgTransferSession(client, this.custodyAddress, this.orderRepository));

      await client.query('COMMIT');

      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async loadOrderBook(): Promise<OrderBookSnapshot> {
    const [orders, nextNonce] = await Promise.all([
      this.orderRepository.findOpen(),
      this.orderRepository.nextNonce(),
    ]);
    return { orders, nextNonce };
  }

  /**
   * Current balance outside of any session
   */
  async balanceOf(holder: Address, asset: AssetId): Promise<bigint> {
    const result = await this.pool.query<AmountRow>(
      'SELECT amount FROM escrow.balances WHERE holder = $1 AND asset = $2',
      [holder, asset]
    );

    const row = result.rows[0];
    return row ? BigInt(row.amount) : 0n;
  }
}
