/**
 * In-Memory Ledger
 * AssetTransfer backed by maps, used for local runs and tests.
 * Sessions journal each write and replay the journal backwards on failure.
 * Order records live in the ledger too, so an engine rebuilt over the same
 * instance sees every committed order.
 */

import type { Address, AssetId, OrderId, SwapOrder } from '@swapbook/shared';
import { ReadWriteLock } from '../concurrency/ReadWriteLock';
import { InsufficientFundsError, InvalidInputError, OrderNotFoundError } from '../errors';
import type {
  AssetTransfer,
  ClosedOrderStatus,
  OrderBookSnapshot,
  TransferMovement,
  TransferSession,
} from './AssetTransfer';

export interface InMemoryLedgerOptions {
  custodyAddress: Address;
  /**
   * Runs after every movement inside the session, like a token callback.
   * Throwing aborts and reverts the session.
   */
  onTransfer?: (movement: TransferMovement) => void | Promise<void>;
}

type Book = Map<AssetId, Map<Address, bigint>>;

interface OrderRecord {
  order: SwapOrder;
  nonce: bigint;
  status: 'OPEN' | ClosedOrderStatus;
}

function readEntry(book: Book, asset: AssetId, holder: Address): bigint {
  return book.get(asset)?.get(holder) ?? 0n;
}

function writeEntry(book: Book, asset: AssetId, holder: Address, amount: bigint): void {
  let holders = book.get(asset);
  if (!holders) {
    holders = new Map();
    book.set(asset, holders);
  }
  holders.set(holder, amount);
}

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new InvalidInputError('Transfer amount must be greater than 0');
  }
}

class InMemoryTransferSession implements TransferSession {
  private readonly journal: Array<() => void> = [];
  private closed = false;

  constructor(
    private readonly balances: Book,
    private readonly allowances: Book,
    private readonly orderRecords: Map<OrderId, OrderRecord>,
    private readonly custodyAddress: Address,
    private readonly onTransfer?: (movement: TransferMovement) => void | Promise<void>
  ) {}

  async pull(asset: AssetId, from: Address, amount: bigint): Promise<void> {
    await this.move({ kind: 'pull', asset, from, to: this.custodyAddress, amount });
  }

  async push(asset: AssetId, to: Address, amount: bigint): Promise<void> {
    await this.move({ kind: 'push', asset, from: this.custodyAddress, to, amount });
  }

  async transferFrom(asset: AssetId, from: Address, to: Address, amount: bigint): Promise<void> {
    await this.move({ kind: 'transferFrom', asset, from, to, amount });
  }

  async custodyBalance(asset: AssetId): Promise<bigint> {
    this.assertOpen();
    return readEntry(this.balances, asset, this.custodyAddress);
  }

  async recordOrderOpened(order: SwapOrder, nonce: bigint): Promise<void> {
    this.assertOpen();
    if (this.orderRecords.has(order.id)) {
      throw new InvalidInputError(`Order ${order.id} already recorded`);
    }
    this.writeRecord(order.id, { order, nonce, status: 'OPEN' });
  }

  async recordOrderClosed(id: OrderId, status: ClosedOrderStatus): Promise<void> {
    this.assertOpen();
    const record = this.orderRecords.get(id);
    if (!record || record.status !== 'OPEN') {
      throw new OrderNotFoundError(id);
    }
    this.writeRecord(id, { ...record, status });
  }

  rollback(): void {
    while (this.journal.length > 0) {
      const undo = this.journal.pop();
      undo?.();
    }
  }

  close(): void {
    this.closed = true;
  }

  private async move(movement: TransferMovement): Promise<void> {
    this.assertOpen();
    assertPositive(movement.amount);

    // Holder-initiated legs spend the allowance granted to custody
    if (movement.kind !== 'push') {
      const allowance = readEntry(this.allowances, movement.asset, movement.from);
      if (allowance < movement.amount) {
        throw new InsufficientFundsError(
          `Allowance of ${movement.from} for ${movement.asset} is ${allowance}, needs ${movement.amount}`,
          'ALLOWANCE'
        );
      }
      this.write(this.allowances, movement.asset, movement.from, allowance - movement.amount);
    }

    const balance = readEntry(this.balances, movement.asset, movement.from);
    if (balance < movement.amount) {
      throw new InsufficientFundsError(
        `Balance of ${movement.from} for ${movement.asset} is ${balance}, needs ${movement.amount}`,
        'BALANCE'
      );
    }

    this.write(this.balances, movement.asset, movement.from, balance - movement.amount);
    this.write(
      this.balances,
      movement.asset,
      movement.to,
      readEntry(this.balances, movement.asset, movement.to) + movement.amount
    );

    if (this.onTransfer) {
      await this.onTransfer(movement);
    }
  }

  private write(book: Book, asset: AssetId, holder: Address, amount: bigint): void {
    const previous = book.get(asset)?.get(holder);
    this.journal.push(() => {
      if (previous === undefined) {
        book.get(asset)?.delete(holder);
      } else {
        writeEntry(book, asset, holder, previous);
      }
    });
    writeEntry(book, asset, holder, amount);
  }

  private writeRecord(id: OrderId, record: OrderRecord): void {
    const previous = this.orderRecords.get(id);
    this.journal.push(() => {
      if (previous === undefined) {
        this.orderRecords.delete(id);
      } else {
        this.orderRecords.set(id, previous);
      }
    });
    this.orderRecords.set(id, record);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Transfer session already closed');
    }
  }
}

export class InMemoryLedger implements AssetTransfer {
  readonly custodyAddress: Address;
  private readonly balances: Book = new Map();
  private readonly allowances: Book = new Map();
  private readonly orderRecords = new Map<OrderId, OrderRecord>();
  private readonly lock = new ReadWriteLock();
  private readonly onTransfer?: (movement: TransferMovement) => void | Promise<void>;

  constructor(options: InMemoryLedgerOptions) {
    this.custodyAddress = options.custodyAddress;
    this.onTransfer = options.onTransfer;
  }

  async atomically<T>(work: (session: TransferSession) => Promise<T>): Promise<T> {
    return this.lock.withWriteLock(async () => {
      const session = new InMemoryTransferSession(
        this.balances,
        this.allowances,
        this.orderRecords,
        this.custodyAddress,
        this.onTransfer
      );

      try {
        return await work(session);
      } catch (error) {
        session.rollback();
        throw error;
      } finally {
        session.close();
      }
    });
  }

  async loadOrderBook(): Promise<OrderBookSnapshot> {
    return this.lock.withReadLock(() => {
      const records = [...this.orderRecords.values()].sort((a, b) =>
        a.nonce < b.nonce ? -1 : a.nonce > b.nonce ? 1 : 0
      );
      const last = records[records.length - 1];

      return {
        orders: records.filter((record) => record.status === 'OPEN').map((record) => record.order),
        nextNonce: last ? last.nonce + 1n : 0n,
      };
    });
  }

  /**
   * Mint funds to a holder outside of any session (seeding)
   */
  credit(holder: Address, asset: AssetId, amount: bigint): void {
    assertPositive(amount);
    writeEntry(this.balances, asset, holder, readEntry(this.balances, asset, holder) + amount);
  }

  /**
   * Set the amount custody may pull from holder
   */
  approve(holder: Address, asset: AssetId, amount: bigint): void {
    if (amount < 0n) {
      throw new InvalidInputError('Allowance cannot be negative');
    }
    writeEntry(this.allowances, asset, holder, amount);
  }

  balanceOf(holder: Address, asset: AssetId): bigint {
    return readEntry(this.balances, asset, holder);
  }

  allowance(holder: Address, asset: AssetId): bigint {
    return readEntry(this.allowances, asset, holder);
  }
}
