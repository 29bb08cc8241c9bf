/**
 * Order Engine
 * Create / cancel / execute state transitions for the swap book.
 *
 * Every mutation holds the write lock for its full duration, custody calls
 * included, and runs inside a mutation context so that a call arriving from
 * a transfer callback is rejected instead of deadlocking on that lock.
 * Order records are written in the same custody session as the funds they
 * account for; the in-memory book follows the session and is undone if it
 * rolls back. Engines are built with OrderEngine.open, which rebuilds the
 * book from the committed records.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import {
  isSameAddress,
  isZeroAddress,
  type Address,
  type AssetId,
  type FeeSchedule,
  type OrderCanceledNotification,
  type OrderCreatedNotification,
  type OrderExecutedNotification,
  type OrderId,
  type OrderNotification,
  type SwapOrder,
} from '@swapbook/shared';
import {
  escrowOperationCounter,
  escrowOperationDuration,
  feesCollectedCounter,
  notificationFailureCounter,
  openOrdersGauge,
} from '../../monitoring/metrics';
import { ReadWriteLock } from '../concurrency/ReadWriteLock';
import type { AssetTransfer, ClosedOrderStatus, TransferSession } from '../custody/AssetTransfer';
import {
  InsufficientFundsError,
  InvalidFeeAddressError,
  InvalidInputError,
  OrderNotFoundError,
  PermissionDeniedError,
  ReentrantCallError,
} from '../errors';
import type { OrderEventPublisher } from '../events/EscrowEventBus';
import { computeSettlement, DEFAULT_FEE_SCHEDULE, validateFeeRate } from '../fees';
import { deriveOrderId } from '../orderId';
import { MinimumOrderPolicy } from '../policy';
import { OrderStore } from '../store/OrderStore';

export const DEFAULT_PAGE_LIMIT = 50;

export interface CreateSwapOrderParams {
  maker: Address;
  offeredAsset: AssetId;
  offeredAmount: bigint;
  requestedAsset: AssetId;
  requestedAmount: bigint;
}

export interface OrderEngineOptions {
  adminAddress: Address;
  feeRecipient: Address;
  minimumOrderAmounts: Record<AssetId, bigint>;
  fees?: FeeSchedule;
  publishers?: OrderEventPublisher[];
  clock?: () => Date;
}

export interface OrderPage {
  orders: SwapOrder[];
  total: number;
  limit: number;
  offset: number;
}

export type EscrowOperation = 'create' | 'cancel' | 'execute' | 'set_fee_recipient';

function orderDetail(order: SwapOrder) {
  return {
    id: order.id,
    offeredAsset: order.offeredAsset,
    offeredAmount: order.offeredAmount,
    requestedAsset: order.requestedAsset,
    requestedAmount: order.requestedAmount,
    maker: order.maker,
  };
}

export class OrderEngine {
  private readonly lock = new ReadWriteLock();
  private readonly mutationContext = new AsyncLocalStorage<EscrowOperation>();
  private readonly policy: MinimumOrderPolicy;
  private readonly fees: FeeSchedule;
  private readonly adminAddress: Address;
  private readonly publishers: OrderEventPublisher[];
  private readonly clock: () => Date;
  private feeRecipient: Address;
  private nonce = 0n;

  /**
   * Build an engine over the orders already committed to the ledger
   */
  static async open(transfer: AssetTransfer, options: OrderEngineOptions): Promise<OrderEngine> {
    const snapshot = await transfer.loadOrderBook();

    const store = new OrderStore();
    for (const order of snapshot.orders) {
      store.insert(order);
    }

    const engine = new OrderEngine(store, transfer, options);
    engine.nonce = snapshot.nextNonce;
    return engine;
  }

  private constructor(
    private readonly store: OrderStore,
    private readonly transfer: AssetTransfer,
    options: OrderEngineOptions
  ) {
    if (isZeroAddress(options.adminAddress)) {
      throw new InvalidInputError('adminAddress is required');
    }

    const fees = options.fees ?? DEFAULT_FEE_SCHEDULE;
    validateFeeRate(fees.makerFee, 'makerFee');
    validateFeeRate(fees.takerFee, 'takerFee');
    this.assertValidFeeRecipient(options.feeRecipient);

    this.policy = new MinimumOrderPolicy(options.minimumOrderAmounts);
    this.fees = fees;
    this.adminAddress = options.adminAddress;
    this.feeRecipient = options.feeRecipient;
    this.publishers = options.publishers ?? [];
    this.clock = options.clock ?? (() => new Date());

    openOrdersGauge.set(store.length);
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  /**
   * Pull the maker's deposit into custody and record the order in the same
   * session. The new id is only reported through the returned notification.
   */
  async createOrder(params: CreateSwapOrderParams): Promise<OrderCreatedNotification> {
    return this.runExclusive(
      'create',
      async () => {
        this.validateCreateOrderParams(params);

        const createdAt = this.clock();
        const nonce = this.nonce++;
        const order: SwapOrder = {
          id: deriveOrderId({
            nonce,
            maker: params.maker,
            timestamp: createdAt,
            offeredAsset: params.offeredAsset,
            requestedAsset: params.requestedAsset,
          }),
          offeredAsset: params.offeredAsset,
          offeredAmount: params.offeredAmount,
          requestedAsset: params.requestedAsset,
          requestedAmount: params.requestedAmount,
          maker: params.maker,
          createdAt,
        };

        const insertion: { position: number | null } = { position: null };
        try {
          await this.transfer.atomically(async (session) => {
            await session.pull(params.offeredAsset, params.maker, params.offeredAmount);
            await session.recordOrderOpened(order, nonce);
            insertion.position = this.store.insert(order);
          });
        } catch (error) {
          if (insertion.position !== null) {
            this.store.removeByPosition(insertion.position);
          }
          throw error;
        }

        const notification: OrderCreatedNotification = {
          type: 'ORDER_CREATED',
          ...orderDetail(order),
          timestamp: createdAt,
        };
        return notification;
      },
      (notification) => this.publish(notification)
    );
  }

  /**
   * Return the deposit to the maker and drop the order
   */
  async cancelOrder(caller: Address, id: OrderId): Promise<OrderCanceledNotification> {
    return this.runExclusive(
      'cancel',
      async () => {
        const position = this.requirePosition(id);
        const order = this.store.get(position);

        if (order.maker !== caller) {
          throw new PermissionDeniedError(`Only the maker may cancel order ${id}`);
        }

        await this.settle(position, order, 'CANCELED', (session) =>
          session.push(order.offeredAsset, order.maker, order.offeredAmount)
        );

        const notification: OrderCanceledNotification = {
          type: 'ORDER_CANCELED',
          ...orderDetail(order),
          timestamp: this.clock(),
        };
        return notification;
      },
      (notification) => this.publish(notification)
    );
  }

  /**
   * Swap: taker pays the requested asset to the maker and receives the
   * deposit, each leg net of its fee
   */
  async executeOrder(taker: Address, id: OrderId): Promise<OrderExecutedNotification> {
    return this.runExclusive(
      'execute',
      async () => {
        const position = this.requirePosition(id);
        const order = this.store.get(position);

        if (isZeroAddress(order.maker)) {
          throw new PermissionDeniedError(`Order ${id} has no maker`);
        }

        if (isZeroAddress(taker)) {
          throw new InvalidInputError('taker is required');
        }

        const settlement = computeSettlement(order, this.fees, this.feeRecipient);

        await this.settle(position, order, 'EXECUTED', async (session) => {
          if (settlement.requestedFee > 0n) {
            await session.transferFrom(
              order.requestedAsset,
              taker,
              settlement.feeRecipient,
              settlement.requestedFee
            );
          }
          if (settlement.requestedPayout > 0n) {
            await session.transferFrom(order.requestedAsset, taker, order.maker, settlement.requestedPayout);
          }
          if (settlement.offeredFee > 0n) {
            await session.push(order.offeredAsset, settlement.feeRecipient, settlement.offeredFee);
          }
          if (settlement.offeredPayout > 0n) {
            await session.push(order.offeredAsset, taker, settlement.offeredPayout);
          }
        });

        this.recordFee(order.requestedAsset, settlement.requestedFee);
        this.recordFee(order.offeredAsset, settlement.offeredFee);

        const notification: OrderExecutedNotification = {
          type: 'ORDER_EXECUTED',
          ...orderDetail(order),
          taker,
          settlement,
          timestamp: this.clock(),
        };
        return notification;
      },
      (notification) => this.publish(notification)
    );
  }

  /**
   * Admin only
   */
  async setFeeRecipient(caller: Address, recipient: Address): Promise<void> {
    return this.runExclusive('set_fee_recipient', async () => {
      if (caller !== this.adminAddress) {
        throw new PermissionDeniedError('Only the administrator may change the fee recipient');
      }

      this.assertValidFeeRecipient(recipient);
      this.feeRecipient = recipient;
    });
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  async getOrder(id: OrderId): Promise<SwapOrder> {
    return this.read(() => this.store.get(this.requirePosition(id)));
  }

  async getNumberOrders(): Promise<number> {
    return this.read(() => this.store.length);
  }

  /**
   * Page in current book order; rejects offset >= count and limit > count
   */
  async getOrders(limit: number, offset: number): Promise<SwapOrder[]> {
    return this.read(() => this.store.slice(offset, limit));
  }

  /**
   * Count and page taken from one snapshot of the book. Without a limit the
   * default page is narrowed to the book size, and the first page of an
   * empty book is empty.
   */
  async getOrderPage(offset: number, limit?: number): Promise<OrderPage> {
    return this.read(() => {
      const total = this.store.length;

      if (limit === undefined && total === 0 && offset === 0) {
        return { orders: [], total, limit: 0, offset };
      }

      const effectiveLimit = limit ?? Math.min(DEFAULT_PAGE_LIMIT, total);
      return { orders: this.store.slice(offset, effectiveLimit), total, limit: effectiveLimit, offset };
    });
  }

  async getFeeRecipient(): Promise<Address> {
    return this.read(() => this.feeRecipient);
  }

  getFeeSchedule(): FeeSchedule {
    return this.fees;
  }

  getMinimumOrderAmount(asset: AssetId): bigint | null {
    return this.policy.minimumFor(asset);
  }

  getAdminAddress(): Address {
    return this.adminAddress;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Lock, re-entry guard and metrics around one mutation. afterCommit runs
   * under the lock and still inside the mutation context, so a publisher
   * that calls back into a mutation is rejected rather than left waiting
   * on the lock.
   */
  private async runExclusive<T>(
    operation: EscrowOperation,
    work: () => Promise<T>,
    afterCommit?: (result: T) => Promise<void>
  ): Promise<T> {
    if (this.mutationContext.getStore() !== undefined) {
      escrowOperationCounter.inc({ operation, outcome: 'reentrant' });
      throw new ReentrantCallError(operation);
    }

    const endTimer = escrowOperationDuration.startTimer({ operation });

    try {
      return await this.lock.withWriteLock(async () => {
        const result = await this.mutationContext.run(operation, work);

        openOrdersGauge.set(this.store.length);
        escrowOperationCounter.inc({ operation, outcome: 'success' });

        const publish = afterCommit;
        if (publish) {
          await this.mutationContext.run(operation, () => publish(result));
        }

        return result;
      });
    } catch (error) {
      escrowOperationCounter.inc({ operation, outcome: 'failure' });
      throw error;
    } finally {
      endTimer();
    }
  }

  /**
   * Reads made from inside a mutation (transfer callbacks) see its
   * in-flight state instead of waiting on the lock it holds
   */
  private async read<T>(work: () => T): Promise<T> {
    if (this.mutationContext.getStore() !== undefined) {
      return work();
    }
    return this.lock.withReadLock(work);
  }

  /**
   * Verify custody, remove and close the order, then run the transfers. If
   * the session fails at any point the order goes back to its old position.
   */
  private async settle(
    position: number,
    order: SwapOrder,
    status: ClosedOrderStatus,
    transfers: (session: TransferSession) => Promise<void>
  ): Promise<void> {
    const removal = { done: false };

    try {
      await this.transfer.atomically(async (session) => {
        const custody = await session.custodyBalance(order.offeredAsset);
        if (custody < order.offeredAmount) {
          throw new InsufficientFundsError(
            `Custody holds ${custody} ${order.offeredAsset}, order ${order.id} needs ${order.offeredAmount}`,
            'CUSTODY'
          );
        }

        this.store.removeByPosition(position);
        removal.done = true;

        await session.recordOrderClosed(order.id, status);

        await transfers(session);
      });
    } catch (error) {
      if (removal.done) {
        this.store.restoreAt(position, order);
      }
      throw error;
    }
  }

  private async publish(notification: OrderNotification): Promise<void> {
    for (const publisher of this.publishers) {
      try {
        await publisher.publish(notification);
      } catch (error) {
        // The mutation already committed; delivery failures are reported, not rolled back
        notificationFailureCounter.inc({ publisher: publisher.name });
        console.error(`Failed to publish ${notification.type} for ${notification.id} via ${publisher.name}:`, error);
      }
    }
  }

  private requirePosition(id: OrderId): number {
    const position = this.store.findPosition(id);
    if (position === null) {
      throw new OrderNotFoundError(id);
    }
    return position;
  }

  private recordFee(asset: AssetId, amount: bigint): void {
    if (amount > 0n) {
      feesCollectedCounter.inc({ asset }, Number(amount));
    }
  }

  private assertValidFeeRecipient(recipient: Address): void {
    if (isZeroAddress(recipient)) {
      throw new InvalidFeeAddressError('Fee recipient must not be empty');
    }
    if (isSameAddress(recipient, this.transfer.custodyAddress)) {
      throw new InvalidFeeAddressError('Fee recipient must not be the custody address');
    }
  }

  private validateCreateOrderParams(params: CreateSwapOrderParams): void {
    if (params.offeredAsset === params.requestedAsset) {
      throw new InvalidInputError('offered and requested assets must differ');
    }

    this.policy.assertOfferable(params.offeredAsset, params.offeredAmount);

    if (params.requestedAmount <= 0n) {
      throw new InvalidInputError('requestedAmount must be greater than 0');
    }

    if (!params.requestedAsset) {
      throw new InvalidInputError('requestedAsset is required');
    }

    if (isZeroAddress(params.maker)) {
      throw new InvalidInputError('maker is required');
    }
  }
}
