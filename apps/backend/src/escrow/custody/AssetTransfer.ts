/**
 * Asset Transfer Contract
 * Custody collaborator used by the order engine. All movements inside one
 * atomically() call commit together or not at all.
 */

import type { Address, AssetId, OrderId, SwapOrder } from '@swapbook/shared';

export type TransferKind = 'pull' | 'push' | 'transferFrom';

export interface TransferMovement {
  kind: TransferKind;
  asset: AssetId;
  from: Address;
  to: Address;
  amount: bigint;
}

export interface TransferSession {
  /**
   * Move amount from holder into custody; consumes the holder's allowance
   * @throws {InsufficientFundsError} reason ALLOWANCE or BALANCE
   */
  pull(asset: AssetId, from: Address, amount: bigint): Promise<void>;

  /**
   * Move amount out of custody to a recipient
   */
  push(asset: AssetId, to: Address, amount: bigint): Promise<void>;

  /**
   * Move amount between two external holders; consumes from's allowance
   */
  transferFrom(asset: AssetId, from: Address, to: Address, amount: bigint): Promise<void>;

  custodyBalance(asset: AssetId): Promise<bigint>;

  /**
   * Persist a new open order; commits with the deposit that backs it
   */
  recordOrderOpened(order: SwapOrder, nonce: bigint): Promise<void>;

  /**
   * Close an open order; commits with the transfers that settle it
   * @throws {OrderNotFoundError} when no open record exists
   */
  recordOrderClosed(id: OrderId, status: ClosedOrderStatus): Promise<void>;
}

export type ClosedOrderStatus = 'CANCELED' | 'EXECUTED';

/**
 * Open orders in creation order, plus the next unused id nonce
 */
export interface OrderBookSnapshot {
  orders: SwapOrder[];
  nextNonce: bigint;
}

export interface AssetTransfer {
  readonly custodyAddress: Address;

  /**
   * Run work in one all-or-nothing session. On error every movement made
   * by the session is reverted and the error is rethrown.
   */
  atomically<T>(work: (session: TransferSession) => Promise<T>): Promise<T>;

  /**
   * Committed open orders, used to rebuild the book at startup
   */
  loadOrderBook(): Promise<OrderBookSnapshot>;
}
