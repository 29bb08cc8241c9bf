/**
 * Domain Types
 * Source of truth for escrow entities shared across services.
 * Amounts are integer base units and stay bigint end to end.
 */

// ============================================================================
// Identity
// ============================================================================

export type Address = string;

export type AssetId = string;

export type OrderId = string;

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

/**
 * True for the empty identity (blank or all-zero address)
 */
export function isZeroAddress(address: Address): boolean {
  return address.trim() === '' || address.toLowerCase() === ZERO_ADDRESS;
}

/**
 * Hex addresses compare without regard to checksum casing
 */
export function isSameAddress(a: Address, b: Address): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

// ============================================================================
// Order Domain
// ============================================================================

export interface SwapOrder {
  id: OrderId;
  offeredAsset: AssetId;
  offeredAmount: bigint;
  requestedAsset: AssetId;
  requestedAmount: bigint;
  maker: Address;
  createdAt: Date;
}

// ============================================================================
// Fee Domain
// ============================================================================

export interface FeeRate {
  numerator: bigint;
  denominator: bigint;
}

export interface FeeSchedule {
  makerFee: FeeRate; // Charged on the requested asset the maker receives
  takerFee: FeeRate; // Charged on the offered asset the taker receives
}

export interface Settlement {
  requestedFee: bigint;
  requestedPayout: bigint;
  offeredFee: bigint;
  offeredPayout: bigint;
  feeRecipient: Address;
}

// ============================================================================
// Notification Domain
// ============================================================================

export type OrderNotificationType = 'ORDER_CREATED' | 'ORDER_EXECUTED' | 'ORDER_CANCELED';

interface OrderNotificationBase {
  id: OrderId;
  offeredAsset: AssetId;
  offeredAmount: bigint;
  requestedAsset: AssetId;
  requestedAmount: bigint;
  maker: Address;
  timestamp: Date;
}

export interface OrderCreatedNotification extends OrderNotificationBase {
  type: 'ORDER_CREATED';
}

export interface OrderExecutedNotification extends OrderNotificationBase {
  type: 'ORDER_EXECUTED';
  taker: Address;
  settlement: Settlement;
}

export interface OrderCanceledNotification extends OrderNotificationBase {
  type: 'ORDER_CANCELED';
}

export type OrderNotification =
  | OrderCreatedNotification
  | OrderExecutedNotification
  | OrderCanceledNotification;
