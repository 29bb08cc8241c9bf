/**
 * API Types
 * Request/Response types for the REST API and queue payloads.
 * Amounts travel as decimal strings since JSON has no bigint.
 */

import type { OrderNotificationType } from './domain';

// ============================================================================
// Common API Structures
// ============================================================================

export interface PaginationMeta {
  limit: number;
  offset: number;
  total: number;
}

export interface PaginatedResponse<T> {
  items: T[];
  meta: PaginationMeta;
}

export interface ApiError {
  error: string;
  message: string;
  retry_after_seconds?: number;
  reason?: string;
}

// ============================================================================
// Order API
// ============================================================================

export interface CreateSwapOrderRequest {
  offered_asset: string;
  offered_amount: string;
  requested_asset: string;
  requested_amount: string;
}

export interface SwapOrderResponse {
  id: string;
  offered_asset: string;
  offered_amount: string;
  requested_asset: string;
  requested_amount: string;
  maker: string;
  created_at: string;
}

export type ListSwapOrdersResponse = PaginatedResponse<SwapOrderResponse>;

export interface OrderCountResponse {
  count: number;
}

// ============================================================================
// Notification Payloads
// ============================================================================

export interface SettlementPayload {
  requested_fee: string;
  requested_payout: string;
  offered_fee: string;
  offered_payout: string;
  fee_recipient: string;
}

export interface OrderNotificationPayload {
  type: OrderNotificationType;
  id: string;
  offered_asset: string;
  offered_amount: string;
  requested_asset: string;
  requested_amount: string;
  maker: string;
  taker?: string;
  settlement?: SettlementPayload;
  timestamp: string;
}

// ============================================================================
// Admin API
// ============================================================================

export interface SetFeeRecipientRequest {
  fee_recipient: string;
}

export interface FeeRecipientResponse {
  fee_recipient: string;
}
