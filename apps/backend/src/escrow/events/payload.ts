/**
 * Wire payloads for orders and notifications (bigint → decimal string)
 */

import type {
  OrderNotification,
  OrderNotificationPayload,
  Settlement,
  SettlementPayload,
  SwapOrder,
  SwapOrderResponse,
} from '@swapbook/shared';

export function toSwapOrderResponse(order: SwapOrder): SwapOrderResponse {
  return {
    id: order.id,
    offered_asset: order.offeredAsset,
    offered_amount: order.offeredAmount.toString(),
    requested_asset: order.requestedAsset,
    requested_amount: order.requestedAmount.toString(),
    maker: order.maker,
    created_at: order.createdAt.toISOString(),
  };
}

export function toSettlementPayload(settlement: Settlement): SettlementPayload {
  return {
    requested_fee: settlement.requestedFee.toString(),
    requested_payout: settlement.requestedPayout.toString(),
    offered_fee: settlement.offeredFee.toString(),
    offered_payout: settlement.offeredPayout.toString(),
    fee_recipient: settlement.feeRecipient,
  };
}

export function toNotificationPayload(notification: OrderNotification): OrderNotificationPayload {
  const payload: OrderNotificationPayload = {
    type: notification.type,
    id: notification.id,
    offered_asset: notification.offeredAsset,
    offered_amount: notification.offeredAmount.toString(),
    requested_asset: notification.requestedAsset,
    requested_amount: notification.requestedAmount.toString(),
    maker: notification.maker,
    timestamp: notification.timestamp.toISOString(),
  };

  if (notification.type === 'ORDER_EXECUTED') {
    payload.taker = notification.taker;
    payload.settlement = toSettlementPayload(notification.settlement);
  }

  return payload;
}
