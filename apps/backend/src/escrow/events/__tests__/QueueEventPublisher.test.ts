/**
 * Queue Event Publisher Tests
 * Job naming and wire payloads
 */

import type { OrderExecutedNotification, OrderNotificationPayload } from '@swapbook/shared';
import type { Queue } from 'bullmq';
import { toNotificationPayload, toSwapOrderResponse } from '../payload';
import { QueueEventPublisher } from '../QueueEventPublisher';

const MAKER = '0x00000000000000000000000000000000000000b1';
const TAKER = '0x00000000000000000000000000000000000000b2';
const FEE_RECIPIENT = '0x00000000000000000000000000000000000000f1';

const executed: OrderExecutedNotification = {
  type: 'ORDER_EXECUTED',
  id: '0xabc',
  offeredAsset: 'USDC',
  offeredAmount: 600n,
  requestedAsset: 'WETH',
  requestedAmount: 20n,
  maker: MAKER,
  taker: TAKER,
  settlement: {
    requestedFee: 0n,
    requestedPayout: 20n,
    offeredFee: 4n,
    offeredPayout: 596n,
    feeRecipient: FEE_RECIPIENT,
  },
  timestamp: new Date('2024-01-01T00:00:00Z'),
};

describe('payload', () => {
  it('should render executed notifications with string amounts', () => {
    expect(toNotificationPayload(executed)).toEqual({
      type: 'ORDER_EXECUTED',
      id: '0xabc',
      offered_asset: 'USDC',
      offered_amount: '600',
      requested_asset: 'WETH',
      requested_amount: '20',
      maker: MAKER,
      taker: TAKER,
      settlement: {
        requested_fee: '0',
        requested_payout: '20',
        offered_fee: '4',
        offered_payout: '596',
        fee_recipient: FEE_RECIPIENT,
      },
      timestamp: '2024-01-01T00:00:00.000Z',
    });
  });

  it('should omit taker and settlement for other notifications', () => {
    const payload = toNotificationPayload({
      type: 'ORDER_CANCELED',
      id: '0xabc',
      offeredAsset: 'USDC',
      offeredAmount: 600n,
      requestedAsset: 'WETH',
      requestedAmount: 20n,
      maker: MAKER,
      timestamp: new Date('2024-01-01T00:00:00Z'),
    });

    expect(payload).not.toHaveProperty('taker');
    expect(payload).not.toHaveProperty('settlement');
  });

  it('should render orders with string amounts', () => {
    expect(
      toSwapOrderResponse({
        id: '0xabc',
        offeredAsset: 'USDC',
        offeredAmount: 123456789012345678901234567890n,
        requestedAsset: 'WETH',
        requestedAmount: 1n,
        maker: MAKER,
        createdAt: new Date('2024-01-01T00:00:00Z'),
      })
    ).toEqual({
      id: '0xabc',
      offered_asset: 'USDC',
      offered_amount: '123456789012345678901234567890',
      requested_asset: 'WETH',
      requested_amount: '1',
      maker: MAKER,
      created_at: '2024-01-01T00:00:00.000Z',
    });
  });
});

describe('QueueEventPublisher', () => {
  it('should add a job named after the notification type', async () => {
    const add = jest.fn().mockResolvedValue({ id: 'ORDER_EXECUTED-0xabc' });
    const queue = { add } as unknown as Queue<OrderNotificationPayload>;
    const publisher = new QueueEventPublisher(queue);

    await publisher.publish(executed);

    expect(add).toHaveBeenCalledWith('ORDER_EXECUTED', toNotificationPayload(executed), {
      jobId: 'ORDER_EXECUTED-0xabc',
    });
  });

  it('should propagate queue failures', async () => {
    const queue = {
      add: jest.fn().mockRejectedValue(new Error('connection refused')),
    } as unknown as Queue<OrderNotificationPayload>;

    await expect(new QueueEventPublisher(queue).publish(executed)).rejects.toThrow('connection refused');
  });
});
