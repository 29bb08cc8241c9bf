/**
 * Queue Event Publisher
 * Forwards order notifications to the BullMQ notifications queue
 */

import type { OrderNotification, OrderNotificationPayload } from '@swapbook/shared';
import type { Queue } from 'bullmq';
import type { OrderEventPublisher } from './EscrowEventBus';
import { toNotificationPayload } from './payload';

export class QueueEventPublisher implements OrderEventPublisher {
  readonly name = 'queue';

  constructor(private readonly queue: Queue<OrderNotificationPayload>) {}

  /**
   * Job id is type-orderId so a retried publish cannot enqueue twice
   */
  async publish(notification: OrderNotification): Promise<void> {
    await this.queue.add(notification.type, toNotificationPayload(notification), {
      jobId: `${notification.type}-${notification.id}`,
    });
  }
}
