/**
 * Escrow Event Bus
 * In-process fan-out of order notifications
 */

import { EventEmitter } from 'node:events';
import type {
  OrderCanceledNotification,
  OrderCreatedNotification,
  OrderExecutedNotification,
  OrderNotification,
} from '@swapbook/shared';

/**
 * Receives notifications once the mutation that produced them committed
 */
export interface OrderEventPublisher {
  readonly name: string;
  publish(notification: OrderNotification): void | Promise<void>;
}

export interface EscrowEventListeners {
  ORDER_CREATED: (notification: OrderCreatedNotification) => void;
  ORDER_EXECUTED: (notification: OrderExecutedNotification) => void;
  ORDER_CANCELED: (notification: OrderCanceledNotification) => void;
  notification: (notification: OrderNotification) => void;
}

export class EscrowEventBus implements OrderEventPublisher {
  readonly name = 'event-bus';
  private readonly emitter = new EventEmitter();

  /**
   * Emits on the notification's type and on 'notification'
   */
  publish(notification: OrderNotification): void {
    this.emitter.emit(notification.type, notification);
    this.emitter.emit('notification', notification);
  }

  on<K extends keyof EscrowEventListeners>(type: K, listener: EscrowEventListeners[K]): this {
    this.emitter.on(type, listener);
    return this;
  }

  off<K extends keyof EscrowEventListeners>(type: K, listener: EscrowEventListeners[K]): this {
    this.emitter.off(type, listener);
    return this;
  }
}
