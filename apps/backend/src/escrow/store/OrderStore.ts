/**
 * Order Store
 * Open orders in an array plus an id → position index.
 * Removal is a swap-remove: O(1), does not preserve order.
 */

import type { OrderId, SwapOrder } from '@swapbook/shared';
import { IndexOutOfBoundsError, InvalidInputError } from '../errors';

export class OrderStore {
  private readonly orders: SwapOrder[] = [];
  private readonly positions = new Map<OrderId, number>();

  get length(): number {
    return this.orders.length;
  }

  /**
   * Append a frozen copy of order and index it. Caller guarantees the id is
   * unique.
   */
  insert(order: SwapOrder): number {
    const position = this.orders.length;
    const stored = Object.isFrozen(order) ? order : Object.freeze({ ...order });
    this.orders.push(stored);
    this.positions.set(stored.id, position);
    return position;
  }

  findPosition(id: OrderId): number | null {
    const position = this.positions.get(id);
    if (position === undefined) {
      return null;
    }
    return position;
  }

  get(position: number): SwapOrder {
    this.assertInBounds(position);
    return this.orders[position];
  }

  /**
   * Remove the order at position by moving the last order into its slot
   */
  removeByPosition(position: number): SwapOrder {
    this.assertInBounds(position);

    const removed = this.orders[position];
    const lastPosition = this.orders.length - 1;
    this.positions.delete(removed.id);

    if (position !== lastPosition) {
      const moved = this.orders[lastPosition];
      this.orders[position] = moved;
      this.positions.set(moved.id, position);
    }

    this.orders.pop();
    return removed;
  }

  /**
   * Inverse of removeByPosition(position): puts order back where it was
   * and returns the displaced order to the tail
   */
  restoreAt(position: number, order: SwapOrder): void {
    if (!Number.isInteger(position) || position < 0 || position > this.orders.length) {
      throw new IndexOutOfBoundsError(position, this.orders.length);
    }

    if (position === this.orders.length) {
      this.insert(order);
      return;
    }

    const displaced = this.orders[position];
    this.positions.set(displaced.id, this.orders.length);
    this.orders.push(displaced);

    this.orders[position] = Object.isFrozen(order) ? order : Object.freeze({ ...order });
    this.positions.set(order.id, position);
  }

  /**
   * Page of orders in current array order (reflects prior swap-removes)
   */
  slice(offset: number, limit: number): SwapOrder[] {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new InvalidInputError('offset must be a non-negative integer');
    }
    if (!Number.isInteger(limit) || limit < 0) {
      throw new InvalidInputError('limit must be a non-negative integer');
    }
    if (limit > this.orders.length) {
      throw new InvalidInputError(`limit ${limit} exceeds order count ${this.orders.length}`);
    }
    if (offset >= this.orders.length) {
      throw new InvalidInputError(`offset ${offset} out of range for ${this.orders.length} orders`);
    }

    const end = Math.min(offset + limit, this.orders.length);
    return this.orders.slice(offset, end);
  }

  private assertInBounds(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position >= this.orders.length) {
      throw new IndexOutOfBoundsError(position, this.orders.length);
    }
  }
}
