/**
 * Order Store Tests
 * Swap-remove bookkeeping, restore and paging
 */

import type { SwapOrder } from '@swapbook/shared';
import { IndexOutOfBoundsError, InvalidInputError } from '../../errors';
import { OrderStore } from '../OrderStore';

function makeOrder(id: string): SwapOrder {
  return {
    id,
    offeredAsset: 'USDC',
    offeredAmount: 600n,
    requestedAsset: 'WETH',
    requestedAmount: 20n,
    maker: '0x00000000000000000000000000000000000000b1',
    createdAt: new Date('2024-01-01T00:00:00Z'),
  };
}

/**
 * Deterministic 32-bit LCG so a failing sequence can be replayed
 */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

function ids(store: OrderStore, count: number): string[] {
  return store.slice(0, count).map((order) => order.id);
}

describe('OrderStore', () => {
  let store: OrderStore;

  beforeEach(() => {
    store = new OrderStore();
    store.insert(makeOrder('a'));
    store.insert(makeOrder('b'));
    store.insert(makeOrder('c'));
  });

  describe('insert / findPosition', () => {
    it('should append orders and index their positions', () => {
      expect(store.length).toBe(3);
      expect(store.findPosition('a')).toBe(0);
      expect(store.findPosition('c')).toBe(2);
      expect(store.insert(makeOrder('d'))).toBe(3);
    });

    it('should return null for unknown ids', () => {
      expect(store.findPosition('missing')).toBeNull();
      expect(new OrderStore().findPosition('a')).toBeNull();
    });
  });

  describe('get', () => {
    it('should reject positions outside the book', () => {
      expect(() => store.get(3)).toThrow(IndexOutOfBoundsError);
      expect(() => store.get(-1)).toThrow('Position -1 out of bounds for 3 orders');
    });
  });

  describe('removeByPosition', () => {
    it('should move the last order into the freed slot', () => {
      const removed = store.removeByPosition(0);

      expect(removed.id).toBe('a');
      expect(store.length).toBe(2);
      expect(ids(store, 2)).toEqual(['c', 'b']);
      expect(store.findPosition('a')).toBeNull();
      expect(store.findPosition('c')).toBe(0);
      expect(store.findPosition('b')).toBe(1);
    });

    it('should pop when removing the last order', () => {
      store.removeByPosition(2);

      expect(ids(store, 2)).toEqual(['a', 'b']);
      expect(store.findPosition('c')).toBeNull();
    });

    it('should empty a single-order book', () => {
      const single = new OrderStore();
      single.insert(makeOrder('x'));

      single.removeByPosition(0);

      expect(single.length).toBe(0);
      expect(single.findPosition('x')).toBeNull();
    });
  });

  describe('restoreAt', () => {
    it('should undo a swap-remove from the middle', () => {
      const removed = store.removeByPosition(0);

      store.restoreAt(0, removed);

      expect(ids(store, 3)).toEqual(['a', 'b', 'c']);
      expect(store.findPosition('a')).toBe(0);
      expect(store.findPosition('c')).toBe(2);
    });

    it('should undo removal of the tail', () => {
      const removed = store.removeByPosition(2);

      store.restoreAt(2, removed);

      expect(ids(store, 3)).toEqual(['a', 'b', 'c']);
      expect(store.findPosition('c')).toBe(2);
    });

    it('should reject positions past the end', () => {
      expect(() => store.restoreAt(5, makeOrder('z'))).toThrow(IndexOutOfBoundsError);
    });
  });

  describe('slice', () => {
    it('should return the page starting at offset', () => {
      expect(store.slice(1, 2).map((order) => order.id)).toEqual(['b', 'c']);
    });

    it('should truncate pages that run past the end', () => {
      expect(store.slice(2, 2).map((order) => order.id)).toEqual(['c']);
    });

    it('should reject a limit larger than the book', () => {
      expect(() => store.slice(0, 4)).toThrow('limit 4 exceeds order count 3');
    });

    it('should reject an offset at or past the end', () => {
      expect(() => store.slice(3, 1)).toThrow('offset 3 out of range for 3 orders');
      expect(() => new OrderStore().slice(0, 0)).toThrow(InvalidInputError);
    });

    it('should reject negative or fractional arguments', () => {
      expect(() => store.slice(-1, 1)).toThrow('offset must be a non-negative integer');
      expect(() => store.slice(0, 1.5)).toThrow('limit must be a non-negative integer');
    });
  });

  describe('immutability', () => {
    it('should store a frozen copy of the inserted order', () => {
      const original = makeOrder('d');
      const position = store.insert(original);
      const stored = store.get(position);

      expect(Object.isFrozen(stored)).toBe(true);
      expect(() => {
        stored.maker = '0x00000000000000000000000000000000000000b2';
      }).toThrow(TypeError);

      original.maker = '0x00000000000000000000000000000000000000b3';
      expect(store.get(position).maker).toBe('0x00000000000000000000000000000000000000b1');
    });

    it('should hand out frozen orders from slice', () => {
      expect(store.slice(0, 3).every((order) => Object.isFrozen(order))).toBe(true);
    });
  });

  describe('index consistency', () => {
    it.each([1, 7, 42, 2024])('should keep every position indexed after a mixed sequence (seed %i)', (seed) => {
      const random = seededRandom(seed);
      const book = new OrderStore();
      const removedIds: string[] = [];
      let nextId = 0;

      for (let step = 0; step < 500; step++) {
        if (book.length === 0 || random() < 0.55) {
          book.insert(makeOrder(`o${nextId++}`));
        } else {
          const position = Math.floor(random() * book.length);
          removedIds.push(book.removeByPosition(position).id);
        }
      }

      expect(book.length).toBe(nextId - removedIds.length);
      for (let i = 0; i < book.length; i++) {
        expect(book.findPosition(book.get(i).id)).toBe(i);
      }
      for (const id of removedIds) {
        expect(book.findPosition(id)).toBeNull();
      }
    });
  });
});
