/**
 * In-Memory Ledger Tests
 * Allowance and balance checks, journal rollback, transfer hook
 */

import type { SwapOrder } from '@swapbook/shared';
import { InsufficientFundsError, InvalidInputError, OrderNotFoundError } from '../../errors';
import type { TransferMovement, TransferSession } from '../AssetTransfer';
import { InMemoryLedger } from '../InMemoryLedger';

const CUSTODY = '0x00000000000000000000000000000000000000c1';
const MAKER = '0x00000000000000000000000000000000000000b1';
const TAKER = '0x00000000000000000000000000000000000000b2';

function makeOrder(id: string): SwapOrder {
  return {
    id,
    offeredAsset: 'USDC',
    offeredAmount: 600n,
    requestedAsset: 'WETH',
    requestedAmount: 20n,
    maker: MAKER,
    createdAt: new Date('2024-01-01T00:00:00Z'),
  };
}

describe('InMemoryLedger', () => {
  let ledger: InMemoryLedger;

  beforeEach(() => {
    ledger = new InMemoryLedger({ custodyAddress: CUSTODY });
    ledger.credit(MAKER, 'USDC', 1000n);
    ledger.approve(MAKER, 'USDC', 600n);
  });

  describe('pull', () => {
    it('should move funds into custody and spend the allowance', async () => {
      await ledger.atomically((session) => session.pull('USDC', MAKER, 600n));

      expect(ledger.balanceOf(MAKER, 'USDC')).toBe(400n);
      expect(ledger.balanceOf(CUSTODY, 'USDC')).toBe(600n);
      expect(ledger.allowance(MAKER, 'USDC')).toBe(0n);
    });

    it('should reject pulls above the allowance', async () => {
      const attempt = ledger.atomically((session) => session.pull('USDC', MAKER, 601n));

      await expect(attempt).rejects.toBeInstanceOf(InsufficientFundsError);
      await expect(attempt).rejects.toMatchObject({ reason: 'ALLOWANCE' });
      expect(ledger.balanceOf(MAKER, 'USDC')).toBe(1000n);
    });

    it('should restore the allowance when the balance is short', async () => {
      ledger.approve(MAKER, 'USDC', 5000n);

      await expect(
        ledger.atomically((session) => session.pull('USDC', MAKER, 2000n))
      ).rejects.toMatchObject({ code: 'INSUFFICIENT_FUNDS', reason: 'BALANCE' });

      expect(ledger.allowance(MAKER, 'USDC')).toBe(5000n);
      expect(ledger.balanceOf(MAKER, 'USDC')).toBe(1000n);
    });

    it('should reject zero amounts', async () => {
      await expect(ledger.atomically((session) => session.pull('USDC', MAKER, 0n))).rejects.toThrow(
        InvalidInputError
      );
    });
  });

  describe('transferFrom', () => {
    it('should move funds between holders against the allowance', async () => {
      ledger.credit(TAKER, 'WETH', 30n);
      ledger.approve(TAKER, 'WETH', 20n);

      await ledger.atomically((session) => session.transferFrom('WETH', TAKER, MAKER, 20n));

      expect(ledger.balanceOf(TAKER, 'WETH')).toBe(10n);
      expect(ledger.balanceOf(MAKER, 'WETH')).toBe(20n);
      expect(ledger.allowance(TAKER, 'WETH')).toBe(0n);
    });
  });

  describe('atomically', () => {
    it('should roll back every movement of a failed session', async () => {
      await expect(
        ledger.atomically(async (session) => {
          await session.pull('USDC', MAKER, 600n);
          await session.push('DAI', TAKER, 1n);
        })
      ).rejects.toMatchObject({ reason: 'BALANCE' });

      expect(ledger.balanceOf(MAKER, 'USDC')).toBe(1000n);
      expect(ledger.balanceOf(CUSTODY, 'USDC')).toBe(0n);
      expect(ledger.allowance(MAKER, 'USDC')).toBe(600n);
    });

    it('should report the custody balance inside a session', async () => {
      const custody = await ledger.atomically(async (session) => {
        await session.pull('USDC', MAKER, 500n);
        return session.custodyBalance('USDC');
      });

      expect(custody).toBe(500n);
    });

    it('should refuse use of a session after it closed', async () => {
      const captured: { session: TransferSession | null } = { session: null };
      await ledger.atomically(async (session) => {
        captured.session = session;
      });

      const session = captured.session;
      if (!session) {
        throw new Error('session was not captured');
      }

      await expect(session.push('USDC', MAKER, 1n)).rejects.toThrow('Transfer session already closed');
    });
  });

  describe('onTransfer', () => {
    it('should report each movement', async () => {
      const movements: TransferMovement[] = [];
      const hooked = new InMemoryLedger({
        custodyAddress: CUSTODY,
        onTransfer: (movement) => {
          movements.push(movement);
        },
      });
      hooked.credit(MAKER, 'USDC', 1000n);
      hooked.approve(MAKER, 'USDC', 1000n);

      await hooked.atomically((session) => session.pull('USDC', MAKER, 700n));

      expect(movements).toEqual([{ kind: 'pull', asset: 'USDC', from: MAKER, to: CUSTODY, amount: 700n }]);
    });

    it('should revert the session when the hook throws', async () => {
      const hooked = new InMemoryLedger({
        custodyAddress: CUSTODY,
        onTransfer: () => {
          throw new Error('receiver rejected');
        },
      });
      hooked.credit(MAKER, 'USDC', 1000n);
      hooked.approve(MAKER, 'USDC', 1000n);

      await expect(hooked.atomically((session) => session.pull('USDC', MAKER, 700n))).rejects.toThrow(
        'receiver rejected'
      );

      expect(hooked.balanceOf(MAKER, 'USDC')).toBe(1000n);
      expect(hooked.balanceOf(CUSTODY, 'USDC')).toBe(0n);
      expect(hooked.allowance(MAKER, 'USDC')).toBe(1000n);
    });
  });

  describe('seeding', () => {
    it('should reject negative allowances', () => {
      expect(() => ledger.approve(MAKER, 'USDC', -1n)).toThrow('Allowance cannot be negative');
    });
  });

  describe('order records', () => {
    it('should commit opened orders with the session', async () => {
      await ledger.atomically(async (session) => {
        await session.pull('USDC', MAKER, 600n);
        await session.recordOrderOpened(makeOrder('0xa'), 0n);
      });

      await expect(ledger.loadOrderBook()).resolves.toEqual({ orders: [makeOrder('0xa')], nextNonce: 1n });
    });

    it('should drop the record when the session rolls back', async () => {
      await expect(
        ledger.atomically(async (session) => {
          await session.recordOrderOpened(makeOrder('0xa'), 0n);
          await session.pull('USDC', MAKER, 700n);
        })
      ).rejects.toBeInstanceOf(InsufficientFundsError);

      await expect(ledger.loadOrderBook()).resolves.toEqual({ orders: [], nextNonce: 0n });
    });

    it('should keep nonces of closed orders reserved', async () => {
      await ledger.atomically(async (session) => {
        await session.recordOrderOpened(makeOrder('0xa'), 0n);
        await session.recordOrderOpened(makeOrder('0xb'), 1n);
      });
      await ledger.atomically((session) => session.recordOrderClosed('0xb', 'EXECUTED'));

      await expect(ledger.loadOrderBook()).resolves.toEqual({ orders: [makeOrder('0xa')], nextNonce: 2n });
    });

    it('should refuse to close an order twice', async () => {
      await ledger.atomically((session) => session.recordOrderOpened(makeOrder('0xa'), 0n));
      await ledger.atomically((session) => session.recordOrderClosed('0xa', 'CANCELED'));

      await expect(
        ledger.atomically((session) => session.recordOrderClosed('0xa', 'CANCELED'))
      ).rejects.toBeInstanceOf(OrderNotFoundError);
    });
  });
});
