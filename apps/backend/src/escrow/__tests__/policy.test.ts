/**
 * Minimum Order Policy Tests
 */

import { InvalidInputError } from '../errors';
import { MinimumOrderPolicy } from '../policy';

describe('MinimumOrderPolicy', () => {
  const policy = new MinimumOrderPolicy({ USDC: 500n, WETH: 1n });

  it('should report minimums for listed assets only', () => {
    expect(policy.minimumFor('USDC')).toBe(500n);
    expect(policy.minimumFor('DOGE')).toBeNull();
    expect(policy.assets()).toEqual(['USDC', 'WETH']);
  });

  it('should accept amounts at the minimum', () => {
    expect(() => policy.assertOfferable('USDC', 500n)).not.toThrow();
  });

  it('should reject amounts below the minimum', () => {
    expect(() => policy.assertOfferable('USDC', 499n)).toThrow(
      'Offered amount 499 is below the USDC minimum of 500'
    );
  });

  it('should reject assets that are not listed', () => {
    expect(() => policy.assertOfferable('DOGE', 1000n)).toThrow('Asset DOGE is not accepted for offers');
  });

  it('should refuse non-positive minimums', () => {
    expect(() => new MinimumOrderPolicy({ DAI: 0n })).toThrow(InvalidInputError);
  });
});
