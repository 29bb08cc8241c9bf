/**
 * Minimum Order Policy
 * Only allow-listed assets may be offered, each with a fixed minimum
 */

import type { AssetId } from '@swapbook/shared';
import { InvalidInputError } from './errors';

export class MinimumOrderPolicy {
  private readonly minimums: ReadonlyMap<AssetId, bigint>;

  constructor(minimums: Record<AssetId, bigint>) {
    const entries = Object.entries(minimums);

    for (const [asset, minimum] of entries) {
      if (minimum <= 0n) {
        throw new InvalidInputError(`Minimum order amount for ${asset} must be greater than 0`);
      }
    }

    this.minimums = new Map(entries);
  }

  /**
   * Minimum for asset, or null when the asset is not allow-listed
   */
  minimumFor(asset: AssetId): bigint | null {
    return this.minimums.get(asset) ?? null;
  }

  assets(): AssetId[] {
    return Array.from(this.minimums.keys());
  }

  /**
   * @throws {InvalidInputError} for unlisted assets and amounts under the minimum
   */
  assertOfferable(asset: AssetId, amount: bigint): void {
    const minimum = this.minimumFor(asset);

    if (minimum === null) {
      throw new InvalidInputError(`Asset ${asset} is not accepted for offers`);
    }

    if (amount < minimum) {
      throw new InvalidInputError(`Offered amount ${amount} is below the ${asset} minimum of ${minimum}`);
    }
  }
}
