// BalanceLedger -- per-asset, per-holder balances.
//
// Two-level map: asset id -> (holder -> amount). Inner maps are created on
// first write; reads of absent keys return zero. Entries are never deleted,
// a zero balance is the resting state.

import type { Holder } from './address.js';
import { isZeroAddress } from './address.js';
import {
  BalanceOverflowError,
  InsufficientBalanceError,
  LengthMismatchError,
  ZeroAddressQueryError,
} from './errors.js';
import type { Journal } from './journal.js';
import type { Amount, AssetId } from './uint256.js';
import { MAX_UINT256, assertUint256 } from './uint256.js';

export type AdjustSign = 'increase' | 'decrease';

export class BalanceLedger {
  private readonly balances = new Map<AssetId, Map<Holder, Amount>>();
  private readonly journal: Journal;

  constructor(journal: Journal) {
    this.journal = journal;
  }

  /**
   * Balance of `holder` in `asset`.
   * The zero address holds nothing by definition, so asking for it is an error.
   */
  balanceOf(asset: AssetId, holder: Holder): Amount {
    if (isZeroAddress(holder)) {
      throw new ZeroAddressQueryError();
    }
    assertUint256(asset);
    return this.read(asset, holder);
  }

  /** Position-for-position pairing of `holders[i]` with `assets[i]`. */
  balanceOfBatch(holders: readonly Holder[], assets: readonly AssetId[]): Amount[] {
    if (holders.length !== assets.length) {
      throw new LengthMismatchError();
    }
    return holders.map((holder, i) => this.balanceOf(assets[i], holder));
  }

  /** Whether `holder` can cover `amount` of `asset`. */
  covers(asset: AssetId, holder: Holder, amount: Amount): boolean {
    return this.read(asset, holder) >= amount;
  }

  /**
   * Apply `delta` to one entry. A decrease larger than the balance fails with
   * InsufficientBalance and a credit past 2^256 - 1 fails with
   * BalanceOverflow; in both cases nothing is written.
   */
  adjust(asset: AssetId, holder: Holder, delta: Amount, sign: AdjustSign): void {
    assertUint256(asset);
    assertUint256(delta);

    const current = this.read(asset, holder);
    let next: Amount;
    if (sign === 'decrease') {
      if (delta > current) {
        throw new InsufficientBalanceError();
      }
      next = current - delta;
    } else {
      next = current + delta;
      if (next > MAX_UINT256) {
        throw new BalanceOverflowError();
      }
    }

    this.write(asset, holder, next);
  }

  /** Sum of every balance held in `asset`. */
  circulatingSupply(asset: AssetId): Amount {
    let total = 0n;
    for (const amount of this.balances.get(asset)?.values() ?? []) {
      total += amount;
    }
    return total;
  }

  /** Holders with a non-zero balance in `asset`. */
  holdersOf(asset: AssetId): Holder[] {
    const holders: Holder[] = [];
    for (const [holder, amount] of this.balances.get(asset) ?? []) {
      if (amount > 0n) {
        holders.push(holder);
      }
    }
    return holders;
  }

  private read(asset: AssetId, holder: Holder): Amount {
    return this.balances.get(asset)?.get(holder) ?? 0n;
  }

  private write(asset: AssetId, holder: Holder, amount: Amount): void {
    const entries = this.balances.get(asset) ?? new Map<Holder, Amount>();
    const previous = entries.get(holder) ?? 0n;
    this.journal.recordUndo(() => entries.set(holder, previous));
    this.balances.set(asset, entries);
    entries.set(holder, amount);
  }
}
