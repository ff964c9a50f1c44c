// IdentitySet -- creator and creation-time supply per asset id.
//
// `totalSupply` is the figure recorded when the asset class was created. It
// is a static label: later mint and burn activity does not touch it. The live
// figure is BalanceLedger.circulatingSupply().

import type { Holder } from './address.js';
import { ZERO_ADDRESS, isZeroAddress } from './address.js';
import { NonexistentAssetError } from './errors.js';
import type { Journal } from './journal.js';
import type { Amount, AssetId } from './uint256.js';
import { assertUint256 } from './uint256.js';

export interface AssetRecord {
  id: AssetId;
  creator: Holder;
  totalSupply: Amount;
  /** Metadata label, stored verbatim. Empty when none was given. */
  label: string;
}

export class IdentitySet {
  private readonly records = new Map<AssetId, AssetRecord>();
  private readonly journal: Journal;
  // Id 0 is never issued.
  private lastId: AssetId = 0n;

  constructor(journal: Journal) {
    this.journal = journal;
  }

  /**
   * Register a new asset class and return its id. Announces the label when
   * one is given. Does not mint: supplying the asset is a separate operation.
   */
  createAsset(creator: Holder, initialSupplyLabel: Amount, label = ''): AssetId {
    assertUint256(initialSupplyLabel);

    const previousId = this.lastId;
    const id = previousId + 1n;
    assertUint256(id);

    this.journal.recordUndo(() => {
      this.lastId = previousId;
      this.records.delete(id);
    });
    this.lastId = id;
    this.records.set(id, { id, creator, totalSupply: initialSupplyLabel, label });

    if (label.length > 0) {
      this.journal.emit({ type: 'metadata', id, value: label });
    }

    return id;
  }

  exists(asset: AssetId): boolean {
    return !isZeroAddress(this.creatorOf(asset));
  }

  /** Record for `asset`, or NonexistentAsset when it was never created. */
  get(asset: AssetId): AssetRecord {
    const record = this.records.get(asset);
    if (!record || isZeroAddress(record.creator)) {
      throw new NonexistentAssetError();
    }
    return { ...record };
  }

  creatorOf(asset: AssetId): Holder {
    return this.records.get(asset)?.creator ?? ZERO_ADDRESS;
  }

  totalSupply(asset: AssetId): Amount {
    return this.records.get(asset)?.totalSupply ?? 0n;
  }

  /** Number of asset classes created so far. */
  get count(): number {
    return this.records.size;
  }

  get lastAssetId(): AssetId {
    return this.lastId;
  }
}
