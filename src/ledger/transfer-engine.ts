// TransferEngine -- single and batch transfer, mint and burn.
//
// Every method assumes the caller has opened a journal scope (Ledger does this
// for each public operation). A thrown error means the scope must be rolled
// back; the engine itself never undoes partial work.
//
// Ordering inside a transfer:
//   1. recipient / source checks
//   2. authorization
//   3. balance mutations, pair by pair
//   4. notification
//   5. receipt check (transfers only; minting is always accepted)

import type { AcceptanceProtocol } from './acceptance.js';
import type { Holder } from './address.js';
import { ZERO_ADDRESS, isZeroAddress } from './address.js';
import type { ApprovalRegistry } from './approval-registry.js';
import type { BalanceLedger } from './balance-ledger.js';
import {
  BurnExceedsBalanceError,
  LengthMismatchError,
  UnauthorizedError,
  ZeroRecipientError,
  ZeroSourceError,
} from './errors.js';
import type { Journal } from './journal.js';
import type { Amount, AssetId } from './uint256.js';

export interface TransferEngineDeps {
  balances: BalanceLedger;
  approvals: ApprovalRegistry;
  acceptance: AcceptanceProtocol;
  journal: Journal;
}

export class TransferEngine {
  private readonly balances: BalanceLedger;
  private readonly approvals: ApprovalRegistry;
  private readonly acceptance: AcceptanceProtocol;
  private readonly journal: Journal;

  constructor(deps: TransferEngineDeps) {
    this.balances = deps.balances;
    this.approvals = deps.approvals;
    this.acceptance = deps.acceptance;
    this.journal = deps.journal;
  }

  /** Caller must be `from` itself or an approved operator of `from`. */
  authorize(operator: Holder, from: Holder): void {
    if (operator !== from && !this.approvals.isApprovedForAll(from, operator)) {
      throw new UnauthorizedError();
    }
  }

  // ---------------------------------------------------------------------------
  // Transfers
  // ---------------------------------------------------------------------------

  transfer(
    operator: Holder,
    from: Holder,
    to: Holder,
    asset: AssetId,
    amount: Amount,
    data: string
  ): void {
    if (isZeroAddress(to)) {
      throw new ZeroRecipientError();
    }
    this.authorize(operator, from);

    this.move(asset, from, to, amount);
    this.journal.emit({ type: 'transfer-single', operator, from, to, id: asset, value: amount });

    this.acceptance.check(to, {
      variant: 'single',
      operator,
      from,
      id: asset,
      value: amount,
      data,
    });
  }

  transferBatch(
    operator: Holder,
    from: Holder,
    to: Holder,
    assets: readonly AssetId[],
    amounts: readonly Amount[],
    data: string
  ): void {
    if (isZeroAddress(to)) {
      throw new ZeroRecipientError();
    }
    this.authorize(operator, from);
    assertSameLength(assets, amounts);

    assets.forEach((asset, i) => this.move(asset, from, to, amounts[i]));

    this.journal.emit({
      type: 'transfer-batch',
      operator,
      from,
      to,
      ids: [...assets],
      values: [...amounts],
    });

    // The receiver gets its own arrays; the queued event must stay untouched.
    this.acceptance.check(to, {
      variant: 'batch',
      operator,
      from,
      ids: [...assets],
      values: [...amounts],
      data,
    });
  }

  // ---------------------------------------------------------------------------
  // Supply
  // ---------------------------------------------------------------------------

  /** Credit `to` from nothing. No receipt check. */
  mint(operator: Holder, to: Holder, asset: AssetId, amount: Amount, _data: string): void {
    if (isZeroAddress(to)) {
      throw new ZeroRecipientError();
    }

    this.balances.adjust(asset, to, amount, 'increase');
    this.journal.emit({
      type: 'transfer-single',
      operator,
      from: ZERO_ADDRESS,
      to,
      id: asset,
      value: amount,
    });
  }

  mintBatch(
    operator: Holder,
    to: Holder,
    assets: readonly AssetId[],
    amounts: readonly Amount[],
    _data: string
  ): void {
    if (isZeroAddress(to)) {
      throw new ZeroRecipientError();
    }
    assertSameLength(assets, amounts);

    assets.forEach((asset, i) => this.balances.adjust(asset, to, amounts[i], 'increase'));

    this.journal.emit({
      type: 'transfer-batch',
      operator,
      from: ZERO_ADDRESS,
      to,
      ids: [...assets],
      values: [...amounts],
    });
  }

  burn(operator: Holder, owner: Holder, asset: AssetId, amount: Amount): void {
    if (isZeroAddress(owner)) {
      throw new ZeroSourceError();
    }

    this.debitForBurn(asset, owner, amount);
    this.journal.emit({
      type: 'transfer-single',
      operator,
      from: owner,
      to: ZERO_ADDRESS,
      id: asset,
      value: amount,
    });
  }

  burnBatch(
    operator: Holder,
    owner: Holder,
    assets: readonly AssetId[],
    amounts: readonly Amount[]
  ): void {
    if (isZeroAddress(owner)) {
      throw new ZeroSourceError();
    }
    assertSameLength(assets, amounts);

    assets.forEach((asset, i) => this.debitForBurn(asset, owner, amounts[i]));

    this.journal.emit({
      type: 'transfer-batch',
      operator,
      from: owner,
      to: ZERO_ADDRESS,
      ids: [...assets],
      values: [...amounts],
    });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /** Debit then credit. The debit carries the sufficiency check. */
  private move(asset: AssetId, from: Holder, to: Holder, amount: Amount): void {
    this.balances.adjust(asset, from, amount, 'decrease');
    this.balances.adjust(asset, to, amount, 'increase');
  }

  private debitForBurn(asset: AssetId, owner: Holder, amount: Amount): void {
    if (!this.balances.covers(asset, owner, amount)) {
      throw new BurnExceedsBalanceError();
    }
    this.balances.adjust(asset, owner, amount, 'decrease');
  }
}

function assertSameLength(assets: readonly AssetId[], amounts: readonly Amount[]): void {
  if (assets.length !== amounts.length) {
    throw new LengthMismatchError();
  }
}
