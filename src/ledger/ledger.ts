// Ledger -- the single owned aggregate of all ledger state.
//
// One instance per process, created once with Ledger.initialize() and then
// mutated in place. Every public operation runs through execute(), which
// opens a journal scope and either commits the whole operation (then hands
// its notifications to the announce sink) or rolls all of it back.
//
// Operations are synchronous end to end, receipt hooks included, so the
// event loop already serializes them; there is no separate lock.

import type { FastifyBaseLogger } from 'fastify';

import type { ReceiptHookHost } from './acceptance.js';
import { AcceptanceProtocol } from './acceptance.js';
import type { Holder } from './address.js';
import { ApprovalRegistry } from './approval-registry.js';
import { BalanceLedger } from './balance-ledger.js';
import { UnauthorizedError, isLedgerError } from './errors.js';
import { EventLog } from './event-log.js';
import type { AnnounceFn, LedgerEvent } from './events.js';
import type { AssetRecord } from './identity-set.js';
import { IdentitySet } from './identity-set.js';
import { Journal } from './journal.js';
import { ReceiverRegistry } from './receivers.js';
import { TransferEngine } from './transfer-engine.js';
import type { Amount, AssetId } from './uint256.js';

export const DEFAULT_EVENT_LOG_CAPACITY = 1000;

export interface LedgerOptions {
  /** The authority allowed to create assets, mint and burn. */
  owner: Holder;
  logger: FastifyBaseLogger;
  /** Programmatic-holder environment. Defaults to an empty ReceiverRegistry. */
  receivers?: ReceiptHookHost;
  eventLogCapacity?: number;
  /** Extra sink, called after the event log for every committed notification. */
  announce?: AnnounceFn;
}

export class Ledger {
  readonly owner: Holder;
  readonly identities: IdentitySet;
  readonly balances: BalanceLedger;
  readonly approvals: ApprovalRegistry;
  readonly events: EventLog;
  readonly receivers: ReceiptHookHost;

  private readonly journal: Journal;
  private readonly engine: TransferEngine;
  private readonly logger: FastifyBaseLogger;
  private readonly extraSink: AnnounceFn | undefined;

  private constructor(options: LedgerOptions) {
    this.owner = options.owner;
    this.logger = options.logger;
    this.extraSink = options.announce;
    this.receivers = options.receivers ?? new ReceiverRegistry();
    this.events = new EventLog(options.eventLogCapacity ?? DEFAULT_EVENT_LOG_CAPACITY);

    this.journal = new Journal();
    this.identities = new IdentitySet(this.journal);
    this.balances = new BalanceLedger(this.journal);
    this.approvals = new ApprovalRegistry(this.journal);
    this.engine = new TransferEngine({
      balances: this.balances,
      approvals: this.approvals,
      acceptance: new AcceptanceProtocol(this.receivers, this.logger),
      journal: this.journal,
    });
  }

  static initialize(options: LedgerOptions): Ledger {
    const ledger = new Ledger(options);
    options.logger.info({ owner: options.owner }, 'Ledger initialized');
    return ledger;
  }

  /** Operations performed on behalf of `caller`. */
  session(caller: Holder): LedgerSession {
    return new LedgerSession(this, this.engine, caller);
  }

  /**
   * Run `body` as one all-or-nothing operation. Calls nest: an operation
   * started inside another commits or rolls back with it, which is how a
   * caller makes asset creation and its initial mint a single unit.
   */
  execute<T>(operation: string, caller: Holder, body: () => T): T {
    const checkpoint = this.journal.begin();
    let result: T;
    try {
      result = body();
    } catch (error) {
      this.journal.rollback(checkpoint);
      this.logger.warn(
        { operation, caller, code: isLedgerError(error) ? error.code : 'UNEXPECTED' },
        'Ledger operation aborted'
      );
      throw error;
    }

    const committed = this.journal.commit(checkpoint);
    this.logger.debug({ operation, caller, events: committed.length }, 'Ledger operation committed');
    for (const event of committed) {
      this.announce(event);
    }
    return result;
  }

  // Sink failures never undo a committed operation.
  private announce(event: LedgerEvent): void {
    this.events.append(event);
    if (!this.extraSink) {
      return;
    }
    try {
      this.extraSink(event);
    } catch (error) {
      this.logger.error({ err: error, type: event.type }, 'Announce sink failed');
    }
  }
}

/**
 * The dispatcher-facing surface: every public operation, with the caller
 * bound once. Reads never fail for unknown ids or pairs; writes run inside
 * Ledger.execute().
 */
export class LedgerSession {
  readonly caller: Holder;
  private readonly ledger: Ledger;
  private readonly engine: TransferEngine;

  constructor(ledger: Ledger, engine: TransferEngine, caller: Holder) {
    this.ledger = ledger;
    this.engine = engine;
    this.caller = caller;
  }

  // ---- Queries ----

  balanceOf(asset: AssetId, holder: Holder): Amount {
    return this.ledger.balances.balanceOf(asset, holder);
  }

  balanceOfBatch(holders: readonly Holder[], assets: readonly AssetId[]): Amount[] {
    return this.ledger.balances.balanceOfBatch(holders, assets);
  }

  isApprovedForAll(owner: Holder, operator: Holder): boolean {
    return this.ledger.approvals.isApprovedForAll(owner, operator);
  }

  exists(asset: AssetId): boolean {
    return this.ledger.identities.exists(asset);
  }

  getAsset(asset: AssetId): AssetRecord {
    return this.ledger.identities.get(asset);
  }

  // ---- Approvals ----

  setApprovalForAll(operator: Holder, approved: boolean): void {
    this.run('setApprovalForAll', () =>
      this.ledger.approvals.setApprovalForAll(this.caller, operator, approved)
    );
  }

  // ---- Transfers ----

  transfer(from: Holder, to: Holder, asset: AssetId, amount: Amount, data = '0x'): void {
    this.run('transfer', () => this.engine.transfer(this.caller, from, to, asset, amount, data));
  }

  transferBatch(
    from: Holder,
    to: Holder,
    assets: readonly AssetId[],
    amounts: readonly Amount[],
    data = '0x'
  ): void {
    this.run('transferBatch', () =>
      this.engine.transferBatch(this.caller, from, to, assets, amounts, data)
    );
  }

  // ---- Supply (owner only) ----

  mint(to: Holder, asset: AssetId, amount: Amount, data = '0x'): void {
    this.runAsOwner('mint', () => this.engine.mint(this.caller, to, asset, amount, data));
  }

  mintBatch(to: Holder, assets: readonly AssetId[], amounts: readonly Amount[], data = '0x'): void {
    this.runAsOwner('mintBatch', () =>
      this.engine.mintBatch(this.caller, to, assets, amounts, data)
    );
  }

  burn(owner: Holder, asset: AssetId, amount: Amount): void {
    this.runAsOwner('burn', () => this.engine.burn(this.caller, owner, asset, amount));
  }

  burnBatch(owner: Holder, assets: readonly AssetId[], amounts: readonly Amount[]): void {
    this.runAsOwner('burnBatch', () => this.engine.burnBatch(this.caller, owner, assets, amounts));
  }

  // ---- Asset classes (owner only) ----

  /** Register a new asset class without supplying it. */
  createAssetRecord(initialSupply: Amount, label = ''): AssetId {
    return this.runAsOwner('createAsset', () =>
      this.ledger.identities.createAsset(this.caller, initialSupply, label)
    );
  }

  /**
   * Register a new asset class, then mint `initialSupply` to `initialHolder`.
   * These are two operations: if the mint fails, the record stays and the
   * mint's error propagates. Wrap the call in Ledger.execute() to make the
   * pair atomic.
   */
  createAsset(initialHolder: Holder, initialSupply: Amount, label = ''): AssetId {
    const id = this.createAssetRecord(initialSupply, label);
    this.mint(initialHolder, id, initialSupply);
    return id;
  }

  private run<T>(operation: string, body: () => T): T {
    return this.ledger.execute(operation, this.caller, body);
  }

  private runAsOwner<T>(operation: string, body: () => T): T {
    return this.run(operation, () => {
      if (this.caller !== this.ledger.owner) {
        throw new UnauthorizedError();
      }
      return body();
    });
  }
}
