// AcceptanceProtocol -- receipt confirmation for programmatic recipients.
//
// A transfer into a programmatic holder is final only if the holder's receipt
// hook answers with the expected selector. The hook call is classified into
// exactly one of four outcomes; everything except a matching `ok` aborts the
// enclosing operation.

import type { FastifyBaseLogger } from 'fastify';

import type { Holder } from './address.js';
import {
  CalleePanickedError,
  LedgerInternalError,
  NotAReceiverError,
  ReceiverRevertedError,
  RejectedBySelectorError,
} from './errors.js';
import type { Amount, AssetId } from './uint256.js';

// ---------------------------------------------------------------------------
// Selectors
// ---------------------------------------------------------------------------

/** Expected answer from the single-receipt hook. */
export const RECEIVED_SELECTOR = '0xf23a6e61';

/** Expected answer from the batch-receipt hook. */
export const BATCH_RECEIVED_SELECTOR = '0xbc197c81';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SingleReceipt {
  variant: 'single';
  operator: Holder;
  from: Holder;
  id: AssetId;
  value: Amount;
  data: string;
}

export interface BatchReceipt {
  variant: 'batch';
  operator: Holder;
  from: Holder;
  ids: AssetId[];
  values: Amount[];
  data: string;
}

export type Receipt = SingleReceipt | BatchReceipt;

/** Result of calling a receipt hook. */
export type ExternalOutcome =
  | { kind: 'ok'; returnValue: string }
  | { kind: 'error-with-reason'; reason: string }
  | { kind: 'error-without-reason'; data?: string }
  | { kind: 'panic'; cause: unknown };

export type AcceptanceVerdict =
  | { accepted: true }
  | { accepted: false; error: Error & { code: string } };

/** The environment side of the protocol: who is programmatic, and the call itself. */
export interface ReceiptHookHost {
  isProgrammatic(holder: Holder): boolean;
  invokeReceiptHook(target: Holder, receipt: Receipt): ExternalOutcome;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export function expectedSelector(variant: Receipt['variant']): string {
  return variant === 'single' ? RECEIVED_SELECTOR : BATCH_RECEIVED_SELECTOR;
}

/** Decide commit or abort for one hook outcome. */
export function classifyOutcome(
  outcome: ExternalOutcome,
  variant: Receipt['variant']
): AcceptanceVerdict {
  switch (outcome.kind) {
    case 'ok':
      return outcome.returnValue.toLowerCase() === expectedSelector(variant)
        ? { accepted: true }
        : { accepted: false, error: new RejectedBySelectorError() };
    case 'error-with-reason':
      return { accepted: false, error: new ReceiverRevertedError(outcome.reason) };
    case 'error-without-reason':
      return { accepted: false, error: new NotAReceiverError() };
    case 'panic':
      return { accepted: false, error: new CalleePanickedError() };
    default: {
      const unclassified: never = outcome;
      throw new LedgerInternalError(`unclassified receipt outcome ${JSON.stringify(unclassified)}`);
    }
  }
}

export class AcceptanceProtocol {
  private readonly host: ReceiptHookHost;
  private readonly logger: FastifyBaseLogger;

  constructor(host: ReceiptHookHost, logger: FastifyBaseLogger) {
    this.host = host;
    this.logger = logger;
  }

  /**
   * Run the receipt check against `to`. Plain addresses accept implicitly.
   * Throws the abort reason when the recipient does not accept.
   */
  check(to: Holder, receipt: Receipt): void {
    if (!this.host.isProgrammatic(to)) {
      return;
    }

    const outcome = this.host.invokeReceiptHook(to, receipt);
    const verdict = classifyOutcome(outcome, receipt.variant);

    if (!verdict.accepted) {
      this.logger.debug(
        { to, variant: receipt.variant, outcome: outcome.kind, code: verdict.error.code },
        'Receipt rejected'
      );
      throw verdict.error;
    }
  }
}
