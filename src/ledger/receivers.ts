// ReceiverRegistry -- in-process programmatic holders.
//
// An address is programmatic when a TokenReceiver is registered for it. The
// registry performs the receipt-hook call synchronously and maps what the
// hook does onto an ExternalOutcome:
//
//   returns a value                    -> ok
//   throws ReceiverRevert(reason)      -> error-with-reason
//   throws a ledger error              -> error-with-reason (its message)
//   throws ReceiverRevert(), or lacks
//   the hook for this variant          -> error-without-reason
//   throws anything else               -> panic

import type {
  BatchReceipt,
  ExternalOutcome,
  Receipt,
  ReceiptHookHost,
  SingleReceipt,
} from './acceptance.js';
import { BATCH_RECEIVED_SELECTOR, RECEIVED_SELECTOR } from './acceptance.js';
import type { Holder } from './address.js';
import { isLedgerError } from './errors.js';
import type { AssetId } from './uint256.js';

/** Receipt hooks of a programmatic holder. Either may be absent. */
export interface TokenReceiver {
  onReceived?(receipt: SingleReceipt): string;
  onBatchReceived?(receipt: BatchReceipt): string;
}

/** Deliberate refusal from inside a receipt hook. */
export class ReceiverRevert extends Error {
  readonly reason: string | undefined;

  constructor(reason?: string) {
    super(reason ?? 'receiver reverted without a reason');
    this.name = 'ReceiverRevert';
    this.reason = reason;
  }
}

export class ReceiverRegistry implements ReceiptHookHost {
  private readonly receivers = new Map<Holder, TokenReceiver>();

  register(address: Holder, receiver: TokenReceiver): void {
    this.receivers.set(address, receiver);
  }

  unregister(address: Holder): boolean {
    return this.receivers.delete(address);
  }

  isProgrammatic(holder: Holder): boolean {
    return this.receivers.has(holder);
  }

  get size(): number {
    return this.receivers.size;
  }

  invokeReceiptHook(target: Holder, receipt: Receipt): ExternalOutcome {
    const receiver = this.receivers.get(target);
    if (!receiver) {
      return { kind: 'error-without-reason' };
    }

    let returnValue: unknown;
    try {
      if (receipt.variant === 'single') {
        if (!receiver.onReceived) {
          return { kind: 'error-without-reason' };
        }
        returnValue = receiver.onReceived(receipt);
      } else {
        if (!receiver.onBatchReceived) {
          return { kind: 'error-without-reason' };
        }
        returnValue = receiver.onBatchReceived(receipt);
      }
    } catch (error) {
      if (error instanceof ReceiverRevert) {
        return error.reason !== undefined && error.reason.length > 0
          ? { kind: 'error-with-reason', reason: error.reason }
          : { kind: 'error-without-reason' };
      }
      // A nested ledger call that failed inside the hook reverts with its reason.
      if (isLedgerError(error)) {
        return { kind: 'error-with-reason', reason: error.message };
      }
      return { kind: 'panic', cause: error };
    }

    // A hook that answers with something other than a string cannot be decoded.
    if (typeof returnValue !== 'string') {
      return { kind: 'error-without-reason' };
    }
    return { kind: 'ok', returnValue };
  }
}

// ---------------------------------------------------------------------------
// Built-in receivers
// ---------------------------------------------------------------------------

export interface VaultReceiverOptions {
  /** Asset ids the vault takes. Omit to take every asset. */
  acceptedAssets?: readonly AssetId[];
  /** Revert reason for refused assets. */
  reason: string;
}

/**
 * Holding contract that accepts a fixed set of asset ids and reverts with a
 * configured reason for anything else. A batch is refused as a whole if any
 * id is outside the set.
 */
export class VaultReceiver implements TokenReceiver {
  private readonly accepted: ReadonlySet<AssetId> | undefined;
  private readonly reason: string;

  constructor(options: VaultReceiverOptions) {
    this.accepted = options.acceptedAssets ? new Set(options.acceptedAssets) : undefined;
    this.reason = options.reason;
  }

  onReceived(receipt: SingleReceipt): string {
    this.assertAccepted([receipt.id]);
    return RECEIVED_SELECTOR;
  }

  onBatchReceived(receipt: BatchReceipt): string {
    this.assertAccepted(receipt.ids);
    return BATCH_RECEIVED_SELECTOR;
  }

  private assertAccepted(ids: readonly AssetId[]): void {
    const accepted = this.accepted;
    if (accepted && ids.some((id) => !accepted.has(id))) {
      throw new ReceiverRevert(this.reason);
    }
  }
}
