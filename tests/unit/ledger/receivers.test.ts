import { describe, it, expect, vi } from 'vitest';

import type { BatchReceipt, SingleReceipt } from '@/ledger/acceptance.js';
import { BATCH_RECEIVED_SELECTOR, RECEIVED_SELECTOR } from '@/ledger/acceptance.js';
import { InsufficientBalanceError } from '@/ledger/errors.js';
import { ReceiverRegistry, ReceiverRevert, VaultReceiver } from '@/ledger/receivers.js';

import { ALICE, BOB, VAULT } from '../../helpers/ledger.js';

const single: SingleReceipt = { variant: 'single', operator: ALICE, from: ALICE, id: 1n, value: 5n, data: '0x' };
const batch: BatchReceipt = {
  variant: 'batch',
  operator: ALICE,
  from: ALICE,
  ids: [1n, 2n],
  values: [5n, 6n],
  data: '0x',
};

describe('ReceiverRegistry', () => {
  it('should treat only registered addresses as programmatic', () => {
    const registry = new ReceiverRegistry();
    registry.register(VAULT, {});

    expect(registry.isProgrammatic(VAULT)).toBe(true);
    expect(registry.isProgrammatic(BOB)).toBe(false);
    expect(registry.size).toBe(1);

    expect(registry.unregister(VAULT)).toBe(true);
    expect(registry.unregister(VAULT)).toBe(false);
    expect(registry.isProgrammatic(VAULT)).toBe(false);
  });

  it('should return the hook answer as ok', () => {
    const registry = new ReceiverRegistry();
    const onReceived = vi.fn(() => RECEIVED_SELECTOR);
    registry.register(VAULT, { onReceived });

    expect(registry.invokeReceiptHook(VAULT, single)).toEqual({ kind: 'ok', returnValue: RECEIVED_SELECTOR });
    expect(onReceived).toHaveBeenCalledWith(single);
  });

  it('should report a missing hook or receiver as a reasonless failure', () => {
    const registry = new ReceiverRegistry();
    registry.register(VAULT, { onReceived: () => RECEIVED_SELECTOR });

    expect(registry.invokeReceiptHook(VAULT, batch)).toEqual({ kind: 'error-without-reason' });
    expect(registry.invokeReceiptHook(BOB, single)).toEqual({ kind: 'error-without-reason' });
  });

  it('should map reverts by whether they carry a reason', () => {
    const registry = new ReceiverRegistry();
    registry.register(VAULT, {
      onReceived: () => {
        throw new ReceiverRevert('closed');
      },
      onBatchReceived: () => {
        throw new ReceiverRevert();
      },
    });
    registry.register(BOB, {
      onReceived: () => {
        throw new ReceiverRevert('');
      },
    });

    expect(registry.invokeReceiptHook(VAULT, single)).toEqual({ kind: 'error-with-reason', reason: 'closed' });
    expect(registry.invokeReceiptHook(VAULT, batch)).toEqual({ kind: 'error-without-reason' });
    expect(registry.invokeReceiptHook(BOB, single)).toEqual({ kind: 'error-without-reason' });
  });

  it('should surface a failed nested ledger call with its reason', () => {
    const registry = new ReceiverRegistry();
    registry.register(VAULT, {
      onReceived: () => {
        throw new InsufficientBalanceError();
      },
    });

    expect(registry.invokeReceiptHook(VAULT, single)).toEqual({
      kind: 'error-with-reason',
      reason: 'InsufficientBalance',
    });
  });

  it('should treat any other throw as a panic', () => {
    const registry = new ReceiverRegistry();
    const cause = new RangeError('index out of bounds');
    registry.register(VAULT, {
      onReceived: () => {
        throw cause;
      },
    });

    expect(registry.invokeReceiptHook(VAULT, single)).toEqual({ kind: 'panic', cause });
  });
});

describe('VaultReceiver', () => {
  it('should accept every asset when no set is configured', () => {
    const vault = new VaultReceiver({ reason: 'vault: asset not accepted' });

    expect(vault.onReceived({ ...single, id: 99n })).toBe(RECEIVED_SELECTOR);
    expect(vault.onBatchReceived(batch)).toBe(BATCH_RECEIVED_SELECTOR);
  });

  it('should revert with the configured reason outside its set', () => {
    const vault = new VaultReceiver({ acceptedAssets: [1n], reason: 'vault: asset not accepted' });

    expect(vault.onReceived(single)).toBe(RECEIVED_SELECTOR);
    expect(() => vault.onReceived({ ...single, id: 2n })).toThrow(ReceiverRevert);
    // One refused id refuses the whole batch
    expect(() => vault.onBatchReceived(batch)).toThrow('vault: asset not accepted');
  });
});
