import { beforeEach, describe, it, expect } from 'vitest';

import { ApprovalRegistry } from '@/ledger/approval-registry.js';
import { Journal } from '@/ledger/journal.js';

import { ALICE, BOB, CAROL, expectReason, inScope } from '../../helpers/ledger.js';

describe('ApprovalRegistry', () => {
  let journal: Journal;
  let approvals: ApprovalRegistry;

  beforeEach(() => {
    journal = new Journal();
    approvals = new ApprovalRegistry(journal);
  });

  it('should default every pair to false, including self', () => {
    expect(approvals.isApprovedForAll(ALICE, BOB)).toBe(false);
    expect(approvals.isApprovedForAll(ALICE, ALICE)).toBe(false);
  });

  it('should grant and revoke per operator', () => {
    inScope(journal, () => {
      approvals.setApprovalForAll(ALICE, BOB, true);
      approvals.setApprovalForAll(ALICE, CAROL, true);
    });
    inScope(journal, () => approvals.setApprovalForAll(ALICE, CAROL, false));

    expect(approvals.isApprovedForAll(ALICE, BOB)).toBe(true);
    expect(approvals.isApprovedForAll(ALICE, CAROL)).toBe(false);
    // Approvals are directional
    expect(approvals.isApprovedForAll(BOB, ALICE)).toBe(false);
  });

  it('should reject self-approval', () => {
    expectReason(
      () => inScope(journal, () => approvals.setApprovalForAll(ALICE, ALICE, true)),
      'SelfApproval',
      'LEDGER_SELF_APPROVAL'
    );
  });

  it('should announce every write, even when the value does not change', () => {
    const first = inScope(journal, () => approvals.setApprovalForAll(ALICE, BOB, true));
    const second = inScope(journal, () => approvals.setApprovalForAll(ALICE, BOB, true));

    const expected = { type: 'approval-for-all', owner: ALICE, operator: BOB, approved: true };
    expect(first).toEqual([expected]);
    expect(second).toEqual([expected]);
  });

  it('should restore the previous value on rollback', () => {
    inScope(journal, () => approvals.setApprovalForAll(ALICE, BOB, true));

    const checkpoint = journal.begin();
    approvals.setApprovalForAll(ALICE, BOB, false);
    journal.rollback(checkpoint);

    expect(approvals.isApprovedForAll(ALICE, BOB)).toBe(true);
  });
});
