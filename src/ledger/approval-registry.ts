// ApprovalRegistry -- owner -> (operator -> approved).

import type { Holder } from './address.js';
import { SelfApprovalError } from './errors.js';
import type { Journal } from './journal.js';

export class ApprovalRegistry {
  private readonly approvals = new Map<Holder, Map<Holder, boolean>>();
  private readonly journal: Journal;

  constructor(journal: Journal) {
    this.journal = journal;
  }

  /**
   * Grant or revoke blanket transfer authority. The notification goes out on
   * every call, including writes that leave the value unchanged.
   */
  setApprovalForAll(owner: Holder, operator: Holder, approved: boolean): void {
    if (owner === operator) {
      throw new SelfApprovalError();
    }

    const operators = this.approvals.get(owner) ?? new Map<Holder, boolean>();
    const previous = operators.get(operator) ?? false;
    this.journal.recordUndo(() => operators.set(operator, previous));
    this.approvals.set(owner, operators);
    operators.set(operator, approved);

    this.journal.emit({ type: 'approval-for-all', owner, operator, approved });
  }

  isApprovedForAll(owner: Holder, operator: Holder): boolean {
    return this.approvals.get(owner)?.get(operator) ?? false;
  }
}
