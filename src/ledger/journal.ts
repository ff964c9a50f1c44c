// Undo journal for one in-progress ledger operation.
//
// Every state write registers the inverse write here, and every notification
// is queued here instead of being announced directly. Aborting an operation
// replays the inverses newest-first and drops its queued notifications;
// committing the outermost operation releases the notifications in order.
//
// Scopes nest: a receipt hook that calls back into the ledger opens a child
// scope whose entries fold into the parent on commit.

import type { LedgerEvent } from './events.js';
import { LedgerInternalError } from './errors.js';

type JournalEntry = { kind: 'undo'; revert: () => void } | { kind: 'event'; event: LedgerEvent };

/** Position in the journal at which a scope was opened. */
export interface Checkpoint {
  readonly depth: number;
  readonly index: number;
}

export class Journal {
  private readonly entries: JournalEntry[] = [];
  private depth = 0;

  /** True while at least one operation scope is open. */
  get active(): boolean {
    return this.depth > 0;
  }

  begin(): Checkpoint {
    this.depth += 1;
    return { depth: this.depth, index: this.entries.length };
  }

  /** Register the inverse of a write that has just been applied. */
  recordUndo(revert: () => void): void {
    this.assertActive();
    this.entries.push({ kind: 'undo', revert });
  }

  emit(event: LedgerEvent): void {
    this.assertActive();
    this.entries.push({ kind: 'event', event });
  }

  /**
   * Close the scope opened at `checkpoint`. Returns the notifications to
   * announce: all of them for the outermost scope, none for a nested one.
   */
  commit(checkpoint: Checkpoint): LedgerEvent[] {
    this.close(checkpoint);
    if (this.depth > 0) {
      return [];
    }

    const events: LedgerEvent[] = [];
    for (const entry of this.entries) {
      if (entry.kind === 'event') {
        events.push(entry.event);
      }
    }
    this.entries.length = 0;
    return events;
  }

  /** Undo every write made since `checkpoint` and drop its notifications. */
  rollback(checkpoint: Checkpoint): void {
    this.close(checkpoint);
    while (this.entries.length > checkpoint.index) {
      const entry = this.entries.pop();
      if (entry?.kind === 'undo') {
        entry.revert();
      }
    }
  }

  private close(checkpoint: Checkpoint): void {
    if (checkpoint.depth !== this.depth) {
      throw new LedgerInternalError(
        `scope closed out of order (open depth ${this.depth}, closing ${checkpoint.depth})`
      );
    }
    this.depth -= 1;
  }

  private assertActive(): void {
    if (this.depth === 0) {
      throw new LedgerInternalError('state written outside an operation scope');
    }
  }
}
