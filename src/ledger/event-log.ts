// Bounded in-memory log of committed ledger notifications.

import type { LedgerEvent } from './events.js';

export interface LoggedEvent {
  /** Starts at 1, increases by one per appended event, never reused. */
  sequence: number;
  event: LedgerEvent;
}

export interface EventLogQuery {
  /** Return events with a sequence strictly greater than this. */
  after?: number;
  limit?: number;
}

export const DEFAULT_EVENT_PAGE_SIZE = 100;

export class EventLog {
  private readonly capacity: number;
  private readonly entries: LoggedEvent[] = [];
  private sequence = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Event log capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  append(event: LedgerEvent): LoggedEvent {
    this.sequence += 1;
    const entry: LoggedEvent = { sequence: this.sequence, event };
    this.entries.push(entry);
    // Oldest entries fall off once the log is full.
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
    return entry;
  }

  list(query: EventLogQuery = {}): LoggedEvent[] {
    const after = query.after ?? 0;
    const limit = query.limit ?? DEFAULT_EVENT_PAGE_SIZE;
    return this.entries.filter((entry) => entry.sequence > after).slice(0, limit);
  }

  get lastSequence(): number {
    return this.sequence;
  }

  get size(): number {
    return this.entries.length;
  }
}
