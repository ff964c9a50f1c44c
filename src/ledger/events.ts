// Ledger notifications.
//
// Operations queue these on the journal; only committed operations hand them
// to the announce sink, so an aborted transfer leaves no trace.

import type { Holder } from './address.js';
import type { Amount, AssetId } from './uint256.js';

export interface TransferSingleEvent {
  type: 'transfer-single';
  operator: Holder;
  from: Holder;
  to: Holder;
  id: AssetId;
  value: Amount;
}

export interface TransferBatchEvent {
  type: 'transfer-batch';
  operator: Holder;
  from: Holder;
  to: Holder;
  ids: AssetId[];
  values: Amount[];
}

export interface ApprovalForAllEvent {
  type: 'approval-for-all';
  owner: Holder;
  operator: Holder;
  approved: boolean;
}

/** Metadata label assigned at asset creation. */
export interface MetadataEvent {
  type: 'metadata';
  id: AssetId;
  value: string;
}

export type LedgerEvent =
  | TransferSingleEvent
  | TransferBatchEvent
  | ApprovalForAllEvent
  | MetadataEvent;

/** Fire-and-forget notification sink. */
export type AnnounceFn = (event: LedgerEvent) => void;

// ---------------------------------------------------------------------------
// Wire format
// ---------------------------------------------------------------------------

export type SerializedLedgerEvent =
  | (Omit<TransferSingleEvent, 'id' | 'value'> & { id: string; value: string })
  | (Omit<TransferBatchEvent, 'ids' | 'values'> & { ids: string[]; values: string[] })
  | ApprovalForAllEvent
  | (Omit<MetadataEvent, 'id'> & { id: string });

/** Render bigints as decimal strings for JSON. */
export function serializeEvent(event: LedgerEvent): SerializedLedgerEvent {
  switch (event.type) {
    case 'transfer-single':
      return { ...event, id: event.id.toString(), value: event.value.toString() };
    case 'transfer-batch':
      return {
        ...event,
        ids: event.ids.map((id) => id.toString()),
        values: event.values.map((value) => value.toString()),
      };
    case 'approval-for-all':
      return event;
    case 'metadata':
      return { ...event, id: event.id.toString() };
  }
}
