// Ledger barrel export -- the accounting core, usable without the HTTP server

export { Ledger, LedgerSession, DEFAULT_EVENT_LOG_CAPACITY } from './ledger.js';
export type { LedgerOptions } from './ledger.js';
export { BalanceLedger } from './balance-ledger.js';
export type { AdjustSign } from './balance-ledger.js';
export { ApprovalRegistry } from './approval-registry.js';
export { IdentitySet } from './identity-set.js';
export type { AssetRecord } from './identity-set.js';
export { TransferEngine } from './transfer-engine.js';
export {
  AcceptanceProtocol,
  RECEIVED_SELECTOR,
  BATCH_RECEIVED_SELECTOR,
  classifyOutcome,
  expectedSelector,
} from './acceptance.js';
export type {
  AcceptanceVerdict,
  BatchReceipt,
  ExternalOutcome,
  Receipt,
  ReceiptHookHost,
  SingleReceipt,
} from './acceptance.js';
export { ReceiverRegistry, ReceiverRevert, VaultReceiver } from './receivers.js';
export type { TokenReceiver, VaultReceiverOptions } from './receivers.js';
export { EventLog, DEFAULT_EVENT_PAGE_SIZE } from './event-log.js';
export type { EventLogQuery, LoggedEvent } from './event-log.js';
export { Journal } from './journal.js';
export type { Checkpoint } from './journal.js';
export { serializeEvent } from './events.js';
export type { AnnounceFn, LedgerEvent, SerializedLedgerEvent } from './events.js';
export { HolderSchema, HexDataSchema, ZERO_ADDRESS, isZeroAddress, toHolder } from './address.js';
export type { Holder } from './address.js';
export { MAX_UINT256, Uint256StringSchema, assertUint256, isUint256 } from './uint256.js';
export type { Amount, AssetId } from './uint256.js';
export * from './errors.js';
