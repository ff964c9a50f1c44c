// SDK barrel export -- public API for ledger clients

export { LedgerClient, LedgerRequestError } from './ledger-client.js';
export type { LedgerClientOptions } from './ledger-client.js';
export type {
  ApprovalRequest,
  ApprovalResponse,
  AssetResponse,
  BalanceBatchRequest,
  BalanceBatchResponse,
  BalanceResponse,
  BurnBatchRequest,
  BurnRequest,
  CreateAssetRequest,
  CreateAssetResponse,
  ErrorResponse,
  EventsQuery,
  EventsResponse,
  MintBatchRequest,
  MintRequest,
  OperationResponse,
  TransferBatchRequest,
  TransferRequest,
} from './types.js';
export {
  ApprovalResponseSchema,
  AssetResponseSchema,
  BalanceBatchResponseSchema,
  BalanceResponseSchema,
  CreateAssetResponseSchema,
  ErrorResponseSchema,
  EventsResponseSchema,
  LedgerEventSchema,
  MAX_BATCH_SIZE,
  OperationResponseSchema,
} from './types.js';
