// Wire schemas for the ledger HTTP API.
//
// Request schemas transform decimal strings into bigints and normalize
// addresses; the server validates bodies with them and the client derives its
// input types from them (z.input). Response schemas keep numbers as decimal
// strings.

import { z } from 'zod';

import { HexDataSchema, HolderSchema } from '../ledger/address.js';
import { Uint256StringSchema } from '../ledger/uint256.js';

/** Upper bound on entries in any batch request. */
export const MAX_BATCH_SIZE = 500;

const IdListSchema = z.array(Uint256StringSchema).max(MAX_BATCH_SIZE);

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export const CreateAssetRequestSchema = z.object({
  /** Receives the initial supply */
  initialHolder: HolderSchema,
  initialSupply: Uint256StringSchema,
  /** Metadata label, announced verbatim when non-empty */
  label: z.string().max(2048).default(''),
});

export const AssetParamsSchema = z.object({
  id: Uint256StringSchema,
});

export const BalanceParamsSchema = z.object({
  asset: Uint256StringSchema,
  holder: HolderSchema,
});

export const BalanceBatchRequestSchema = z.object({
  holders: z.array(HolderSchema).max(MAX_BATCH_SIZE),
  assets: IdListSchema,
});

export const ApprovalRequestSchema = z.object({
  operator: HolderSchema,
  approved: z.boolean(),
});

export const ApprovalParamsSchema = z.object({
  owner: HolderSchema,
  operator: HolderSchema,
});

export const TransferRequestSchema = z.object({
  from: HolderSchema,
  to: HolderSchema,
  id: Uint256StringSchema,
  amount: Uint256StringSchema,
  data: HexDataSchema,
});

export const TransferBatchRequestSchema = z.object({
  from: HolderSchema,
  to: HolderSchema,
  ids: IdListSchema,
  amounts: IdListSchema,
  data: HexDataSchema,
});

export const MintRequestSchema = z.object({
  to: HolderSchema,
  id: Uint256StringSchema,
  amount: Uint256StringSchema,
  data: HexDataSchema,
});

export const MintBatchRequestSchema = z.object({
  to: HolderSchema,
  ids: IdListSchema,
  amounts: IdListSchema,
  data: HexDataSchema,
});

export const BurnRequestSchema = z.object({
  owner: HolderSchema,
  id: Uint256StringSchema,
  amount: Uint256StringSchema,
});

export const BurnBatchRequestSchema = z.object({
  owner: HolderSchema,
  ids: IdListSchema,
  amounts: IdListSchema,
});

export const EventsQuerySchema = z.object({
  after: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_BATCH_SIZE).default(100),
});

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export const OperationResponseSchema = z.object({
  success: z.literal(true),
});

export const CreateAssetResponseSchema = z.object({
  id: z.string(),
});

export const AssetResponseSchema = z.object({
  id: z.string(),
  creator: z.string(),
  /** Supply recorded at creation; not updated by later mint/burn */
  totalSupply: z.string(),
  /** Sum of current balances */
  circulatingSupply: z.string(),
  label: z.string(),
});

export const BalanceResponseSchema = z.object({
  balance: z.string(),
});

export const BalanceBatchResponseSchema = z.object({
  balances: z.array(z.string()),
});

export const ApprovalResponseSchema = z.object({
  owner: z.string(),
  operator: z.string(),
  approved: z.boolean(),
});

export const LedgerEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('transfer-single'),
    operator: z.string(),
    from: z.string(),
    to: z.string(),
    id: z.string(),
    value: z.string(),
  }),
  z.object({
    type: z.literal('transfer-batch'),
    operator: z.string(),
    from: z.string(),
    to: z.string(),
    ids: z.array(z.string()),
    values: z.array(z.string()),
  }),
  z.object({
    type: z.literal('approval-for-all'),
    owner: z.string(),
    operator: z.string(),
    approved: z.boolean(),
  }),
  z.object({
    type: z.literal('metadata'),
    id: z.string(),
    value: z.string(),
  }),
]);

export const EventsResponseSchema = z.object({
  events: z.array(z.object({ sequence: z.number().int(), event: LedgerEventSchema })),
  lastSequence: z.number().int(),
});

/** Body of every non-2xx response (see plugins/error-handler.ts). */
export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    statusCode: z.number().int(),
  }),
  requestId: z.string(),
  timestamp: z.string(),
});

// ---------------------------------------------------------------------------
// Inferred TypeScript types
// ---------------------------------------------------------------------------

export type CreateAssetRequest = z.input<typeof CreateAssetRequestSchema>;
export type BalanceBatchRequest = z.input<typeof BalanceBatchRequestSchema>;
export type ApprovalRequest = z.input<typeof ApprovalRequestSchema>;
export type TransferRequest = z.input<typeof TransferRequestSchema>;
export type TransferBatchRequest = z.input<typeof TransferBatchRequestSchema>;
export type MintRequest = z.input<typeof MintRequestSchema>;
export type MintBatchRequest = z.input<typeof MintBatchRequestSchema>;
export type BurnRequest = z.input<typeof BurnRequestSchema>;
export type BurnBatchRequest = z.input<typeof BurnBatchRequestSchema>;
export type EventsQuery = z.input<typeof EventsQuerySchema>;

export type OperationResponse = z.infer<typeof OperationResponseSchema>;
export type CreateAssetResponse = z.infer<typeof CreateAssetResponseSchema>;
export type AssetResponse = z.infer<typeof AssetResponseSchema>;
export type BalanceResponse = z.infer<typeof BalanceResponseSchema>;
export type BalanceBatchResponse = z.infer<typeof BalanceBatchResponseSchema>;
export type ApprovalResponse = z.infer<typeof ApprovalResponseSchema>;
export type EventsResponse = z.infer<typeof EventsResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
