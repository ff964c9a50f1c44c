import createError from '@fastify/error';

// Ledger errors (LEDGER_*)
//
// The message of every error is the literal failure reason. Callers match on
// it, so these strings must not change.

/** Transfer or mint targeting the zero address (400) */
export const ZeroRecipientError = createError('LEDGER_ZERO_RECIPIENT', 'ZeroRecipient', 400);

/** Burn from the zero address (400) */
export const ZeroSourceError = createError('LEDGER_ZERO_SOURCE', 'ZeroSource', 400);

/** Balance query for the zero address (400) */
export const ZeroAddressQueryError = createError(
  'LEDGER_ZERO_ADDRESS_QUERY',
  'ZeroAddressQuery',
  400
);

/** Caller is neither the holder nor an approved operator, or not the ledger owner (403) */
export const UnauthorizedError = createError('LEDGER_UNAUTHORIZED', 'Unauthorized', 403);

/** Holder tried to approve itself as operator (400) */
export const SelfApprovalError = createError('LEDGER_SELF_APPROVAL', 'SelfApproval', 400);

/** Parallel id/amount (or holder/id) arrays differ in length (400) */
export const LengthMismatchError = createError('LEDGER_LENGTH_MISMATCH', 'LengthMismatch', 400);

export const InsufficientBalanceError = createError(
  'LEDGER_INSUFFICIENT_BALANCE',
  'InsufficientBalance',
  409
);

export const BurnExceedsBalanceError = createError(
  'LEDGER_BURN_EXCEEDS_BALANCE',
  'BurnExceedsBalance',
  409
);

/** Credit would push a balance past 2^256 - 1 (409) */
export const BalanceOverflowError = createError('LEDGER_BALANCE_OVERFLOW', 'BalanceOverflow', 409);

/** Id or amount outside the uint256 range (400) */
export const AmountOutOfRangeError = createError(
  'LEDGER_AMOUNT_OUT_OF_RANGE',
  'AmountOutOfRange',
  400
);

// Receipt-hook outcomes (422)

export const RejectedBySelectorError = createError(
  'LEDGER_REJECTED_BY_SELECTOR',
  'RejectedBySelector',
  422
);

/** Receiver reverted with a reason; the reason is the whole message. */
export const ReceiverRevertedError = createError<[string]>('LEDGER_RECEIVER_REVERTED', '%s', 422);

export const NotAReceiverError = createError(
  'LEDGER_NOT_A_RECEIVER',
  'NotAnERC1155Receiver',
  422
);

export const CalleePanickedError = createError('LEDGER_CALLEE_PANICKED', 'CalleePanicked', 422);

export const NonexistentAssetError = createError(
  'LEDGER_NONEXISTENT_ASSET',
  'NonexistentAsset',
  404
);

/** Broken ledger invariant, never a caller mistake (500) */
export const LedgerInternalError = createError<[string]>(
  'LEDGER_INTERNAL',
  'Internal ledger error: %s',
  500
);

/** Narrow an unknown thrown value to a ledger error with its reason code. */
export function isLedgerError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('LEDGER_')
  );
}
