import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Caller identity errors (CALLER_*)

/** Write route called without the x-caller header (401) */
export const CallerMissingError = createError(
  'CALLER_MISSING',
  'Missing x-caller header',
  401
);

/** x-caller header is not a 20-byte hex address (401) */
export const CallerInvalidError = createError<[string]>(
  'CALLER_INVALID',
  'Invalid x-caller header: %s',
  401
);

// Ledger errors (LEDGER_*) - re-exported from ledger domain
export {
  ZeroRecipientError,
  ZeroSourceError,
  ZeroAddressQueryError,
  UnauthorizedError,
  SelfApprovalError,
  LengthMismatchError,
  InsufficientBalanceError,
  BurnExceedsBalanceError,
  BalanceOverflowError,
  AmountOutOfRangeError,
  RejectedBySelectorError,
  ReceiverRevertedError,
  NotAReceiverError,
  CalleePanickedError,
  NonexistentAssetError,
  LedgerInternalError,
  isLedgerError,
} from '../ledger/errors.js';
