// 256-bit unsigned integer helpers for asset ids and amounts.
//
// Values are plain bigints; the range is enforced at every boundary where a
// value enters the ledger (HTTP schemas, adjust, createAsset).

import { z } from 'zod';

import { AmountOutOfRangeError } from './errors.js';

/** Identifier of one token class. */
export type AssetId = bigint;

/** Token quantity. Never observably negative. */
export type Amount = bigint;

export const MAX_UINT256 = (1n << 256n) - 1n;

export function isUint256(value: bigint): boolean {
  return value >= 0n && value <= MAX_UINT256;
}

/** Throw AmountOutOfRange unless `value` fits in 256 unsigned bits. */
export function assertUint256(value: bigint): void {
  if (!isUint256(value)) {
    throw new AmountOutOfRangeError();
  }
}

/**
 * Decimal string -> bigint, restricted to the uint256 range.
 * JSON has no bigint, so every id and amount travels as a decimal string.
 */
export const Uint256StringSchema = z
  .string()
  .regex(/^\d{1,78}$/, 'must be a non-negative decimal integer')
  .transform((value) => BigInt(value))
  .refine(isUint256, 'must not exceed 2^256 - 1');
