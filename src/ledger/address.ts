import { z } from 'zod';

/**
 * 20-byte holder address, `0x` + 40 hex digits, normalized to lower case so
 * that map lookups never depend on checksum casing.
 */
export const HolderSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, 'must be a 0x-prefixed 20-byte hex address')
  .transform((value) => value.toLowerCase())
  .brand<'Holder'>();

export type Holder = z.infer<typeof HolderSchema>;

/** Reserved sentinel: unset creator, mint source, burn destination. */
export const ZERO_ADDRESS: Holder = HolderSchema.parse(
  '0x0000000000000000000000000000000000000000'
);

/** Parse and normalize an address, throwing a ZodError when malformed. */
export function toHolder(value: string): Holder {
  return HolderSchema.parse(value);
}

export function isZeroAddress(holder: Holder): boolean {
  return holder === ZERO_ADDRESS;
}

/** Hex byte string passed through to receipt hooks untouched. */
export const HexDataSchema = z
  .string()
  .regex(/^0x([0-9a-fA-F]{2})*$/, 'must be 0x-prefixed hex bytes')
  .default('0x');
