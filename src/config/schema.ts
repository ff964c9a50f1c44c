import { z } from 'zod';

import { HolderSchema, isZeroAddress } from '../ledger/address.js';
import { DEFAULT_EVENT_LOG_CAPACITY } from '../ledger/ledger.js';
import { Uint256StringSchema } from '../ledger/uint256.js';

/** A programmatic holder declared in config, backed by a VaultReceiver. */
export const ReceiverConfigSchema = z.object({
  address: HolderSchema,
  /** Asset ids (decimal strings) the receiver accepts. Omit to accept all. */
  acceptedAssets: z.array(Uint256StringSchema).optional(),
  /** Revert reason for refused assets */
  reason: z.string().min(1).default('vault: asset not accepted'),
});

export const LedgerConfigSchema = z.object({
  /** Ledger authority: the only caller allowed to create assets, mint and burn */
  owner: HolderSchema.refine((owner) => !isZeroAddress(owner), 'must not be the zero address'),
  /** Committed notifications retained for GET /events */
  eventLogCapacity: z.number().int().min(1).default(DEFAULT_EVENT_LOG_CAPACITY),
  receivers: z.array(ReceiverConfigSchema).default([]),
});

export const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(3000),
    })
    .default(() => ({ host: '0.0.0.0', port: 3000 })),

  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default(() => ({ level: 'info' as const, pretty: false })),

  // Optional Sentry integration
  sentry: z
    .object({
      dsn: z.string().url(),
      environment: z.string().default('development'),
      tracesSampleRate: z.number().min(0).max(1).default(0.1),
    })
    .optional(),

  // Environment mode
  env: z.enum(['development', 'production', 'test']).default('development'),

  // Rate limiting configuration
  rateLimit: z
    .object({
      global: z.number().int().min(1).default(100),
      windowMs: z.number().int().min(1000).default(60000),
    })
    .default(() => ({ global: 100, windowMs: 60000 })),

  ledger: LedgerConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;
export type ReceiverConfig = z.infer<typeof ReceiverConfigSchema>;
