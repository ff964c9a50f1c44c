// Ledger construction from validated configuration.

import type { FastifyBaseLogger } from 'fastify';

import { Ledger } from './ledger.js';
import { ReceiverRegistry, VaultReceiver } from './receivers.js';
import type { LedgerConfig } from '../config/index.js';

export interface CreateLedgerOptions {
  /** Registry to populate; programmatic holders registered in code go here. */
  receivers?: ReceiverRegistry;
}

export function createLedger(
  config: LedgerConfig,
  logger: FastifyBaseLogger,
  options: CreateLedgerOptions = {}
): Ledger {
  const receivers = options.receivers ?? new ReceiverRegistry();

  for (const receiver of config.receivers) {
    receivers.register(
      receiver.address,
      new VaultReceiver({ acceptedAssets: receiver.acceptedAssets, reason: receiver.reason })
    );
    logger.debug({ address: receiver.address }, 'Programmatic holder registered from config');
  }

  return Ledger.initialize({
    owner: config.owner,
    logger,
    receivers,
    eventLogCapacity: config.eventLogCapacity,
  });
}
