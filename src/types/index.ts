// Fastify type augmentation

import type { Config } from '../config/index.js';
import type { Ledger, LedgerSession } from '../ledger/ledger.js';

declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    ledger: Ledger;
  }

  interface FastifyRequest {
    /** Session for the x-caller holder. Throws CALLER_MISSING / CALLER_INVALID. */
    ledgerSession(): LedgerSession;
  }
}
