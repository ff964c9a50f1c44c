import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import type { Ledger } from '../ledger/ledger.js';

// Read version once at startup (not on every request)
const packageJson = JSON.parse(readFileSync(resolve(process.cwd(), 'package.json'), 'utf-8')) as {
  version: string;
};
const APP_VERSION = packageJson.version;

interface LedgerStatus {
  owner: string;
  assets: number;
  lastAssetId: string;
  lastEventSequence: number;
}

interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  version: string;
  uptime: number;
  ledger: LedgerStatus;
}

function ledgerStatus(ledger: Ledger): LedgerStatus {
  return {
    owner: ledger.owner,
    assets: ledger.identities.count,
    lastAssetId: ledger.identities.lastAssetId.toString(),
    lastEventSequence: ledger.events.lastSequence,
  };
}

// The ledger is in-process with no external dependencies, so a response at
// all means healthy.
const healthRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    { schema: { tags: ['Health'] } },
    async (_request, reply) => {
      const response: HealthResponse = {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: APP_VERSION,
        uptime: process.uptime(),
        ledger: ledgerStatus(fastify.ledger),
      };

      return reply.status(200).send(response);
    }
  );

  done();
};

export const healthRoutesPlugin = fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
