import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';

import {
  BalanceBatchRequestSchema,
  BalanceBatchResponseSchema,
  BalanceParamsSchema,
  BalanceResponseSchema,
} from '../sdk/types.js';

// Balance reads need no caller: they go straight to the shared BalanceLedger.
const balanceRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.get(
    '/balances/:asset/:holder',
    {
      schema: {
        description: 'Balance of one holder in one asset. The zero address is rejected.',
        tags: ['Balances'],
        params: BalanceParamsSchema,
        response: { 200: BalanceResponseSchema },
      },
    },
    async (request, reply) => {
      const { asset, holder } = request.params;
      const balance = fastify.ledger.balances.balanceOf(asset, holder);
      return reply.status(200).send({ balance: balance.toString() });
    }
  );

  app.post(
    '/balances/batch',
    {
      schema: {
        description: 'Balances for holders[i] in assets[i]; both lists must be the same length',
        tags: ['Balances'],
        body: BalanceBatchRequestSchema,
        response: { 200: BalanceBatchResponseSchema },
      },
    },
    async (request, reply) => {
      const { holders, assets } = request.body;
      const balances = fastify.ledger.balances.balanceOfBatch(holders, assets);
      return reply.status(200).send({ balances: balances.map((b) => b.toString()) });
    }
  );

  done();
};

export const balanceRoutesPlugin = fp(balanceRoutes, {
  name: 'balance-routes',
  fastify: '5.x',
});
