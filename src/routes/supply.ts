// Mint and burn routes (ledger owner only).

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';

import {
  BurnBatchRequestSchema,
  BurnRequestSchema,
  MintBatchRequestSchema,
  MintRequestSchema,
  OperationResponseSchema,
} from '../sdk/types.js';

const supplyRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const response = { 200: OperationResponseSchema };

  app.post(
    '/mint',
    { schema: { tags: ['Supply'], body: MintRequestSchema, response } },
    async (request, reply) => {
      const { to, id, amount, data } = request.body;
      request.ledgerSession().mint(to, id, amount, data);
      return reply.status(200).send({ success: true as const });
    }
  );

  app.post(
    '/mint/batch',
    { schema: { tags: ['Supply'], body: MintBatchRequestSchema, response } },
    async (request, reply) => {
      const { to, ids, amounts, data } = request.body;
      request.ledgerSession().mintBatch(to, ids, amounts, data);
      return reply.status(200).send({ success: true as const });
    }
  );

  app.post(
    '/burn',
    { schema: { tags: ['Supply'], body: BurnRequestSchema, response } },
    async (request, reply) => {
      const { owner, id, amount } = request.body;
      request.ledgerSession().burn(owner, id, amount);
      return reply.status(200).send({ success: true as const });
    }
  );

  app.post(
    '/burn/batch',
    { schema: { tags: ['Supply'], body: BurnBatchRequestSchema, response } },
    async (request, reply) => {
      const { owner, ids, amounts } = request.body;
      request.ledgerSession().burnBatch(owner, ids, amounts);
      return reply.status(200).send({ success: true as const });
    }
  );

  done();
};

export const supplyRoutesPlugin = fp(supplyRoutes, {
  name: 'supply-routes',
  fastify: '5.x',
});
