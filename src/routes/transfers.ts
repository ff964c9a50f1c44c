// Transfer routes -- caller moves its own balances or acts as an approved operator.
//
// Transfers into programmatic holders run the receipt check before the
// response is written; a refused receipt surfaces as a 422 with the reason.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';

import {
  OperationResponseSchema,
  TransferBatchRequestSchema,
  TransferRequestSchema,
} from '../sdk/types.js';

const transferRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.post(
    '/transfers',
    {
      schema: {
        tags: ['Transfers'],
        body: TransferRequestSchema,
        response: { 200: OperationResponseSchema },
      },
    },
    async (request, reply) => {
      const { from, to, id, amount, data } = request.body;
      request.ledgerSession().transfer(from, to, id, amount, data);
      return reply.status(200).send({ success: true as const });
    }
  );

  app.post(
    '/transfers/batch',
    {
      schema: {
        description: 'All-or-nothing multi-asset transfer',
        tags: ['Transfers'],
        body: TransferBatchRequestSchema,
        response: { 200: OperationResponseSchema },
      },
    },
    async (request, reply) => {
      const { from, to, ids, amounts, data } = request.body;
      request.ledgerSession().transferBatch(from, to, ids, amounts, data);
      return reply.status(200).send({ success: true as const });
    }
  );

  done();
};

export const transferRoutesPlugin = fp(transferRoutes, {
  name: 'transfer-routes',
  fastify: '5.x',
});
