import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';

import {
  ApprovalParamsSchema,
  ApprovalRequestSchema,
  ApprovalResponseSchema,
  OperationResponseSchema,
} from '../sdk/types.js';

const approvalRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.put(
    '/approvals',
    {
      schema: {
        description: 'Grant or revoke an operator for all of the caller\'s balances',
        tags: ['Approvals'],
        body: ApprovalRequestSchema,
        response: { 200: OperationResponseSchema },
      },
    },
    async (request, reply) => {
      const { operator, approved } = request.body;
      request.ledgerSession().setApprovalForAll(operator, approved);
      return reply.status(200).send({ success: true as const });
    }
  );

  app.get(
    '/approvals/:owner/:operator',
    {
      schema: {
        tags: ['Approvals'],
        params: ApprovalParamsSchema,
        response: { 200: ApprovalResponseSchema },
      },
    },
    async (request, reply) => {
      const { owner, operator } = request.params;
      return reply.status(200).send({
        owner,
        operator,
        approved: fastify.ledger.approvals.isApprovedForAll(owner, operator),
      });
    }
  );

  done();
};

export const approvalRoutesPlugin = fp(approvalRoutes, {
  name: 'approval-routes',
  fastify: '5.x',
});
