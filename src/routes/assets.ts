// Asset class routes -- creation (owner only) and record lookup.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';

import {
  AssetParamsSchema,
  AssetResponseSchema,
  CreateAssetRequestSchema,
  CreateAssetResponseSchema,
} from '../sdk/types.js';

const assetRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.post(
    '/assets',
    {
      schema: {
        description:
          'Create an asset class, then mint its initial supply to initialHolder (owner only). ' +
          'The two steps are separate: a failed mint leaves the asset registered.',
        tags: ['Assets'],
        body: CreateAssetRequestSchema,
        response: { 201: CreateAssetResponseSchema },
      },
    },
    async (request, reply) => {
      const { initialHolder, initialSupply, label } = request.body;
      const session = request.ledgerSession();

      const id = session.createAsset(initialHolder, initialSupply, label);
      request.log.info({ id: id.toString(), creator: session.caller }, 'Asset class created');

      return reply.status(201).send({ id: id.toString() });
    }
  );

  app.get(
    '/assets/:id',
    {
      schema: {
        description: 'Creator, creation-time supply, live circulating supply and label',
        tags: ['Assets'],
        params: AssetParamsSchema,
        response: { 200: AssetResponseSchema },
      },
    },
    async (request, reply) => {
      const record = fastify.ledger.identities.get(request.params.id);
      return reply.status(200).send({
        id: record.id.toString(),
        creator: record.creator,
        totalSupply: record.totalSupply.toString(),
        circulatingSupply: fastify.ledger.balances.circulatingSupply(record.id).toString(),
        label: record.label,
      });
    }
  );

  done();
};

export const assetRoutesPlugin = fp(assetRoutes, {
  name: 'asset-routes',
  fastify: '5.x',
});
