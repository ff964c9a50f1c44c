import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';

import { serializeEvent } from '../ledger/events.js';
import { EventsQuerySchema, EventsResponseSchema } from '../sdk/types.js';

const eventRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.get(
    '/events',
    {
      schema: {
        description:
          'Committed ledger notifications after the given sequence number. ' +
          'Only the most recent entries are retained (ledger.eventLogCapacity).',
        tags: ['Events'],
        querystring: EventsQuerySchema,
        response: { 200: EventsResponseSchema },
      },
    },
    async (request, reply) => {
      const { after, limit } = request.query;
      const log = fastify.ledger.events;
      return reply.status(200).send({
        events: log
          .list({ after, limit })
          .map((entry) => ({ sequence: entry.sequence, event: serializeEvent(entry.event) })),
        lastSequence: log.lastSequence,
      });
    }
  );

  done();
};

export const eventRoutesPlugin = fp(eventRoutes, {
  name: 'event-routes',
  fastify: '5.x',
});
