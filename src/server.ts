import { randomUUID } from 'node:crypto';

import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import type { Config } from './config/index.js';
import { createLedger } from './ledger/factory.js';
import type { ReceiverRegistry } from './ledger/receivers.js';
import { callerIdentityPlugin } from './plugins/caller-identity.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { requestLoggerPlugin } from './plugins/request-logger.js';
import { approvalRoutesPlugin } from './routes/approvals.js';
import { assetRoutesPlugin } from './routes/assets.js';
import { balanceRoutesPlugin } from './routes/balances.js';
import { eventRoutesPlugin } from './routes/events.js';
import { healthRoutesPlugin } from './routes/health.js';
import { supplyRoutesPlugin } from './routes/supply.js';
import { transferRoutesPlugin } from './routes/transfers.js';

// Import types to ensure augmentation is loaded
import './types/index.js';

export interface CreateServerOptions {
  config: Config;
  /** Programmatic holders registered in code, in addition to those in config. */
  receivers?: ReceiverRegistry;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    logger: {
      level: config.logging.level,
      transport: config.logging.pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    },
    // Request ID handling
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    // Disable default request logging (we use custom plugin)
    disableRequestLogging: true,
    // Batch bodies top out well below this
    bodyLimit: 262144,
  });

  // Zod type provider compilers (enables Zod schemas in route schema declarations)
  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  server.decorate('config', config);

  // Security headers
  await server.register(helmet, {
    global: true,
    contentSecurityPolicy: isDev ? false : undefined,
  });

  await server.register(rateLimit, {
    max: config.rateLimit.global,
    timeWindow: config.rateLimit.windowMs,
  });

  // CORS - permissive in dev, restrictive in prod
  await server.register(cors, {
    origin: isDev ? true : false,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID', 'X-Caller'],
  });

  // Custom plugins
  await server.register(errorHandlerPlugin, { isDev });
  await server.register(requestLoggerPlugin, { isDev });

  // ---- OpenAPI documentation ----
  await server.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'Multi-Token Ledger',
        description:
          'Balances, approvals, transfers, mint and burn for numerically identified asset classes. ' +
          'Write routes act for the holder named in the x-caller header.',
        version: '1.0.0',
      },
      servers: [{ url: 'http://localhost:3000', description: 'Development' }],
      tags: [
        { name: 'Health', description: 'Server health' },
        { name: 'Assets', description: 'Asset class creation and records' },
        { name: 'Balances', description: 'Balance queries' },
        { name: 'Approvals', description: 'Operator approvals' },
        { name: 'Transfers', description: 'Holder-initiated transfers' },
        { name: 'Supply', description: 'Mint and burn (ledger owner only)' },
        { name: 'Events', description: 'Committed ledger notifications' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // ---- Ledger initialization ----
  const ledger = createLedger(config.ledger, server.log.child({ component: 'ledger' }), {
    receivers: options.receivers,
  });
  server.decorate('ledger', ledger);
  server.log.info(
    { owner: ledger.owner, receivers: config.ledger.receivers.length },
    'Ledger layer initialized'
  );

  await server.register(callerIdentityPlugin);

  // Routes
  await server.register(healthRoutesPlugin);
  await server.register(assetRoutesPlugin);
  await server.register(balanceRoutesPlugin);
  await server.register(approvalRoutesPlugin);
  await server.register(transferRoutesPlugin);
  await server.register(supplyRoutesPlugin);
  await server.register(eventRoutesPlugin);

  return server;
}
