import { defaultConfigPath, loadConfig } from './config/index.js';
import { initSentry } from './instrument.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  // Fails fast on a missing or invalid config file
  const configPath = defaultConfigPath();
  const config = loadConfig(configPath);

  const server = await createServer({ config });
  initSentry(config.sentry, server.log);
  server.log.info(
    { configPath, env: config.env, owner: server.ledger.owner },
    'Ledger service configured'
  );

  try {
    const address = await server.listen({
      host: config.server.host,
      port: config.server.port,
    });
    server.log.info({ address, docs: `${address}/docs` }, 'Ledger service listening');
  } catch (err) {
    server.log.error(err, 'Failed to start server');
    process.exit(1);
  }

  // State lives in memory only; closing drops it.
  const shutdown = async (signal: string): Promise<void> => {
    server.log.info(
      { signal, lastEventSequence: server.ledger.events.lastSequence },
      'Shutting down ledger service'
    );
    await server.close();
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
