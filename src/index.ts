import { loadConfig } from './config/index.js';
import { ServerStartError } from './errors/index.js';
import { initSentry } from './instrument.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  // Load and validate config (fails fast if invalid, including a missing codecKey)
  const config = loadConfig();

  initSentry(
    config.sentry?.dsn,
    config.sentry?.environment ?? config.env,
    config.sentry?.tracesSampleRate
  );

  // Create server (connects and initializes the file store)
  const server = await createServer({ config });

  // Start listening
  try {
    const address = await server.listen({
      host: config.server.host,
      port: config.server.port,
    });
    server.log.info(`Server listening at ${address}`);
  } catch (err) {
    server.log.error(
      new ServerStartError(err instanceof Error ? err.message : 'Unknown error'),
      'Failed to start server'
    );
    await server.close();
    process.exit(1);
  }

  // Graceful shutdown (onClose disconnects the file store)
  const shutdown = async (signal: string) => {
    server.log.info(`Received ${signal}, shutting down...`);
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
