import { createApp } from './app.js';
import { config } from './config.js';
import { db } from './db/connection.js';
import { logger } from './logger.js';

async function main(): Promise<void> {
  const app = await createApp();

  await app.listen({ port: config.port, host: '0.0.0.0' });
  logger.info(
    { port: config.port, transport: config.inference.transport, endpoint: config.inference.endpointUrl },
    'Claim audit backend listening',
  );

  function shutdown(signal: string) {
    logger.info({ signal }, 'Shutting down gracefully');
    Promise.all([app.close(), db.destroy()])
      .then(() => {
        logger.info('Server closed');
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      });
  }

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
