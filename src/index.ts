import { buildApp } from './app.js';
import { createNoteRepository } from './repositories/index.js';
import { loadConfig } from './utils/config.js';
import logger from './utils/logger.js';

const VERSION = process.env.npm_package_version || 'dev';

async function main() {
  // Load configuration
  const config = loadConfig();
  logger.level = config.logLevel;
  logger.info({ version: VERSION }, 'Starting notedrop');

  // Initialize note storage
  const repository = await createNoteRepository(config.storage);
  logger.info({ backend: repository.backend }, 'Note repository configured');

  // Initialize Fastify server
  const app = await buildApp({ repository, config });

  // Start server
  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });
    logger.info(
      { port: config.server.port, host: config.server.host },
      'Server started successfully'
    );
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    try {
      await app.close();
    } catch (error) {
      logger.error({ error }, 'Error while closing server');
    }
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  logger.error({ error }, 'Fatal error');
  process.exit(1);
});
