import { loadConfig } from './utils/config.js';
import { StorageSession } from './services/storage-session.js';
import { createRemoteBackendFactory, LocalFileBackend } from './storage/index.js';
import { buildApp } from './api/app.js';
import logger from './utils/logger.js';

async function main() {
  // Load configuration
  const config = loadConfig();

  if (!config.apiKey) {
    logger.warn('API_KEY is not set; note routes are unprotected');
  }

  const local = new LocalFileBackend(config.storage.localFile);
  logger.info({ localFile: local.location, provider: config.storage.provider }, 'Initialized storage backends');

  const session = new StorageSession({
    local,
    remoteFactory: createRemoteBackendFactory(config.storage),
    provider: config.storage.provider,
  });

  if (config.storage.setupBucket) {
    const result = await session.setup(config.storage.setupBucket);
    if (result.ok) {
      logger.info({ ...result.value }, 'Startup setup finished');
    } else {
      logger.error({ error: result.error }, 'Startup setup failed');
    }
  }

  // Initialize Fastify server
  const app = await buildApp(session, config);

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
    await app.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  logger.error({ error }, 'Fatal error');
  process.exit(1);
});
