/**
 * Tariffline API - Entry Point
 */
import { logger } from '@tariffline/core';
import { buildApp } from './app.js';
import { loadConfig, loadEnvFile } from './config.js';

loadEnvFile();

async function bootstrap() {
  const config = loadConfig();
  const app = await buildApp(config);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    await app.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: config.port, host: config.host });
  logger.info({ port: config.port, outputDir: config.outputDir }, 'API server started');
}

bootstrap().catch((error) => {
  logger.fatal({ error }, 'Failed to start API server');
  process.exit(1);
});
