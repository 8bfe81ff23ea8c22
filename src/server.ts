import { createApp } from './app';
import { config, getConfigSummary, validateConfig } from './core/config';
import { logger } from './core/logger';
import { createStore } from './repositories/store.factory';
import { startServer, stopServer } from './server-control';
import { createInventoryEngine } from './services/inventory.service';

async function main(): Promise<void> {
  const issues = validateConfig(config);
  if (issues.length > 0) {
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  logger.info(getConfigSummary(config), 'Configuration loaded');

  const store = await createStore(config);
  const engine = createInventoryEngine(store);
  const app = createApp(engine, { backendTimeoutMs: config.BACKEND_TIMEOUT_MS });

  await startServer(app, store, config.PORT);
}

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string) {
  logger.info(`${signal} received, starting graceful shutdown`);

  try {
    await stopServer();
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Error during graceful shutdown');
    process.exit(1);
  }
}

main().catch((error) => {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
});

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection, shutting down');
  void gracefulShutdown('unhandledRejection');
});
