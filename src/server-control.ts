import { Server } from 'http';
import { Application } from 'express';
import { logger } from './core/logger';
import { InventoryStore } from './repositories/store.types';

let server: Server | null = null;
let activeStore: InventoryStore | null = null;
let isShuttingDown = false;

/**
 * Start listening; the store is closed again by stopServer
 */
export function startServer(app: Application, store: InventoryStore, port: number): Promise<Server> {
  if (server) {
    return Promise.reject(new Error('Server is already started'));
  }

  return new Promise((resolve, reject) => {
    const listening = app.listen(port, () => {
      logger.info({ port }, `Server running on port ${port}`);
      resolve(listening);
    });
    server = listening;
    activeStore = store;

    listening.on('error', (error) => {
      logger.error({ error }, 'Server error');
      server = null;
      activeStore = null;
      reject(error);
    });
  });
}

/**
 * Stop accepting connections, wait for in-flight requests, then close the store
 */
export async function stopServer(): Promise<void> {
  const current = server;
  if (!current || isShuttingDown) {
    return;
  }

  isShuttingDown = true;
  logger.info('Starting graceful shutdown');

  try {
    await new Promise<void>((resolve, reject) => {
      current.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('Server stopped accepting new connections');

    if (activeStore) {
      await activeStore.close();
      logger.info('Inventory store closed');
    }
    logger.info('Graceful shutdown completed');
  } finally {
    server = null;
    activeStore = null;
    isShuttingDown = false;
  }
}

export function isServerRunning(): boolean {
  return server !== null && !isShuttingDown;
}
