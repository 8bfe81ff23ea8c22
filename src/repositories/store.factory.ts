import { WarehouseConfig } from '../core/config.types';
import { logger } from '../core/logger';
import { MemoryInventoryStore } from './memory.store';
import { runMigrations } from './migrations';
import { PostgresInventoryStore } from './postgres.store';
import { InventoryStore } from './store.types';

/**
 * Build the one store handle the process shares.
 */
export async function createStore(cfg: WarehouseConfig): Promise<InventoryStore> {
  if (cfg.DB_DRIVER === 'memory') {
    logger.warn('Using in-memory inventory store; data is lost on restart');
    return new MemoryInventoryStore();
  }

  const store = new PostgresInventoryStore({
    host: cfg.DB_HOST,
    port: cfg.DB_PORT,
    user: cfg.DB_USER,
    password: cfg.DB_PASSWORD,
    database: cfg.DB_NAME,
    poolMax: cfg.DB_POOL_MAX,
    connectTimeoutMs: cfg.DB_CONNECT_TIMEOUT_MS,
  });

  if (cfg.DB_MIGRATE) {
    try {
      const report = await runMigrations(store.pool);
      logger.info(report, 'Schema migrations finished');
    } catch (error) {
      await store.close();
      throw error;
    }
  }

  return store;
}
