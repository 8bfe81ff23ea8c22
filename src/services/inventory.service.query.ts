import { ExecutionContext } from '../core/context';
import { ConnectivityError, QueryError } from '../core/errors';
import { logger } from '../core/logger';
import { ProductAvailability, StockRecord } from '../core/types';
import { InventoryStore } from '../repositories/store.types';
import { runInTransaction } from './inventory.service.transaction';

/**
 * Availability values that are not plain integers count as zero.
 */
export function parseAvailability(value: string): number {
  return /^[+-]?\d+$/.test(value) ? Number(value) : 0;
}

export class InventoryQueryService {
  constructor(private readonly store: InventoryStore) {}

  async ping(): Promise<void> {
    logger.debug('Ping entry');
    try {
      await this.store.ping();
    } catch (error) {
      logger.error({ error }, 'Inventory store ping failed');
      throw ConnectivityError.unreachable(error);
    }
  }

  async getInventory(context: ExecutionContext): Promise<StockRecord[]> {
    const log = logger.child({ rid: context.requestId, operation: 'GetInventory' });
    log.debug('GetInventory entry');

    const stocks = await runInTransaction(
      { store: this.store, context, log, operation: 'GetInventory' },
      'read',
      (cause) => QueryError.failed('GetInventory', cause),
      (tx) => tx.listStock()
    );

    log.debug({ count: stocks.length }, 'GetInventory returns the stocks');
    return stocks;
  }

  async getProductStock(context: ExecutionContext): Promise<ProductAvailability[]> {
    const log = logger.child({ rid: context.requestId, operation: 'GetProductStock' });
    log.debug('GetProductStock entry');

    const rows = await runInTransaction(
      { store: this.store, context, log, operation: 'GetProductStock' },
      'read',
      (cause) => QueryError.failed('GetProductStock', cause),
      (tx) => tx.listProductAvailability()
    );

    const available = rows.filter((row) => parseAvailability(row.available) !== 0);
    log.debug({ count: available.length, total: rows.length }, 'GetProductStock returns the products');
    return available;
  }
}
