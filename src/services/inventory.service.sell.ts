import { ExecutionContext } from '../core/context';
import { OutOfStockError, ProductNotFoundError, QueryError, WriteError } from '../core/errors';
import { logger } from '../core/logger';
import { ProductName } from '../core/types';
import { InventoryStore } from '../repositories/store.types';
import { runInTransaction } from './inventory.service.transaction';
import { SalePhase } from './inventory.service.types';

export class ProductSaleService {
  constructor(private readonly store: InventoryStore) {}

  /**
   * Check that the product exists and every article covers its amount, then
   * decrement all of them in one transaction.
   *
   * The product's stock rows are locked before the stock check, so a
   * concurrent sale touching the same articles waits for this one to finish
   * and then sees the decremented stock.
   */
  async sellProduct(context: ExecutionContext, productName: ProductName): Promise<void> {
    const log = logger.child({ rid: context.requestId, operation: 'SellProduct', productName });
    log.debug('SellProduct entry');

    let phase: SalePhase = 'Started';
    // Failures before the decrement are read failures
    const toError = (cause: unknown) =>
      phase === 'Started' || phase === 'ExistenceChecked'
        ? QueryError.failed('SellProduct', cause)
        : WriteError.failed('SellProduct', cause);

    try {
      await runInTransaction(
        { store: this.store, context, log, operation: 'SellProduct' },
        'write',
        toError,
        async (tx) => {
          const exists = await tx.productExists(productName);
          if (exists === 0) {
            log.info('Product is not found in system');
            throw new ProductNotFoundError(productName);
          }
          phase = 'ExistenceChecked';

          await tx.lockStockForProduct(productName);
          const missingArticles = await tx.productInStock(productName);
          if (missingArticles !== 0) {
            log.info({ missingArticles }, 'Product items are out of stock');
            throw new OutOfStockError(productName, missingArticles);
          }
          phase = 'StockChecked';

          await tx.decrementStockForProduct(productName);
          phase = 'Decremented';
        }
      );
    } catch (error) {
      const failedAt = phase;
      phase = 'RolledBack';
      log.debug({ failedAt, phase }, 'Sale rolled back');
      throw error;
    }

    phase = 'Committed';
    log.debug({ phase }, 'Product sold, inventory updated');
  }
}
