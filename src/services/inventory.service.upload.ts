import { ExecutionContext } from '../core/context';
import { WriteError } from '../core/errors';
import { logger } from '../core/logger';
import { Inventory, ProductName, Products, toCompositionEntries } from '../core/types';
import { InventoryStore } from '../repositories/store.types';
import { runInTransaction } from './inventory.service.transaction';

function findDuplicateName(products: Products): ProductName | undefined {
  const seen = new Set<ProductName>();
  for (const product of products.products) {
    if (seen.has(product.name)) {
      return product.name;
    }
    seen.add(product.name);
  }
  return undefined;
}

export class InventoryUploadService {
  constructor(private readonly store: InventoryStore) {}

  /**
   * Register every product of the batch with its composition rows, or none of
   * them. Products are immutable: a name seen twice in the batch, or one that
   * is already registered, fails the whole upload.
   */
  async uploadProducts(context: ExecutionContext, products: Products): Promise<number> {
    const log = logger.child({ rid: context.requestId, operation: 'UploadProducts' });
    log.debug({ products: products.products.length }, 'UploadProducts entry');

    const duplicate = findDuplicateName(products);
    if (duplicate !== undefined) {
      log.info({ productName: duplicate }, 'Product appears more than once in the upload');
      throw WriteError.duplicateProduct('UploadProducts', duplicate);
    }
    const entries = toCompositionEntries(products);

    await runInTransaction(
      { store: this.store, context, log, operation: 'UploadProducts' },
      'write',
      (cause) => WriteError.failed('UploadProducts', cause),
      async (tx) => {
        for (const product of products.products) {
          if ((await tx.productExists(product.name)) !== 0) {
            log.info({ productName: product.name }, 'Product is already registered');
            throw WriteError.productRegistered('UploadProducts', product.name);
          }
          await tx.insertProduct(product.name);
        }

        for (const entry of entries) {
          try {
            await tx.insertComposition(entry.productName, entry.artId, entry.amountOf);
          } catch (error) {
            log.error({ error, entry }, 'Failed to insert composition row');
            throw error;
          }
        }
      }
    );

    const inserted = products.products.length;
    log.debug({ inserted, rows: entries.length }, 'UploadProducts uploaded products');
    return inserted;
  }

  /**
   * Store every stock entry of the batch, or none of them.
   */
  async uploadInventory(context: ExecutionContext, inventory: Inventory): Promise<number> {
    const log = logger.child({ rid: context.requestId, operation: 'UploadInventory' });
    log.debug({ items: inventory.inventory.length }, 'UploadInventory entry');

    await runInTransaction(
      { store: this.store, context, log, operation: 'UploadInventory' },
      'write',
      (cause) => WriteError.failed('UploadInventory', cause),
      async (tx) => {
        for (const item of inventory.inventory) {
          try {
            await tx.insertStock(item.artId, item.name, item.stock);
          } catch (error) {
            log.error({ error, item }, 'Failed to insert stock row');
            throw error;
          }
        }
      }
    );

    const inserted = inventory.inventory.length;
    log.debug({ inserted }, 'UploadInventory uploaded stock');
    return inserted;
  }
}
