import { ExecutionContext } from '../core/context';
import { ArticleId, ProductAvailability, ProductName, StockRecord } from '../core/types';

/**
 * One open transaction against the inventory store. Every method maps to one
 * statement of the query set. After commit or rollback the transaction is
 * finished: further statements throw, a second rollback is a no-op.
 */
export interface StoreTransaction {
  listStock(): Promise<StockRecord[]>;
  listProductAvailability(): Promise<ProductAvailability[]>;
  /** Number of composition rows registered for the product; 0 when unknown. */
  productExists(productName: ProductName): Promise<number>;
  /** Number of composition articles whose stock is below the required amount; 0 when sellable. */
  productInStock(productName: ProductName): Promise<number>;
  /** Lock the product's stock rows until the transaction finishes. */
  lockStockForProduct(productName: ProductName): Promise<void>;
  decrementStockForProduct(productName: ProductName): Promise<void>;
  /** Register a product name; fails when the name is already registered. */
  insertProduct(productName: ProductName): Promise<void>;
  /** Append a composition row; the product must be registered first. */
  insertComposition(productName: ProductName, artId: ArticleId, amountOf: number): Promise<void>;
  insertStock(artId: ArticleId, name: string, stock: number): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface InventoryStore {
  /** Resolves when the backing store answers. */
  ping(): Promise<void>;
  begin(context: ExecutionContext): Promise<StoreTransaction>;
  close(): Promise<void>;
}

export class TransactionFinishedError extends Error {
  constructor() {
    super('Transaction has already been committed or rolled back');
    this.name = 'TransactionFinishedError';
  }
}
