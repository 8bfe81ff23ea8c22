import { ExecutionContext } from '../core/context';
import { Inventory, ProductAvailability, ProductName, Products, StockRecord } from '../core/types';

// States a sale moves through; any failure ends in RolledBack
export type SalePhase =
  | 'Started'
  | 'ExistenceChecked'
  | 'StockChecked'
  | 'Decremented'
  | 'Committed'
  | 'RolledBack';

export interface InventoryEngine {
  /** Liveness check; rejects with ConnectivityError when the store is unreachable. */
  ping(): Promise<void>;

  getInventory(context: ExecutionContext): Promise<StockRecord[]>;

  /** Products whose availability does not parse as zero. */
  getProductStock(context: ExecutionContext): Promise<ProductAvailability[]>;

  /** Resolves with the number of products stored. */
  uploadProducts(context: ExecutionContext, products: Products): Promise<number>;

  /** Resolves with the number of stock entries stored. */
  uploadInventory(context: ExecutionContext, inventory: Inventory): Promise<number>;

  sellProduct(context: ExecutionContext, productName: ProductName): Promise<void>;
}
