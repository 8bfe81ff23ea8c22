import { ExecutionContext } from '../core/context';
import { Inventory, ProductAvailability, ProductName, Products, StockRecord } from '../core/types';
import { InventoryStore } from '../repositories/store.types';
import { InventoryQueryService } from './inventory.service.query';
import { ProductSaleService } from './inventory.service.sell';
import { InventoryEngine } from './inventory.service.types';
import { InventoryUploadService } from './inventory.service.upload';

// Stateless between calls; the store handle is the only shared resource
class InventoryEngineImpl implements InventoryEngine {
  private readonly queryService: InventoryQueryService;
  private readonly uploadService: InventoryUploadService;
  private readonly saleService: ProductSaleService;

  constructor(store: InventoryStore) {
    this.queryService = new InventoryQueryService(store);
    this.uploadService = new InventoryUploadService(store);
    this.saleService = new ProductSaleService(store);
  }

  ping(): Promise<void> {
    return this.queryService.ping();
  }

  getInventory(context: ExecutionContext): Promise<StockRecord[]> {
    return this.queryService.getInventory(context);
  }

  getProductStock(context: ExecutionContext): Promise<ProductAvailability[]> {
    return this.queryService.getProductStock(context);
  }

  uploadProducts(context: ExecutionContext, products: Products): Promise<number> {
    return this.uploadService.uploadProducts(context, products);
  }

  uploadInventory(context: ExecutionContext, inventory: Inventory): Promise<number> {
    return this.uploadService.uploadInventory(context, inventory);
  }

  sellProduct(context: ExecutionContext, productName: ProductName): Promise<void> {
    return this.saleService.sellProduct(context, productName);
  }
}

export function createInventoryEngine(store: InventoryStore): InventoryEngine {
  return new InventoryEngineImpl(store);
}
