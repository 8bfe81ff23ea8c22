import { Router, NextFunction, Request, Response } from 'express';
import { OutOfStockError, ProductNotFoundError } from '../core/errors';
import { logger } from '../core/logger';
import {
  Inventory,
  InventoryPayloadSchema,
  ProductAvailability,
  Products,
  ProductsPayloadSchema,
  SellParamsSchema,
  StockRecord,
  SuccessResponse,
} from '../core/types';
import { validateBody, validateParams } from '../middleware/validate';
import { InventoryEngine } from '../services/inventory.service';
import {
  incrementInventoryReads,
  incrementInventoryUploads,
  incrementProductStockReads,
  incrementProductUploads,
  incrementRejectedSales,
  incrementSales,
} from '../utils/metrics';

export const NO_PRODUCT_IN_STOCK = 'No product in stock';

export function createWarehouseRoutes(engine: InventoryEngine): Router {
  const router = Router();

  // GET /inventory
  router.get('/inventory', async (req: Request, res: Response, next: NextFunction) => {
    try {
      logger.debug({ req: { id: req.id } }, 'Get inventory requested');
      const stocks = await engine.getInventory(req.ctx);
      incrementInventoryReads();

      const body: SuccessResponse<StockRecord[]> = { success: true, data: stocks };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  // GET /product
  router.get('/product', async (req: Request, res: Response, next: NextFunction) => {
    try {
      logger.debug({ req: { id: req.id } }, 'Get product stock requested');
      const products = await engine.getProductStock(req.ctx);
      incrementProductStockReads();

      const body: SuccessResponse<ProductAvailability[]> =
        products.length === 0
          ? { success: true, data: [], message: NO_PRODUCT_IN_STOCK }
          : { success: true, data: products };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  // POST /product (upload product definitions)
  router.post('/product',
    validateBody(ProductsPayloadSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const products: Products = req.body;
        logger.info({ req: { id: req.id }, products: products.products.length }, 'Upload products requested');

        const inserted = await engine.uploadProducts(req.ctx, products);
        incrementProductUploads();

        const body: SuccessResponse = { success: true, message: `${inserted} product inserted`, count: inserted };
        res.json(body);
      } catch (error) {
        next(error);
      }
    }
  );

  // POST /inventory (upload stock)
  router.post('/inventory',
    validateBody(InventoryPayloadSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const inventory: Inventory = req.body;
        logger.info({ req: { id: req.id }, items: inventory.inventory.length }, 'Upload inventory requested');

        const inserted = await engine.uploadInventory(req.ctx, inventory);
        incrementInventoryUploads();

        const body: SuccessResponse = { success: true, message: `${inserted} item inserted`, count: inserted };
        res.json(body);
      } catch (error) {
        next(error);
      }
    }
  );

  // POST /product/:productName (sell one unit)
  router.post('/product/:productName',
    validateParams(SellParamsSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      const { productName } = req.params;
      try {
        logger.info({ req: { id: req.id }, productName }, 'Sell product requested');

        await engine.sellProduct(req.ctx, productName);
        incrementSales();

        const body: SuccessResponse = {
          success: true,
          message: `Product ${productName} is sold and inventory is updated accordingly`,
        };
        res.json(body);
      } catch (error) {
        if (error instanceof ProductNotFoundError || error instanceof OutOfStockError) {
          incrementRejectedSales();
        }
        next(error);
      }
    }
  );

  return router;
}
