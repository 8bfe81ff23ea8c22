import { z } from 'zod';

// Base types
export type ArticleId = string;
export type ProductName = string;

// Stock and amounts travel as decimal text
const QUANTITY_PATTERN = /^\d+$/;

const QuantitySchema = z
  .union([z.number().int().min(0), z.string().trim().regex(QUANTITY_PATTERN, 'must be a non-negative integer')])
  .transform((value) => (typeof value === 'number' ? value : Number(value)))
  .refine((value) => Number.isSafeInteger(value), 'must be a safe integer');

export const ArticleIdSchema = z.string().trim().min(1).max(64);
export const ProductNameSchema = z.string().trim().min(1).max(128);

// Read projection of an article
export interface StockRecord {
  artId: ArticleId;
  name: string;
  stock: string;
}

// Derived per-product sellable flag, as reported by the store
export interface ProductAvailability {
  name: ProductName;
  available: string;
}

export interface ArticleAmount {
  artId: ArticleId;
  amountOf: number;
}

export interface Product {
  name: ProductName;
  containArticles: ArticleAmount[];
}

// One (product, article, amount) row of the composition table
export interface ProductCompositionEntry {
  productName: ProductName;
  artId: ArticleId;
  amountOf: number;
}

// Stock entry of an inventory upload
export interface InventoryItem {
  artId: ArticleId;
  name: string;
  stock: number;
}

export interface Products {
  products: Product[];
}

export interface Inventory {
  inventory: InventoryItem[];
}

// Wire schemas: snake_case on the wire, camelCase in the domain
export const ArticleAmountSchema = z
  .object({
    art_id: ArticleIdSchema,
    amount_of: QuantitySchema.refine((value) => value > 0, 'must be greater than zero'),
  })
  .transform((value): ArticleAmount => ({ artId: value.art_id, amountOf: value.amount_of }));

export const ProductSchema = z
  .object({
    name: ProductNameSchema,
    contain_articles: z.array(ArticleAmountSchema).min(1),
  })
  .transform((value): Product => ({ name: value.name, containArticles: value.contain_articles }));

export const ProductsPayloadSchema = z.object({
  products: z.array(ProductSchema).superRefine((products, ctx) => {
    const seen = new Set<ProductName>();
    products.forEach((product, index) => {
      if (seen.has(product.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'name'],
          message: `Product ${product.name} appears more than once`,
        });
      }
      seen.add(product.name);
    });
  }),
});

export const InventoryItemSchema = z
  .object({
    art_id: ArticleIdSchema,
    name: z.string().trim().min(1).max(128),
    stock: QuantitySchema,
  })
  .transform((value): InventoryItem => ({ artId: value.art_id, name: value.name, stock: value.stock }));

export const InventoryPayloadSchema = z.object({
  inventory: z.array(InventoryItemSchema),
});

export const SellParamsSchema = z.object({
  productName: ProductNameSchema,
});

// API Response DTOs
export interface SuccessResponse<T = undefined> {
  success: true;
  data?: T;
  message?: string;
  count?: number;
}

export interface ErrorResponse {
  success: false;
  error: {
    name: string;
    message: string;
    code: string;
    statusCode: number;
    timestamp: string;
    details?: Record<string, unknown>;
    stack?: string;
  };
}

/**
 * Flatten a products upload into the rows the composition table stores.
 */
export function toCompositionEntries(products: Products): ProductCompositionEntry[] {
  return products.products.flatMap((product) =>
    product.containArticles.map((article) => ({
      productName: product.name,
      artId: article.artId,
      amountOf: article.amountOf,
    }))
  );
}
