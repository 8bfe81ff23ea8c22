import { ExecutionContext } from '../core/context';
import { logger } from '../core/logger';
import { ArticleId, ProductAvailability, ProductName, StockRecord } from '../core/types';
import { PerKeyMutex, Release } from '../utils/perKeyMutex';
import { InventoryStore, StoreTransaction, TransactionFinishedError } from './store.types';

interface ArticleRow {
  name: string;
  stock: number;
}

interface StoreState {
  stock: Map<ArticleId, ArticleRow>;
  products: Set<ProductName>;
  // product name -> article id -> amount required
  compositions: Map<ProductName, Map<ArticleId, number>>;
}

export class ConstraintViolationError extends Error {
  constructor(public readonly constraint: string, message: string) {
    super(message);
    this.name = 'ConstraintViolationError';
  }
}

const STORE_LOCK = 'inventory-store';

function cloneState(state: StoreState): StoreState {
  const stock = new Map<ArticleId, ArticleRow>();
  for (const [artId, row] of state.stock) {
    stock.set(artId, { ...row });
  }
  const compositions = new Map<ProductName, Map<ArticleId, number>>();
  for (const [productName, articles] of state.compositions) {
    compositions.set(productName, new Map(articles));
  }
  return { stock, products: new Set(state.products), compositions };
}

/**
 * In-process inventory store. Transactions are fully serialized: `begin`
 * waits for the previous transaction to finish and works on a private copy
 * that replaces the shared state on commit.
 */
export class MemoryInventoryStore implements InventoryStore {
  private state: StoreState = { stock: new Map(), products: new Set(), compositions: new Map() };
  private readonly mutex = new PerKeyMutex();
  private closed = false;

  async ping(): Promise<void> {
    if (this.closed) {
      throw new Error('Memory store is closed');
    }
  }

  async begin(context: ExecutionContext): Promise<StoreTransaction> {
    await this.ping();
    const release = await this.mutex.lock(STORE_LOCK, context.signal);
    logger.trace({ rid: context.requestId }, 'Memory transaction started');
    return new MemoryTransaction(cloneState(this.state), context.signal, release, (next) => {
      this.state = next;
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class MemoryTransaction implements StoreTransaction {
  private finished = false;

  constructor(
    private readonly working: StoreState,
    private readonly signal: AbortSignal,
    private readonly release: Release,
    private readonly publish: (state: StoreState) => void
  ) {}

  async listStock(): Promise<StockRecord[]> {
    this.ensureActive();
    return [...this.working.stock.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([artId, row]) => ({ artId, name: row.name, stock: String(row.stock) }));
  }

  async listProductAvailability(): Promise<ProductAvailability[]> {
    this.ensureActive();
    return [...this.working.compositions.keys()]
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
      .map((name) => ({ name, available: this.shortArticles(name) === 0 ? '1' : '0' }));
  }

  async productExists(productName: ProductName): Promise<number> {
    this.ensureActive();
    return this.working.compositions.get(productName)?.size ?? 0;
  }

  async productInStock(productName: ProductName): Promise<number> {
    this.ensureActive();
    return this.shortArticles(productName);
  }

  async lockStockForProduct(_productName: ProductName): Promise<void> {
    // The whole store is already held by this transaction
    this.ensureActive();
  }

  async decrementStockForProduct(productName: ProductName): Promise<void> {
    this.ensureActive();
    const articles = this.working.compositions.get(productName);
    if (!articles) return;

    for (const [artId, amountOf] of articles) {
      const row = this.working.stock.get(artId);
      if (!row) continue;
      const next = row.stock - amountOf;
      if (next < 0) {
        throw new ConstraintViolationError(
          'stock_stock_check',
          `Stock of article ${artId} would become negative`
        );
      }
      row.stock = next;
    }
  }

  async insertProduct(productName: ProductName): Promise<void> {
    this.ensureActive();
    if (this.working.products.has(productName)) {
      throw new ConstraintViolationError('products_pkey', `Product ${productName} already exists`);
    }
    this.working.products.add(productName);
  }

  async insertComposition(productName: ProductName, artId: ArticleId, amountOf: number): Promise<void> {
    this.ensureActive();
    if (!this.working.products.has(productName)) {
      throw new ConstraintViolationError(
        'product_articles_product_name_fkey',
        `Product ${productName} is not registered`
      );
    }
    if (!Number.isInteger(amountOf) || amountOf <= 0) {
      throw new ConstraintViolationError(
        'product_articles_amount_of_check',
        `Amount of article ${artId} for ${productName} must be a positive integer`
      );
    }
    let articles = this.working.compositions.get(productName);
    if (!articles) {
      articles = new Map();
      this.working.compositions.set(productName, articles);
    }
    if (articles.has(artId)) {
      throw new ConstraintViolationError(
        'product_articles_pkey',
        `Product ${productName} already contains article ${artId}`
      );
    }
    articles.set(artId, amountOf);
  }

  async insertStock(artId: ArticleId, name: string, stock: number): Promise<void> {
    this.ensureActive();
    if (!Number.isInteger(stock) || stock < 0) {
      throw new ConstraintViolationError('stock_stock_check', `Stock of article ${artId} must be a non-negative integer`);
    }
    const existing = this.working.stock.get(artId);
    this.working.stock.set(artId, { name, stock: (existing?.stock ?? 0) + stock });
  }

  async commit(): Promise<void> {
    this.ensureActive();
    this.finished = true;
    this.publish(this.working);
    this.release();
  }

  async rollback(): Promise<void> {
    if (this.finished) return;
    this.finished = true;
    this.release();
  }

  private shortArticles(productName: ProductName): number {
    const articles = this.working.compositions.get(productName);
    if (!articles) return 0;
    let short = 0;
    for (const [artId, amountOf] of articles) {
      if ((this.working.stock.get(artId)?.stock ?? 0) < amountOf) {
        short += 1;
      }
    }
    return short;
  }

  private ensureActive(): void {
    if (this.finished) {
      throw new TransactionFinishedError();
    }
    this.signal.throwIfAborted();
  }
}
