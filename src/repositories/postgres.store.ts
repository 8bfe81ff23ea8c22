import { Pool, PoolClient, QueryResultRow } from 'pg';
import { ExecutionContext, remainingMs } from '../core/context';
import { logger } from '../core/logger';
import { ArticleId, ProductAvailability, ProductName, StockRecord } from '../core/types';
import * as queries from './queries';
import { InventoryStore, StoreTransaction, TransactionFinishedError } from './store.types';

export interface PostgresStoreConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  poolMax: number;
  connectTimeoutMs: number;
}

type StockRow = { art_id: string; name: string; stock: string };
type AvailabilityRow = { name: string; available: string };
type CountRow = { count: number };
type SessionRow = { pid: number };

/**
 * PostgreSQL-backed store. One pool is shared by every engine call; each
 * transaction checks out its own client for its whole lifetime.
 */
export class PostgresInventoryStore implements InventoryStore {
  readonly pool: Pool;

  constructor(config: PostgresStoreConfig) {
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.database,
      max: config.poolMax,
      connectionTimeoutMillis: config.connectTimeoutMs,
    });
    this.pool.on('error', (error) => {
      logger.error({ error }, 'Idle PostgreSQL client failed');
    });
  }

  async ping(): Promise<void> {
    await this.pool.query(queries.ping);
  }

  async begin(context: ExecutionContext): Promise<StoreTransaction> {
    const client = await this.checkout(context.signal);
    let backendPid: number | undefined;
    try {
      await client.query(queries.begin);
      // Statements still running at the deadline are cancelled by the server
      const session = await client.query<SessionRow>(queries.prepareTransaction, [String(remainingMs(context))]);
      backendPid = session.rows[0]?.pid;
    } catch (error) {
      client.release(error instanceof Error ? error : true);
      throw error;
    }
    return new PostgresTransaction(client, context.signal, (reason) => this.cancel(backendPid, reason));
  }

  /**
   * Wait for a pooled client unless the signal aborts first. A client that
   * arrives after the abort goes straight back to the pool.
   */
  private checkout(signal: AbortSignal): Promise<PoolClient> {
    signal.throwIfAborted();
    return new Promise<PoolClient>((resolve, reject) => {
      const onAbort = () => reject(signal.reason);
      signal.addEventListener('abort', onAbort, { once: true });

      this.pool.connect().then(
        (client) => {
          signal.removeEventListener('abort', onAbort);
          if (signal.aborted) {
            client.release();
            return;
          }
          resolve(client);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  // Ask the server to stop the statement running on `pid`; the statement then fails on its own client
  private cancel(pid: number | undefined, reason: unknown): void {
    if (pid === undefined) return;
    logger.debug({ pid, reason }, 'Cancelling running statement');
    this.pool.query(queries.cancelBackend, [pid]).catch((error: unknown) => {
      logger.warn({ error, pid }, 'Failed to cancel running statement');
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

class PostgresTransaction implements StoreTransaction {
  private finished = false;

  constructor(
    private readonly client: PoolClient,
    private readonly signal: AbortSignal,
    private readonly cancelRunning: (reason: unknown) => void
  ) {}

  async listStock(): Promise<StockRecord[]> {
    const rows = await this.run<StockRow>(queries.listStock);
    return rows.map((row) => ({ artId: row.art_id, name: row.name, stock: row.stock }));
  }

  async listProductAvailability(): Promise<ProductAvailability[]> {
    const rows = await this.run<AvailabilityRow>(queries.listProductAvailability);
    return rows.map((row) => ({ name: row.name, available: row.available }));
  }

  async productExists(productName: ProductName): Promise<number> {
    return this.count(queries.productExists, productName);
  }

  async productInStock(productName: ProductName): Promise<number> {
    return this.count(queries.productInStock, productName);
  }

  async lockStockForProduct(productName: ProductName): Promise<void> {
    await this.run(queries.lockStockForProduct, [productName]);
  }

  async decrementStockForProduct(productName: ProductName): Promise<void> {
    await this.run(queries.decrementStockForProduct, [productName]);
  }

  async insertProduct(productName: ProductName): Promise<void> {
    await this.run(queries.insertProduct, [productName]);
  }

  async insertComposition(productName: ProductName, artId: ArticleId, amountOf: number): Promise<void> {
    await this.run(queries.insertComposition, [productName, artId, amountOf]);
  }

  async insertStock(artId: ArticleId, name: string, stock: number): Promise<void> {
    await this.run(queries.insertStock, [artId, name, stock]);
  }

  async commit(): Promise<void> {
    await this.run(queries.commit);
    this.finish();
  }

  async rollback(): Promise<void> {
    if (this.finished) return;
    try {
      await this.client.query(queries.rollback);
      this.finish();
    } catch (error) {
      // A client that cannot roll back is not returned to the pool
      this.finish(error instanceof Error ? error : true);
      throw error;
    }
  }

  private async count(text: string, productName: ProductName): Promise<number> {
    const rows = await this.run<CountRow>(text, [productName]);
    return Number(rows[0]?.count ?? 0);
  }

  private async run<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<R[]> {
    if (this.finished) {
      throw new TransactionFinishedError();
    }
    this.signal.throwIfAborted();
    const onAbort = () => this.cancelRunning(this.signal.reason);
    this.signal.addEventListener('abort', onAbort, { once: true });
    try {
      const result = await this.client.query<R>(text, values);
      return result.rows;
    } finally {
      this.signal.removeEventListener('abort', onAbort);
    }
  }

  private finish(releaseError?: Error | boolean): void {
    this.finished = true;
    this.client.release(releaseError);
  }
}
