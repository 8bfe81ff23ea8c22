import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PostgresInventoryStore } from '../../src/repositories/postgres.store';
import { MemoryInventoryStore } from '../../src/repositories/memory.store';
import { createStore } from '../../src/repositories/store.factory';
import * as queries from '../../src/repositories/queries';
import { loadConfig } from '../../src/core/config';
import { createInventoryEngine } from '../../src/services/inventory.service';
import { OutOfStockError, QueryError, WriteError } from '../../src/core/errors';
import { createExecutionContext } from '../../src/core/context';
import { abortedContext, testContext } from '../helpers/fixtures';

const pg = vi.hoisted(() => {
  interface Call {
    text: string;
    values?: unknown[];
  }
  const state = {
    calls: [] as Call[],
    rows: new Map<string, unknown[]>(),
    failures: new Map<string, Error>(),
    poolError: undefined as Error | undefined,
  };
  const run = async (text: string, values?: unknown[]) => {
    state.calls.push({ text, values });
    const failure = state.failures.get(text);
    if (failure) {
      throw failure;
    }
    return { rows: state.rows.get(text) ?? [] };
  };
  const client = { query: vi.fn(run), release: vi.fn() };

  class Pool {
    static instances: Pool[] = [];
    on = vi.fn();
    query = vi.fn(async (text: string, values?: unknown[]) => {
      if (state.poolError) {
        throw state.poolError;
      }
      return run(text, values);
    });
    connect = vi.fn(async () => client);
    end = vi.fn(async () => undefined);

    constructor(public readonly options: Record<string, unknown>) {
      Pool.instances.push(this);
    }
  }

  return { state, client, Pool };
});

vi.mock('pg', () => ({ Pool: pg.Pool }));

const storeConfig = {
  host: 'localhost',
  port: 5432,
  user: 'warehouse',
  password: 'test-secret',
  database: 'warehouse',
  poolMax: 5,
  connectTimeoutMs: 1000,
};

const texts = () => pg.state.calls.map((call) => call.text);

describe('PostgresInventoryStore', () => {
  let store: PostgresInventoryStore;

  beforeEach(() => {
    vi.clearAllMocks();
    pg.state.calls.length = 0;
    pg.state.rows.clear();
    pg.state.failures.clear();
    pg.state.poolError = undefined;
    pg.Pool.instances.length = 0;
    store = new PostgresInventoryStore(storeConfig);
  });

  it('should size the pool from its configuration', () => {
    expect(pg.Pool.instances[0].options).toEqual({
      host: 'localhost',
      port: 5432,
      user: 'warehouse',
      password: 'test-secret',
      database: 'warehouse',
      max: 5,
      connectionTimeoutMillis: 1000,
    });
    expect(pg.Pool.instances[0].on).toHaveBeenCalledWith('error', expect.any(Function));
  });

  it('should ping with a trivial query', async () => {
    await store.ping();

    expect(texts()).toEqual([queries.ping]);
  });

  it('should open each transaction with a statement timeout', async () => {
    const tx = await store.begin(testContext({ timeoutMs: 5000 }));

    expect(texts()).toEqual([queries.begin, queries.prepareTransaction]);
    expect(pg.state.calls[1].values).toEqual([expect.stringMatching(/^\d+$/)]);
    await tx.rollback();
  });

  it('should not check out a client for an aborted context', async () => {
    await expect(store.begin(abortedContext())).rejects.toThrow('caller gave up');

    expect(pg.Pool.instances[0].connect).not.toHaveBeenCalled();
  });

  it('should stop waiting for a pooled client when the caller goes away', async () => {
    let deliver: (client: typeof pg.client) => void = () => undefined;
    pg.Pool.instances[0].connect.mockImplementationOnce(
      () =>
        new Promise<typeof pg.client>((resolve) => {
          deliver = resolve;
        })
    );
    const handle = createExecutionContext({ requestId: 'gone', timeoutMs: 5000 });

    const pending = store.begin(handle.context);
    handle.abort(new Error('client disconnected'));

    await expect(pending).rejects.toThrow('client disconnected');
    deliver(pg.client);
    await vi.waitFor(() => expect(pg.client.release).toHaveBeenCalledTimes(1));
    expect(pg.client.release).toHaveBeenCalledWith();
    expect(texts()).toEqual([]);
  });

  it('should cancel the running statement when the caller goes away', async () => {
    pg.state.rows.set(queries.prepareTransaction, [{ pid: 4242 }]);
    const handle = createExecutionContext({ requestId: 'gone', timeoutMs: 5000 });
    const tx = await store.begin(handle.context);
    let fail: (error: Error) => void = () => undefined;
    pg.client.query.mockImplementationOnce(
      () =>
        new Promise<{ rows: unknown[] }>((_resolve, reject) => {
          fail = reject;
        })
    );

    const pending = tx.listStock();
    handle.abort(new Error('client disconnected'));

    expect(pg.Pool.instances[0].query).toHaveBeenCalledWith(queries.cancelBackend, [4242]);
    fail(new Error('canceling statement due to user request'));
    await expect(pending).rejects.toThrow('canceling statement due to user request');
    await tx.rollback();
    expect(pg.client.release).toHaveBeenCalledTimes(1);
  });

  it('should not cancel anything once the statement has finished', async () => {
    pg.state.rows.set(queries.prepareTransaction, [{ pid: 4242 }]);
    const handle = createExecutionContext({ requestId: 'late', timeoutMs: 5000 });
    const tx = await store.begin(handle.context);

    await tx.listStock();
    handle.abort(new Error('client disconnected'));

    expect(pg.Pool.instances[0].query).not.toHaveBeenCalled();
    await tx.rollback();
  });

  it('should discard the client when BEGIN fails', async () => {
    const failure = new Error('terminating connection');
    pg.state.failures.set(queries.begin, failure);

    await expect(store.begin(testContext())).rejects.toThrow('terminating connection');
    expect(pg.client.release).toHaveBeenCalledWith(failure);
  });

  it('should map stock rows to records', async () => {
    pg.state.rows.set(queries.listStock, [
      { art_id: 'A1', name: 'leg', stock: '6' },
      { art_id: 'A2', name: 'screw', stock: '10' },
    ]);
    const tx = await store.begin(testContext());

    await expect(tx.listStock()).resolves.toEqual([
      { artId: 'A1', name: 'leg', stock: '6' },
      { artId: 'A2', name: 'screw', stock: '10' },
    ]);
    await tx.rollback();
  });

  it('should read counts and default to zero without a row', async () => {
    pg.state.rows.set(queries.productExists, [{ count: 3 }]);
    const tx = await store.begin(testContext());

    await expect(tx.productExists('Oak Stool')).resolves.toBe(3);
    await expect(tx.productInStock('Oak Stool')).resolves.toBe(0);
    expect(pg.state.calls[2]).toEqual({ text: queries.productExists, values: ['Oak Stool'] });
    await tx.rollback();
  });

  it('should release the client once on commit', async () => {
    const tx = await store.begin(testContext());
    await tx.insertStock('A1', 'leg', 4);
    await tx.commit();
    await tx.rollback();

    expect(texts()).toEqual([queries.begin, queries.prepareTransaction, queries.insertStock, queries.commit]);
    expect(pg.client.release).toHaveBeenCalledTimes(1);
    expect(pg.client.release).toHaveBeenCalledWith(undefined);
    await expect(tx.listStock()).rejects.toThrow('Transaction has already been committed or rolled back');
  });

  it('should discard the client when ROLLBACK fails', async () => {
    const failure = new Error('connection lost');
    pg.state.failures.set(queries.rollback, failure);
    const tx = await store.begin(testContext());

    await expect(tx.rollback()).rejects.toThrow('connection lost');
    expect(pg.client.release).toHaveBeenCalledWith(failure);
  });

  it('should end the pool on close', async () => {
    await store.close();

    expect(pg.Pool.instances[0].end).toHaveBeenCalledTimes(1);
  });

  describe('through the inventory engine', () => {
    it('should run a sale as one locked transaction', async () => {
      pg.state.rows.set(queries.productExists, [{ count: 2 }]);
      pg.state.rows.set(queries.productInStock, [{ count: 0 }]);

      await createInventoryEngine(store).sellProduct(testContext(), 'Oak Stool');

      expect(texts()).toEqual([
        queries.begin,
        queries.prepareTransaction,
        queries.productExists,
        queries.lockStockForProduct,
        queries.productInStock,
        queries.decrementStockForProduct,
        queries.commit,
      ]);
      expect(pg.state.calls[5].values).toEqual(['Oak Stool']);
    });

    it('should roll back a sale that is out of stock', async () => {
      pg.state.rows.set(queries.productExists, [{ count: 2 }]);
      pg.state.rows.set(queries.productInStock, [{ count: 1 }]);

      await expect(createInventoryEngine(store).sellProduct(testContext(), 'Oak Stool')).rejects.toBeInstanceOf(
        OutOfStockError
      );

      expect(texts()).toEqual([
        queries.begin,
        queries.prepareTransaction,
        queries.productExists,
        queries.lockStockForProduct,
        queries.productInStock,
        queries.rollback,
      ]);
    });

    it('should roll back a failed decrement as a WriteError', async () => {
      pg.state.rows.set(queries.productExists, [{ count: 2 }]);
      pg.state.failures.set(queries.decrementStockForProduct, new Error('new row violates check constraint'));

      const error = await createInventoryEngine(store)
        .sellProduct(testContext(), 'Oak Stool')
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WriteError);
      expect(error).toMatchObject({ message: 'SellProduct failed: new row violates check constraint' });
      expect(texts().slice(-1)).toEqual([queries.rollback]);
    });

    it('should upload stock rows with their parameters', async () => {
      const count = await createInventoryEngine(store).uploadInventory(testContext(), {
        inventory: [
          { artId: 'A1', name: 'leg', stock: 6 },
          { artId: 'A2', name: 'screw', stock: 10 },
        ],
      });

      expect(count).toBe(2);
      expect(pg.state.calls.slice(2)).toEqual([
        { text: queries.insertStock, values: ['A1', 'leg', 6] },
        { text: queries.insertStock, values: ['A2', 'screw', 10] },
        { text: queries.commit, values: undefined },
      ]);
    });

    it('should register a product before its composition rows', async () => {
      const count = await createInventoryEngine(store).uploadProducts(testContext(), {
        products: [{ name: 'Oak Stool', containArticles: [{ artId: 'A1', amountOf: 3 }] }],
      });

      expect(count).toBe(1);
      expect(pg.state.calls.slice(2)).toEqual([
        { text: queries.productExists, values: ['Oak Stool'] },
        { text: queries.insertProduct, values: ['Oak Stool'] },
        { text: queries.insertComposition, values: ['Oak Stool', 'A1', 3] },
        { text: queries.commit, values: undefined },
      ]);
    });

    it('should roll back the upload of a product that is already registered', async () => {
      pg.state.rows.set(queries.productExists, [{ count: 2 }]);

      await expect(
        createInventoryEngine(store).uploadProducts(testContext(), {
          products: [{ name: 'Oak Stool', containArticles: [{ artId: 'A3', amountOf: 1 }] }],
        })
      ).rejects.toThrow('UploadProducts failed: product Oak Stool is already registered');

      expect(texts()).not.toContain(queries.insertProduct);
      expect(texts().slice(-1)).toEqual([queries.rollback]);
    });

    it('should report a failed read as a QueryError', async () => {
      pg.state.failures.set(queries.listProductAvailability, new Error('relation "product_articles" does not exist'));

      await expect(createInventoryEngine(store).getProductStock(testContext())).rejects.toBeInstanceOf(QueryError);
      expect(texts().slice(-1)).toEqual([queries.rollback]);
    });
  });
});

describe('createStore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    pg.state.calls.length = 0;
    pg.state.poolError = undefined;
    pg.Pool.instances.length = 0;
  });

  const postgresConfig = (migrate: string) =>
    loadConfig({
      DB_DRIVER: 'postgres',
      DB_HOST: 'db.internal',
      DB_USER: 'warehouse',
      DB_PASSWORD: 'test-secret',
      DB_NAME: 'warehouse',
      DB_MIGRATE: migrate,
    });

  it('should build the in-memory store by default', async () => {
    const store = await createStore(loadConfig({}));

    expect(store).toBeInstanceOf(MemoryInventoryStore);
    expect(pg.Pool.instances).toHaveLength(0);
  });

  it('should build a PostgreSQL store without migrating when disabled', async () => {
    const store = await createStore(postgresConfig('false'));

    expect(store).toBeInstanceOf(PostgresInventoryStore);
    expect(pg.Pool.instances[0].options).toMatchObject({ host: 'db.internal', database: 'warehouse', max: 10 });
    expect(pg.Pool.instances[0].query).not.toHaveBeenCalled();
  });

  it('should close the pool when migrations fail', async () => {
    pg.state.poolError = new Error('password authentication failed');

    await expect(createStore(postgresConfig('true'))).rejects.toThrow('password authentication failed');
    expect(pg.Pool.instances[0].end).toHaveBeenCalledTimes(1);
  });
});
