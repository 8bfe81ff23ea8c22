import { ExecutionContext } from '../core/context';
import { DomainError, WriteError } from '../core/errors';
import { Logger } from '../core/logger';
import { InventoryStore, StoreTransaction } from '../repositories/store.types';

export type TransactionMode = 'read' | 'write';

export interface TransactionScope {
  store: InventoryStore;
  context: ExecutionContext;
  log: Logger;
  operation: string;
}

/**
 * Run `work` in a fresh transaction. Writes commit on success; reads and
 * failures always end in a rollback. Errors that are not already domain
 * errors are converted with `toError`; a failed commit is a WriteError.
 */
export async function runInTransaction<T>(
  scope: TransactionScope,
  mode: TransactionMode,
  toError: (cause: unknown) => DomainError,
  work: (tx: StoreTransaction) => Promise<T>
): Promise<T> {
  const { store, context, log, operation } = scope;

  let tx: StoreTransaction;
  try {
    tx = await store.begin(context);
  } catch (error) {
    log.error({ error }, 'Transaction begin failed');
    throw toError(error);
  }

  try {
    const result = await work(tx);
    if (mode === 'write') {
      try {
        await tx.commit();
      } catch (error) {
        log.error({ error }, 'Transaction commit failed');
        throw WriteError.commitFailed(operation, error);
      }
    }
    return result;
  } catch (error) {
    if (error instanceof DomainError) {
      throw error;
    }
    log.error({ error }, `${operation} failed, rolling back`);
    throw toError(error);
  } finally {
    await rollbackSafely(tx, log);
  }
}

// Rollback failures are logged; the caller still sees the first error
async function rollbackSafely(tx: StoreTransaction, log: Logger): Promise<void> {
  try {
    await tx.rollback();
  } catch (error) {
    log.warn({ error }, 'Transaction rollback failed');
  }
}
