import type Database from 'better-sqlite3';
import { getLogger } from './logger-interface.js';
import { dbTransactionCounter } from './metrics.js';

export class TransactionError extends Error {
  constructor(
    message: string,
    public readonly label: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransactionError';
  }
}

/**
 * Execute the given statements atomically. better-sqlite3 rolls the
 * transaction back when the callback throws.
 */
export function runInTransaction<T>(db: Database.Database, label: string, operations: () => T): T {
  const transaction = db.transaction(operations);

  try {
    const result = transaction();
    dbTransactionCounter.labels('committed').inc();
    return result;
  } catch (error) {
    dbTransactionCounter.labels('aborted').inc();
    getLogger().error({
      label,
      error: error instanceof Error ? error.message : String(error)
    }, 'Transaction aborted');
    throw new TransactionError(
      `Transaction ${label} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      label,
      { cause: error }
    );
  }
}
