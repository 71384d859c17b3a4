import { Counter, Histogram, register } from 'prom-client';
import { getLogger } from './logger-interface.js';

export const dbQueryCounter = new Counter({
  name: 'database_queries_total',
  help: 'Total number of database queries executed',
  labelNames: ['operation', 'table', 'success'],
  registers: [register]
});

export const dbQueryDuration = new Histogram({
  name: 'database_query_duration_seconds',
  help: 'Duration of database queries in seconds',
  labelNames: ['operation', 'table'],
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [register]
});

export const dbTransactionCounter = new Counter({
  name: 'database_transactions_total',
  help: 'Number of database transactions',
  labelNames: ['status'], // 'committed', 'aborted'
  registers: [register]
});

const SLOW_QUERY_MS = 100;

/**
 * Run a synchronous statement and record its duration and outcome.
 */
export function instrumentQuery<T>(operation: string, table: string, run: () => T): T {
  const start = performance.now();
  let success = false;

  try {
    const result = run();
    success = true;
    return result;
  } finally {
    const elapsedMs = performance.now() - start;
    dbQueryCounter.labels(operation, table, String(success)).inc();
    dbQueryDuration.labels(operation, table).observe(elapsedMs / 1000);

    if (elapsedMs > SLOW_QUERY_MS) {
      getLogger().warn({ operation, table, elapsedMs }, 'Slow database query detected');
    }
  }
}
