import Database from 'better-sqlite3';
import { readFileSync } from 'node:fs';
import { getLogger } from './logger-interface.js';

export type SqliteDatabase = Database.Database;

const SCHEMA_PATH = new URL('../schema.sql', import.meta.url);

export interface OpenDatabaseOptions {
  /** Apply schema.sql after opening. Defaults to true. */
  migrate?: boolean;
  readonly?: boolean;
}

/**
 * Open the settings store. Pass `:memory:` for a throwaway database.
 */
export function openDatabase(filename: string, options: OpenDatabaseOptions = {}): SqliteDatabase {
  const { migrate = true, readonly = false } = options;
  const db = new Database(filename, { readonly });

  if (filename !== ':memory:' && !readonly) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  if (migrate && !readonly) {
    applySchema(db);
  }

  getLogger().info({ filename, readonly }, 'Database opened');
  return db;
}

export function applySchema(db: SqliteDatabase): void {
  db.exec(readFileSync(SCHEMA_PATH, 'utf8'));
}

export function closeDatabase(db: SqliteDatabase): void {
  if (db.open) {
    db.close();
    getLogger().info({ filename: db.name }, 'Database closed');
  }
}

export * from './logger-interface.js';
export * from './metrics.js';
export * from './transaction-manager.js';
