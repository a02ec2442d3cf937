/**
 * CRM Database: SQLite connection and schema
 *
 * Owns the single better-sqlite3 connection for the process. It is opened at
 * start-up, handed by reference to every repository and service, and closed
 * at shutdown. WAL mode and foreign keys are always on.
 *
 * Usage:
 *   const db = new CrmDatabase(':memory:');
 *   db.open();
 *   db.transaction(() => { ... });
 *   db.close();
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { createLogger } from '../utils/logger.js';
import { ConflictError, CrmError, StorageError } from '../domain/errors.js';

const log = createLogger('crm:store');

export type SqlValue = string | number | bigint | Buffer | null;

// ─── Schema ─────────────────────────────────────────────────────────────────

const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS customers (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    company TEXT,
    title TEXT,
    email TEXT UNIQUE COLLATE NOCASE,
    phone TEXT UNIQUE,
    note TEXT,
    status TEXT NOT NULL DEFAULT 'lead',
    tags TEXT NOT NULL DEFAULT '[]',
    last_interacted_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS interactions (
    id TEXT PRIMARY KEY,
    customer_id TEXT NOT NULL REFERENCES customers(id) ON DELETE CASCADE,
    type TEXT NOT NULL,
    happened_at TEXT NOT NULL,
    summary TEXT,
    content TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS opportunities (
    id TEXT PRIMARY KEY,
    customer_id TEXT NOT NULL REFERENCES customers(id) ON DELETE CASCADE,
    name TEXT NOT NULL,
    description TEXT,
    status TEXT NOT NULL DEFAULT 'open',
    amount REAL NOT NULL DEFAULT 0 CHECK (amount >= 0),
    probability INTEGER CHECK (probability IS NULL OR (probability >= 0 AND probability <= 100)),
    expected_close_date TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    customer_id TEXT NOT NULL REFERENCES customers(id) ON DELETE CASCADE,
    remind_at TEXT NOT NULL,
    content TEXT NOT NULL,
    done INTEGER NOT NULL DEFAULT 0,
    sync_external INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS field_definitions (
    key TEXT PRIMARY KEY,
    label TEXT NOT NULL,
    type TEXT NOT NULL,
    options TEXT,
    required INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS customer_field_values (
    customer_id TEXT NOT NULL REFERENCES customers(id) ON DELETE CASCADE,
    field_key TEXT NOT NULL REFERENCES field_definitions(key) ON UPDATE CASCADE,
    value TEXT NOT NULL,
    PRIMARY KEY (customer_id, field_key)
  );
`;

const CREATE_INDEX_SQL = `
  CREATE INDEX IF NOT EXISTS idx_customers_status ON customers(status);
  CREATE INDEX IF NOT EXISTS idx_customers_name ON customers(name);
  CREATE INDEX IF NOT EXISTS idx_interactions_customer ON interactions(customer_id, happened_at);
  CREATE INDEX IF NOT EXISTS idx_opportunities_customer ON opportunities(customer_id);
  CREATE INDEX IF NOT EXISTS idx_opportunities_status ON opportunities(status);
  CREATE INDEX IF NOT EXISTS idx_tasks_customer ON tasks(customer_id, remind_at);
  CREATE INDEX IF NOT EXISTS idx_tasks_open ON tasks(done, remind_at);
  CREATE INDEX IF NOT EXISTS idx_field_values_key ON customer_field_values(field_key);
`;

// ─── Error translation ──────────────────────────────────────────────────────

function isSqliteError(error: unknown): error is Error & { code: string } {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && error.code.startsWith('SQLITE_');
}

/**
 * Map a driver failure onto the CRM error taxonomy. Errors that already
 * belong to it pass through untouched.
 */
export function translateStoreError(error: unknown, operation: string): CrmError {
  if (error instanceof CrmError) {
    return error;
  }

  if (isSqliteError(error) && (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')) {
    const column = error.message.split('failed: ')[1]?.split(',')[0]?.trim() ?? 'value';
    const field = column.includes('.') ? column.slice(column.indexOf('.') + 1) : column;
    return new ConflictError(`Duplicate value for ${field}`, error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new StorageError(`Storage failure during ${operation}: ${message}`, error);
}

// ─── CrmDatabase ────────────────────────────────────────────────────────────

export class CrmDatabase {
  private db: Database.Database | null = null;
  private readonly dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  /**
   * Open the connection and create the schema if needed
   */
  open(): void {
    if (this.db) return;

    try {
      if (this.dbPath !== ':memory:') {
        mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }

      const db = new Database(this.dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');
      db.exec(CREATE_TABLES_SQL);
      db.exec(CREATE_INDEX_SQL);
      this.db = db;
    } catch (error) {
      throw translateStoreError(error, 'open');
    }

    log.info({ dbPath: this.dbPath }, 'CRM database opened');
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      log.info({ dbPath: this.dbPath }, 'CRM database closed');
    }
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  get connection(): Database.Database {
    if (!this.db) {
      throw new StorageError('CRM database not open. Call open() first.');
    }
    return this.db;
  }

  /**
   * Run a single statement-level operation, translating driver errors.
   */
  run<T>(operation: string, fn: (db: Database.Database) => T): T {
    const db = this.connection;
    try {
      return fn(db);
    } catch (error) {
      throw translateStoreError(error, operation);
    }
  }

  /**
   * Run `fn` inside a transaction. Nested calls become savepoints, so an
   * inner failure rolls back only the inner work when the caller catches it.
   */
  transaction<T>(operation: string, fn: () => T): T {
    const db = this.connection;
    try {
      return db.transaction(fn)();
    } catch (error) {
      throw translateStoreError(error, operation);
    }
  }
}
