import Database from 'better-sqlite3';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { PersistenceError, isAppError } from '../domain/errors.js';
import { logger } from './logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface DatabaseOptions {
  /** SQLite file path, or ':memory:' */
  filename: string;
  /** How long a statement waits on a locked database before failing */
  busyTimeoutMs: number;
}

/**
 * SQLite database adapter
 * Domain layer never imports this - accessed via repositories
 */
export class DatabaseAdapter {
  private db: Database.Database;

  constructor(options: DatabaseOptions) {
    try {
      this.db = new Database(options.filename, { timeout: options.busyTimeoutMs });
      if (options.filename !== ':memory:') {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.pragma('foreign_keys = ON');
      this.initializeSchema();
      logger.info('Database initialized', { path: options.filename });
    } catch (error) {
      throw new PersistenceError('Failed to initialize database', { error });
    }
  }

  private initializeSchema(): void {
    const schemaPath = join(__dirname, 'db', 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');
    this.db.exec(schema);
    logger.debug('Database schema initialized');
  }

  /**
   * Execute a query with parameters
   */
  query<T>(sql: string, params: unknown[] = []): T[] {
    try {
      const stmt = this.db.prepare(sql);
      return stmt.all(...params) as T[];
    } catch (error) {
      logger.error('Database query failed', { sql, error });
      throw new PersistenceError('Query execution failed', { sql, error });
    }
  }

  /**
   * Execute a single-row query
   */
  queryOne<T>(sql: string, params: unknown[] = []): T | null {
    try {
      const stmt = this.db.prepare(sql);
      return (stmt.get(...params) as T | undefined) ?? null;
    } catch (error) {
      logger.error('Database queryOne failed', { sql, error });
      throw new PersistenceError('QueryOne execution failed', { sql, error });
    }
  }

  /**
   * Execute an INSERT/UPDATE/DELETE statement
   * Returns the number of affected rows
   */
  execute(sql: string, params: unknown[] = []): number {
    try {
      const stmt = this.db.prepare(sql);
      const result = stmt.run(...params);
      return result.changes;
    } catch (error) {
      logger.error('Database execute failed', { sql, error });
      throw new PersistenceError('Execute failed', { sql, error });
    }
  }

  /**
   * Execute multiple statements in a transaction
   * Rolls back on any error; application errors are rethrown unchanged
   */
  transaction<T>(fn: () => T): T {
    const txn = this.db.transaction(fn);
    try {
      return txn();
    } catch (error) {
      logger.error('Transaction failed, rolling back', { error });
      if (isAppError(error)) {
        throw error;
      }
      throw new PersistenceError('Transaction failed', { error });
    }
  }

  close(): void {
    this.db.close();
    logger.info('Database connection closed');
  }
}
