import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { DatabaseError, describeError } from '../domain/errors.js';
import { buildSchema } from './db/schema.js';
import { logger } from './logger.js';
import type { AppConfig } from './config.js';

/**
 * SQLite database adapter
 * Services never import this - repositories receive it via constructor injection
 */
export class DatabaseAdapter {
  private db: Database.Database;

  constructor(config: Pick<AppConfig, 'jobStore'>) {
    const { databasePath, tableName } = config.jobStore;
    try {
      if (databasePath !== ':memory:') {
        mkdirSync(dirname(databasePath), { recursive: true });
      }
      this.db = new Database(databasePath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('busy_timeout = 5000');
      this.db.exec(buildSchema(tableName));
      logger.info('Database initialized', { path: databasePath, table: tableName });
    } catch (error) {
      throw new DatabaseError('Failed to initialize database', { error: describeError(error) });
    }
  }

  /**
   * Execute a query with parameters
   */
  query<T>(sql: string, params: unknown[] = []): T[] {
    try {
      const stmt = this.db.prepare(sql);
      return stmt.all(...params) as T[];
    } catch (error) {
      logger.error('Database query failed', { sql, error: describeError(error) });
      throw new DatabaseError('Query execution failed', { sql, error: describeError(error) });
    }
  }

  /**
   * Execute a single-row query (also used for UPDATE ... RETURNING)
   */
  queryOne<T>(sql: string, params: unknown[] = []): T | null {
    try {
      const stmt = this.db.prepare(sql);
      return (stmt.get(...params) as T | undefined) ?? null;
    } catch (error) {
      logger.error('Database queryOne failed', { sql, error: describeError(error) });
      throw new DatabaseError('QueryOne execution failed', { sql, error: describeError(error) });
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
      logger.error('Database execute failed', { sql, error: describeError(error) });
      throw new DatabaseError('Execute failed', { sql, error: describeError(error) });
    }
  }

  /**
   * Health check used by the readiness endpoint
   */
  ping(): boolean {
    return this.queryOne<{ ok: number }>('SELECT 1 AS ok')?.ok === 1;
  }

  close(): void {
    this.db.close();
    logger.info('Database connection closed');
  }
}
