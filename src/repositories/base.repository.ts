// ============================================
// DEADZONE - Base Repository
// ============================================

import { count } from 'drizzle-orm';
import type { SQLiteTable } from 'drizzle-orm/sqlite-core';
import type { DrizzleDb } from '../db/drizzle.js';
import { isTransientSqliteError, toStoreError } from '../plugins/error-handler.plugin.js';
import { withRetry } from '../utils/retry.js';

const WRITE_ATTEMPTS = 3;

export abstract class BaseRepository<TTable extends SQLiteTable> {
  constructor(
    protected db: DrizzleDb,
    protected table: TTable
  ) {}

  async count(): Promise<number> {
    const results = await this.db.select({ value: count() }).from(this.table);
    return results[0]?.value ?? 0;
  }

  async deleteAll(): Promise<void> {
    await this.write(() => this.db.delete(this.table));
  }

  /**
   * Run one write statement, retrying it while SQLite reports busy or locked.
   * Only the failed statement is repeated; writes before it stay as they are.
   */
  protected async write<T>(statement: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(statement, { attempts: WRITE_ATTEMPTS, isRetryable: isTransientSqliteError });
    } catch (error) {
      throw toStoreError(error);
    }
  }

  protected generateId(): string {
    return crypto.randomUUID();
  }
}
