/**
 * Test Database Manager
 *
 * In-memory PostgreSQL (pg-mem) attached to the application's connection
 * wrapper, so services run their real SQL without an external server.
 * Each test file gets its own instance.
 */

import { newDb, IBackup, IMemoryDb } from 'pg-mem';
import { db } from '../../src/config/database';
import { runStartupMigrations } from '../../src/config/migrations';

class TestDatabase {
  private memDb: IMemoryDb = newDb();
  private backup: IBackup | null = null;

  /**
   * Attach the in-memory pool and create the schema (once).
   */
  async connect(): Promise<void> {
    if (this.backup) {
      return;
    }
    const { Pool } = this.memDb.adapters.createPg();
    db.attach(new Pool());
    await runStartupMigrations(db);
    this.backup = this.memDb.backup();
  }

  /**
   * Drop every row written since connect().
   */
  reset(): void {
    this.backup?.restore();
  }

  /**
   * Run SQL directly, bypassing the services.
   */
  async query<R>(text: string, params?: unknown[]): Promise<R[]> {
    const result = await db.query<R>(text, params);
    return result.rows;
  }
}

export const testDb = new TestDatabase();
