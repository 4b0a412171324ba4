import { Pool, PoolClient, QueryResultRow } from 'pg';
import { config } from './environment';
import { logger } from './logger';

/**
 * Rows returned by a query, typed by the caller.
 */
export interface DbResult<R> {
  rows: R[];
  rowCount: number;
}

/**
 * Anything statements can be issued against: the pool itself, or the
 * client bound to an open transaction.
 */
export interface DbExecutor {
  query<R = QueryResultRow>(text: string, params?: unknown[]): Promise<DbResult<R>>;
}

export type IsolationLevel = 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

export interface TransactionOptions {
  isolationLevel?: IsolationLevel;
}

const logQuery = (text: string, start: number, rowCount: number | null): void => {
  logger.debug('Database query executed', {
    duration: Date.now() - start,
    rows: rowCount,
    query: text.substring(0, 100) // Log first 100 chars
  });
};

const logQueryError = (text: string, start: number, error: unknown): void => {
  logger.error('Database query error', {
    error: error instanceof Error ? error.message : String(error),
    duration: Date.now() - start,
    query: text.substring(0, 100)
  });
};

class DatabaseConnection implements DbExecutor {
  public pool: Pool;

  constructor() {
    logger.info('Database configuration', {
      host: config.database.host,
      port: config.database.port,
      database: config.database.database,
      user: config.database.user,
      connectionTimeoutMillis: config.database.connectionTimeoutMillis
    });

    // pg does not connect until the first query
    this.pool = new Pool(config.database);
    this.pool.on('error', (error: Error) => {
      logger.error('Unexpected idle client error', { error: error.message });
    });
  }

  /**
   * Swap the underlying pool (the test suite attaches an in-memory one).
   */
  attach(pool: Pool): void {
    this.pool = pool;
    logger.info('Database pool attached');
  }

  async query<R = QueryResultRow>(text: string, params?: unknown[]): Promise<DbResult<R>> {
    const start = Date.now();
    try {
      const result = await this.pool.query<R & QueryResultRow>(text, params);
      logQuery(text, start, result.rowCount);
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    } catch (error) {
      logQueryError(text, start, error);
      throw error;
    }
  }

  async connect(): Promise<PoolClient> {
    return this.pool.connect();
  }

  /**
   * Run `callback` inside BEGIN/COMMIT on one pooled client. Any error
   * rolls the whole unit back and is rethrown. Without an isolation level
   * the server default (READ COMMITTED) applies.
   */
  async transaction<T>(callback: (tx: DbExecutor) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    const client = await this.pool.connect();
    const tx: DbExecutor = {
      query: async <R = QueryResultRow>(text: string, params?: unknown[]): Promise<DbResult<R>> => {
        const start = Date.now();
        try {
          const result = await client.query<R & QueryResultRow>(text, params);
          logQuery(text, start, result.rowCount);
          return { rows: result.rows, rowCount: result.rowCount ?? 0 };
        } catch (error) {
          logQueryError(text, start, error);
          throw error;
        }
      }
    };

    try {
      await client.query(options.isolationLevel ? `BEGIN ISOLATION LEVEL ${options.isolationLevel}` : 'BEGIN');
      const result = await callback(tx);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('Database connection pool closed');
  }
}

export const db = new DatabaseConnection();
export const pool = db;
