import pg from 'pg';
import type { PoolConfig } from 'pg';
import { PGlite } from '@electric-sql/pglite';
import { errorMessage } from './errors';
import type { Logger } from './logger';
import { createLogger } from './logger';

/**
 * Database client interface - compatible with pg.Client, pg.PoolClient and PGlite
 */
export interface DbClient {
  query<T = unknown>(sql: string, params?: unknown[]): Promise<{ rows: T[] }>;
}

/**
 * A client that can also run a callback inside a transaction. PGlite
 * satisfies it as is; wrap a node-postgres pool with `pgConnection`.
 */
export interface DbConnection extends DbClient {
  transaction<T>(fn: (tx: DbClient) => Promise<T>): Promise<T>;
}

/** The parts of a node-postgres pool the adapter uses; `pg.Pool` satisfies it. */
export interface PgPool extends DbClient {
  connect(): Promise<PgPoolClient>;
}

export interface PgPoolClient extends DbClient {
  release(): void;
}

/**
 * Adapt a caller-owned node-postgres pool. Each transaction checks out its
 * own client. A failed `ROLLBACK` is logged and the error that caused it is
 * the one rethrown.
 */
export function pgConnection(pool: PgPool, logger: Logger = createLogger('connection')): DbConnection {
  return {
    query<T>(sql: string, params?: unknown[]) {
      return pool.query<T>(sql, params);
    },
    async transaction(fn) {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          logger.error('Rollback failed', { error: errorMessage(rollbackError), cause: errorMessage(error) });
        }
        throw error;
      } finally {
        client.release();
      }
    },
  };
}

/**
 * Run `fn` in a transaction that rolls back when `signal` is aborted: every
 * statement, and the commit, first checks the signal.
 */
export async function runInTransaction<T>(
  connection: DbConnection,
  fn: (tx: DbClient) => Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  signal?.throwIfAborted();
  return connection.transaction(async tx => {
    const result = await fn(withSignal(tx, signal));
    signal?.throwIfAborted();
    return result;
  });
}

export function withSignal(client: DbClient, signal?: AbortSignal): DbClient {
  if (!signal) return client;
  return {
    query<T>(sql: string, params?: unknown[]) {
      signal.throwIfAborted();
      return client.query<T>(sql, params);
    },
  };
}

export interface OpenedConnection {
  readonly connection: DbConnection;
  close(): Promise<void>;
}

/**
 * Open a connection for a caller that owns its lifecycle, such as the CLI.
 *
 * Connection string formats:
 * - `pglite:` or `pglite::memory:` - In-memory PGlite database
 * - `pglite:/path/to/dir` - PGlite database persisted to filesystem
 * - `postgresql://...` or other - PostgreSQL connection string
 */
export async function openConnection(connectionString: string, poolConfig: PoolConfig = {}): Promise<OpenedConnection> {
  if (connectionString.startsWith('pglite:')) {
    const pglitePath = connectionString.slice('pglite:'.length);
    const db = new PGlite(pglitePath || undefined);
    await db.waitReady;
    return { connection: db, close: () => db.close() };
  }

  const pool = new pg.Pool({ ...poolConfig, connectionString });
  return { connection: pgConnection(pool), close: () => pool.end() };
}
