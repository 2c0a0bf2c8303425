/**
 * Trading Core Database Client
 *
 * node-postgres pool with transaction helpers and error classification.
 * Wallet writes always run inside `serializableTransaction`.
 */

import { Pool, type QueryResult as PgQueryResult } from 'pg';
import { dbLogger } from './logger';

// ============================================================================
// ERROR CLASSIFICATION
// ============================================================================

export interface DatabaseError extends Error {
  code?: string;
  constraint?: string;
  detail?: string;
  table?: string;
}

function errorCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object' || !('code' in error)) return undefined;
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}

/**
 * CHECK constraint violation (23514), e.g. a wallet going negative
 */
export function isCheckViolation(error: unknown): error is DatabaseError {
  return error instanceof Error && errorCode(error) === '23514';
}

/**
 * Serialization failure (40001) or deadlock (40P01). The transaction was
 * rolled back in full and can be re-run from the start.
 */
export function isSerializationFailure(error: unknown): boolean {
  const code = errorCode(error);
  return code === '40001' || code === '40P01';
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  // SQLSTATE 08xxx: connection exception, 57P0x: operator intervention
  '08000',
  '08001',
  '08003',
  '08004',
  '08006',
  '57P01',
  '57P02',
  '57P03',
  '53300', // too_many_connections
  '55P03', // lock_not_available
  '57014', // query_canceled (statement/lock timeout)
]);

export function isTransientDbError(error: unknown): boolean {
  const code = errorCode(error);
  if (code && TRANSIENT_CODES.has(code.toUpperCase())) return true;

  const message = error instanceof Error ? error.message : String(error);
  return /connection\s+terminated|terminating\s+connection|socket\s+hang\s+up|Connection terminated unexpectedly/i.test(
    message
  );
}

// ============================================================================
// QUERY INTERFACE
// ============================================================================

export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number;
}

export type QueryFn = <T = Record<string, unknown>>(
  sql: string,
  params?: unknown[]
) => Promise<QueryResult<T>>;

export interface Database {
  query: QueryFn;
  serializableTransaction<T>(fn: (query: QueryFn) => Promise<T>): Promise<T>;
  healthCheck(): Promise<{ connected: boolean; latencyMs: number }>;
  close(): Promise<void>;
}

export type RawQuery = (sql: string, params?: unknown[]) => Promise<PgQueryResult>;

/**
 * Wrap a node-postgres style query function as a typed QueryFn.
 */
export function bindQuery(run: RawQuery): QueryFn {
  return async <T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>> => {
    const result = await run(sql, params);
    const rows: T[] = result.rows;
    return { rows, rowCount: result.rowCount ?? 0 };
  };
}

export function createDatabase(options: { url: string; maxConnections?: number }): Database {
  const pool = new Pool({
    connectionString: options.url,
    max: options.maxConnections ?? 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  pool.on('error', (err) => {
    dbLogger.error({ err }, 'Idle client error');
  });

  const runInTransaction = async <T>(
    begin: string,
    fn: (query: QueryFn) => Promise<T>
  ): Promise<T> => {
    const client = await pool.connect();
    try {
      await client.query(begin);
      const result = await fn(bindQuery((sql, params) => client.query(sql, params)));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        dbLogger.error(
          { originalError: error, rollbackError },
          'ROLLBACK failed - original error may be lost'
        );
      }
      throw error;
    } finally {
      client.release();
    }
  };

  const database: Database = {
    query: bindQuery((sql, params) => pool.query(sql, params)),

    /**
     * Use for every wallet mutation
     */
    serializableTransaction: (fn) => runInTransaction('BEGIN ISOLATION LEVEL SERIALIZABLE', fn),

    healthCheck: async () => {
      const start = Date.now();
      try {
        await pool.query('SELECT 1');
        return { connected: true, latencyMs: Date.now() - start };
      } catch (error) {
        dbLogger.warn({ err: error }, 'Database health check failed');
        return { connected: false, latencyMs: Date.now() - start };
      }
    },

    close: async () => {
      await pool.end();
      dbLogger.info('Database pool closed');
    },
  };

  const maskedUrl = options.url.replace(/:[^:@/]+@/, ':***@');
  dbLogger.info({ url: maskedUrl }, 'Postgres pool initialized');

  return database;
}
