/**
 * Database Connection Module
 *
 * Connection pooling, typed query helpers, transactions and graceful
 * shutdown for the PostgreSQL ledger.
 *
 * @module db
 */

import { Pool, type PoolClient, type QueryResultRow } from 'pg';

import { getDatabaseConfig, toPgPoolConfig, type DatabaseConfig } from '../config/database.js';
import { InvariantViolationError, LeaveError } from '../types/errors.js';

// SQLSTATE of a unique constraint violation, e.g. a duplicate idempotency key
const UNIQUE_VIOLATION = '23505';

/**
 * Query execution context for logging and tracing
 */
export interface QueryContext {
  readonly queryId: string;
  readonly startTime: number;
  readonly correlationId?: string;
  readonly operation?: string;
}

/**
 * Query execution result with metadata
 */
export interface QueryExecutionResult<T extends QueryResultRow = QueryResultRow> {
  readonly rows: T[];
  readonly rowCount: number;
  readonly executionTimeMs: number;
  readonly context: QueryContext;
}

/**
 * Per-query options
 */
export interface QueryOptions {
  readonly correlationId?: string;
  readonly operation?: string;
}

/**
 * Transaction callback function type
 */
export type TransactionCallback<T> = (client: PoolClient) => Promise<T>;

/**
 * Transaction options
 */
export interface TransactionOptions extends QueryOptions {
  readonly isolationLevel?: 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

  /**
   * Statement timeout inside the transaction, in milliseconds
   */
  readonly timeout?: number;
}

/**
 * Database pool statistics
 */
export interface PoolStats {
  readonly totalCount: number;
  readonly idleCount: number;
  readonly waitingCount: number;
  readonly timestamp: Date;
}

/**
 * Database health check result
 */
export interface DatabaseHealthCheck {
  readonly healthy: boolean;
  readonly latencyMs?: number;
  readonly poolStats?: PoolStats;
  readonly error?: string;
  readonly timestamp: Date;
}

let poolInstance: Pool | null = null;
let configInstance: DatabaseConfig | null = null;
let isShuttingDown = false;
let activeQueryCount = 0;

function generateQueryId(): string {
  return `query_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Read the SQLSTATE code and detail pg attaches to its errors
 */
function describePgError(error: unknown): {
  message: string;
  code?: string;
  detail?: string;
  constraint?: string;
} {
  const message = error instanceof Error ? error.message : String(error);
  if (typeof error !== 'object' || error === null) {
    return { message };
  }
  const record = error as Record<string, unknown>;
  return {
    message,
    code: typeof record.code === 'string' ? record.code : undefined,
    detail: typeof record.detail === 'string' ? record.detail : undefined,
    constraint: typeof record.constraint === 'string' ? record.constraint : undefined,
  };
}

function poolCounts(): { totalCount: number; idleCount: number; waitingCount: number } {
  return {
    totalCount: poolInstance?.totalCount ?? 0,
    idleCount: poolInstance?.idleCount ?? 0,
    waitingCount: poolInstance?.waitingCount ?? 0,
  };
}

/**
 * Initialize database connection pool
 *
 * Idempotent: calling it again returns the same pool.
 *
 * @throws Error if pool initialization fails
 */
export function initializePool(): Pool {
  if (poolInstance) {
    return poolInstance;
  }

  if (isShuttingDown) {
    throw new Error('[DATABASE] Cannot initialize pool during shutdown');
  }

  try {
    configInstance = getDatabaseConfig();
    poolInstance = new Pool(toPgPoolConfig(configInstance));

    poolInstance.on('connect', () => {
      if (configInstance?.enableLogging) {
        console.log('[DATABASE] New client connected to pool', poolCounts());
      }
    });

    poolInstance.on('error', (error) => {
      console.error('[DATABASE] Unexpected pool error:', {
        ...describePgError(error),
        timestamp: new Date().toISOString(),
      });
    });

    console.log('[DATABASE] Database connection pool initialized', {
      host: configInstance.host,
      port: configInstance.port,
      database: configInstance.database,
      poolMax: configInstance.poolMax,
      ssl: configInstance.ssl,
    });

    return poolInstance;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error('[DATABASE] Failed to initialize pool:', {
      error: message,
      timestamp: new Date().toISOString(),
    });
    throw new Error(`[DATABASE] Pool initialization failed: ${message}`);
  }
}

/**
 * Get database connection pool, initializing it on first use
 */
export function getPool(): Pool {
  return poolInstance ?? initializePool();
}

/**
 * Execute a SQL query with type-safe results
 *
 * @throws Error if query execution fails
 */
export async function executeQuery<T extends QueryResultRow = QueryResultRow>(
  query: string,
  params?: unknown[],
  options?: QueryOptions
): Promise<QueryExecutionResult<T>> {
  if (isShuttingDown) {
    throw new Error('[DATABASE] Cannot execute query during shutdown');
  }

  const pool = getPool();
  const context: QueryContext = {
    queryId: generateQueryId(),
    startTime: Date.now(),
    correlationId: options?.correlationId,
    operation: options?.operation,
  };

  activeQueryCount++;

  try {
    const result = await pool.query<T>(query, params);
    const executionTimeMs = Date.now() - context.startTime;

    if (configInstance?.enableLogging) {
      console.log('[DATABASE] Query executed:', {
        queryId: context.queryId,
        operation: context.operation,
        correlationId: context.correlationId,
        rowCount: result.rowCount ?? 0,
        executionTimeMs,
      });
    }

    return {
      rows: result.rows,
      rowCount: result.rowCount ?? 0,
      executionTimeMs,
      context,
    };
  } catch (error) {
    const described = describePgError(error);

    console.error('[DATABASE] Query execution error:', {
      queryId: context.queryId,
      operation: context.operation,
      correlationId: context.correlationId,
      ...described,
      executionTimeMs: Date.now() - context.startTime,
    });

    throw new Error(
      `[DATABASE] Query execution failed: ${described.message}${described.code ? ` (${described.code})` : ''}`
    );
  } finally {
    activeQueryCount--;
  }
}

/**
 * Execute a query and return a single row
 *
 * @returns Single row or null if not found
 * @throws Error if query returns multiple rows
 */
export async function queryOne<T extends QueryResultRow = QueryResultRow>(
  query: string,
  params?: unknown[],
  options?: QueryOptions
): Promise<T | null> {
  const result = await executeQuery<T>(query, params, options);

  if (result.rowCount > 1) {
    throw new Error(
      `[DATABASE] Expected single row but got ${result.rowCount} rows (queryId: ${result.context.queryId})`
    );
  }

  return result.rows[0] ?? null;
}

/**
 * Execute a query and return multiple rows
 */
export async function queryMany<T extends QueryResultRow = QueryResultRow>(
  query: string,
  params?: unknown[],
  options?: QueryOptions
): Promise<T[]> {
  const result = await executeQuery<T>(query, params, options);
  return result.rows;
}

/**
 * Execute a transaction with automatic rollback on error
 *
 * Engine errors thrown by the callback (version conflicts, invariant
 * violations) are rethrown unchanged after the rollback so callers can
 * match on them. A unique violation becomes an InvariantViolationError, as in
 * the in-memory ledger; other driver errors are wrapped.
 *
 * @throws Error if transaction fails
 */
export async function executeTransaction<T>(
  callback: TransactionCallback<T>,
  options?: TransactionOptions
): Promise<T> {
  if (isShuttingDown) {
    throw new Error('[DATABASE] Cannot execute transaction during shutdown');
  }

  const pool = getPool();
  const transactionId = generateQueryId();
  const startTime = Date.now();

  activeQueryCount++;

  let client: PoolClient | null = null;

  try {
    client = await pool.connect();

    const isolationLevel = options?.isolationLevel ?? 'READ COMMITTED';
    await client.query(`BEGIN ISOLATION LEVEL ${isolationLevel}`);

    if (options?.timeout) {
      await client.query(`SET LOCAL statement_timeout = ${Math.floor(options.timeout)}`);
    }

    const result = await callback(client);

    await client.query('COMMIT');

    if (configInstance?.enableLogging) {
      console.log('[DATABASE] Transaction committed:', {
        transactionId,
        executionTimeMs: Date.now() - startTime,
        correlationId: options?.correlationId,
        operation: options?.operation,
      });
    }

    return result;
  } catch (error) {
    if (client) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        console.error('[DATABASE] Rollback failed:', {
          transactionId,
          rollbackError: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
        });
      }
    }

    if (error instanceof LeaveError) {
      throw error;
    }

    const described = describePgError(error);

    if (described.code === UNIQUE_VIOLATION) {
      throw new InvariantViolationError('Unique constraint violated', {
        constraint: described.constraint,
        detail: described.detail,
      });
    }

    console.error('[DATABASE] Transaction failed:', {
      transactionId,
      ...described,
      correlationId: options?.correlationId,
      operation: options?.operation,
      executionTimeMs: Date.now() - startTime,
    });

    throw new Error(
      `[DATABASE] Transaction failed: ${described.message}${described.code ? ` (${described.code})` : ''}`
    );
  } finally {
    client?.release();
    activeQueryCount--;
  }
}

/**
 * Test database connection
 */
export async function testConnection(): Promise<DatabaseHealthCheck> {
  const timestamp = new Date();
  const startTime = Date.now();

  try {
    const pool = getPool();
    await pool.query('SELECT 1 as test');
    const latencyMs = Date.now() - startTime;

    return {
      healthy: true,
      latencyMs,
      poolStats: {
        totalCount: pool.totalCount,
        idleCount: pool.idleCount,
        waitingCount: pool.waitingCount,
        timestamp,
      },
      timestamp,
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    console.error('[DATABASE] Connection test failed:', {
      error: errorMessage,
      timestamp: timestamp.toISOString(),
    });

    return {
      healthy: false,
      error: errorMessage,
      timestamp,
    };
  }
}

/**
 * Gracefully shutdown database connection pool
 *
 * Waits for active queries to complete before closing the pool.
 */
export async function shutdown(options?: {
  readonly timeout?: number;
  readonly force?: boolean;
}): Promise<void> {
  if (isShuttingDown) {
    console.warn('[DATABASE] Shutdown already in progress');
    return;
  }

  if (!poolInstance) {
    return;
  }

  isShuttingDown = true;
  const timeout = options?.timeout ?? 30000;
  const startTime = Date.now();

  console.log('[DATABASE] Starting graceful shutdown...', {
    activeQueryCount,
    timeout,
    force: options?.force ?? false,
  });

  try {
    if (!options?.force) {
      while (activeQueryCount > 0 && Date.now() - startTime < timeout) {
        await new Promise((resolve) => setTimeout(resolve, 100));
      }

      if (activeQueryCount > 0) {
        console.warn('[DATABASE] Shutdown timeout reached with active queries:', {
          activeQueryCount,
          elapsedMs: Date.now() - startTime,
        });
      }
    }

    await poolInstance.end();
    poolInstance = null;
    configInstance = null;

    console.log('[DATABASE] Database connection pool closed', {
      elapsedMs: Date.now() - startTime,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error('[DATABASE] Error during shutdown:', {
      error: message,
      elapsedMs: Date.now() - startTime,
    });
    throw new Error(`[DATABASE] Shutdown failed: ${message}`);
  } finally {
    isShuttingDown = false;
  }
}
