/**
 * Database Configuration Module
 *
 * Connection settings for the PostgreSQL ledger, read from DATABASE_URL or
 * the individual DB_* variables.
 *
 * @module config/database
 */

import { type PoolConfig } from 'pg';

import { parseBoolean, parseEnvironment, parseInteger, parseOptionalString, type Environment } from './env.js';

const TAG = 'DATABASE_CONFIG';

/**
 * How the pool negotiates TLS. `require` encrypts without verifying the
 * server certificate, `verify-full` verifies it.
 */
export type DatabaseSSLMode = 'disable' | 'require' | 'verify-full';

const SSL_MODES: readonly DatabaseSSLMode[] = ['disable', 'require', 'verify-full'];

export interface DatabaseConnection {
  readonly host: string;
  readonly port: number;
  readonly database: string;
  readonly user: string;
  readonly password: string;
}

export interface DatabaseConfig extends DatabaseConnection {
  readonly ssl: DatabaseSSLMode;
  readonly poolMax: number;
  readonly idleTimeoutMillis: number;
  readonly connectionTimeoutMillis: number;

  /**
   * Upper bound on a single statement, including the row locks the ledger
   * takes while guarding versions
   */
  readonly statementTimeout: number;

  readonly environment: Environment;

  /**
   * Log every query and transaction
   */
  readonly enableLogging: boolean;
}

function isSSLMode(value: string): value is DatabaseSSLMode {
  return (SSL_MODES as readonly string[]).includes(value);
}

function parseSSLMode(value: string | undefined, environment: Environment): DatabaseSSLMode {
  const fallback: DatabaseSSLMode = environment === 'production' ? 'verify-full' : 'disable';
  const mode = value?.trim().toLowerCase();
  if (!mode) {
    return fallback;
  }
  if (!isSSLMode(mode)) {
    console.warn(`[${TAG}] Invalid DB_SSL_MODE "${value}", using "${fallback}". Valid modes: ${SSL_MODES.join(', ')}`);
    return fallback;
  }
  return mode;
}

/**
 * Parse a postgres:// or postgresql:// connection string
 *
 * @returns null when absent, malformed or missing host, database or user
 */
export function parseDatabaseURL(url: string | undefined): DatabaseConnection | null {
  if (!url) {
    return null;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    console.warn(`[${TAG}] DATABASE_URL is not a valid URL`);
    return null;
  }

  if (parsed.protocol !== 'postgresql:' && parsed.protocol !== 'postgres:') {
    console.warn(`[${TAG}] Invalid DATABASE_URL protocol: ${parsed.protocol}`);
    return null;
  }

  const connection: DatabaseConnection = {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : 5432,
    database: decodeURIComponent(parsed.pathname.slice(1)),
    user: decodeURIComponent(parsed.username),
    password: decodeURIComponent(parsed.password),
  };

  if (!connection.host || !connection.database || !connection.user) {
    console.warn(`[${TAG}] DATABASE_URL must name a host, a database and a user`);
    return null;
  }
  return connection;
}

/**
 * Load database configuration from environment variables
 *
 * DATABASE_URL takes precedence over DB_HOST, DB_PORT, DB_NAME, DB_USER and
 * DB_PASSWORD.
 *
 * @throws Error if no password is configured in production
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const environment = parseEnvironment(env.NODE_ENV, TAG);
  const connection: DatabaseConnection = parseDatabaseURL(env.DATABASE_URL) ?? {
    host: parseOptionalString(env.DB_HOST) ?? 'localhost',
    port: parseInteger(env.DB_PORT, 5432, 1, 65535, 'DB_PORT', TAG),
    database: parseOptionalString(env.DB_NAME) ?? 'leave_ledger',
    user: parseOptionalString(env.DB_USER) ?? 'leave_user',
    password: env.DB_PASSWORD ?? '',
  };

  if (!connection.password && environment === 'production') {
    throw new Error(`[${TAG}] FATAL: Database password is required in production. Set DATABASE_URL or DB_PASSWORD.`);
  }

  const config: DatabaseConfig = {
    ...connection,
    ssl: parseSSLMode(env.DB_SSL_MODE, environment),
    poolMax: parseInteger(env.DB_POOL_MAX, environment === 'production' ? 20 : 5, 1, 200, 'DB_POOL_MAX', TAG),
    idleTimeoutMillis: parseInteger(env.DB_POOL_IDLE_TIMEOUT, 30000, 1000, 3600000, 'DB_POOL_IDLE_TIMEOUT', TAG),
    connectionTimeoutMillis: parseInteger(
      env.DB_POOL_CONNECTION_TIMEOUT,
      10000,
      1000,
      60000,
      'DB_POOL_CONNECTION_TIMEOUT',
      TAG
    ),
    statementTimeout: parseInteger(env.DB_STATEMENT_TIMEOUT, 30000, 1000, 600000, 'DB_STATEMENT_TIMEOUT', TAG),
    environment,
    enableLogging: parseBoolean(env.DB_ENABLE_LOGGING, environment === 'development', TAG),
  };

  console.log(`[${TAG}] Database configuration loaded:`, {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    ssl: config.ssl,
    poolMax: config.poolMax,
    environment: config.environment,
    passwordSet: config.password.length > 0,
  });

  return config;
}

/**
 * Convert DatabaseConfig to pg PoolConfig
 */
export function toPgPoolConfig(config: DatabaseConfig): PoolConfig {
  return {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeoutMillis,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
    application_name: 'leave-orchestrator',
    statement_timeout: config.statementTimeout,
    ssl: config.ssl === 'disable' ? false : { rejectUnauthorized: config.ssl === 'verify-full' },
  };
}

let databaseConfigInstance: DatabaseConfig | null = null;

/**
 * Get database configuration singleton
 */
export function getDatabaseConfig(): DatabaseConfig {
  if (!databaseConfigInstance) {
    databaseConfigInstance = loadDatabaseConfig();
  }
  return databaseConfigInstance;
}
