/**
 * HTTP Server Entry Point Module
 *
 * Wires the leave services from configuration, starts the HTTP server and the
 * side-effect worker, and shuts everything down in order on a signal.
 *
 * @module server
 */

import { type Server } from 'http';

import { createApp } from './app.js';
import { getAuthConfig } from './config/auth.js';
import { getEmailConfig } from './config/email.js';
import { parseBoolean, parseEnvironment, parseInteger, parseOptionalString } from './config/env.js';
import { getIntegrationsConfig } from './config/integrations.js';
import { getLeaveConfig } from './config/leave.js';
import { createLeaveServices, type LeaveServices } from './container.js';
import { initializePool, shutdown as shutdownDatabase, testConnection } from './db/index.js';
import { computeBackoffDelay, sleep } from './utils/backoff.js';

const TAG = 'SERVER';

/**
 * Environment Configuration
 */
const ENV = {
  NODE_ENV: parseEnvironment(process.env.NODE_ENV, TAG),
  PORT: parseInteger(process.env.PORT, 3000, 1, 65535, 'PORT', TAG),
  HOST: parseOptionalString(process.env.HOST) ?? '0.0.0.0',

  /**
   * Graceful shutdown timeout in milliseconds
   */
  SHUTDOWN_TIMEOUT: parseInteger(process.env.SHUTDOWN_TIMEOUT, 30000, 1000, 300000, 'SHUTDOWN_TIMEOUT', TAG),

  DB_CONNECTION_TIMEOUT: parseInteger(
    process.env.DB_CONNECTION_TIMEOUT,
    10000,
    1000,
    120000,
    'DB_CONNECTION_TIMEOUT',
    TAG
  ),

  /**
   * Use the Postgres ledger; false runs on the in-memory ledger
   */
  ENABLE_DATABASE: parseBoolean(process.env.ENABLE_DATABASE, true, TAG),

  /**
   * Run the side-effect worker in this process
   */
  ENABLE_WORKER: parseBoolean(process.env.ENABLE_WORKER, true, TAG),
} as const;

/**
 * Server state tracking
 */
let serverInstance: Server | null = null;
let services: LeaveServices | null = null;
let isShuttingDown = false;

/**
 * Initialize Database Connection
 *
 * Retries with exponential backoff before giving up.
 */
async function initializeDatabase(): Promise<boolean> {
  if (!ENV.ENABLE_DATABASE) {
    console.log('[SERVER] Database connection disabled (ENABLE_DATABASE=false), using in-memory ledger');
    return true;
  }

  console.log('[SERVER] Initializing database connection...');

  const maxRetries = 3;
  const baseDelay = 1000;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      initializePool();

      let timer: NodeJS.Timeout | undefined;
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('Database connection timeout')), ENV.DB_CONNECTION_TIMEOUT);
      });

      const healthCheck = await Promise.race([testConnection(), timeoutPromise]).finally(() =>
        clearTimeout(timer)
      );

      if (!healthCheck.healthy) {
        throw new Error(`Database health check failed: ${healthCheck.error}`);
      }

      console.log('[SERVER] Database connection established successfully:', {
        latencyMs: healthCheck.latencyMs,
        poolStats: healthCheck.poolStats,
        timestamp: new Date().toISOString(),
      });

      return true;
    } catch (error) {
      console.error(`[SERVER] Database connection attempt ${attempt}/${maxRetries} failed:`, {
        error: error instanceof Error ? error.message : String(error),
        attempt,
        timestamp: new Date().toISOString(),
      });

      if (attempt < maxRetries) {
        const delay = computeBackoffDelay(attempt, baseDelay, 8000);
        console.log(`[SERVER] Retrying database connection in ${delay}ms...`);
        await sleep(delay);
      }
    }
  }

  console.error('[SERVER] FATAL: Failed to establish database connection after all retries');
  return false;
}

/**
 * Start HTTP Server
 *
 * @throws {Error} If the port cannot be bound
 */
function startServer(leaveServices: LeaveServices): Promise<Server> {
  return new Promise((resolve, reject) => {
    console.log('[SERVER] Starting HTTP server...', {
      host: ENV.HOST,
      port: ENV.PORT,
      environment: ENV.NODE_ENV,
      timestamp: new Date().toISOString(),
    });

    const app = createApp({
      engine: leaveServices.engine,
      executor: leaveServices.executor,
      context: leaveServices.context,
      reports: leaveServices.reports,
      rateLimit: getAuthConfig().rateLimit,
    });

    const server = app.listen(ENV.PORT, ENV.HOST, () => {
      console.log('[SERVER] HTTP server started successfully:', {
        host: ENV.HOST,
        port: ENV.PORT,
        environment: ENV.NODE_ENV,
        processId: process.pid,
        nodeVersion: process.version,
        timestamp: new Date().toISOString(),
      });

      resolve(server);
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
      const reasons: Record<string, string> = {
        EADDRINUSE: `Port ${ENV.PORT} is already in use`,
        EACCES: `Permission denied to bind to port ${ENV.PORT}`,
      };
      const reason = error.code ? reasons[error.code] : undefined;

      console.error('[SERVER] FATAL: Could not bind HTTP server:', {
        port: ENV.PORT,
        code: error.code,
        error: error.message,
      });
      reject(reason ? new Error(reason) : error);
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

/**
 * Graceful Shutdown Handler
 *
 * Stops the worker first so no effect is claimed after the pool closes, then
 * the HTTP server, then the database pool and SMTP transport.
 */
async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    console.warn('[SERVER] Shutdown already in progress, ignoring signal:', signal);
    return;
  }

  isShuttingDown = true;

  console.log('[SERVER] Received shutdown signal:', {
    signal,
    timestamp: new Date().toISOString(),
  });

  const shutdownTimeout = setTimeout(() => {
    console.error('[SERVER] FATAL: Shutdown timeout exceeded, forcing exit');
    process.exit(1);
  }, ENV.SHUTDOWN_TIMEOUT);

  try {
    if (services) {
      await services.worker.stop();
    }

    if (serverInstance) {
      console.log('[SERVER] Closing HTTP server...');
      await closeServer(serverInstance);
      console.log('[SERVER] HTTP server closed successfully');
    }

    if (ENV.ENABLE_DATABASE) {
      console.log('[SERVER] Closing database connections...');
      await shutdownDatabase({ timeout: Math.max(ENV.SHUTDOWN_TIMEOUT - 5000, 1000), force: false });
    }

    services?.emailService.close();

    clearTimeout(shutdownTimeout);
    console.log('[SERVER] Graceful shutdown completed successfully');
    process.exit(0);
  } catch (error) {
    console.error('[SERVER] FATAL: Error during graceful shutdown:', {
      error: error instanceof Error ? error.message : String(error),
      timestamp: new Date().toISOString(),
    });
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

function setupSignalHandlers(): void {
  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
  });

  process.on('uncaughtException', (error: Error) => {
    console.error('[SERVER] FATAL: Uncaught exception:', {
      error: error.message,
      stack: error.stack,
      timestamp: new Date().toISOString(),
    });
    void gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    console.error('[SERVER] FATAL: Unhandled promise rejection:', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
      timestamp: new Date().toISOString(),
    });
    void gracefulShutdown('unhandledRejection');
  });
}

/**
 * Main Server Initialization
 *
 * 1. Signal handlers
 * 2. Database connection (unless disabled)
 * 3. Services and side-effect worker
 * 4. HTTP server
 */
export async function main(): Promise<void> {
  console.log('[SERVER] Starting leave orchestration service:', {
    nodeEnv: ENV.NODE_ENV,
    nodeVersion: process.version,
    processId: process.pid,
    timestamp: new Date().toISOString(),
  });

  try {
    setupSignalHandlers();

    if (!(await initializeDatabase())) {
      throw new Error('Failed to initialize database connection');
    }

    services = createLeaveServices({
      leave: getLeaveConfig(),
      integrations: getIntegrationsConfig(),
      email: getEmailConfig(),
      useDatabase: ENV.ENABLE_DATABASE,
    });

    if (ENV.ENABLE_WORKER) {
      services.worker.start();
    } else {
      console.log('[SERVER] Side-effect worker disabled (ENABLE_WORKER=false)');
    }

    serverInstance = await startServer(services);

    console.log('[SERVER] Server is ready to accept connections:', {
      url: `http://${ENV.HOST === '0.0.0.0' ? 'localhost' : ENV.HOST}:${ENV.PORT}`,
      worker: services.worker.isRunning,
    });
  } catch (error) {
    console.error('[SERVER] FATAL: Server initialization failed:', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      timestamp: new Date().toISOString(),
    });

    if (services) {
      await services.worker.stop();
    }
    if (ENV.ENABLE_DATABASE) {
      await shutdownDatabase({ timeout: 5000, force: true }).catch((cleanupError: unknown) => {
        console.error('[SERVER] Error during cleanup:', {
          error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      });
    }

    process.exit(1);
  }
}
