/**
 * Global test setup for Vitest
 *
 * Runs before every test file and pins the environment the configuration
 * modules read.
 */

import { afterEach, beforeEach, vi } from 'vitest';

process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = 'test-secret';
process.env.JWT_ISSUER = 'leave-orchestrator';
process.env.JWT_AUDIENCE = 'leave-orchestrator-api';
process.env.ENABLE_DATABASE = 'false';
process.env.ENABLE_WORKER = 'false';
process.env.EMAIL_ENABLED = 'false';
process.env.DB_ENABLE_LOGGING = 'false';

// Keep test output readable. restoreMocks undoes these after every test,
// so they are re-applied before each one.
beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.useRealTimers();
});
