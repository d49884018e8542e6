/**
 * Database helper unit tests
 *
 * pg is mocked; no connection is opened.
 *
 * @module tests/unit/db
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { executeTransaction, queryOne, shutdown, testConnection } from '../../../src/db/index.js';
import { InvariantViolationError, VersionConflictError } from '../../../src/types/errors.js';

const fake = vi.hoisted(() => ({
  client: { query: vi.fn(), release: vi.fn() },
  pool: {
    query: vi.fn(),
    connect: vi.fn(),
    on: vi.fn(),
    end: vi.fn(),
    totalCount: 1,
    idleCount: 1,
    waitingCount: 0,
  },
}));

vi.mock('pg', () => ({
  Pool: vi.fn(function () {
    return fake.pool;
  }),
}));

describe('database helpers', () => {
  beforeEach(() => {
    fake.client.query.mockResolvedValue({ rows: [], rowCount: 0 });
    fake.pool.connect.mockResolvedValue(fake.client);
    fake.pool.end.mockResolvedValue(undefined);
  });

  afterEach(async () => {
    await shutdown({ force: true });
  });

  describe('executeTransaction', () => {
    it('should wrap the callback in BEGIN and COMMIT and release the client', async () => {
      const result = await executeTransaction(async (client) => {
        await client.query('SELECT 1');
        return 'done';
      });

      expect(result).toBe('done');
      expect(fake.client.query.mock.calls.map((call) => call[0])).toEqual([
        'BEGIN ISOLATION LEVEL READ COMMITTED',
        'SELECT 1',
        'COMMIT',
      ]);
      expect(fake.client.release).toHaveBeenCalledTimes(1);
    });

    it('should roll back and rethrow engine errors unchanged', async () => {
      const conflict = new VersionConflictError('req-1', 1, 2);

      await expect(
        executeTransaction(async () => {
          throw conflict;
        })
      ).rejects.toBe(conflict);
      expect(fake.client.query).toHaveBeenLastCalledWith('ROLLBACK');
      expect(fake.client.release).toHaveBeenCalledTimes(1);
    });

    it('should report a unique violation as an invariant violation', async () => {
      const duplicate = Object.assign(new Error('duplicate key value violates unique constraint'), {
        code: '23505',
        constraint: 'idx_side_effect_records_key',
        detail: 'Key (idempotency_key)=(leave:req-1:calendar_create:v3) already exists.',
      });

      const attempt = executeTransaction(async () => {
        throw duplicate;
      });

      await expect(attempt).rejects.toBeInstanceOf(InvariantViolationError);
      await expect(attempt).rejects.toMatchObject({
        details: {
          constraint: 'idx_side_effect_records_key',
          detail: 'Key (idempotency_key)=(leave:req-1:calendar_create:v3) already exists.',
        },
      });
    });

    it('should wrap other driver errors with their SQLSTATE', async () => {
      await expect(
        executeTransaction(async () => {
          throw Object.assign(new Error('terminating connection'), { code: '57P01' });
        })
      ).rejects.toThrow('[DATABASE] Transaction failed: terminating connection (57P01)');
    });

    it('should set a statement timeout when asked', async () => {
      await executeTransaction(async () => undefined, { isolationLevel: 'SERIALIZABLE', timeout: 2500 });

      expect(fake.client.query.mock.calls.slice(0, 2).map((call) => call[0])).toEqual([
        'BEGIN ISOLATION LEVEL SERIALIZABLE',
        'SET LOCAL statement_timeout = 2500',
      ]);
    });
  });

  describe('queryOne', () => {
    it('should refuse more than one row', async () => {
      fake.pool.query.mockResolvedValue({ rows: [{ id: 'a' }, { id: 'b' }], rowCount: 2 });

      await expect(queryOne('SELECT id FROM employees')).rejects.toThrow(
        /^\[DATABASE\] Expected single row but got 2 rows/
      );
    });

    it('should return null when nothing matches', async () => {
      fake.pool.query.mockResolvedValue({ rows: [], rowCount: 0 });

      expect(await queryOne('SELECT id FROM employees WHERE id = $1', ['ghost'])).toBeNull();
    });
  });

  describe('testConnection', () => {
    it('should report pool statistics when healthy', async () => {
      fake.pool.query.mockResolvedValue({ rows: [{ test: 1 }], rowCount: 1 });

      const health = await testConnection();

      expect(health.healthy).toBe(true);
      expect(health.poolStats).toMatchObject({ totalCount: 1, idleCount: 1, waitingCount: 0 });
    });

    it('should report a failed connection', async () => {
      fake.pool.query.mockRejectedValue(new Error('ECONNREFUSED'));

      const health = await testConnection();

      expect(health).toMatchObject({ healthy: false, error: 'ECONNREFUSED' });
    });
  });
});
