/**
 * PostgreSQL Ledger Store
 *
 * Version guards take a row lock (`SELECT ... FOR UPDATE`) inside the
 * transaction that performs the write, so two writers presenting the same
 * version serialize and the second sees the bumped version. Side-effect
 * records are leased with `FOR UPDATE SKIP LOCKED` so concurrent workers
 * never claim the same record.
 *
 * @module services/postgres-ledger
 */

import crypto from 'crypto';
import type { PoolClient } from 'pg';

import { executeQuery, executeTransaction, queryMany, queryOne } from '../db/index.js';
import {
  InvariantViolationError,
  LeaseLostError,
  NotFoundError,
  VersionConflictError,
} from '../types/errors.js';
import {
  LeaveState,
  isLeaveState,
  isLeaveType,
  isMessageTemplate,
  isSideEffectKind,
  isSideEffectStatus,
  type ApprovalTier,
  type BalanceAdjustment,
  type DateSpan,
  type Employee,
  type LeaveBalances,
  type LeaveRequest,
  type LeaveType,
  type MessageTemplate,
  type SideEffectRecord,
  type SideEffectStatus,
} from '../types/leave.js';
import {
  roundDays,
  type CommittedTransition,
  type EffectUpdate,
  type EmployeeSeed,
  type LedgerStore,
  type OverlapQuery,
  type TransitionCommit,
} from './ledger-store.js';

/**
 * Database record interface for employees joined with their balances
 */
interface EmployeeRecord {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly phone: string | null;
  readonly team_id: string;
  readonly manager_id: string | null;
  readonly version: number;
  readonly balances: unknown;
  readonly created_at: Date;
  readonly updated_at: Date;
}

/**
 * Database record interface for leave requests
 */
interface LeaveRequestRecord {
  readonly id: string;
  readonly employee_id: string;
  readonly leave_type: string;
  readonly start_date: string;
  readonly end_date: string;
  readonly half_day: boolean;
  readonly days: string;
  readonly reason: string;
  readonly state: string;
  readonly version: number;
  readonly approval_tier: string;
  readonly decided_by: string | null;
  readonly decision_note: string | null;
  readonly sync_batch: number | null;
  readonly created_at: Date;
  readonly updated_at: Date;
}

/**
 * Database record interface for side-effect records
 */
interface SideEffectRow {
  readonly id: string;
  readonly request_id: string;
  readonly kind: string;
  readonly idempotency_key: string;
  readonly scheduled_at_version: number;
  readonly status: string;
  readonly attempts: number;
  readonly last_error: string | null;
  readonly abandoned: boolean;
  readonly template: string | null;
  readonly recipient_id: string | null;
  readonly result: string | null;
  readonly locked_until: Date | null;
  readonly lease_token: string | null;
  readonly created_at: Date;
  readonly updated_at: Date;
}

const EMPLOYEE_SELECT = `
  SELECT e.id, e.name, e.email, e.phone, e.team_id, e.manager_id, e.version,
         e.created_at, e.updated_at,
         COALESCE(
           json_object_agg(b.leave_type, b.remaining) FILTER (WHERE b.leave_type IS NOT NULL),
           '{}'::json
         ) AS balances
    FROM employees e
    LEFT JOIN employee_balances b ON b.employee_id = e.id`;

// DATE columns are read as text so no timezone conversion touches them
const REQUEST_COLUMNS = `
  r.id, r.employee_id, r.leave_type,
  to_char(r.start_date, 'YYYY-MM-DD') AS start_date,
  to_char(r.end_date, 'YYYY-MM-DD') AS end_date,
  r.half_day, r.days::text AS days, r.reason, r.state, r.version, r.approval_tier,
  r.decided_by, r.decision_note, r.sync_batch, r.created_at, r.updated_at`;

function toTemplate(value: string | null): MessageTemplate | undefined {
  if (value === null) {
    return undefined;
  }
  if (!isMessageTemplate(value)) {
    throw unexpected('template', value);
  }
  return value;
}

function unexpected(column: string, value: unknown): InvariantViolationError {
  return new InvariantViolationError(`Unexpected value in ledger column ${column}`, {
    column,
    value,
  });
}

function toBalances(value: unknown): LeaveBalances {
  const balances: LeaveBalances = {};
  if (typeof value !== 'object' || value === null) {
    return balances;
  }
  for (const [leaveType, remaining] of Object.entries(value)) {
    const amount = Number(remaining);
    if (isLeaveType(leaveType) && Number.isFinite(amount)) {
      balances[leaveType] = roundDays(amount);
    }
  }
  return balances;
}

function toEmployee(row: EmployeeRecord): Employee {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    phone: row.phone ?? undefined,
    teamId: row.team_id,
    managerId: row.manager_id ?? undefined,
    balances: toBalances(row.balances),
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toApprovalTier(value: string): ApprovalTier {
  if (value === 'standard' || value === 'escalated') {
    return value;
  }
  throw unexpected('approval_tier', value);
}

function toLeaveRequest(row: LeaveRequestRecord): LeaveRequest {
  if (!isLeaveType(row.leave_type)) {
    throw unexpected('leave_type', row.leave_type);
  }
  if (!isLeaveState(row.state)) {
    throw unexpected('state', row.state);
  }
  return {
    id: row.id,
    employeeId: row.employee_id,
    leaveType: row.leave_type,
    span: { start: row.start_date, end: row.end_date },
    halfDay: row.half_day,
    days: Number(row.days),
    reason: row.reason,
    state: row.state,
    version: row.version,
    approvalTier: toApprovalTier(row.approval_tier),
    decidedBy: row.decided_by ?? undefined,
    decisionNote: row.decision_note ?? undefined,
    syncBatch: row.sync_batch ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toSideEffect(row: SideEffectRow): SideEffectRecord {
  if (!isSideEffectKind(row.kind)) {
    throw unexpected('kind', row.kind);
  }
  if (!isSideEffectStatus(row.status)) {
    throw unexpected('status', row.status);
  }
  return {
    id: row.id,
    requestId: row.request_id,
    kind: row.kind,
    idempotencyKey: row.idempotency_key,
    scheduledAtVersion: row.scheduled_at_version,
    status: row.status,
    attempts: row.attempts,
    lastError: row.last_error ?? undefined,
    abandoned: row.abandoned,
    template: toTemplate(row.template),
    recipientId: row.recipient_id ?? undefined,
    result: row.result ?? undefined,
    lockedUntil: row.locked_until ?? undefined,
    leaseToken: row.lease_token ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

async function fetchEmployee(client: PoolClient, id: string): Promise<Employee | null> {
  const result = await client.query<EmployeeRecord>(
    `${EMPLOYEE_SELECT} WHERE e.id = $1 GROUP BY e.id`,
    [id]
  );
  const row = result.rows[0];
  return row ? toEmployee(row) : null;
}

/**
 * Lock the request row and check its version
 */
async function guardRequestVersion(
  client: PoolClient,
  requestId: string,
  expectedVersion: number
): Promise<void> {
  const result = await client.query<{ version: number }>(
    'SELECT version FROM leave_requests WHERE id = $1 FOR UPDATE',
    [requestId]
  );
  const actual = result.rows[0]?.version ?? null;
  const matches = expectedVersion === 0 ? actual === null : actual === expectedVersion;
  if (!matches) {
    throw new VersionConflictError(requestId, expectedVersion, actual);
  }
}

async function writeRequest(
  client: PoolClient,
  request: LeaveRequest,
  expectedVersion: number
): Promise<void> {
  const params = [
    request.id,
    request.employeeId,
    request.leaveType,
    request.span.start,
    request.span.end,
    request.halfDay,
    request.days,
    request.reason,
    request.state,
    request.version,
    request.approvalTier,
    request.decidedBy ?? null,
    request.decisionNote ?? null,
    request.syncBatch ?? null,
    request.createdAt,
    request.updatedAt,
  ];

  if (expectedVersion === 0) {
    await client.query(
      `INSERT INTO leave_requests (
         id, employee_id, leave_type, start_date, end_date, half_day, days, reason,
         state, version, approval_tier, decided_by, decision_note, sync_batch,
         created_at, updated_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16)`,
      params
    );
    return;
  }

  await client.query(
    `UPDATE leave_requests
        SET employee_id = $2, leave_type = $3, start_date = $4, end_date = $5,
            half_day = $6, days = $7, reason = $8, state = $9, version = $10,
            approval_tier = $11, decided_by = $12, decision_note = $13,
            sync_batch = $14, created_at = $15, updated_at = $16
      WHERE id = $1`,
    params
  );
}

async function applyBalance(
  client: PoolClient,
  adjustment: BalanceAdjustment
): Promise<Employee> {
  const { employeeId, leaveType, delta, expectedVersion } = adjustment;

  const locked = await client.query<{ version: number }>(
    'SELECT version FROM employees WHERE id = $1 FOR UPDATE',
    [employeeId]
  );
  const lockedRow = locked.rows[0];
  if (!lockedRow) {
    throw new NotFoundError('employee', employeeId);
  }
  if (lockedRow.version !== expectedVersion) {
    throw new VersionConflictError(employeeId, expectedVersion, lockedRow.version);
  }

  // a zero delta only claims the row version
  if (delta !== 0) {
    const current = await client.query<{ remaining: string }>(
      'SELECT remaining::text AS remaining FROM employee_balances WHERE employee_id = $1 AND leave_type = $2',
      [employeeId, leaveType]
    );
    const remaining = roundDays(Number(current.rows[0]?.remaining ?? 0) + delta);
    if (remaining < 0) {
      throw new InvariantViolationError('Balance would become negative', {
        employeeId,
        leaveType,
        delta,
      });
    }

    await client.query(
      `INSERT INTO employee_balances (employee_id, leave_type, remaining)
       VALUES ($1, $2, $3)
       ON CONFLICT (employee_id, leave_type) DO UPDATE SET remaining = EXCLUDED.remaining`,
      [employeeId, leaveType, remaining]
    );
  }
  await client.query(
    'UPDATE employees SET version = version + 1, updated_at = now() WHERE id = $1',
    [employeeId]
  );

  const employee = await fetchEmployee(client, employeeId);
  if (!employee) {
    throw new NotFoundError('employee', employeeId);
  }
  return employee;
}

export class PostgresLedgerStore implements LedgerStore {
  async getEmployee(id: string): Promise<Employee | null> {
    const row = await queryOne<EmployeeRecord>(
      `${EMPLOYEE_SELECT} WHERE e.id = $1 GROUP BY e.id`,
      [id],
      { operation: 'ledger.getEmployee' }
    );
    return row ? toEmployee(row) : null;
  }

  async getRequest(id: string): Promise<LeaveRequest | null> {
    const row = await queryOne<LeaveRequestRecord>(
      `SELECT ${REQUEST_COLUMNS} FROM leave_requests r WHERE r.id = $1`,
      [id],
      { operation: 'ledger.getRequest' }
    );
    return row ? toLeaveRequest(row) : null;
  }

  async saveRequest(request: LeaveRequest, expectedVersion: number): Promise<LeaveRequest> {
    await executeTransaction(
      async (client) => {
        await guardRequestVersion(client, request.id, expectedVersion);
        await writeRequest(client, request, expectedVersion);
      },
      { operation: 'ledger.saveRequest' }
    );
    return request;
  }

  async adjustBalance(
    employeeId: string,
    leaveType: LeaveType,
    delta: number,
    expectedVersion: number
  ): Promise<Employee> {
    return executeTransaction(
      (client) => applyBalance(client, { employeeId, leaveType, delta, expectedVersion }),
      { operation: 'ledger.adjustBalance' }
    );
  }

  async commitTransition(commit: TransitionCommit): Promise<CommittedTransition> {
    return executeTransaction(
      async (client) => {
        await guardRequestVersion(client, commit.request.id, commit.expectedVersion);
        await writeRequest(client, commit.request, commit.expectedVersion);

        const employee = commit.balanceAdjustment
          ? await applyBalance(client, commit.balanceAdjustment)
          : undefined;

        const effects: SideEffectRecord[] = [];
        for (const plan of commit.effects) {
          const inserted = await client.query<SideEffectRow>(
            `INSERT INTO side_effect_records (
               id, request_id, kind, idempotency_key, scheduled_at_version,
               status, attempts, abandoned, template, recipient_id
             ) VALUES ($1, $2, $3, $4, $5, 'pending', 0, false, $6, $7)
             RETURNING *`,
            [
              crypto.randomUUID(),
              commit.request.id,
              plan.kind,
              plan.idempotencyKey,
              commit.request.version,
              plan.template ?? null,
              plan.recipientId ?? null,
            ]
          );
          const row = inserted.rows[0];
          if (row) {
            effects.push(toSideEffect(row));
          }
        }

        return { request: commit.request, employee, effects };
      },
      { operation: 'ledger.commitTransition' }
    );
  }

  async listRequestsForEmployee(
    employeeId: string,
    states?: readonly LeaveState[]
  ): Promise<LeaveRequest[]> {
    const rows = await queryMany<LeaveRequestRecord>(
      `SELECT ${REQUEST_COLUMNS}
         FROM leave_requests r
        WHERE r.employee_id = $1
          AND ($2::text[] IS NULL OR r.state = ANY($2))
        ORDER BY r.start_date, r.created_at`,
      [employeeId, states ? [...states] : null],
      { operation: 'ledger.listRequestsForEmployee' }
    );
    return rows.map(toLeaveRequest);
  }

  async listOverlappingRequests(span: DateSpan, query: OverlapQuery): Promise<LeaveRequest[]> {
    const rows = await queryMany<LeaveRequestRecord>(
      `SELECT ${REQUEST_COLUMNS}
         FROM leave_requests r
        WHERE r.state = ANY($1)
          AND r.start_date <= $3::date
          AND r.end_date >= $2::date
          AND ($4::text[] IS NULL OR r.employee_id = ANY($4))
          AND ($5::text IS NULL OR r.id <> $5)
        ORDER BY r.start_date, r.created_at`,
      [
        [...query.states],
        span.start,
        span.end,
        query.employeeIds ? [...query.employeeIds] : null,
        query.excludeRequestId ?? null,
      ],
      { operation: 'ledger.listOverlappingRequests' }
    );
    return rows.map(toLeaveRequest);
  }

  async listTeamMembers(teamId: string): Promise<Employee[]> {
    const rows = await queryMany<EmployeeRecord>(
      `${EMPLOYEE_SELECT} WHERE e.team_id = $1 GROUP BY e.id ORDER BY e.id`,
      [teamId],
      { operation: 'ledger.listTeamMembers' }
    );
    return rows.map(toEmployee);
  }

  async listDirectReports(managerId: string): Promise<Employee[]> {
    const rows = await queryMany<EmployeeRecord>(
      `${EMPLOYEE_SELECT} WHERE e.manager_id = $1 GROUP BY e.id ORDER BY e.id`,
      [managerId],
      { operation: 'ledger.listDirectReports' }
    );
    return rows.map(toEmployee);
  }

  async listPendingForApprover(
    managerId: string | undefined,
    tiers: readonly ApprovalTier[]
  ): Promise<LeaveRequest[]> {
    const rows = await queryMany<LeaveRequestRecord>(
      `SELECT ${REQUEST_COLUMNS}
         FROM leave_requests r
         JOIN employees e ON e.id = r.employee_id
        WHERE r.state = $1
          AND r.approval_tier = ANY($2)
          AND ($3::text IS NULL OR e.manager_id = $3)
        ORDER BY r.start_date, r.created_at`,
      [LeaveState.Pending, [...tiers], managerId ?? null],
      { operation: 'ledger.listPendingForApprover' }
    );
    return rows.map(toLeaveRequest);
  }

  async listEffects(requestId: string): Promise<SideEffectRecord[]> {
    const rows = await queryMany<SideEffectRow>(
      'SELECT * FROM side_effect_records WHERE request_id = $1 ORDER BY created_at, kind',
      [requestId],
      { operation: 'ledger.listEffects' }
    );
    return rows.map(toSideEffect);
  }

  async getEffect(id: string): Promise<SideEffectRecord | null> {
    const row = await queryOne<SideEffectRow>(
      'SELECT * FROM side_effect_records WHERE id = $1',
      [id],
      { operation: 'ledger.getEffect' }
    );
    return row ? toSideEffect(row) : null;
  }

  async claimDueEffects(limit: number, leaseMs: number, now: Date): Promise<SideEffectRecord[]> {
    const result = await executeQuery<SideEffectRow>(
      `UPDATE side_effect_records
          SET locked_until = $3,
              lease_token = gen_random_uuid()::text
        WHERE id IN (
          SELECT id
            FROM side_effect_records
           WHERE status = 'pending'
             AND abandoned = false
             AND (locked_until IS NULL OR locked_until <= $1)
           ORDER BY created_at
           LIMIT $2
           FOR UPDATE SKIP LOCKED
        )
        RETURNING *`,
      [now, limit, new Date(now.getTime() + leaseMs)],
      { operation: 'ledger.claimDueEffects' }
    );
    return result.rows.map(toSideEffect);
  }

  async claimEffect(id: string, leaseMs: number, now: Date): Promise<SideEffectRecord | null> {
    const row = await queryOne<SideEffectRow>(
      `UPDATE side_effect_records
          SET locked_until = $3,
              lease_token = gen_random_uuid()::text
        WHERE id = $1
          AND status = 'pending'
          AND abandoned = false
          AND (locked_until IS NULL OR locked_until <= $2)
        RETURNING *`,
      [id, now, new Date(now.getTime() + leaseMs)],
      { operation: 'ledger.claimEffect' }
    );
    return row ? toSideEffect(row) : null;
  }

  async completeEffect(id: string, update: EffectUpdate): Promise<SideEffectRecord> {
    const row = await queryOne<SideEffectRow>(
      `UPDATE side_effect_records
          SET status = $2,
              attempts = COALESCE($3, attempts),
              last_error = CASE WHEN $4 THEN NULL ELSE COALESCE($5, last_error) END,
              result = COALESCE($6, result),
              abandoned = COALESCE($7, abandoned),
              locked_until = NULL,
              lease_token = NULL,
              updated_at = now()
        WHERE id = $1
          AND ($8::text IS NULL OR lease_token = $8)
        RETURNING *`,
      [
        id,
        update.status,
        update.attempts ?? null,
        update.lastError === null,
        update.lastError ?? null,
        update.result ?? null,
        update.abandoned ?? null,
        update.leaseToken ?? null,
      ],
      { operation: 'ledger.completeEffect' }
    );
    if (row) {
      return toSideEffect(row);
    }
    if (update.leaseToken !== undefined && (await this.getEffect(id))) {
      throw new LeaseLostError(id);
    }
    throw new NotFoundError('side_effect', id);
  }

  async listEffectsByStatus(status: SideEffectStatus): Promise<SideEffectRecord[]> {
    const rows = await queryMany<SideEffectRow>(
      'SELECT * FROM side_effect_records WHERE status = $1 ORDER BY updated_at',
      [status],
      { operation: 'ledger.listEffectsByStatus' }
    );
    return rows.map(toSideEffect);
  }

  async upsertEmployee(seed: EmployeeSeed): Promise<Employee> {
    return executeTransaction(
      async (client) => {
        await client.query(
          `INSERT INTO employees (id, name, email, phone, team_id, manager_id)
           VALUES ($1, $2, $3, $4, $5, $6)
           ON CONFLICT (id) DO UPDATE
             SET name = EXCLUDED.name, email = EXCLUDED.email, phone = EXCLUDED.phone,
                 team_id = EXCLUDED.team_id, manager_id = EXCLUDED.manager_id,
                 version = employees.version + 1, updated_at = now()`,
          [seed.id, seed.name, seed.email, seed.phone ?? null, seed.teamId, seed.managerId ?? null]
        );

        await client.query('DELETE FROM employee_balances WHERE employee_id = $1', [seed.id]);
        for (const [leaveType, remaining] of Object.entries(seed.balances)) {
          await client.query(
            'INSERT INTO employee_balances (employee_id, leave_type, remaining) VALUES ($1, $2, $3)',
            [seed.id, leaveType, remaining]
          );
        }

        const employee = await fetchEmployee(client, seed.id);
        if (!employee) {
          throw new NotFoundError('employee', seed.id);
        }
        return employee;
      },
      { operation: 'ledger.upsertEmployee' }
    );
  }
}
