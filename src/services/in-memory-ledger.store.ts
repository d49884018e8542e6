/**
 * In-memory Ledger Store
 *
 * Backs the test suite and the ENABLE_DATABASE=false development mode. Each
 * operation runs to completion without yielding between its version check
 * and its write, which gives the same single-writer guarantee the
 * PostgreSQL store gets from row locks.
 *
 * @module services/in-memory-ledger
 */

import crypto from 'crypto';

import {
  InvariantViolationError,
  LeaseLostError,
  NotFoundError,
  VersionConflictError,
} from '../types/errors.js';
import {
  LeaveState,
  SideEffectStatus,
  type ApprovalTier,
  type DateSpan,
  type Employee,
  type LeaveRequest,
  type LeaveType,
  type SideEffectRecord,
} from '../types/leave.js';
import { spansOverlap } from '../utils/date.js';
import {
  roundDays,
  type CommittedTransition,
  type EffectUpdate,
  type EmployeeSeed,
  type LedgerStore,
  type OverlapQuery,
  type TransitionCommit,
} from './ledger-store.js';

function byStartThenCreated(a: LeaveRequest, b: LeaveRequest): number {
  if (a.span.start !== b.span.start) {
    return a.span.start < b.span.start ? -1 : 1;
  }
  return a.createdAt.getTime() - b.createdAt.getTime();
}

function isClaimable(effect: SideEffectRecord, now: Date): boolean {
  const leaseFree = !effect.lockedUntil || effect.lockedUntil.getTime() <= now.getTime();
  return effect.status === SideEffectStatus.Pending && !effect.abandoned && leaseFree;
}

export class InMemoryLedgerStore implements LedgerStore {
  private readonly employees = new Map<string, Employee>();
  private readonly requests = new Map<string, LeaveRequest>();
  private readonly effects = new Map<string, SideEffectRecord>();
  private readonly effectKeys = new Set<string>();

  async getEmployee(id: string): Promise<Employee | null> {
    return this.employees.get(id) ?? null;
  }

  async getRequest(id: string): Promise<LeaveRequest | null> {
    return this.requests.get(id) ?? null;
  }

  async saveRequest(request: LeaveRequest, expectedVersion: number): Promise<LeaveRequest> {
    this.assertRequestVersion(request.id, expectedVersion);
    this.requests.set(request.id, request);
    return request;
  }

  async adjustBalance(
    employeeId: string,
    leaveType: LeaveType,
    delta: number,
    expectedVersion: number
  ): Promise<Employee> {
    const updated = this.computeBalance(employeeId, leaveType, delta, expectedVersion);
    this.employees.set(employeeId, updated);
    return updated;
  }

  async commitTransition(commit: TransitionCommit): Promise<CommittedTransition> {
    // every check runs before the first write
    this.assertRequestVersion(commit.request.id, commit.expectedVersion);

    const adjustment = commit.balanceAdjustment;
    const employee = adjustment
      ? this.computeBalance(
          adjustment.employeeId,
          adjustment.leaveType,
          adjustment.delta,
          adjustment.expectedVersion
        )
      : undefined;

    for (const plan of commit.effects) {
      if (this.effectKeys.has(plan.idempotencyKey)) {
        throw new InvariantViolationError('Side effect scheduled twice', {
          idempotencyKey: plan.idempotencyKey,
        });
      }
    }

    const now = new Date();
    const records: SideEffectRecord[] = commit.effects.map((plan) => ({
      id: crypto.randomUUID(),
      requestId: commit.request.id,
      kind: plan.kind,
      idempotencyKey: plan.idempotencyKey,
      scheduledAtVersion: commit.request.version,
      status: SideEffectStatus.Pending,
      attempts: 0,
      abandoned: false,
      template: plan.template,
      recipientId: plan.recipientId,
      createdAt: now,
      updatedAt: now,
    }));

    this.requests.set(commit.request.id, commit.request);
    if (employee) {
      this.employees.set(employee.id, employee);
    }
    for (const record of records) {
      this.effects.set(record.id, record);
      this.effectKeys.add(record.idempotencyKey);
    }

    return { request: commit.request, employee, effects: records };
  }

  async listRequestsForEmployee(
    employeeId: string,
    states?: readonly LeaveState[]
  ): Promise<LeaveRequest[]> {
    return [...this.requests.values()]
      .filter((r) => r.employeeId === employeeId && (!states || states.includes(r.state)))
      .sort(byStartThenCreated);
  }

  async listOverlappingRequests(span: DateSpan, query: OverlapQuery): Promise<LeaveRequest[]> {
    return [...this.requests.values()]
      .filter(
        (r) =>
          query.states.includes(r.state) &&
          r.id !== query.excludeRequestId &&
          (!query.employeeIds || query.employeeIds.includes(r.employeeId)) &&
          spansOverlap(r.span, span)
      )
      .sort(byStartThenCreated);
  }

  async listTeamMembers(teamId: string): Promise<Employee[]> {
    return [...this.employees.values()].filter((e) => e.teamId === teamId);
  }

  async listDirectReports(managerId: string): Promise<Employee[]> {
    return [...this.employees.values()]
      .filter((e) => e.managerId === managerId)
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  async listPendingForApprover(
    managerId: string | undefined,
    tiers: readonly ApprovalTier[]
  ): Promise<LeaveRequest[]> {
    return [...this.requests.values()]
      .filter((r) => {
        if (r.state !== LeaveState.Pending || !tiers.includes(r.approvalTier)) {
          return false;
        }
        return managerId === undefined || this.employees.get(r.employeeId)?.managerId === managerId;
      })
      .sort(byStartThenCreated);
  }

  async listEffects(requestId: string): Promise<SideEffectRecord[]> {
    return [...this.effects.values()].filter((e) => e.requestId === requestId);
  }

  async getEffect(id: string): Promise<SideEffectRecord | null> {
    return this.effects.get(id) ?? null;
  }

  async claimDueEffects(limit: number, leaseMs: number, now: Date): Promise<SideEffectRecord[]> {
    const claimed: SideEffectRecord[] = [];

    for (const effect of this.effects.values()) {
      if (claimed.length >= limit) {
        break;
      }
      if (isClaimable(effect, now)) {
        claimed.push(this.lease(effect, leaseMs, now));
      }
    }

    return claimed;
  }

  async claimEffect(id: string, leaseMs: number, now: Date): Promise<SideEffectRecord | null> {
    const effect = this.effects.get(id);
    return effect && isClaimable(effect, now) ? this.lease(effect, leaseMs, now) : null;
  }

  async completeEffect(id: string, update: EffectUpdate): Promise<SideEffectRecord> {
    const effect = this.effects.get(id);
    if (!effect) {
      throw new NotFoundError('side_effect', id);
    }
    if (update.leaseToken !== undefined && effect.leaseToken !== update.leaseToken) {
      throw new LeaseLostError(id);
    }

    const lastError = update.lastError === null ? undefined : (update.lastError ?? effect.lastError);
    const next: SideEffectRecord = {
      ...effect,
      status: update.status,
      attempts: update.attempts ?? effect.attempts,
      lastError,
      result: update.result ?? effect.result,
      abandoned: update.abandoned ?? effect.abandoned,
      lockedUntil: undefined,
      leaseToken: undefined,
      updatedAt: new Date(),
    };
    this.effects.set(id, next);
    return next;
  }

  async listEffectsByStatus(status: SideEffectStatus): Promise<SideEffectRecord[]> {
    return [...this.effects.values()].filter((e) => e.status === status);
  }

  async upsertEmployee(seed: EmployeeSeed): Promise<Employee> {
    const existing = this.employees.get(seed.id);
    const now = new Date();
    const employee: Employee = {
      id: seed.id,
      name: seed.name,
      email: seed.email,
      phone: seed.phone,
      teamId: seed.teamId,
      managerId: seed.managerId,
      balances: { ...seed.balances },
      version: existing ? existing.version + 1 : 0,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    this.employees.set(employee.id, employee);
    return employee;
  }

  private assertRequestVersion(requestId: string, expectedVersion: number): void {
    const stored = this.requests.get(requestId);
    const actual = stored ? stored.version : null;
    const matches = expectedVersion === 0 ? actual === null : actual === expectedVersion;
    if (!matches) {
      throw new VersionConflictError(requestId, expectedVersion, actual);
    }
  }

  private lease(effect: SideEffectRecord, leaseMs: number, now: Date): SideEffectRecord {
    const leased: SideEffectRecord = {
      ...effect,
      lockedUntil: new Date(now.getTime() + leaseMs),
      leaseToken: crypto.randomUUID(),
    };
    this.effects.set(effect.id, leased);
    return leased;
  }

  private computeBalance(
    employeeId: string,
    leaveType: LeaveType,
    delta: number,
    expectedVersion: number
  ): Employee {
    const employee = this.employees.get(employeeId);
    if (!employee) {
      throw new NotFoundError('employee', employeeId);
    }
    if (employee.version !== expectedVersion) {
      throw new VersionConflictError(employeeId, expectedVersion, employee.version);
    }

    if (delta === 0) {
      return { ...employee, version: employee.version + 1, updatedAt: new Date() };
    }

    const remaining = roundDays((employee.balances[leaveType] ?? 0) + delta);
    if (remaining < 0) {
      throw new InvariantViolationError('Balance would become negative', {
        employeeId,
        leaveType,
        delta,
      });
    }

    return {
      ...employee,
      balances: { ...employee.balances, [leaveType]: remaining },
      version: employee.version + 1,
      updatedAt: new Date(),
    };
  }
}
