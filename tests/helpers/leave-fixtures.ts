/**
 * Shared builders for leave tests
 *
 * A small team: manager `mgr-1` (whose manager is `hr-1`) with reports
 * `emp-1`, `emp-2` and `emp-3`, all on `team-a`.
 */

import { vi } from 'vitest';

import { ManagerApprovalPolicy, type ApprovalPolicy } from '../../src/services/approval-policy.js';
import { InMemoryLedgerStore } from '../../src/services/in-memory-ledger.store.js';
import type { EffectChannels } from '../../src/services/leave-lifecycle.js';
import { LeaveLifecycleEngine, type LeaveEngineOptions } from '../../src/services/leave.service.js';
import type { EmployeeSeed } from '../../src/services/ledger-store.js';
import { UserRole } from '../../src/types/index.js';
import {
  LeaveState,
  LeaveType,
  SideEffectKind,
  SideEffectStatus,
  type Actor,
  type Employee,
  type LeaveRequest,
  type SideEffectRecord,
} from '../../src/types/leave.js';

export const FIXED_NOW = new Date('2024-05-20T09:00:00Z');

export const HR: Actor = { employeeId: 'hr-1', role: UserRole.HRAdmin };
export const MANAGER: Actor = { employeeId: 'mgr-1', role: UserRole.Manager };
export const EMPLOYEE: Actor = { employeeId: 'emp-1', role: UserRole.Employee };
export const TEAMMATE: Actor = { employeeId: 'emp-2', role: UserRole.Employee };

export const ALL_CHANNELS: EffectChannels = { calendar: true, spreadsheet: true, notifications: true };
export const NO_CHANNELS: EffectChannels = { calendar: false, spreadsheet: false, notifications: false };

export const TEAM_SEEDS: readonly EmployeeSeed[] = [
  {
    id: 'hr-1',
    name: 'Hana Reyes',
    email: 'hr@example.com',
    teamId: 'team-hr',
    balances: { [LeaveType.Annual]: 25 },
  },
  {
    id: 'mgr-1',
    name: 'Mateo Lind',
    email: 'manager@example.com',
    teamId: 'team-a',
    managerId: 'hr-1',
    balances: { [LeaveType.Annual]: 25 },
  },
  {
    id: 'emp-1',
    name: 'Ada Okafor',
    email: 'ada@example.com',
    phone: '+15550100001',
    teamId: 'team-a',
    managerId: 'mgr-1',
    balances: { [LeaveType.Annual]: 10, [LeaveType.Sick]: 5 },
  },
  {
    id: 'emp-2',
    name: 'Bram de Vries',
    email: 'bram@example.com',
    teamId: 'team-a',
    managerId: 'mgr-1',
    balances: { [LeaveType.Annual]: 10 },
  },
  {
    id: 'emp-3',
    name: 'Chen Wei',
    email: 'chen@example.com',
    teamId: 'team-a',
    managerId: 'mgr-1',
    balances: { [LeaveType.Annual]: 10 },
  },
];

export async function seedTeam(store: InMemoryLedgerStore): Promise<void> {
  for (const seed of TEAM_SEEDS) {
    await store.upsertEmployee(seed);
  }
}

/**
 * Engine over a seeded in-memory store with sequential request ids
 * (`req-1`, `req-2`, ...)
 */
export async function createTestEngine(
  overrides: Partial<LeaveEngineOptions> = {}
): Promise<{ store: InMemoryLedgerStore; engine: LeaveLifecycleEngine }> {
  const store = new InMemoryLedgerStore();
  await seedTeam(store);

  let sequence = 0;
  const engine = new LeaveLifecycleEngine({
    store,
    policy: new ManagerApprovalPolicy(),
    channels: ALL_CHANNELS,
    teamAbsenceThreshold: 0.3,
    maxSpanDays: 90,
    settlementRetries: 5,
    now: () => FIXED_NOW,
    generateId: () => `req-${++sequence}`,
    ...overrides,
  });

  return { store, engine };
}

export function buildEmployee(overrides: Partial<Employee> = {}): Employee {
  return {
    id: 'emp-1',
    name: 'Ada Okafor',
    email: 'ada@example.com',
    teamId: 'team-a',
    managerId: 'mgr-1',
    balances: { [LeaveType.Annual]: 10 },
    version: 0,
    createdAt: FIXED_NOW,
    updatedAt: FIXED_NOW,
    ...overrides,
  };
}

export function buildRequest(overrides: Partial<LeaveRequest> = {}): LeaveRequest {
  return {
    id: 'req-1',
    employeeId: 'emp-1',
    leaveType: LeaveType.Annual,
    span: { start: '2024-06-03', end: '2024-06-07' },
    halfDay: false,
    days: 5,
    reason: 'Family trip',
    state: LeaveState.Draft,
    version: 1,
    approvalTier: 'standard',
    createdAt: FIXED_NOW,
    updatedAt: FIXED_NOW,
    ...overrides,
  };
}

export function buildEffect(overrides: Partial<SideEffectRecord> = {}): SideEffectRecord {
  return {
    id: 'fx-1',
    requestId: 'req-1',
    kind: SideEffectKind.CalendarCreate,
    idempotencyKey: 'leave:req-1:calendar_create:v3',
    scheduledAtVersion: 3,
    status: SideEffectStatus.Pending,
    attempts: 0,
    abandoned: false,
    createdAt: FIXED_NOW,
    updatedAt: FIXED_NOW,
    ...overrides,
  };
}

/**
 * Policy double whose decisions are set per test
 */
export function stubPolicy(overrides: Partial<ApprovalPolicy> = {}): ApprovalPolicy {
  return {
    name: 'stub',
    evaluateSubmission: vi.fn(() => 'await_approver' as const),
    canApprove: vi.fn(() => true),
    ...overrides,
  };
}

/**
 * Draft and submit a request for `emp-1` (or `actor`), returning it pending
 */
export async function submitRequest(
  engine: LeaveLifecycleEngine,
  span: { start: string; end: string },
  actor: Actor = EMPLOYEE,
  leaveType: LeaveType = LeaveType.Annual
): Promise<LeaveRequest> {
  const draft = await engine.createDraft(
    { employeeId: actor.employeeId, leaveType, start: span.start, end: span.end, reason: 'Time off' },
    actor
  );
  return engine.submit(draft.id, draft.version, actor);
}
