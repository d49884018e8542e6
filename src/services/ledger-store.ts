/**
 * Ledger Store contract
 *
 * The ledger is the single source of truth for balances, request state and
 * the side-effect log. Every write is guarded by the version the caller read;
 * a stale write fails with VersionConflictError and is never merged.
 *
 * @module services/ledger-store
 */

import type {
  ApprovalTier,
  BalanceAdjustment,
  DateSpan,
  Employee,
  LeaveBalances,
  LeaveRequest,
  LeaveState,
  LeaveType,
  SideEffectPlan,
  SideEffectRecord,
  SideEffectStatus,
} from '../types/leave.js';

/**
 * Employee data accepted by the seeding operation
 */
export interface EmployeeSeed {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly phone?: string;
  readonly teamId: string;
  readonly managerId?: string;
  readonly balances: LeaveBalances;
}

/**
 * One transition, persisted as a single logical step
 */
export interface TransitionCommit {
  /**
   * Request as produced by the transition (version already incremented)
   */
  readonly request: LeaveRequest;

  /**
   * Version the transition was computed from. 0 inserts a new request.
   */
  readonly expectedVersion: number;

  readonly balanceAdjustment?: BalanceAdjustment;

  /**
   * Effects scheduled by the transition, recorded as pending at `request.version`
   */
  readonly effects: readonly SideEffectPlan[];
}

export interface CommittedTransition {
  readonly request: LeaveRequest;
  readonly employee?: Employee;
  readonly effects: readonly SideEffectRecord[];
}

/**
 * Outcome of one side-effect execution or an operator action on a record
 */
export interface EffectUpdate {
  readonly status: SideEffectStatus;
  readonly attempts?: number;

  /**
   * null clears a previous error
   */
  readonly lastError?: string | null;

  readonly result?: string;
  readonly abandoned?: boolean;

  /**
   * Token of the claim the update is made under. When given, the update only
   * applies while that claim still holds the lease. Operator updates carry
   * none and void any outstanding lease.
   */
  readonly leaseToken?: string;
}

export interface OverlapQuery {
  /**
   * Restrict to these employees. Omitted means every employee.
   */
  readonly employeeIds?: readonly string[];

  readonly states: readonly LeaveState[];

  /**
   * Leave this request out of the result
   */
  readonly excludeRequestId?: string;
}

export interface LedgerStore {
  getEmployee(id: string): Promise<Employee | null>;
  getRequest(id: string): Promise<LeaveRequest | null>;

  /**
   * Persist a request at `expectedVersion`; 0 inserts
   *
   * @throws {VersionConflictError} When the stored version differs
   */
  saveRequest(request: LeaveRequest, expectedVersion: number): Promise<LeaveRequest>;

  /**
   * Apply a balance delta at the employee's `expectedVersion`
   *
   * @throws {VersionConflictError} When the stored version differs
   * @throws {InvariantViolationError} When the balance would go below zero
   */
  adjustBalance(
    employeeId: string,
    leaveType: LeaveType,
    delta: number,
    expectedVersion: number
  ): Promise<Employee>;

  /**
   * Persist a request, its balance adjustment and its newly scheduled effects atomically
   */
  commitTransition(commit: TransitionCommit): Promise<CommittedTransition>;

  listRequestsForEmployee(employeeId: string, states?: readonly LeaveState[]): Promise<LeaveRequest[]>;
  listOverlappingRequests(span: DateSpan, query: OverlapQuery): Promise<LeaveRequest[]>;
  listTeamMembers(teamId: string): Promise<Employee[]>;

  /**
   * Employees whose manager is `managerId`, ordered by id
   */
  listDirectReports(managerId: string): Promise<Employee[]>;

  /**
   * Pending requests awaiting a decision. With a manager id, only that
   * manager's direct reports.
   */
  listPendingForApprover(
    managerId: string | undefined,
    tiers: readonly ApprovalTier[]
  ): Promise<LeaveRequest[]>;

  listEffects(requestId: string): Promise<SideEffectRecord[]>;
  getEffect(id: string): Promise<SideEffectRecord | null>;

  /**
   * Lease up to `limit` pending records whose lease is free or expired,
   * issuing each a fresh lease token
   */
  claimDueEffects(limit: number, leaseMs: number, now: Date): Promise<SideEffectRecord[]>;

  /**
   * Lease one record if it is pending and its lease is free or expired
   */
  claimEffect(id: string, leaseMs: number, now: Date): Promise<SideEffectRecord | null>;

  /**
   * Record an execution outcome and release the lease
   *
   * @throws {LeaseLostError} When `update.leaseToken` no longer holds the lease
   */
  completeEffect(id: string, update: EffectUpdate): Promise<SideEffectRecord>;

  listEffectsByStatus(status: SideEffectStatus): Promise<SideEffectRecord[]>;

  upsertEmployee(seed: EmployeeSeed): Promise<Employee>;
}

/**
 * Round a day count to two decimals
 */
export function roundDays(value: number): number {
  return Math.round(value * 100) / 100;
}
