/**
 * Leave Lifecycle Engine
 *
 * Owns a leave request from draft to terminal state. Every public operation
 * reads the request, gathers the ledger data the transition needs, runs the
 * pure transition function and commits the result (request, balance change
 * and scheduled side effects) in one step. Callers present the version they
 * read; a stale version fails with VersionConflictError.
 *
 * @module services/leave
 */

import crypto from 'crypto';

import {
  ConflictRejectionError,
  ForbiddenTransitionError,
  InvalidTransitionError,
  LeaveError,
  LeaveValidationError,
  NotFoundError,
  VersionConflictError,
} from '../types/errors.js';
import { UserRole } from '../types/index.js';
import {
  APPROVED_STATES,
  LeaveState,
  LeaveType,
  isBalanceTracked,
  isLeaveType,
  type Actor,
  type Employee,
  type LeaveAction,
  type LeaveBalanceLine,
  type LeaveRequest,
  type SideEffectRecord,
} from '../types/leave.js';
import { countSpanDays, validateDateSpan } from '../utils/date.js';
import type { ApprovalPolicy } from './approval-policy.js';
import { ConflictResolver, type ConflictContext } from './conflict-resolver.service.js';
import {
  SYSTEM_ACTOR,
  settlementAction,
  transition,
  type EffectChannels,
  type TransitionRejection,
} from './leave-lifecycle.js';
import { roundDays, type CommittedTransition, type LedgerStore } from './ledger-store.js';

const MAX_REASON_LENGTH = 1000;

/**
 * Raw draft input as received from a caller; validated by createDraft
 */
export interface DraftInput {
  readonly employeeId: string;
  readonly leaveType: unknown;
  readonly start: unknown;
  readonly end: unknown;
  readonly halfDay?: unknown;
  readonly reason: unknown;
}

export interface OperationOptions {
  readonly correlationId?: string;
}

export interface LeaveEngineOptions {
  readonly store: LedgerStore;
  readonly policy: ApprovalPolicy;
  readonly resolver?: ConflictResolver;
  readonly channels: EffectChannels;
  readonly teamAbsenceThreshold: number;
  readonly maxSpanDays: number;

  /**
   * Bound on re-read-and-retry loops after a version conflict the caller
   * did not cause (another request's balance write, settlement races)
   */
  readonly settlementRetries: number;

  readonly now?: () => Date;
  readonly generateId?: () => string;

  /**
   * Called after a commit that scheduled side effects
   */
  readonly onEffectsScheduled?: (effects: readonly SideEffectRecord[]) => void;
}

/**
 * Request together with its side-effect log
 */
export interface RequestView {
  readonly request: LeaveRequest;
  readonly effects: readonly SideEffectRecord[];
}

function needsConflictContext(action: LeaveAction): boolean {
  return action.type === 'submit' || action.type === 'approve';
}

function toLeaveError(request: LeaveRequest, expectedVersion: number, rejection: TransitionRejection): LeaveError {
  switch (rejection.reason) {
    case 'version_conflict':
      return new VersionConflictError(request.id, expectedVersion, request.version);
    case 'invalid_transition':
      return new InvalidTransitionError(rejection.message, rejection.details ?? {});
    case 'forbidden':
      return new ForbiddenTransitionError(rejection.message, rejection.details ?? {});
    case 'rejected_overlap':
    case 'rejected_insufficient_balance':
      return new ConflictRejectionError(rejection.reason, rejection.message, rejection.details);
    case 'validation':
      return new LeaveValidationError([rejection.message]);
  }
}

export class LeaveLifecycleEngine {
  private readonly store: LedgerStore;
  private readonly policy: ApprovalPolicy;
  private readonly resolver: ConflictResolver;
  private readonly channels: EffectChannels;
  private readonly teamAbsenceThreshold: number;
  private readonly maxSpanDays: number;
  private readonly settlementRetries: number;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly onEffectsScheduled?: (effects: readonly SideEffectRecord[]) => void;

  constructor(options: LeaveEngineOptions) {
    this.store = options.store;
    this.policy = options.policy;
    this.resolver = options.resolver ?? new ConflictResolver();
    this.channels = options.channels;
    this.teamAbsenceThreshold = options.teamAbsenceThreshold;
    this.maxSpanDays = options.maxSpanDays;
    this.settlementRetries = options.settlementRetries;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
    this.onEffectsScheduled = options.onEffectsScheduled;
  }

  /**
   * Validate input and record a new request in draft
   *
   * @throws {LeaveValidationError} On malformed input; nothing is stored
   */
  async createDraft(input: DraftInput, actor: Actor, options?: OperationOptions): Promise<LeaveRequest> {
    if (actor.employeeId !== input.employeeId && actor.role !== UserRole.HRAdmin) {
      throw new ForbiddenTransitionError('Leave can only be drafted for yourself', {
        actorId: actor.employeeId,
        employeeId: input.employeeId,
      });
    }

    const errors: string[] = [];

    if (!isLeaveType(input.leaveType)) {
      errors.push(`Leave type must be one of: ${Object.values(LeaveType).join(', ')}`);
    }

    const spanCheck = validateDateSpan(
      { start: input.start, end: input.end },
      { maxSpanDays: this.maxSpanDays }
    );
    errors.push(...spanCheck.errors);

    if (input.halfDay !== undefined && typeof input.halfDay !== 'boolean') {
      errors.push('halfDay must be a boolean');
    }
    const halfDay = input.halfDay === true;
    if (halfDay && spanCheck.isValid && input.start !== input.end) {
      errors.push('Half-day leave must start and end on the same date');
    }

    const reason = typeof input.reason === 'string' ? input.reason.trim() : '';
    if (reason.length === 0) {
      errors.push('Reason is required');
    } else if (reason.length > MAX_REASON_LENGTH) {
      errors.push(`Reason cannot exceed ${MAX_REASON_LENGTH} characters`);
    }

    if (
      errors.length > 0 ||
      !isLeaveType(input.leaveType) ||
      typeof input.start !== 'string' ||
      typeof input.end !== 'string'
    ) {
      console.warn('[LIFECYCLE] Draft validation failed:', {
        employeeId: input.employeeId,
        errors,
        correlationId: options?.correlationId,
        timestamp: new Date().toISOString(),
      });
      throw new LeaveValidationError(errors);
    }

    const employee = await this.store.getEmployee(input.employeeId);
    if (!employee) {
      throw new NotFoundError('employee', input.employeeId);
    }

    const span = { start: input.start, end: input.end };
    const now = this.now();
    const draft: LeaveRequest = {
      id: this.generateId(),
      employeeId: employee.id,
      leaveType: input.leaveType,
      span,
      halfDay,
      days: halfDay ? 0.5 : countSpanDays(span),
      reason,
      state: LeaveState.Draft,
      version: 1,
      approvalTier: 'standard',
      createdAt: now,
      updatedAt: now,
    };

    const saved = await this.store.saveRequest(draft, 0);

    console.log('[LIFECYCLE] Draft created:', {
      requestId: saved.id,
      employeeId: saved.employeeId,
      leaveType: saved.leaveType,
      span: saved.span,
      days: saved.days,
      correlationId: options?.correlationId,
      timestamp: now.toISOString(),
    });

    return saved;
  }

  /**
   * Submit a draft for approval
   *
   * Runs the conflict checks. When the approval policy approves the request
   * automatically the approval follows in a second transition; if that
   * approval is refused the request stays pending for a human approver.
   */
  async submit(
    requestId: string,
    expectedVersion: number,
    actor: Actor,
    options?: OperationOptions
  ): Promise<LeaveRequest> {
    const committed = await this.apply(requestId, expectedVersion, { type: 'submit' }, actor, options);
    const employee = await this.requireEmployee(committed.request.employeeId);

    if (this.policy.evaluateSubmission(committed.request, { employee }) !== 'auto_approve') {
      return committed.request;
    }

    try {
      const approved = await this.apply(
        requestId,
        committed.request.version,
        { type: 'approve', note: `Approved automatically by ${this.policy.name} policy` },
        SYSTEM_ACTOR,
        options
      );
      return approved.request;
    } catch (error) {
      if (
        error instanceof ConflictRejectionError ||
        error instanceof VersionConflictError ||
        error instanceof ForbiddenTransitionError
      ) {
        console.warn('[LIFECYCLE] Automatic approval refused, request left pending:', {
          requestId,
          code: error.code,
          correlationId: options?.correlationId,
          timestamp: new Date().toISOString(),
        });
        return committed.request;
      }
      throw error;
    }
  }

  async approve(
    requestId: string,
    expectedVersion: number,
    actor: Actor,
    options?: OperationOptions & { readonly note?: string }
  ): Promise<LeaveRequest> {
    const note = options?.note?.trim();
    const committed = await this.apply(
      requestId,
      expectedVersion,
      { type: 'approve', note: note ? note : undefined },
      actor,
      options
    );
    return committed.request;
  }

  async reject(
    requestId: string,
    expectedVersion: number,
    actor: Actor,
    reason: string,
    options?: OperationOptions
  ): Promise<LeaveRequest> {
    const committed = await this.apply(requestId, expectedVersion, { type: 'reject', reason }, actor, options);
    return committed.request;
  }

  async withdraw(
    requestId: string,
    expectedVersion: number,
    actor: Actor,
    options?: OperationOptions
  ): Promise<LeaveRequest> {
    const committed = await this.apply(requestId, expectedVersion, { type: 'withdraw' }, actor, options);
    return committed.request;
  }

  /**
   * Cancel approved leave, crediting the balance back
   */
  async revert(
    requestId: string,
    expectedVersion: number,
    actor: Actor,
    options?: OperationOptions & { readonly reason?: string }
  ): Promise<LeaveRequest> {
    const committed = await this.apply(
      requestId,
      expectedVersion,
      { type: 'revert', reason: options?.reason },
      actor,
      options
    );
    return committed.request;
  }

  /**
   * Apply whatever settlement transitions the side-effect log calls for
   *
   * Re-reads the request on every step, so a version conflict with a
   * concurrent writer is retried against fresh state.
   *
   * @returns The request after settlement, or null if it does not exist
   */
  async settle(requestId: string, options?: OperationOptions): Promise<LeaveRequest | null> {
    let conflicts = 0;

    // resume_sync may be followed by mark_synced, hence more than one step
    for (let step = 0; step < 4; ) {
      const request = await this.store.getRequest(requestId);
      if (!request) {
        return null;
      }

      const action = settlementAction(request, await this.store.listEffects(requestId));
      if (!action) {
        return request;
      }

      try {
        await this.apply(requestId, request.version, { type: action }, SYSTEM_ACTOR, options);
        step++;
      } catch (error) {
        if (error instanceof VersionConflictError && conflicts < this.settlementRetries) {
          conflicts++;
          continue;
        }
        throw error;
      }
    }

    return this.store.getRequest(requestId);
  }

  /**
   * Request and side-effect log, visible to the owner, their manager and HR
   */
  async getRequest(requestId: string, actor: Actor): Promise<RequestView> {
    const request = await this.store.getRequest(requestId);
    if (!request) {
      throw new NotFoundError('request', requestId);
    }

    if (actor.role !== UserRole.HRAdmin && actor.employeeId !== request.employeeId) {
      const owner = await this.requireEmployee(request.employeeId);
      if (owner.managerId !== actor.employeeId) {
        throw new ForbiddenTransitionError('Not allowed to view this request', {
          requestId,
          actorId: actor.employeeId,
        });
      }
    }

    return { request, effects: await this.store.listEffects(requestId) };
  }

  async listRequestsForEmployee(employeeId: string): Promise<LeaveRequest[]> {
    return this.store.listRequestsForEmployee(employeeId);
  }

  /**
   * Remaining and pending days per leave type. Unpaid leave has no limit and
   * reports a null remaining.
   */
  async getBalances(employeeId: string): Promise<LeaveBalanceLine[]> {
    const employee = await this.requireEmployee(employeeId);
    const pending = await this.store.listRequestsForEmployee(employeeId, [LeaveState.Pending]);

    return Object.values(LeaveType).map((leaveType) => ({
      leaveType,
      remaining: isBalanceTracked(leaveType) ? (employee.balances[leaveType] ?? 0) : null,
      pending: roundDays(
        pending.filter((r) => r.leaveType === leaveType).reduce((sum, r) => sum + r.days, 0)
      ),
    }));
  }

  /**
   * Pending requests the actor may decide
   */
  async listApprovals(actor: Actor): Promise<LeaveRequest[]> {
    if (actor.role === UserRole.HRAdmin) {
      return this.store.listPendingForApprover(undefined, ['standard', 'escalated']);
    }
    if (actor.role !== UserRole.Manager) {
      throw new ForbiddenTransitionError('Only managers and HR admins have an approval queue', {
        actorId: actor.employeeId,
      });
    }

    const candidates = await this.store.listPendingForApprover(actor.employeeId, ['standard', 'escalated']);
    const decidable: LeaveRequest[] = [];
    for (const request of candidates) {
      const employee = await this.requireEmployee(request.employeeId);
      if (this.policy.canApprove(actor, request, { employee })) {
        decidable.push(request);
      }
    }
    return decidable;
  }

  private async requireEmployee(employeeId: string): Promise<Employee> {
    const employee = await this.store.getEmployee(employeeId);
    if (!employee) {
      throw new NotFoundError('employee', employeeId);
    }
    return employee;
  }

  private async buildConflictContext(request: LeaveRequest, employee: Employee): Promise<ConflictContext> {
    const overlappingApproved = await this.store.listOverlappingRequests(request.span, {
      employeeIds: [employee.id],
      states: APPROVED_STATES,
      excludeRequestId: request.id,
    });

    const team = await this.store.listTeamMembers(employee.teamId);
    const teammateIds = team.filter((member) => member.id !== employee.id).map((member) => member.id);

    let teammatesOnLeave = 0;
    if (teammateIds.length > 0) {
      const teamLeave = await this.store.listOverlappingRequests(request.span, {
        employeeIds: teammateIds,
        states: APPROVED_STATES,
      });
      teammatesOnLeave = new Set(teamLeave.map((r) => r.employeeId)).size;
    }

    return {
      employee,
      overlappingApproved,
      teamSize: Math.max(team.length, 1),
      teammatesOnLeave,
      threshold: this.teamAbsenceThreshold,
    };
  }

  /**
   * Read, transition, commit
   *
   * A version conflict on the employee's row comes from a concurrent
   * approval or revert of another request; the transition is re-run against
   * the fresh ledger, which also re-runs the overlap and balance checks.
   */
  private async apply(
    requestId: string,
    expectedVersion: number,
    action: LeaveAction,
    actor: Actor,
    options?: OperationOptions
  ): Promise<CommittedTransition> {
    for (let attempt = 1; ; attempt++) {
      const request = await this.store.getRequest(requestId);
      if (!request) {
        throw new NotFoundError('request', requestId);
      }
      const employee = await this.requireEmployee(request.employeeId);
      const conflict = needsConflictContext(action)
        ? await this.buildConflictContext(request, employee)
        : undefined;

      const result = transition(request, expectedVersion, action, actor, {
        now: this.now(),
        employee,
        policy: this.policy,
        resolver: this.resolver,
        conflict,
        channels: this.channels,
      });

      if (!result.ok) {
        console.warn('[LIFECYCLE] Transition rejected:', {
          requestId,
          action: action.type,
          actorId: actor.employeeId,
          reason: result.rejection.reason,
          message: result.rejection.message,
          correlationId: options?.correlationId,
          timestamp: new Date().toISOString(),
        });
        throw toLeaveError(request, expectedVersion, result.rejection);
      }

      try {
        const committed = await this.store.commitTransition({
          request: result.request,
          expectedVersion,
          // Approvals guard the employee row even without a debit, so two
          // racing approvals of overlapping untracked leave serialize on it
          balanceAdjustment:
            result.balanceDelta !== 0 || action.type === 'approve'
              ? {
                  employeeId: employee.id,
                  leaveType: request.leaveType,
                  delta: result.balanceDelta,
                  expectedVersion: employee.version,
                }
              : undefined,
          effects: result.effects,
        });

        console.log('[LIFECYCLE] Transition committed:', {
          requestId,
          action: action.type,
          actorId: actor.employeeId,
          from: request.state,
          to: committed.request.state,
          version: committed.request.version,
          balanceDelta: result.balanceDelta,
          effects: committed.effects.map((e) => e.kind),
          outcome: result.outcome?.kind,
          correlationId: options?.correlationId,
          timestamp: new Date().toISOString(),
        });

        if (committed.effects.length > 0) {
          this.onEffectsScheduled?.(committed.effects);
        }

        return committed;
      } catch (error) {
        if (
          error instanceof VersionConflictError &&
          error.entityId === employee.id &&
          attempt < this.settlementRetries
        ) {
          console.warn('[LIFECYCLE] Balance changed concurrently, retrying transition:', {
            requestId,
            action: action.type,
            attempt,
            correlationId: options?.correlationId,
          });
          continue;
        }
        throw error;
      }
    }
  }
}
