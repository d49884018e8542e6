/**
 * Leave lifecycle state machine
 *
 * `transition` is the only place request state changes are decided. It is
 * pure: given the request, the version the caller read, the action, the
 * actor and the ledger data gathered by the engine, it returns either the
 * next request (version + 1), the balance delta to apply in the same commit
 * and the side effects to schedule, or a rejection.
 *
 * | action           | from                                                  | to                                |
 * |------------------|-------------------------------------------------------|-----------------------------------|
 * | submit           | draft                                                 | pending                           |
 * | approve          | pending                                               | approved_pending_sync / approved  |
 * | reject           | pending                                               | rejected                          |
 * | withdraw         | draft, pending                                        | withdrawn                         |
 * | revert           | approved, approved_pending_sync, approved_sync_failed, synced | reverted                  |
 * | mark_synced      | approved_pending_sync                                 | synced                            |
 * | mark_sync_failed | approved_pending_sync                                 | approved_sync_failed              |
 * | resume_sync      | approved_sync_failed                                  | approved_pending_sync             |
 *
 * @module services/leave-lifecycle
 */

import { InvariantViolationError } from '../types/errors.js';
import { UserRole } from '../types/index.js';
import {
  APPROVED_STATES,
  LeaveState,
  SideEffectKind,
  SideEffectStatus,
  isBalanceTracked,
  isBestEffortKind,
  type Actor,
  type Employee,
  type LeaveAction,
  type LeaveActionType,
  type LeaveRequest,
  type MessageTemplate,
  type SideEffectPlan,
  type SideEffectRecord,
} from '../types/leave.js';
import { deriveIdempotencyKey } from '../utils/idempotency.js';
import type { ApprovalPolicy } from './approval-policy.js';
import type { ConflictContext, ConflictOutcome, ConflictResolver } from './conflict-resolver.service.js';
import { roundDays } from './ledger-store.js';

/**
 * Which downstream systems receive side effects
 */
export interface EffectChannels {
  readonly calendar: boolean;
  readonly spreadsheet: boolean;
  readonly notifications: boolean;
}

export interface TransitionContext {
  readonly now: Date;

  /**
   * Owner of the request
   */
  readonly employee: Employee;

  readonly policy: ApprovalPolicy;
  readonly resolver: ConflictResolver;

  /**
   * Ledger data for the conflict checks; required by submit and approve
   */
  readonly conflict?: ConflictContext;

  readonly channels: EffectChannels;
}

export type RejectionReason =
  | 'version_conflict'
  | 'invalid_transition'
  | 'forbidden'
  | 'rejected_overlap'
  | 'rejected_insufficient_balance'
  | 'validation';

export interface TransitionRejection {
  readonly reason: RejectionReason;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export type TransitionResult =
  | {
      readonly ok: true;
      readonly request: LeaveRequest;

      /**
       * Days added to (positive) or taken from (negative) the balance
       */
      readonly balanceDelta: number;

      readonly effects: readonly SideEffectPlan[];

      /**
       * Conflict check outcome for submit and approve
       */
      readonly outcome?: ConflictOutcome;
    }
  | { readonly ok: false; readonly rejection: TransitionRejection };

export type SettlementAction = Extract<LeaveActionType, 'mark_synced' | 'mark_sync_failed' | 'resume_sync'>;

/**
 * Actor used for transitions the engine issues on its own
 */
export const SYSTEM_ACTOR: Actor = { employeeId: 'system', role: 'SYSTEM' };

const ALLOWED_FROM: Readonly<Record<LeaveActionType, readonly LeaveState[]>> = {
  submit: [LeaveState.Draft],
  approve: [LeaveState.Pending],
  reject: [LeaveState.Pending],
  withdraw: [LeaveState.Draft, LeaveState.Pending],
  revert: APPROVED_STATES,
  mark_synced: [LeaveState.ApprovedPendingSync],
  mark_sync_failed: [LeaveState.ApprovedPendingSync],
  resume_sync: [LeaveState.ApprovedSyncFailed],
};

function reject(
  reason: RejectionReason,
  message: string,
  details?: Record<string, unknown>
): TransitionResult {
  return { ok: false, rejection: { reason, message, details } };
}

function isOwner(actor: Actor, request: LeaveRequest): boolean {
  return actor.role !== 'SYSTEM' && actor.employeeId === request.employeeId;
}

function isAuthorized(
  action: LeaveAction,
  actor: Actor,
  request: LeaveRequest,
  context: TransitionContext
): boolean {
  switch (action.type) {
    case 'submit':
    case 'withdraw':
      return isOwner(actor, request);
    case 'approve':
    case 'reject':
      return context.policy.canApprove(actor, request, { employee: context.employee });
    case 'revert':
      return (
        isOwner(actor, request) ||
        actor.role === UserRole.HRAdmin ||
        (actor.role === UserRole.Manager && context.employee.managerId === actor.employeeId)
      );
    case 'mark_synced':
    case 'mark_sync_failed':
    case 'resume_sync':
      return actor.role === 'SYSTEM';
  }
}

/**
 * Collects the side effects of one transition, keyed at the new version
 */
class EffectPlanner {
  readonly effects: SideEffectPlan[] = [];

  constructor(
    private readonly next: LeaveRequest,
    private readonly context: TransitionContext
  ) {}

  calendar(kind: SideEffectKind.CalendarCreate | SideEffectKind.CalendarDelete): this {
    if (this.context.channels.calendar) {
      this.add(kind);
    }
    return this;
  }

  spreadsheet(event: MessageTemplate): this {
    if (this.context.channels.spreadsheet) {
      this.add(SideEffectKind.SheetSync, event);
    }
    return this;
  }

  notifyEmployee(template: MessageTemplate): this {
    if (this.context.channels.notifications) {
      this.add(SideEffectKind.NotifyEmployee, template, this.next.employeeId);
    }
    return this;
  }

  notifyApprover(template: MessageTemplate): this {
    const approverId = this.context.employee.managerId;
    if (this.context.channels.notifications && approverId) {
      this.add(SideEffectKind.NotifyApprover, template, approverId);
    }
    return this;
  }

  private add(kind: SideEffectKind, template?: MessageTemplate, recipientId?: string): void {
    this.effects.push({
      kind,
      idempotencyKey: deriveIdempotencyKey(this.next.id, kind, this.next.version),
      template,
      recipientId,
    });
  }
}

function requireConflictContext(context: TransitionContext, action: LeaveActionType): ConflictContext {
  if (!context.conflict) {
    throw new InvariantViolationError(`Conflict context missing for ${action}`);
  }
  return context.conflict;
}

function blockingOutcome(outcome: ConflictOutcome, request: LeaveRequest): TransitionResult | null {
  switch (outcome.kind) {
    case 'rejected_overlap':
      return reject('rejected_overlap', 'Leave span overlaps an approved request', {
        conflictingRequestIds: outcome.conflictingRequestIds,
      });
    case 'rejected_insufficient_balance':
      return reject(
        'rejected_insufficient_balance',
        `Requested ${outcome.requested} days exceeds the remaining ${request.leaveType} balance of ${outcome.remaining}`,
        { requested: outcome.requested, remaining: outcome.remaining, leaveType: request.leaveType }
      );
    case 'eligible':
    case 'requires_escalated_approval':
      return null;
  }
}

/**
 * Compute the next state of a request
 */
export function transition(
  request: LeaveRequest,
  expectedVersion: number,
  action: LeaveAction,
  actor: Actor,
  context: TransitionContext
): TransitionResult {
  if (request.version !== expectedVersion) {
    return reject(
      'version_conflict',
      `Request ${request.id} is at version ${request.version}, not ${expectedVersion}`,
      { expectedVersion, actualVersion: request.version }
    );
  }

  if (!ALLOWED_FROM[action.type].includes(request.state)) {
    return reject('invalid_transition', `Cannot ${action.type} a request in state ${request.state}`, {
      action: action.type,
      state: request.state,
    });
  }

  if (!isAuthorized(action, actor, request, context)) {
    return reject('forbidden', `Actor ${actor.employeeId} may not ${action.type} request ${request.id}`, {
      action: action.type,
      actorId: actor.employeeId,
      role: actor.role,
    });
  }

  const base: LeaveRequest = {
    ...request,
    version: request.version + 1,
    updatedAt: context.now,
  };
  const days = isBalanceTracked(request.leaveType) ? request.days : 0;

  switch (action.type) {
    case 'submit': {
      const outcome = context.resolver.evaluate(request, requireConflictContext(context, action.type));
      const blocked = blockingOutcome(outcome, request);
      if (blocked) {
        return blocked;
      }

      const escalated = outcome.kind === 'requires_escalated_approval';
      const next: LeaveRequest = {
        ...base,
        state: LeaveState.Pending,
        approvalTier: escalated ? 'escalated' : 'standard',
      };
      const effects = new EffectPlanner(next, context)
        .notifyApprover(escalated ? 'escalated' : 'submitted')
        .notifyEmployee('submitted').effects;
      return { ok: true, request: next, balanceDelta: 0, effects, outcome };
    }

    case 'approve': {
      const outcome = context.resolver.checkApproval(
        request,
        requireConflictContext(context, action.type)
      );
      const blocked = blockingOutcome(outcome, request);
      if (blocked) {
        return blocked;
      }

      const draftNext: LeaveRequest = {
        ...base,
        decidedBy: actor.employeeId,
        decisionNote: action.note,
      };
      const effects = new EffectPlanner(draftNext, context)
        .calendar(SideEffectKind.CalendarCreate)
        .spreadsheet('approved')
        .notifyEmployee('approved').effects;

      const next: LeaveRequest =
        effects.length > 0
          ? { ...draftNext, state: LeaveState.ApprovedPendingSync, syncBatch: draftNext.version }
          : { ...draftNext, state: LeaveState.Approved };
      return { ok: true, request: next, balanceDelta: days > 0 ? roundDays(-days) : 0, effects, outcome };
    }

    case 'reject': {
      const reason = action.reason.trim();
      if (reason.length === 0) {
        return reject('validation', 'A rejection reason is required', { field: 'reason' });
      }
      const next: LeaveRequest = {
        ...base,
        state: LeaveState.Rejected,
        decidedBy: actor.employeeId,
        decisionNote: reason,
      };
      const effects = new EffectPlanner(next, context).notifyEmployee('rejected').effects;
      return { ok: true, request: next, balanceDelta: 0, effects };
    }

    case 'withdraw': {
      const next: LeaveRequest = { ...base, state: LeaveState.Withdrawn };
      const planner = new EffectPlanner(next, context);
      if (request.state === LeaveState.Pending) {
        planner.notifyApprover('withdrawn');
      }
      return { ok: true, request: next, balanceDelta: 0, effects: planner.effects };
    }

    case 'revert': {
      const next: LeaveRequest = {
        ...base,
        state: LeaveState.Reverted,
        decidedBy: actor.employeeId,
        decisionNote: action.reason?.trim() || request.decisionNote,
      };
      const effects = new EffectPlanner(next, context)
        .calendar(SideEffectKind.CalendarDelete)
        .spreadsheet('reverted')
        .notifyEmployee('reverted').effects;
      return { ok: true, request: next, balanceDelta: roundDays(days), effects };
    }

    case 'mark_synced': {
      const next: LeaveRequest = { ...base, state: LeaveState.Synced };
      const effects = new EffectPlanner(next, context).notifyEmployee('synced').effects;
      return { ok: true, request: next, balanceDelta: 0, effects };
    }

    case 'mark_sync_failed': {
      const next: LeaveRequest = { ...base, state: LeaveState.ApprovedSyncFailed };
      const effects = new EffectPlanner(next, context).notifyApprover('sync_failed').effects;
      return { ok: true, request: next, balanceDelta: 0, effects };
    }

    case 'resume_sync': {
      const next: LeaveRequest = { ...base, state: LeaveState.ApprovedPendingSync };
      return { ok: true, request: next, balanceDelta: 0, effects: [] };
    }
  }
}

function isBlockingFailure(effect: SideEffectRecord): boolean {
  return (
    effect.status === SideEffectStatus.FailedPermanent &&
    !effect.abandoned &&
    !isBestEffortKind(effect.kind)
  );
}

function isSettled(effect: SideEffectRecord): boolean {
  return (
    effect.status === SideEffectStatus.Succeeded ||
    effect.abandoned ||
    (isBestEffortKind(effect.kind) &&
      (effect.status === SideEffectStatus.FailedPermanent ||
        effect.status === SideEffectStatus.FailedRetryable))
  );
}

/**
 * The settlement transition a request is due, given its side-effect log
 *
 * Only effects of the current approval batch count. A permanent calendar
 * failure moves the request to approved_sync_failed; best-effort effects
 * settle once they stop retrying, whatever the outcome, and stay open to
 * re-drive. A retryable calendar failure keeps the request waiting.
 * Operator abandon and re-drive lift a request out of approved_sync_failed.
 */
export function settlementAction(
  request: LeaveRequest,
  effects: readonly SideEffectRecord[]
): SettlementAction | null {
  if (request.syncBatch === undefined) {
    return null;
  }
  const batch = effects.filter((e) => e.scheduledAtVersion === request.syncBatch);

  switch (request.state) {
    case LeaveState.ApprovedPendingSync:
      if (batch.some(isBlockingFailure)) {
        return 'mark_sync_failed';
      }
      return batch.every(isSettled) ? 'mark_synced' : null;
    case LeaveState.ApprovedSyncFailed:
      return batch.some(isBlockingFailure) ? null : 'resume_sync';
    default:
      return null;
  }
}
