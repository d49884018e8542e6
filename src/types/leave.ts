/**
 * Leave Management Type Definitions
 *
 * Domain model of the leave orchestration engine: employees and their
 * balances, leave requests and their lifecycle states, and the side-effect
 * records that mirror approved leave into the calendar, the tracking sheet and
 * the messaging channels.
 *
 * @module types/leave
 */

import type { BaseEntity, UserRole } from './index.js';

/**
 * Leave type enumeration
 */
export enum LeaveType {
  /**
   * Annual vacation leave
   */
  Annual = 'annual',

  /**
   * Sick leave for medical reasons
   */
  Sick = 'sick',

  /**
   * Personal days
   */
  Personal = 'personal',

  /**
   * Bereavement leave
   */
  Bereavement = 'bereavement',

  /**
   * Parental leave
   */
  Parental = 'parental',

  /**
   * Unpaid leave (no balance limit, never debited)
   */
  Unpaid = 'unpaid',
}

/**
 * Lifecycle states of a leave request
 */
export enum LeaveState {
  Draft = 'draft',
  Pending = 'pending',
  Approved = 'approved',
  ApprovedPendingSync = 'approved_pending_sync',
  Synced = 'synced',
  ApprovedSyncFailed = 'approved_sync_failed',
  Rejected = 'rejected',
  Withdrawn = 'withdrawn',
  Reverted = 'reverted',
}

/**
 * States in which the request holds an approved, debited span
 */
export const APPROVED_STATES: readonly LeaveState[] = [
  LeaveState.Approved,
  LeaveState.ApprovedPendingSync,
  LeaveState.ApprovedSyncFailed,
  LeaveState.Synced,
];

/**
 * Approval tier a pending request is routed to
 */
export type ApprovalTier = 'standard' | 'escalated';

/**
 * Actions accepted by the lifecycle transition function. The last three are
 * issued by the engine itself while settling side effects.
 */
export type LeaveAction =
  | { readonly type: 'submit' }
  | { readonly type: 'approve'; readonly note?: string }
  | { readonly type: 'reject'; readonly reason: string }
  | { readonly type: 'withdraw' }
  | { readonly type: 'revert'; readonly reason?: string }
  | { readonly type: 'mark_synced' }
  | { readonly type: 'mark_sync_failed' }
  | { readonly type: 'resume_sync' };

export type LeaveActionType = LeaveAction['type'];

/**
 * Who is performing a transition
 */
export interface Actor {
  /**
   * Employee record of the actor, or 'system' for engine-issued transitions
   */
  readonly employeeId: string;

  /**
   * Role of the actor
   */
  readonly role: UserRole | 'SYSTEM';
}

/**
 * Inclusive calendar-date span. Both ends are `YYYY-MM-DD` strings; there is
 * no time-of-day component.
 */
export interface DateSpan {
  readonly start: string;
  readonly end: string;
}

/**
 * Remaining days per leave type
 */
export type LeaveBalances = Partial<Record<LeaveType, number>>;

/**
 * Employee as seen by the ledger
 */
export interface Employee extends BaseEntity {
  /**
   * Display name
   */
  readonly name: string;

  /**
   * Email address used by the email channel
   */
  readonly email: string;

  /**
   * Phone number (E.164) used by the WhatsApp channel
   */
  readonly phone?: string;

  /**
   * Team the employee belongs to (used for the absence threshold)
   */
  readonly teamId: string;

  /**
   * Manager reference, looked up by id and never owned
   */
  readonly managerId?: string;

  /**
   * Remaining days per leave type
   */
  readonly balances: LeaveBalances;

  /**
   * Optimistic-concurrency version of the balance row
   */
  readonly version: number;
}

/**
 * Leave request entity
 */
export interface LeaveRequest extends BaseEntity {
  readonly employeeId: string;
  readonly leaveType: LeaveType;
  readonly span: DateSpan;

  /**
   * Half-day request; only valid for single-day spans
   */
  readonly halfDay: boolean;

  /**
   * Days counted against the balance
   */
  readonly days: number;

  readonly reason: string;
  readonly state: LeaveState;

  /**
   * Incremented on every transition
   */
  readonly version: number;

  readonly approvalTier: ApprovalTier;

  /**
   * Approver or canceller of the request
   */
  readonly decidedBy?: string;

  /**
   * Rejection reason or approval/revert note
   */
  readonly decisionNote?: string;

  /**
   * Version at which the outstanding approval side effects were scheduled
   */
  readonly syncBatch?: number;
}

/**
 * Side-effect kinds
 */
export enum SideEffectKind {
  CalendarCreate = 'calendar_create',
  CalendarDelete = 'calendar_delete',
  NotifyEmployee = 'notify_employee',
  NotifyApprover = 'notify_approver',
  SheetSync = 'sheet_sync',
}

/**
 * Side-effect execution status
 */
export enum SideEffectStatus {
  Pending = 'pending',
  Succeeded = 'succeeded',
  FailedRetryable = 'failed_retryable',
  FailedPermanent = 'failed_permanent',
}

/**
 * Message templates, one per event kind
 */
export type MessageTemplate =
  | 'submitted'
  | 'escalated'
  | 'approved'
  | 'rejected'
  | 'withdrawn'
  | 'reverted'
  | 'synced'
  | 'sync_failed';

export const MESSAGE_TEMPLATES: readonly MessageTemplate[] = [
  'submitted',
  'escalated',
  'approved',
  'rejected',
  'withdrawn',
  'reverted',
  'synced',
  'sync_failed',
];

/**
 * Durable record of one scheduled side effect
 */
export interface SideEffectRecord extends BaseEntity {
  readonly requestId: string;
  readonly kind: SideEffectKind;

  /**
   * Deterministic key: request id + kind + scheduling version
   */
  readonly idempotencyKey: string;

  /**
   * Request version produced by the transition that scheduled this effect
   */
  readonly scheduledAtVersion: number;

  readonly status: SideEffectStatus;
  readonly attempts: number;
  readonly lastError?: string;

  /**
   * Set when an operator gives up on a failed effect
   */
  readonly abandoned: boolean;

  /**
   * Message template for notification kinds; the recorded event for sheet rows
   */
  readonly template?: MessageTemplate;

  /**
   * Employee id of the message recipient for notification kinds
   */
  readonly recipientId?: string;

  /**
   * Adapter result (calendar event id, message id, sheet range)
   */
  readonly result?: string;

  /**
   * Execution lease held by a draining worker
   */
  readonly lockedUntil?: Date;

  /**
   * Issued with each claim; completing under another token fails
   */
  readonly leaseToken?: string;
}

/**
 * Side effect as planned by a transition, before it is persisted
 */
export interface SideEffectPlan {
  readonly kind: SideEffectKind;
  readonly idempotencyKey: string;
  readonly template?: MessageTemplate;
  readonly recipientId?: string;
}

/**
 * Balance change applied in the same commit as a transition
 */
export interface BalanceAdjustment {
  readonly employeeId: string;
  readonly leaveType: LeaveType;
  readonly delta: number;
  readonly expectedVersion: number;
}

/**
 * Leave balance view for one leave type
 */
export interface LeaveBalanceLine {
  readonly leaveType: LeaveType;
  readonly remaining: number | null;
  readonly pending: number;
}

/**
 * Type guard to check if a value is a valid LeaveType
 *
 * @param value - Value to check
 * @returns True if value is a valid LeaveType
 */
export function isLeaveType(value: unknown): value is LeaveType {
  return (
    typeof value === 'string' &&
    (Object.values(LeaveType) as string[]).includes(value)
  );
}

/**
 * Type guard to check if a value is a valid LeaveState
 *
 * @param value - Value to check
 * @returns True if value is a valid LeaveState
 */
export function isLeaveState(value: unknown): value is LeaveState {
  return (
    typeof value === 'string' &&
    (Object.values(LeaveState) as string[]).includes(value)
  );
}

/**
 * Type guard to check if a value is a valid SideEffectStatus
 */
export function isSideEffectStatus(value: unknown): value is SideEffectStatus {
  return (
    typeof value === 'string' &&
    (Object.values(SideEffectStatus) as string[]).includes(value)
  );
}

/**
 * Type guard to check if a value is a valid SideEffectKind
 */
export function isSideEffectKind(value: unknown): value is SideEffectKind {
  return (
    typeof value === 'string' &&
    (Object.values(SideEffectKind) as string[]).includes(value)
  );
}

export function isMessageTemplate(value: unknown): value is MessageTemplate {
  return typeof value === 'string' && (MESSAGE_TEMPLATES as readonly string[]).includes(value);
}

/**
 * Whether the leave type draws from a balance
 */
export function isBalanceTracked(leaveType: LeaveType): boolean {
  return leaveType !== LeaveType.Unpaid;
}

/**
 * Whether the request currently holds an approved span
 */
export function isApprovedState(state: LeaveState): boolean {
  return APPROVED_STATES.includes(state);
}

/**
 * Whether a failure of this kind is recorded without holding the request
 * back from settling. Only the calendar block is authoritative enough to move
 * a request into approved_sync_failed; messages and the spreadsheet mirror
 * are best-effort.
 */
export function isBestEffortKind(kind: SideEffectKind): boolean {
  return kind !== SideEffectKind.CalendarCreate && kind !== SideEffectKind.CalendarDelete;
}
