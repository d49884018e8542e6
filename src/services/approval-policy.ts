/**
 * Approval policies
 *
 * The lifecycle engine consults a policy after a request is submitted (may it
 * be approved automatically?) and whenever someone tries to decide it (may
 * this actor approve or reject it?). Policies are interchangeable without
 * touching the state machine.
 *
 * @module services/approval-policy
 */

import { UserRole } from '../types/index.js';
import type { Actor, Employee, LeaveRequest, LeaveType } from '../types/leave.js';

/**
 * What the policy knows about the request being decided
 */
export interface ApprovalContext {
  /**
   * Owner of the request
   */
  readonly employee: Employee;
}

export type SubmissionDecision = 'auto_approve' | 'await_approver';

export interface ApprovalPolicy {
  readonly name: string;

  evaluateSubmission(request: LeaveRequest, context: ApprovalContext): SubmissionDecision;

  canApprove(actor: Actor, request: LeaveRequest, context: ApprovalContext): boolean;
}

/**
 * Managers decide standard-tier requests of their direct reports; HR admins
 * decide anything. Nobody decides their own request.
 */
export class ManagerApprovalPolicy implements ApprovalPolicy {
  readonly name = 'manager';

  evaluateSubmission(): SubmissionDecision {
    return 'await_approver';
  }

  canApprove(actor: Actor, request: LeaveRequest, context: ApprovalContext): boolean {
    if (actor.employeeId === request.employeeId) {
      return false;
    }

    if (actor.role === UserRole.HRAdmin) {
      return true;
    }

    return (
      actor.role === UserRole.Manager &&
      request.approvalTier === 'standard' &&
      context.employee.managerId === actor.employeeId
    );
  }
}

export interface AutoApproveOptions {
  /**
   * Longest request, in days, approved without an approver
   */
  readonly maxDays: number;

  readonly leaveTypes: readonly LeaveType[];
}

/**
 * Approves short standard-tier requests of the configured types without an
 * approver and defers everything else to the wrapped policy.
 */
export class AutoApproveShortLeavePolicy implements ApprovalPolicy {
  readonly name: string;

  constructor(
    private readonly inner: ApprovalPolicy,
    private readonly options: AutoApproveOptions
  ) {
    this.name = `auto-approve-short(${inner.name})`;
  }

  evaluateSubmission(request: LeaveRequest, context: ApprovalContext): SubmissionDecision {
    return this.qualifies(request) ? 'auto_approve' : this.inner.evaluateSubmission(request, context);
  }

  canApprove(actor: Actor, request: LeaveRequest, context: ApprovalContext): boolean {
    if (actor.role === 'SYSTEM') {
      return this.qualifies(request);
    }
    return this.inner.canApprove(actor, request, context);
  }

  private qualifies(request: LeaveRequest): boolean {
    return (
      request.approvalTier === 'standard' &&
      this.options.maxDays > 0 &&
      request.days <= this.options.maxDays &&
      this.options.leaveTypes.includes(request.leaveType)
    );
  }
}

/**
 * Build the policy described by the leave configuration
 */
export function createApprovalPolicy(options: AutoApproveOptions): ApprovalPolicy {
  const base = new ManagerApprovalPolicy();
  if (options.maxDays > 0 && options.leaveTypes.length > 0) {
    return new AutoApproveShortLeavePolicy(base, options);
  }
  return base;
}
