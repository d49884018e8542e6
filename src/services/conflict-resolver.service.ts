/**
 * Conflict Resolver
 *
 * Decides whether a candidate leave span can be submitted or approved, and
 * which approval tier it needs. Pure: the lifecycle engine gathers the
 * ledger data and passes it in.
 *
 * @module services/conflict-resolver
 */

import {
  isBalanceTracked,
  type Employee,
  type LeaveRequest,
} from '../types/leave.js';

/**
 * Ledger data the resolver evaluates a candidate against
 */
export interface ConflictContext {
  readonly employee: Employee;

  /**
   * The employee's own approved-family requests overlapping the candidate span
   */
  readonly overlappingApproved: readonly LeaveRequest[];

  /**
   * Headcount of the employee's team, the employee included
   */
  readonly teamSize: number;

  /**
   * Distinct teammates (the employee excluded) with approved-family leave
   * overlapping the candidate span
   */
  readonly teammatesOnLeave: number;

  /**
   * Fraction of the team allowed to be absent at once
   */
  readonly threshold: number;
}

export type ConflictOutcome =
  | { readonly kind: 'eligible' }
  | { readonly kind: 'rejected_overlap'; readonly conflictingRequestIds: readonly string[] }
  | {
      readonly kind: 'rejected_insufficient_balance';
      readonly requested: number;
      readonly remaining: number;
    }
  | {
      readonly kind: 'requires_escalated_approval';
      readonly projectedAbsence: number;
      readonly threshold: number;
    };

export type ConflictOutcomeKind = ConflictOutcome['kind'];

export class ConflictResolver {
  /**
   * Evaluate a candidate at submission
   *
   * Balance first, then the team-absence threshold. Overlap with approved
   * leave is left to approval time, so a submission overlapping an approved
   * request still lands in pending.
   */
  evaluate(candidate: LeaveRequest, context: ConflictContext): ConflictOutcome {
    return this.checkBalance(candidate, context) ?? this.checkTeamAbsence(context) ?? { kind: 'eligible' };
  }

  /**
   * Re-check a pending request at approval time
   *
   * Overlap against the employee's approved-family leave, then balance, both
   * against the current ledger. A threshold breach is reported but does not
   * block: the last approval wins and earlier approvals are never
   * invalidated.
   */
  checkApproval(request: LeaveRequest, context: ConflictContext): ConflictOutcome {
    return (
      this.checkOverlap(request, context) ??
      this.checkBalance(request, context) ??
      this.checkTeamAbsence(context) ?? { kind: 'eligible' }
    );
  }

  private checkOverlap(candidate: LeaveRequest, context: ConflictContext): ConflictOutcome | null {
    const conflicting = context.overlappingApproved.filter(
      (r) => r.id !== candidate.id && r.employeeId === candidate.employeeId
    );
    return conflicting.length > 0
      ? { kind: 'rejected_overlap', conflictingRequestIds: conflicting.map((r) => r.id) }
      : null;
  }

  private checkBalance(candidate: LeaveRequest, context: ConflictContext): ConflictOutcome | null {
    if (!isBalanceTracked(candidate.leaveType)) {
      return null;
    }
    const remaining = context.employee.balances[candidate.leaveType] ?? 0;
    return candidate.days > remaining
      ? { kind: 'rejected_insufficient_balance', requested: candidate.days, remaining }
      : null;
  }

  // A lone absentee is never "concurrent" absence, so at least one teammate
  // must already be away before the threshold applies.
  private checkTeamAbsence(context: ConflictContext): ConflictOutcome | null {
    if (context.teammatesOnLeave < 1) {
      return null;
    }

    const teamSize = Math.max(context.teamSize, context.teammatesOnLeave + 1);
    const projectedAbsence = (context.teammatesOnLeave + 1) / teamSize;

    if (projectedAbsence > context.threshold) {
      return {
        kind: 'requires_escalated_approval',
        projectedAbsence: Math.round(projectedAbsence * 1000) / 1000,
        threshold: context.threshold,
      };
    }

    return null;
  }
}
