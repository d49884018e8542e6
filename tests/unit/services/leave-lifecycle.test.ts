import { describe, it, expect } from 'vitest';

import { ManagerApprovalPolicy } from '../../../src/services/approval-policy.js';
import { ConflictResolver, type ConflictContext } from '../../../src/services/conflict-resolver.service.js';
import {
  SYSTEM_ACTOR,
  settlementAction,
  transition,
  type TransitionContext,
  type TransitionResult,
} from '../../../src/services/leave-lifecycle.js';
import { InvariantViolationError } from '../../../src/types/errors.js';
import {
  LeaveState,
  LeaveType,
  SideEffectKind,
  SideEffectStatus,
  type LeaveRequest,
} from '../../../src/types/leave.js';
import {
  ALL_CHANNELS,
  EMPLOYEE,
  FIXED_NOW,
  HR,
  MANAGER,
  NO_CHANNELS,
  TEAMMATE,
  buildEffect,
  buildEmployee,
  buildRequest,
} from '../../helpers/leave-fixtures.js';

function conflictContext(overrides: Partial<ConflictContext> = {}): ConflictContext {
  return {
    employee: buildEmployee(),
    overlappingApproved: [],
    teamSize: 4,
    teammatesOnLeave: 0,
    threshold: 0.3,
    ...overrides,
  };
}

function transitionContext(overrides: Partial<TransitionContext> = {}): TransitionContext {
  return {
    now: FIXED_NOW,
    employee: buildEmployee(),
    policy: new ManagerApprovalPolicy(),
    resolver: new ConflictResolver(),
    conflict: conflictContext(),
    channels: ALL_CHANNELS,
    ...overrides,
  };
}

function expectOk(result: TransitionResult): Extract<TransitionResult, { ok: true }> {
  if (!result.ok) {
    throw new Error(`Expected transition to succeed: ${result.rejection.message}`);
  }
  return result;
}

function expectRejected(result: TransitionResult): Extract<TransitionResult, { ok: false }>['rejection'] {
  if (result.ok) {
    throw new Error('Expected transition to be rejected');
  }
  return result.rejection;
}

describe('transition', () => {
  describe('version and state checks', () => {
    it('should reject a stale version before anything else', () => {
      const rejection = expectRejected(
        transition(buildRequest({ version: 2 }), 1, { type: 'submit' }, TEAMMATE, transitionContext())
      );

      expect(rejection.reason).toBe('version_conflict');
      expect(rejection.details).toEqual({ expectedVersion: 1, actualVersion: 2 });
    });

    it('should reject actions not allowed from the current state', () => {
      const rejection = expectRejected(
        transition(buildRequest(), 1, { type: 'approve' }, MANAGER, transitionContext())
      );

      expect(rejection.reason).toBe('invalid_transition');
      expect(rejection.message).toBe('Cannot approve a request in state draft');
    });

    it('should reject every action on a terminal request', () => {
      for (const state of [LeaveState.Rejected, LeaveState.Withdrawn, LeaveState.Reverted]) {
        const request = buildRequest({ state });
        for (const action of [
          { type: 'submit' as const },
          { type: 'withdraw' as const },
          { type: 'revert' as const },
        ]) {
          expect(expectRejected(transition(request, 1, action, HR, transitionContext())).reason).toBe(
            'invalid_transition'
          );
        }
      }
    });
  });

  describe('submit', () => {
    it('should move a draft to pending and notify manager and employee', () => {
      const result = expectOk(transition(buildRequest(), 1, { type: 'submit' }, EMPLOYEE, transitionContext()));

      expect(result.request.state).toBe(LeaveState.Pending);
      expect(result.request.version).toBe(2);
      expect(result.request.approvalTier).toBe('standard');
      expect(result.balanceDelta).toBe(0);
      expect(result.effects).toEqual([
        {
          kind: SideEffectKind.NotifyApprover,
          idempotencyKey: 'leave:req-1:notify_approver:v2',
          template: 'submitted',
          recipientId: 'mgr-1',
        },
        {
          kind: SideEffectKind.NotifyEmployee,
          idempotencyKey: 'leave:req-1:notify_employee:v2',
          template: 'submitted',
          recipientId: 'emp-1',
        },
      ]);
    });

    it('should only let the owner submit', () => {
      expect(expectRejected(transition(buildRequest(), 1, { type: 'submit' }, HR, transitionContext())).reason).toBe(
        'forbidden'
      );
    });

    it('should escalate when the team-absence threshold is exceeded', () => {
      const result = expectOk(
        transition(
          buildRequest(),
          1,
          { type: 'submit' },
          EMPLOYEE,
          transitionContext({ conflict: conflictContext({ teammatesOnLeave: 1 }) })
        )
      );

      expect(result.request.approvalTier).toBe('escalated');
      expect(result.effects[0]?.template).toBe('escalated');
      expect(result.outcome?.kind).toBe('requires_escalated_approval');
    });

    it('should submit a span overlapping approved leave and leave the overlap to approval', () => {
      const approved = buildRequest({ id: 'req-0', state: LeaveState.Synced });
      const result = expectOk(
        transition(
          buildRequest(),
          1,
          { type: 'submit' },
          EMPLOYEE,
          transitionContext({ conflict: conflictContext({ overlappingApproved: [approved] }) })
        )
      );

      expect(result.request.state).toBe(LeaveState.Pending);
      expect(result.outcome).toEqual({ kind: 'eligible' });
    });

    it('should reject insufficient balance', () => {
      const rejection = expectRejected(
        transition(buildRequest({ days: 12 }), 1, { type: 'submit' }, EMPLOYEE, transitionContext())
      );

      expect(rejection.reason).toBe('rejected_insufficient_balance');
      expect(rejection.message).toBe('Requested 12 days exceeds the remaining annual balance of 10');
    });

    it('should schedule nothing when no channel is configured', () => {
      const result = expectOk(
        transition(buildRequest(), 1, { type: 'submit' }, EMPLOYEE, transitionContext({ channels: NO_CHANNELS }))
      );

      expect(result.effects).toEqual([]);
    });

    it('should fail loudly without conflict data', () => {
      expect(() =>
        transition(buildRequest(), 1, { type: 'submit' }, EMPLOYEE, transitionContext({ conflict: undefined }))
      ).toThrow(InvariantViolationError);
    });
  });

  describe('approve', () => {
    const pending = buildRequest({ state: LeaveState.Pending, version: 2 });

    it('should debit the balance and schedule the sync batch at the new version', () => {
      const result = expectOk(transition(pending, 2, { type: 'approve', note: 'Enjoy' }, MANAGER, transitionContext()));

      expect(result.request.state).toBe(LeaveState.ApprovedPendingSync);
      expect(result.request.version).toBe(3);
      expect(result.request.syncBatch).toBe(3);
      expect(result.request.decidedBy).toBe('mgr-1');
      expect(result.request.decisionNote).toBe('Enjoy');
      expect(result.balanceDelta).toBe(-5);
      expect(result.effects.map((e) => [e.kind, e.idempotencyKey, e.template])).toEqual([
        [SideEffectKind.CalendarCreate, 'leave:req-1:calendar_create:v3', undefined],
        [SideEffectKind.SheetSync, 'leave:req-1:sheet_sync:v3', 'approved'],
        [SideEffectKind.NotifyEmployee, 'leave:req-1:notify_employee:v3', 'approved'],
      ]);
    });

    it('should reject a span overlapping approved leave', () => {
      const approved = buildRequest({ id: 'req-0', state: LeaveState.Synced });
      const rejection = expectRejected(
        transition(
          pending,
          2,
          { type: 'approve' },
          MANAGER,
          transitionContext({ conflict: conflictContext({ overlappingApproved: [approved] }) })
        )
      );

      expect(rejection.reason).toBe('rejected_overlap');
      expect(rejection.details).toEqual({ conflictingRequestIds: ['req-0'] });
    });

    it('should go straight to approved when nothing needs syncing', () => {
      const result = expectOk(transition(pending, 2, { type: 'approve' }, MANAGER, transitionContext({ channels: NO_CHANNELS })));

      expect(result.request.state).toBe(LeaveState.Approved);
      expect(result.request.syncBatch).toBeUndefined();
    });

    it('should not debit unpaid leave', () => {
      const unpaid = buildRequest({ state: LeaveState.Pending, version: 2, leaveType: LeaveType.Unpaid });

      expect(expectOk(transition(unpaid, 2, { type: 'approve' }, MANAGER, transitionContext())).balanceDelta).toBe(0);
    });

    it('should debit half a day for a half-day request', () => {
      const half = buildRequest({
        state: LeaveState.Pending,
        version: 2,
        span: { start: '2024-06-03', end: '2024-06-03' },
        halfDay: true,
        days: 0.5,
      });

      expect(expectOk(transition(half, 2, { type: 'approve' }, MANAGER, transitionContext())).balanceDelta).toBe(-0.5);
    });

    it('should refuse an approver the policy does not allow', () => {
      expect(expectRejected(transition(pending, 2, { type: 'approve' }, TEAMMATE, transitionContext())).reason).toBe(
        'forbidden'
      );
    });

    it('should re-check the balance at approval', () => {
      const context = transitionContext({
        conflict: conflictContext({ employee: buildEmployee({ balances: { [LeaveType.Annual]: 3 } }) }),
      });

      expect(expectRejected(transition(pending, 2, { type: 'approve' }, MANAGER, context)).reason).toBe(
        'rejected_insufficient_balance'
      );
    });

    it('should not block approval on the absence threshold', () => {
      const context = transitionContext({ conflict: conflictContext({ teammatesOnLeave: 3 }) });

      expect(transition(pending, 2, { type: 'approve' }, HR, context).ok).toBe(true);
    });
  });

  describe('reject', () => {
    const pending = buildRequest({ state: LeaveState.Pending, version: 2 });

    it('should record the reason and notify the employee', () => {
      const result = expectOk(
        transition(pending, 2, { type: 'reject', reason: '  Busy week  ' }, MANAGER, transitionContext())
      );

      expect(result.request.state).toBe(LeaveState.Rejected);
      expect(result.request.decisionNote).toBe('Busy week');
      expect(result.effects.map((e) => e.kind)).toEqual([SideEffectKind.NotifyEmployee]);
    });

    it('should require a reason', () => {
      const rejection = expectRejected(
        transition(pending, 2, { type: 'reject', reason: '   ' }, MANAGER, transitionContext())
      );

      expect(rejection.reason).toBe('validation');
      expect(rejection.message).toBe('A rejection reason is required');
    });
  });

  describe('withdraw', () => {
    it('should withdraw a draft without notifying anyone', () => {
      const result = expectOk(transition(buildRequest(), 1, { type: 'withdraw' }, EMPLOYEE, transitionContext()));

      expect(result.request.state).toBe(LeaveState.Withdrawn);
      expect(result.effects).toEqual([]);
    });

    it('should tell the approver when a pending request is withdrawn', () => {
      const result = expectOk(
        transition(buildRequest({ state: LeaveState.Pending, version: 2 }), 2, { type: 'withdraw' }, EMPLOYEE, transitionContext())
      );

      expect(result.effects.map((e) => [e.kind, e.template])).toEqual([[SideEffectKind.NotifyApprover, 'withdrawn']]);
    });

    it('should only let the owner withdraw', () => {
      expect(
        expectRejected(transition(buildRequest(), 1, { type: 'withdraw' }, MANAGER, transitionContext())).reason
      ).toBe('forbidden');
    });
  });

  describe('revert', () => {
    const synced = buildRequest({ state: LeaveState.Synced, version: 4, syncBatch: 3, decisionNote: 'Enjoy' });

    it('should credit the balance and schedule calendar removal', () => {
      const result = expectOk(transition(synced, 4, { type: 'revert', reason: 'Plans changed' }, EMPLOYEE, transitionContext()));

      expect(result.request.state).toBe(LeaveState.Reverted);
      expect(result.request.decisionNote).toBe('Plans changed');
      expect(result.balanceDelta).toBe(5);
      expect(result.effects.map((e) => [e.kind, e.idempotencyKey, e.template])).toEqual([
        [SideEffectKind.CalendarDelete, 'leave:req-1:calendar_delete:v5', undefined],
        [SideEffectKind.SheetSync, 'leave:req-1:sheet_sync:v5', 'reverted'],
        [SideEffectKind.NotifyEmployee, 'leave:req-1:notify_employee:v5', 'reverted'],
      ]);
    });

    it('should keep the approval note when no reason is given', () => {
      expect(expectOk(transition(synced, 4, { type: 'revert' }, EMPLOYEE, transitionContext())).request.decisionNote).toBe(
        'Enjoy'
      );
    });

    it('should allow the owner, the manager and HR only', () => {
      expect(transition(synced, 4, { type: 'revert' }, MANAGER, transitionContext()).ok).toBe(true);
      expect(transition(synced, 4, { type: 'revert' }, HR, transitionContext()).ok).toBe(true);
      expect(expectRejected(transition(synced, 4, { type: 'revert' }, TEAMMATE, transitionContext())).reason).toBe(
        'forbidden'
      );
    });

    it('should revert from every approved state', () => {
      for (const state of [LeaveState.Approved, LeaveState.ApprovedPendingSync, LeaveState.ApprovedSyncFailed]) {
        expect(transition({ ...synced, state }, 4, { type: 'revert' }, EMPLOYEE, transitionContext()).ok).toBe(true);
      }
    });
  });

  describe('settlement transitions', () => {
    const pendingSync = buildRequest({ state: LeaveState.ApprovedPendingSync, version: 3, syncBatch: 3 });

    it('should be issued by the system only', () => {
      expect(expectRejected(transition(pendingSync, 3, { type: 'mark_synced' }, HR, transitionContext())).reason).toBe(
        'forbidden'
      );
    });

    it('should mark synced and notify the employee', () => {
      const result = expectOk(transition(pendingSync, 3, { type: 'mark_synced' }, SYSTEM_ACTOR, transitionContext()));

      expect(result.request.state).toBe(LeaveState.Synced);
      expect(result.effects.map((e) => [e.kind, e.template])).toEqual([[SideEffectKind.NotifyEmployee, 'synced']]);
    });

    it('should mark sync failed and notify the approver', () => {
      const result = expectOk(
        transition(pendingSync, 3, { type: 'mark_sync_failed' }, SYSTEM_ACTOR, transitionContext())
      );

      expect(result.request.state).toBe(LeaveState.ApprovedSyncFailed);
      expect(result.effects.map((e) => [e.kind, e.template, e.recipientId])).toEqual([
        [SideEffectKind.NotifyApprover, 'sync_failed', 'mgr-1'],
      ]);
    });

    it('should resume a failed sync without new effects', () => {
      const failed: LeaveRequest = { ...pendingSync, state: LeaveState.ApprovedSyncFailed, version: 4 };
      const result = expectOk(transition(failed, 4, { type: 'resume_sync' }, SYSTEM_ACTOR, transitionContext()));

      expect(result.request.state).toBe(LeaveState.ApprovedPendingSync);
      expect(result.request.syncBatch).toBe(3);
      expect(result.effects).toEqual([]);
    });
  });
});

describe('settlementAction', () => {
  const pendingSync = buildRequest({ state: LeaveState.ApprovedPendingSync, version: 3, syncBatch: 3 });
  const calendar = buildEffect({ id: 'fx-cal' });
  const sheet = buildEffect({ id: 'fx-sheet', kind: SideEffectKind.SheetSync, idempotencyKey: 'leave:req-1:sheet_sync:v3' });

  it('should wait while batch effects are pending', () => {
    expect(settlementAction(pendingSync, [{ ...calendar, status: SideEffectStatus.Succeeded }, sheet])).toBeNull();
  });

  it('should mark synced when every batch effect succeeded', () => {
    expect(
      settlementAction(pendingSync, [
        { ...calendar, status: SideEffectStatus.Succeeded },
        { ...sheet, status: SideEffectStatus.Succeeded },
      ])
    ).toBe('mark_synced');
  });

  it('should settle past a best-effort effect that ran out of retries', () => {
    expect(
      settlementAction(pendingSync, [
        { ...calendar, status: SideEffectStatus.Succeeded },
        { ...sheet, status: SideEffectStatus.FailedRetryable, attempts: 3 },
      ])
    ).toBe('mark_synced');
  });

  it('should keep waiting on a calendar effect that ran out of retries', () => {
    expect(
      settlementAction(pendingSync, [
        { ...calendar, status: SideEffectStatus.FailedRetryable, attempts: 3 },
        { ...sheet, status: SideEffectStatus.Succeeded },
      ])
    ).toBeNull();
  });

  it('should settle past a permanently failed best-effort effect', () => {
    expect(
      settlementAction(pendingSync, [
        { ...calendar, status: SideEffectStatus.Succeeded },
        { ...sheet, status: SideEffectStatus.FailedPermanent },
      ])
    ).toBe('mark_synced');
  });

  it('should mark sync failed on a permanent calendar failure', () => {
    expect(settlementAction(pendingSync, [{ ...calendar, status: SideEffectStatus.FailedPermanent }, sheet])).toBe(
      'mark_sync_failed'
    );
  });

  it('should ignore effects of other versions', () => {
    const earlier = buildEffect({ id: 'fx-old', scheduledAtVersion: 2, kind: SideEffectKind.NotifyApprover });

    expect(settlementAction(pendingSync, [earlier, { ...calendar, status: SideEffectStatus.Succeeded }])).toBe(
      'mark_synced'
    );
  });

  it('should resume once the blocking failure is abandoned or re-driven', () => {
    const failed: LeaveRequest = { ...pendingSync, state: LeaveState.ApprovedSyncFailed, version: 4 };

    expect(settlementAction(failed, [{ ...calendar, status: SideEffectStatus.FailedPermanent }])).toBeNull();
    expect(
      settlementAction(failed, [{ ...calendar, status: SideEffectStatus.FailedPermanent, abandoned: true }])
    ).toBe('resume_sync');
    expect(settlementAction(failed, [{ ...calendar, status: SideEffectStatus.Pending }])).toBe('resume_sync');
  });

  it('should do nothing for requests without a sync batch or in other states', () => {
    expect(settlementAction(buildRequest({ state: LeaveState.Approved }), [])).toBeNull();
    expect(settlementAction({ ...pendingSync, state: LeaveState.Synced }, [])).toBeNull();
  });
});
