import { describe, it, expect } from 'vitest';

import { ConflictResolver, type ConflictContext } from '../../../src/services/conflict-resolver.service.js';
import { LeaveState, LeaveType } from '../../../src/types/leave.js';
import { buildEmployee, buildRequest } from '../../helpers/leave-fixtures.js';

describe('ConflictResolver', () => {
  const resolver = new ConflictResolver();

  function context(overrides: Partial<ConflictContext> = {}): ConflictContext {
    return {
      employee: buildEmployee(),
      overlappingApproved: [],
      teamSize: 4,
      teammatesOnLeave: 0,
      threshold: 0.3,
      ...overrides,
    };
  }

  it('should accept a request within balance and with no conflicts', () => {
    expect(resolver.evaluate(buildRequest(), context())).toEqual({ kind: 'eligible' });
  });

  it('should leave overlap with approved leave to approval time at submission', () => {
    const approved = buildRequest({ id: 'req-0', state: LeaveState.Synced, version: 5 });

    expect(resolver.evaluate(buildRequest(), context({ overlappingApproved: [approved] }))).toEqual({
      kind: 'eligible',
    });
  });

  it('should reject a request exceeding the remaining balance', () => {
    expect(resolver.evaluate(buildRequest({ days: 11 }), context())).toEqual({
      kind: 'rejected_insufficient_balance',
      requested: 11,
      remaining: 10,
    });
  });

  it('should accept a request using exactly the remaining balance', () => {
    expect(resolver.evaluate(buildRequest({ days: 10 }), context()).kind).toBe('eligible');
  });

  it('should treat a missing balance as zero', () => {
    expect(resolver.evaluate(buildRequest({ leaveType: LeaveType.Sick, days: 1 }), context())).toEqual({
      kind: 'rejected_insufficient_balance',
      requested: 1,
      remaining: 0,
    });
  });

  it('should never check the balance of unpaid leave', () => {
    expect(resolver.evaluate(buildRequest({ leaveType: LeaveType.Unpaid, days: 60 }), context()).kind).toBe(
      'eligible'
    );
  });

  it('should escalate when projected absence exceeds the threshold', () => {
    expect(resolver.evaluate(buildRequest(), context({ teammatesOnLeave: 1 }))).toEqual({
      kind: 'requires_escalated_approval',
      projectedAbsence: 0.5,
      threshold: 0.3,
    });
  });

  it('should not escalate at or below the threshold', () => {
    expect(resolver.evaluate(buildRequest(), context({ teamSize: 10, teammatesOnLeave: 1 })).kind).toBe(
      'eligible'
    );
    expect(
      resolver.evaluate(buildRequest(), context({ teamSize: 10, teammatesOnLeave: 2, threshold: 0.3 })).kind
    ).toBe('eligible');
  });

  it('should not escalate a lone absentee, even in a tiny team', () => {
    expect(resolver.evaluate(buildRequest(), context({ teamSize: 1, teammatesOnLeave: 0 })).kind).toBe(
      'eligible'
    );
  });

  it('should round the projected absence to three decimals', () => {
    expect(resolver.evaluate(buildRequest(), context({ teamSize: 3, teammatesOnLeave: 1 }))).toEqual({
      kind: 'requires_escalated_approval',
      projectedAbsence: 0.667,
      threshold: 0.3,
    });
  });

  describe('checkApproval', () => {
    it('should reject a span overlapping the employee\'s approved leave', () => {
      const approved = buildRequest({ id: 'req-0', state: LeaveState.Synced, version: 5 });

      expect(resolver.checkApproval(buildRequest(), context({ overlappingApproved: [approved] }))).toEqual({
        kind: 'rejected_overlap',
        conflictingRequestIds: ['req-0'],
      });
    });

    it('should ignore the request itself and other employees in the overlap list', () => {
      const self = buildRequest({ state: LeaveState.Approved });
      const someoneElse = buildRequest({ id: 'req-9', employeeId: 'emp-2', state: LeaveState.Approved });

      expect(
        resolver.checkApproval(buildRequest(), context({ overlappingApproved: [self, someoneElse] }))
      ).toEqual({ kind: 'eligible' });
    });

    it('should report overlap before balance', () => {
      const approved = buildRequest({ id: 'req-0', state: LeaveState.Approved });

      expect(
        resolver.checkApproval(buildRequest({ days: 50 }), context({ overlappingApproved: [approved] })).kind
      ).toBe('rejected_overlap');
    });

    it('should re-check the balance', () => {
      expect(resolver.checkApproval(buildRequest({ days: 11 }), context()).kind).toBe(
        'rejected_insufficient_balance'
      );
    });

    it('should report a threshold breach without rejecting', () => {
      expect(resolver.checkApproval(buildRequest(), context({ teammatesOnLeave: 1 })).kind).toBe(
        'requires_escalated_approval'
      );
    });
  });
});
