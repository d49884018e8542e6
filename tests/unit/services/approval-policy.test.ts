import { describe, it, expect } from 'vitest';

import {
  AutoApproveShortLeavePolicy,
  ManagerApprovalPolicy,
  createApprovalPolicy,
} from '../../../src/services/approval-policy.js';
import { SYSTEM_ACTOR } from '../../../src/services/leave-lifecycle.js';
import { LeaveType } from '../../../src/types/leave.js';
import { EMPLOYEE, HR, MANAGER, TEAMMATE, buildEmployee, buildRequest } from '../../helpers/leave-fixtures.js';

describe('ManagerApprovalPolicy', () => {
  const policy = new ManagerApprovalPolicy();
  const context = { employee: buildEmployee() };

  it('should always wait for an approver', () => {
    expect(policy.evaluateSubmission()).toBe('await_approver');
  });

  it('should let the direct manager decide standard-tier requests', () => {
    expect(policy.canApprove(MANAGER, buildRequest(), context)).toBe(true);
  });

  it('should reserve escalated requests for HR', () => {
    const escalated = buildRequest({ approvalTier: 'escalated' });

    expect(policy.canApprove(MANAGER, escalated, context)).toBe(false);
    expect(policy.canApprove(HR, escalated, context)).toBe(true);
  });

  it('should not let a manager decide for someone else\'s report', () => {
    const otherManager = { employeeId: 'mgr-2', role: MANAGER.role };

    expect(policy.canApprove(otherManager, buildRequest(), context)).toBe(false);
  });

  it('should not let anyone decide their own request', () => {
    const hrOwnRequest = buildRequest({ employeeId: 'hr-1' });

    expect(policy.canApprove(HR, hrOwnRequest, { employee: buildEmployee({ id: 'hr-1' }) })).toBe(false);
  });

  it('should not let employees decide', () => {
    expect(policy.canApprove(TEAMMATE, buildRequest(), context)).toBe(false);
    expect(policy.canApprove(EMPLOYEE, buildRequest({ employeeId: 'emp-3' }), context)).toBe(false);
  });
});

describe('AutoApproveShortLeavePolicy', () => {
  const policy = new AutoApproveShortLeavePolicy(new ManagerApprovalPolicy(), {
    maxDays: 1,
    leaveTypes: [LeaveType.Sick],
  });
  const context = { employee: buildEmployee() };

  it('should name itself after the wrapped policy', () => {
    expect(policy.name).toBe('auto-approve-short(manager)');
  });

  it('should auto-approve short standard requests of a listed type', () => {
    expect(policy.evaluateSubmission(buildRequest({ leaveType: LeaveType.Sick, days: 1 }), context)).toBe(
      'auto_approve'
    );
    expect(policy.evaluateSubmission(buildRequest({ leaveType: LeaveType.Sick, days: 0.5 }), context)).toBe(
      'auto_approve'
    );
  });

  it('should defer longer, unlisted or escalated requests', () => {
    expect(policy.evaluateSubmission(buildRequest({ leaveType: LeaveType.Sick, days: 2 }), context)).toBe(
      'await_approver'
    );
    expect(policy.evaluateSubmission(buildRequest({ leaveType: LeaveType.Annual, days: 1 }), context)).toBe(
      'await_approver'
    );
    expect(
      policy.evaluateSubmission(
        buildRequest({ leaveType: LeaveType.Sick, days: 1, approvalTier: 'escalated' }),
        context
      )
    ).toBe('await_approver');
  });

  it('should let the system approve only qualifying requests', () => {
    expect(policy.canApprove(SYSTEM_ACTOR, buildRequest({ leaveType: LeaveType.Sick, days: 1 }), context)).toBe(
      true
    );
    expect(policy.canApprove(SYSTEM_ACTOR, buildRequest({ leaveType: LeaveType.Sick, days: 3 }), context)).toBe(
      false
    );
  });

  it('should leave human approvals to the wrapped policy', () => {
    expect(policy.canApprove(MANAGER, buildRequest({ days: 3 }), context)).toBe(true);
  });
});

describe('createApprovalPolicy', () => {
  it('should return the manager policy when auto-approval is disabled', () => {
    expect(createApprovalPolicy({ maxDays: 0, leaveTypes: [LeaveType.Sick] }).name).toBe('manager');
    expect(createApprovalPolicy({ maxDays: 2, leaveTypes: [] }).name).toBe('manager');
  });

  it('should wrap the manager policy when auto-approval is configured', () => {
    expect(createApprovalPolicy({ maxDays: 2, leaveTypes: [LeaveType.Sick] }).name).toBe(
      'auto-approve-short(manager)'
    );
  });
});
