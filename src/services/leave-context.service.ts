/**
 * Leave context for the question-answering boundary
 *
 * Collects what an assistant needs to answer an employee's leave questions
 * (balances, requests awaiting a decision, upcoming approved leave) and a
 * plain-text rendering of it. Nothing here calls a model.
 *
 * @module services/leave-context
 */

import { ForbiddenTransitionError, NotFoundError } from '../types/errors.js';
import { UserRole } from '../types/index.js';
import {
  APPROVED_STATES,
  LeaveState,
  type Actor,
  type LeaveBalanceLine,
  type LeaveRequest,
} from '../types/leave.js';
import { formatCalendarDate } from '../utils/date.js';
import type { LeaveLifecycleEngine } from './leave.service.js';
import type { LedgerStore } from './ledger-store.js';

export interface LeaveContextEntry {
  readonly requestId: string;
  readonly leaveType: string;
  readonly start: string;
  readonly end: string;
  readonly days: number;
  readonly state: LeaveState;
}

export interface LeaveContext {
  readonly employeeId: string;
  readonly employeeName: string;
  readonly asOf: string;
  readonly balances: readonly LeaveBalanceLine[];
  readonly pending: readonly LeaveContextEntry[];
  readonly upcoming: readonly LeaveContextEntry[];
  readonly summary: string;
}

function toEntry(request: LeaveRequest): LeaveContextEntry {
  return {
    requestId: request.id,
    leaveType: request.leaveType,
    start: request.span.start,
    end: request.span.end,
    days: request.days,
    state: request.state,
  };
}

function describeEntry(entry: LeaveContextEntry): string {
  const span = entry.start === entry.end ? entry.start : `${entry.start} to ${entry.end}`;
  return `- ${entry.leaveType}, ${span}, ${entry.days} day(s) (${entry.state})`;
}

export class LeaveContextService {
  constructor(
    private readonly store: LedgerStore,
    private readonly engine: Pick<LeaveLifecycleEngine, 'getBalances'>,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Context of an employee as seen by `actor`: the employee, their manager
   * or an HR admin
   *
   * @throws {ForbiddenTransitionError} For anyone else
   */
  async buildContextFor(actor: Actor, employeeId: string): Promise<LeaveContext> {
    if (actor.role !== UserRole.HRAdmin && actor.employeeId !== employeeId) {
      const employee = await this.store.getEmployee(employeeId);
      if (!employee) {
        throw new NotFoundError('employee', employeeId);
      }
      if (employee.managerId !== actor.employeeId) {
        throw new ForbiddenTransitionError('Not allowed to view the leave context of this employee', {
          actorId: actor.employeeId,
          employeeId,
        });
      }
    }
    return this.buildContext(employeeId);
  }

  /**
   * @throws {NotFoundError} When the employee does not exist
   */
  async buildContext(employeeId: string): Promise<LeaveContext> {
    const balances = await this.engine.getBalances(employeeId);
    const employee = await this.store.getEmployee(employeeId);
    const today = formatCalendarDate(this.now());

    const requests = await this.store.listRequestsForEmployee(employeeId, [
      LeaveState.Pending,
      ...APPROVED_STATES,
    ]);
    const pending = requests.filter((r) => r.state === LeaveState.Pending).map(toEntry);
    const upcoming = requests
      .filter((r) => r.state !== LeaveState.Pending && r.span.end >= today)
      .map(toEntry);

    const name = employee?.name ?? employeeId;
    const lines = [
      `Leave summary for ${name} as of ${today}.`,
      'Balances:',
      ...balances.map(
        (line) =>
          `- ${line.leaveType}: ${line.remaining === null ? 'no limit' : `${line.remaining} day(s) remaining`}` +
          (line.pending > 0 ? `, ${line.pending} day(s) pending` : '')
      ),
      pending.length > 0 ? 'Awaiting a decision:' : 'Nothing is awaiting a decision.',
      ...pending.map(describeEntry),
      upcoming.length > 0 ? 'Upcoming approved leave:' : 'No upcoming approved leave.',
      ...upcoming.map(describeEntry),
    ];

    return {
      employeeId,
      employeeName: name,
      asOf: today,
      balances,
      pending,
      upcoming,
      summary: lines.join('\n'),
    };
  }
}
