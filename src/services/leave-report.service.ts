/**
 * Team and organization leave reports
 *
 * Read-only views for managers and HR administrators: the approved leave of
 * a manager's direct reports over a date range, the requests and balances of
 * those reports, and the approved leave starting soon. A manager sees their
 * own direct reports; an HR administrator sees any manager's team and the
 * whole organization.
 *
 * @module services/leave-report
 */

import { addDays, endOfMonth, startOfMonth } from 'date-fns';

import { ForbiddenTransitionError, LeaveValidationError, NotFoundError } from '../types/errors.js';
import { UserRole } from '../types/index.js';
import {
  APPROVED_STATES,
  type Actor,
  type DateSpan,
  type Employee,
  type LeaveBalanceLine,
  type LeaveRequest,
  type LeaveState,
  type LeaveType,
} from '../types/leave.js';
import { formatCalendarDate, validateDateSpan } from '../utils/date.js';
import type { LeaveLifecycleEngine } from './leave.service.js';
import type { LedgerStore } from './ledger-store.js';

const MAX_CALENDAR_SPAN_DAYS = 366;
const DEFAULT_UPCOMING_DAYS = 30;
const MAX_UPCOMING_DAYS = 365;
const DEFAULT_LISTING_LIMIT = 10;

export interface LeaveReportEntry {
  readonly requestId: string;
  readonly employeeId: string;
  readonly employeeName: string;
  readonly leaveType: LeaveType;
  readonly start: string;
  readonly end: string;
  readonly days: number;
  readonly state: LeaveState;
}

export interface TeamCalendarMember {
  readonly employeeId: string;
  readonly employeeName: string;
  readonly leave: readonly LeaveReportEntry[];
}

export interface TeamCalendar {
  readonly managerId: string;
  readonly span: DateSpan;

  /**
   * Direct reports with approved leave in the span, in employee id order
   */
  readonly members: readonly TeamCalendarMember[];
  readonly teamSize: number;
  readonly summary: string;
}

export interface UpcomingLeaveReport {
  readonly scope: 'organization' | 'direct_reports';
  readonly from: string;
  readonly until: string;
  readonly entries: readonly LeaveReportEntry[];

  /**
   * Days of upcoming leave per leave type
   */
  readonly usage: Partial<Record<LeaveType, number>>;
  readonly totalDays: number;
  readonly summary: string;
}

export interface TeamMemberLeave {
  readonly employeeId: string;
  readonly employeeName: string;
  readonly balances: readonly LeaveBalanceLine[];
  readonly requests: readonly LeaveReportEntry[];
}

export interface TeamListingOptions {
  readonly state?: LeaveState;
  readonly employeeId?: string;

  /**
   * Requests per member, earliest start first
   */
  readonly limit?: number;
}

export interface UpcomingReportOptions {
  readonly days?: number;
}

function toReportEntry(request: LeaveRequest, employeeName: string): LeaveReportEntry {
  return {
    requestId: request.id,
    employeeId: request.employeeId,
    employeeName,
    leaveType: request.leaveType,
    start: request.span.start,
    end: request.span.end,
    days: request.days,
    state: request.state,
  };
}

function describeSpan(entry: LeaveReportEntry): string {
  const span = entry.start === entry.end ? entry.start : `${entry.start} to ${entry.end}`;
  return `${entry.leaveType} leave, ${span}, ${entry.days} day(s)`;
}

export class LeaveReportService {
  constructor(
    private readonly store: LedgerStore,
    private readonly engine: Pick<LeaveLifecycleEngine, 'getBalances'>,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Approved leave of a manager's direct reports overlapping `span`, grouped
   * by employee. Without a span, the current month.
   *
   * @throws {ForbiddenTransitionError} When a manager asks for another manager's team
   * @throws {NotFoundError} When the manager does not exist
   * @throws {LeaveValidationError} When the span is not a valid date range
   */
  async teamCalendar(actor: Actor, managerId: string, span?: Partial<DateSpan>): Promise<TeamCalendar> {
    const reports = await this.teamOf(actor, managerId);
    const range = this.resolveCalendarSpan(span);

    const leave = reports.length
      ? await this.store.listOverlappingRequests(range, {
          employeeIds: reports.map((e) => e.id),
          states: APPROVED_STATES,
        })
      : [];

    const members: TeamCalendarMember[] = [];
    for (const employee of reports) {
      const own = leave.filter((r) => r.employeeId === employee.id);
      if (own.length > 0) {
        members.push({
          employeeId: employee.id,
          employeeName: employee.name,
          leave: own.map((r) => toReportEntry(r, employee.name)),
        });
      }
    }

    let summary: string;
    if (reports.length === 0) {
      summary = 'No employees report to this manager.';
    } else if (members.length === 0) {
      summary = `No approved leave for the team between ${range.start} and ${range.end}.`;
    } else {
      summary = [
        `Team leave calendar (${range.start} to ${range.end}):`,
        ...members.flatMap((m) => [`${m.employeeName}:`, ...m.leave.map((e) => `- ${describeSpan(e)}`)]),
      ].join('\n');
    }

    return { managerId, span: range, members, teamSize: reports.length, summary };
  }

  /**
   * Requests and balances of each direct report, optionally narrowed to one
   * report or one state
   *
   * @throws {ForbiddenTransitionError} When a manager asks for another manager's team
   * @throws {NotFoundError} When the manager does not exist, or the named employee is not a direct report
   */
  async teamRequests(actor: Actor, managerId: string, options: TeamListingOptions = {}): Promise<TeamMemberLeave[]> {
    const reports = await this.teamOf(actor, managerId);
    const limit = options.limit ?? DEFAULT_LISTING_LIMIT;

    const selected = options.employeeId === undefined
      ? reports
      : reports.filter((e) => e.id === options.employeeId);
    if (options.employeeId !== undefined && selected.length === 0) {
      throw new NotFoundError('employee', options.employeeId);
    }

    const result: TeamMemberLeave[] = [];
    for (const employee of selected) {
      const requests = await this.store.listRequestsForEmployee(
        employee.id,
        options.state === undefined ? undefined : [options.state]
      );
      result.push({
        employeeId: employee.id,
        employeeName: employee.name,
        balances: await this.engine.getBalances(employee.id),
        requests: requests.slice(0, limit).map((r) => toReportEntry(r, employee.name)),
      });
    }
    return result;
  }

  /**
   * Approved leave starting between today and `days` from today, with days
   * used per leave type. Managers see their direct reports and HR
   * administrators the whole organization.
   *
   * @throws {ForbiddenTransitionError} For employees
   * @throws {LeaveValidationError} When `days` is out of range
   */
  async upcomingLeave(actor: Actor, options: UpcomingReportOptions = {}): Promise<UpcomingLeaveReport> {
    const days = options.days ?? DEFAULT_UPCOMING_DAYS;
    if (!Number.isInteger(days) || days < 1 || days > MAX_UPCOMING_DAYS) {
      throw new LeaveValidationError([`Report window must be between 1 and ${MAX_UPCOMING_DAYS} days`]);
    }

    const today = this.now();
    const from = formatCalendarDate(today);
    const until = formatCalendarDate(addDays(today, days));

    let scope: UpcomingLeaveReport['scope'];
    const names = new Map<string, string>();
    let employeeIds: string[] | undefined;

    if (actor.role === UserRole.HRAdmin) {
      scope = 'organization';
    } else if (actor.role === UserRole.Manager) {
      scope = 'direct_reports';
      const reports = await this.store.listDirectReports(actor.employeeId);
      for (const employee of reports) {
        names.set(employee.id, employee.name);
      }
      employeeIds = reports.map((e) => e.id);
    } else {
      throw new ForbiddenTransitionError('Only managers and HR administrators can view leave reports', {
        actorId: actor.employeeId,
      });
    }

    const requests = employeeIds?.length === 0
      ? []
      : await this.store.listOverlappingRequests(
          { start: from, end: until },
          { employeeIds, states: APPROVED_STATES }
        );

    const entries: LeaveReportEntry[] = [];
    const usage: Partial<Record<LeaveType, number>> = {};
    let totalDays = 0;

    // Leave already under way is not upcoming
    for (const request of requests.filter((r) => r.span.start >= from)) {
      entries.push(toReportEntry(request, await this.nameOf(request.employeeId, names)));
      usage[request.leaveType] = (usage[request.leaveType] ?? 0) + request.days;
      totalDays += request.days;
    }

    const summary = entries.length
      ? [
          `Upcoming approved leave (${from} to ${until}):`,
          ...entries.map((e) => `- ${e.employeeName}: ${describeSpan(e)}`),
        ].join('\n')
      : `No approved leave starting between ${from} and ${until}.`;

    console.log('[LEAVE_REPORT] Upcoming leave report built:', {
      actorId: actor.employeeId,
      scope,
      entries: entries.length,
      totalDays,
      timestamp: new Date().toISOString(),
    });

    return { scope, from, until, entries, usage, totalDays, summary };
  }

  private async teamOf(actor: Actor, managerId: string): Promise<Employee[]> {
    const mayView =
      actor.role === UserRole.HRAdmin ||
      (actor.role === UserRole.Manager && actor.employeeId === managerId);
    if (!mayView) {
      throw new ForbiddenTransitionError('Not allowed to view this team', {
        actorId: actor.employeeId,
        managerId,
      });
    }

    if (!(await this.store.getEmployee(managerId))) {
      throw new NotFoundError('employee', managerId);
    }
    return this.store.listDirectReports(managerId);
  }

  private resolveCalendarSpan(span: Partial<DateSpan> | undefined): DateSpan {
    if (!span || (span.start === undefined && span.end === undefined)) {
      const today = this.now();
      return {
        start: formatCalendarDate(startOfMonth(today)),
        end: formatCalendarDate(endOfMonth(today)),
      };
    }

    const validation = validateDateSpan(span, { maxSpanDays: MAX_CALENDAR_SPAN_DAYS });
    if (!validation.isValid || span.start === undefined || span.end === undefined) {
      throw new LeaveValidationError(validation.errors);
    }
    return { start: span.start, end: span.end };
  }

  private async nameOf(employeeId: string, names: Map<string, string>): Promise<string> {
    const known = names.get(employeeId);
    if (known !== undefined) {
      return known;
    }
    const employee = await this.store.getEmployee(employeeId);
    const name = employee?.name ?? employeeId;
    names.set(employeeId, name);
    return name;
  }
}
