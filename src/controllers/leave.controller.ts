/**
 * Leave Controller Module
 *
 * Translates HTTP requests into lifecycle engine and side-effect executor
 * calls and engine results into the JSON response envelope. Every failure
 * the engine reports is a LeaveError, which already carries its HTTP status
 * and error code.
 *
 * @module controllers/leave
 */

import type { Response } from 'express';

import { toActor, type AuthenticatedRequest } from '../middleware/authenticate.js';
import type { LeaveContextService } from '../services/leave-context.service.js';
import type { LeaveReportService } from '../services/leave-report.service.js';
import type { LeaveLifecycleEngine } from '../services/leave.service.js';
import type { SideEffectExecutor } from '../services/side-effect-executor.service.js';
import type { AuthenticatedUser } from '../types/auth.js';
import { LeaveError, LeaveValidationError } from '../types/errors.js';
import type { ApiErrorResponse, ApiSuccessResponse } from '../types/index.js';
import { SideEffectStatus, isLeaveState, isSideEffectStatus, type LeaveRequest } from '../types/leave.js';

/**
 * HTTP Status Codes
 */
const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  UNAUTHORIZED: 401,
  INTERNAL_SERVER_ERROR: 500,
} as const;

const IF_MATCH_PATTERN = /^(?:W\/)?"?(\d+)"?$/;

export interface LeaveControllerDependencies {
  readonly engine: LeaveLifecycleEngine;
  readonly executor: SideEffectExecutor;
  readonly context: LeaveContextService;
  readonly reports: LeaveReportService;
}

class UnauthenticatedError extends LeaveError {
  constructor() {
    super('Authentication required', 'UNAUTHORIZED', { statusCode: HTTP_STATUS.UNAUTHORIZED });
    this.name = 'UnauthenticatedError';
  }
}

function requireUser(req: AuthenticatedRequest): AuthenticatedUser {
  if (!req.user) {
    throw new UnauthenticatedError();
  }
  return req.user;
}

function requireParam(req: AuthenticatedRequest, name: string): string {
  const value = req.params[name];
  if (!value) {
    throw new LeaveValidationError([`Path parameter ${name} is required`]);
  }
  return value;
}

function bodyOf(req: AuthenticatedRequest): Record<string, unknown> {
  const body: unknown = req.body;
  return typeof body === 'object' && body !== null && !Array.isArray(body)
    ? (body as Record<string, unknown>)
    : {};
}

function optionalText(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new LeaveValidationError([`${field} must be a string`]);
  }
  return value;
}

const POSITIVE_INT_PATTERN = /^[1-9]\d*$/;

function parsePositiveInt(value: unknown, name: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || !POSITIVE_INT_PATTERN.test(value)) {
    throw new LeaveValidationError([`${name} must be a positive integer`]);
  }
  return Number(value);
}

/**
 * Version the caller read, from `expectedVersion` in the body or an
 * `If-Match` header ("3", W/"3" or 3)
 */
export function readExpectedVersion(req: AuthenticatedRequest): number {
  const fromBody = bodyOf(req).expectedVersion;
  if (fromBody !== undefined) {
    if (typeof fromBody !== 'number' || !Number.isInteger(fromBody) || fromBody < 1) {
      throw new LeaveValidationError(['expectedVersion must be a positive integer']);
    }
    return fromBody;
  }

  const ifMatch = req.get('if-match');
  const match = ifMatch ? IF_MATCH_PATTERN.exec(ifMatch.trim()) : null;
  if (match?.[1]) {
    return Number(match[1]);
  }

  throw new LeaveValidationError([
    'expectedVersion is required (in the request body or an If-Match header)',
  ]);
}

function sendSuccess<T>(res: Response, statusCode: number, data: T, message?: string): void {
  const payload: ApiSuccessResponse<T> = { success: true, data, message };
  res.status(statusCode).json(payload);
}

function sendRequest(res: Response, statusCode: number, request: LeaveRequest, message?: string): void {
  res.setHeader('ETag', `"${request.version}"`);
  sendSuccess(res, statusCode, request, message);
}

/**
 * Leave Controller Class
 */
export class LeaveController {
  constructor(private readonly deps: LeaveControllerDependencies) {}

  /**
   * POST /api/leave/requests
   *
   * Body: { leaveType, start, end, halfDay?, reason, employeeId?, submit? }
   */
  createRequest = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'create_request', async (user, correlationId) => {
      const body = bodyOf(req);
      const actor = toActor(user);
      const employeeId = optionalText(body, 'employeeId') ?? user.employeeId;

      const draft = await this.deps.engine.createDraft(
        {
          employeeId,
          leaveType: body.leaveType,
          start: body.start,
          end: body.end,
          halfDay: body.halfDay,
          reason: body.reason,
        },
        actor,
        { correlationId }
      );

      if (body.submit === true) {
        const submitted = await this.deps.engine.submit(draft.id, draft.version, actor, { correlationId });
        sendRequest(res, HTTP_STATUS.CREATED, submitted, 'Leave request submitted');
        return;
      }

      sendRequest(res, HTTP_STATUS.CREATED, draft, 'Leave request drafted');
    });

  /**
   * GET /api/leave/requests/:id
   */
  getRequest = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'get_request', async (user) => {
      const view = await this.deps.engine.getRequest(requireParam(req, 'id'), toActor(user));
      res.setHeader('ETag', `"${view.request.version}"`);
      sendSuccess(res, HTTP_STATUS.OK, view);
    });

  /**
   * POST /api/leave/requests/:id/submit
   */
  submitRequest = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'submit_request', async (user, correlationId) => {
      const request = await this.deps.engine.submit(
        requireParam(req, 'id'),
        readExpectedVersion(req),
        toActor(user),
        { correlationId }
      );
      sendRequest(res, HTTP_STATUS.OK, request, 'Leave request submitted');
    });

  /**
   * POST /api/leave/requests/:id/approve
   *
   * Body: { expectedVersion, note? }
   */
  approveRequest = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'approve_request', async (user, correlationId) => {
      const request = await this.deps.engine.approve(
        requireParam(req, 'id'),
        readExpectedVersion(req),
        toActor(user),
        { correlationId, note: optionalText(bodyOf(req), 'note') }
      );
      sendRequest(res, HTTP_STATUS.OK, request, 'Leave request approved');
    });

  /**
   * POST /api/leave/requests/:id/reject
   *
   * Body: { expectedVersion, reason }
   */
  rejectRequest = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'reject_request', async (user, correlationId) => {
      const request = await this.deps.engine.reject(
        requireParam(req, 'id'),
        readExpectedVersion(req),
        toActor(user),
        optionalText(bodyOf(req), 'reason') ?? '',
        { correlationId }
      );
      sendRequest(res, HTTP_STATUS.OK, request, 'Leave request rejected');
    });

  /**
   * POST /api/leave/requests/:id/withdraw
   */
  withdrawRequest = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'withdraw_request', async (user, correlationId) => {
      const request = await this.deps.engine.withdraw(
        requireParam(req, 'id'),
        readExpectedVersion(req),
        toActor(user),
        { correlationId }
      );
      sendRequest(res, HTTP_STATUS.OK, request, 'Leave request withdrawn');
    });

  /**
   * POST /api/leave/requests/:id/revert
   *
   * Body: { expectedVersion, reason? }
   */
  revertRequest = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'revert_request', async (user, correlationId) => {
      const request = await this.deps.engine.revert(
        requireParam(req, 'id'),
        readExpectedVersion(req),
        toActor(user),
        { correlationId, reason: optionalText(bodyOf(req), 'reason') }
      );
      sendRequest(res, HTTP_STATUS.OK, request, 'Leave cancelled');
    });

  /**
   * GET /api/leave/my-requests?state=
   */
  getMyRequests = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'get_my_requests', async (user) => {
      const state = req.query.state;
      if (state !== undefined && !isLeaveState(state)) {
        throw new LeaveValidationError([`Unknown state filter: ${String(state)}`]);
      }

      const requests = await this.deps.engine.listRequestsForEmployee(user.employeeId);
      sendSuccess(
        res,
        HTTP_STATUS.OK,
        state === undefined ? requests : requests.filter((r) => r.state === state)
      );
    });

  /**
   * GET /api/leave/my-balance
   */
  getMyBalance = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'get_my_balance', async (user) => {
      sendSuccess(res, HTTP_STATUS.OK, await this.deps.engine.getBalances(user.employeeId));
    });

  /**
   * GET /api/leave/approvals
   */
  getApprovals = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'get_approvals', async (user) => {
      sendSuccess(res, HTTP_STATUS.OK, await this.deps.engine.listApprovals(toActor(user)));
    });

  /**
   * GET /api/leave/side-effects?status=failed_permanent
   */
  listSideEffects = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'list_side_effects', async () => {
      const status = req.query.status ?? SideEffectStatus.FailedPermanent;
      if (!isSideEffectStatus(status)) {
        throw new LeaveValidationError([`Unknown side-effect status: ${String(status)}`]);
      }
      sendSuccess(res, HTTP_STATUS.OK, await this.deps.executor.listEffects(status));
    });

  /**
   * POST /api/leave/side-effects/:id/redrive
   */
  redriveSideEffect = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'redrive_side_effect', async (user) => {
      const record = await this.deps.executor.redrive(requireParam(req, 'id'), user.employeeId);
      sendSuccess(res, HTTP_STATUS.OK, record, 'Side effect re-driven');
    });

  /**
   * POST /api/leave/side-effects/:id/abandon
   *
   * Body: { note }
   */
  abandonSideEffect = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'abandon_side_effect', async (user) => {
      const note = optionalText(bodyOf(req), 'note')?.trim();
      if (!note) {
        throw new LeaveValidationError(['A note explaining why the side effect is abandoned is required']);
      }
      const record = await this.deps.executor.abandon(requireParam(req, 'id'), user.employeeId, note);
      sendSuccess(res, HTTP_STATUS.OK, record, 'Side effect abandoned');
    });

  /**
   * GET /api/leave/context/:employeeId
   */
  getLeaveContext = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'get_leave_context', async (user) => {
      const context = await this.deps.context.buildContextFor(toActor(user), requireParam(req, 'employeeId'));
      sendSuccess(res, HTTP_STATUS.OK, context);
    });

  /**
   * GET /api/leave/team/:managerId/calendar
   *
   * Query: start?, end? (both or neither; defaults to the current month)
   */
  getTeamCalendar = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'get_team_calendar', async (user) => {
      const { start, end } = req.query;
      if ((start !== undefined && typeof start !== 'string') || (end !== undefined && typeof end !== 'string')) {
        throw new LeaveValidationError(['start and end must be single calendar dates']);
      }
      if ((start === undefined) !== (end === undefined)) {
        throw new LeaveValidationError(['start and end must be given together']);
      }

      const calendar = await this.deps.reports.teamCalendar(
        toActor(user),
        requireParam(req, 'managerId'),
        start === undefined || end === undefined ? undefined : { start, end }
      );
      sendSuccess(res, HTTP_STATUS.OK, calendar);
    });

  /**
   * GET /api/leave/team/:managerId/requests
   *
   * Query: state?, employeeId?, limit? (requests per member)
   */
  getTeamRequests = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'get_team_requests', async (user) => {
      const { state, employeeId } = req.query;
      if (state !== undefined && !isLeaveState(state)) {
        throw new LeaveValidationError([`Unknown state filter: ${String(state)}`]);
      }
      if (employeeId !== undefined && typeof employeeId !== 'string') {
        throw new LeaveValidationError(['employeeId must be a single value']);
      }

      const listing = await this.deps.reports.teamRequests(toActor(user), requireParam(req, 'managerId'), {
        state,
        employeeId,
        limit: parsePositiveInt(req.query.limit, 'limit'),
      });
      sendSuccess(res, HTTP_STATUS.OK, listing);
    });

  /**
   * GET /api/leave/reports/upcoming
   *
   * Query: days? (window length, default 30)
   */
  getUpcomingReport = (req: AuthenticatedRequest, res: Response): Promise<void> =>
    this.handle(req, res, 'get_upcoming_report', async (user) => {
      const report = await this.deps.reports.upcomingLeave(toActor(user), {
        days: parsePositiveInt(req.query.days, 'days'),
      });
      sendSuccess(res, HTTP_STATUS.OK, report);
    });

  /**
   * Run a handler, answering LeaveErrors with their status and anything
   * else with 500
   */
  private async handle(
    req: AuthenticatedRequest,
    res: Response,
    operation: string,
    handler: (user: AuthenticatedUser, correlationId: string | undefined) => Promise<void>
  ): Promise<void> {
    const startTime = Date.now();
    const correlationId = req.correlationId;

    try {
      await handler(requireUser(req), correlationId);

      console.log('[LEAVE_CONTROLLER] Request handled:', {
        operation,
        correlationId,
        statusCode: res.statusCode,
        executionTimeMs: Date.now() - startTime,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      const executionTimeMs = Date.now() - startTime;

      if (error instanceof LeaveError) {
        const log = error.statusCode >= 500 ? console.error : console.warn;
        log('[LEAVE_CONTROLLER] Request failed:', {
          operation,
          correlationId,
          code: error.code,
          error: error.message,
          executionTimeMs,
          timestamp: new Date().toISOString(),
        });

        const payload: ApiErrorResponse = {
          success: false,
          code: error.code,
          message: error.message,
          details: error.details,
          timestamp: new Date().toISOString(),
        };
        res.status(error.statusCode).json(payload);
        return;
      }

      console.error('[LEAVE_CONTROLLER] Unexpected error:', {
        operation,
        correlationId,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
        executionTimeMs,
        timestamp: new Date().toISOString(),
      });

      const payload: ApiErrorResponse = {
        success: false,
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred',
        timestamp: new Date().toISOString(),
      };
      res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json(payload);
    }
  }
}
