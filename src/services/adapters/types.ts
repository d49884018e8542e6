/**
 * Contracts of the downstream systems a leave request is mirrored into
 *
 * Every call carries the idempotency key of the side-effect record being
 * executed; repeating a call with the same key must not duplicate the
 * effect. Failures are reported as AdapterError (transient or permanent).
 *
 * @module services/adapters/types
 */

import type { Employee, LeaveRequest, MessageTemplate } from '../../types/leave.js';

export interface CalendarAdapter {
  /**
   * Place an all-day busy block covering the request's span
   *
   * @returns Calendar event id
   */
  createBusyBlock(employee: Employee, request: LeaveRequest, idempotencyKey: string): Promise<string>;

  /**
   * Remove a busy block. Removing one that no longer exists succeeds.
   */
  deleteBusyBlock(eventId: string): Promise<void>;
}

/**
 * One line of the leave-tracking spreadsheet
 */
export interface LeaveSheetRow {
  readonly requestId: string;
  readonly employeeName: string;
  readonly leaveType: string;
  readonly start: string;
  readonly end: string;
  readonly days: number;
  readonly state: string;
  readonly recordedAt: string;
}

export interface SpreadsheetAdapter {
  /**
   * Append a row unless a row with this key was already written
   *
   * @returns Range the row occupies
   */
  recordLeave(row: LeaveSheetRow, idempotencyKey: string): Promise<string>;
}

/**
 * Data a message is rendered from
 */
export interface MessageContext {
  readonly request: LeaveRequest;

  /**
   * Owner of the request
   */
  readonly employee: Employee;

  readonly recipient: Employee;
}

export interface NotificationDispatcher {
  readonly channel: string;

  /**
   * Deliver one templated message
   *
   * @returns Channel message id(s)
   */
  send(
    recipientId: string,
    template: MessageTemplate,
    context: MessageContext,
    idempotencyKey: string
  ): Promise<string>;
}
