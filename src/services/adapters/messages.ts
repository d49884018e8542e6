/**
 * Message templates
 *
 * One template per event. The same template reads differently for the owner
 * of the request and for an approver, so rendering looks at who receives it.
 *
 * @module services/adapters/messages
 */

import { format } from 'date-fns';

import type { MessageTemplate } from '../../types/leave.js';
import { parseCalendarDate } from '../../utils/date.js';
import type { MessageContext } from './types.js';

export interface RenderedMessage {
  readonly subject: string;
  readonly text: string;
}

function formatDate(value: string): string {
  const date = parseCalendarDate(value);
  return date ? format(date, 'EEE d MMM yyyy') : value;
}

/**
 * Human-readable span, e.g. "Mon 3 Jun 2024 to Fri 7 Jun 2024 (5 days)"
 */
export function describeSpan(context: MessageContext): string {
  const { request } = context;
  const days = request.days === 1 ? '1 day' : `${request.days} days`;

  if (request.span.start === request.span.end) {
    return `${formatDate(request.span.start)} (${request.halfDay ? 'half day' : days})`;
  }
  return `${formatDate(request.span.start)} to ${formatDate(request.span.end)} (${days})`;
}

export function renderMessage(template: MessageTemplate, context: MessageContext): RenderedMessage {
  const { request, employee, recipient } = context;
  const forOwner = recipient.id === employee.id;
  const span = describeSpan(context);
  const leave = `${request.leaveType} leave`;
  const greeting = `Hi ${recipient.name},`;

  switch (template) {
    case 'submitted':
      return forOwner
        ? {
            subject: 'Leave request submitted',
            text: `${greeting}\n\nYour ${leave} request for ${span} was submitted for approval.`,
          }
        : {
            subject: `Leave request from ${employee.name}`,
            text: `${greeting}\n\n${employee.name} requested ${leave} for ${span}.\nReason: ${request.reason}`,
          };

    case 'escalated':
      return {
        subject: `Leave request from ${employee.name} needs escalated approval`,
        text:
          `${greeting}\n\n${employee.name} requested ${leave} for ${span}.\nReason: ${request.reason}\n\n` +
          'Approving it would take the team over its absence threshold, so an HR admin has to decide it.',
      };

    case 'approved':
      return {
        subject: 'Leave approved',
        text:
          `${greeting}\n\nYour ${leave} for ${span} was approved.` +
          (request.decisionNote ? `\nNote: ${request.decisionNote}` : ''),
      };

    case 'rejected':
      return {
        subject: 'Leave request rejected',
        text: `${greeting}\n\nYour ${leave} request for ${span} was rejected.\nReason: ${request.decisionNote ?? 'not given'}`,
      };

    case 'withdrawn':
      return {
        subject: `Leave request withdrawn by ${employee.name}`,
        text: `${greeting}\n\n${employee.name} withdrew the ${leave} request for ${span}. No action is needed.`,
      };

    case 'reverted':
      return forOwner
        ? {
            subject: 'Leave cancelled',
            text: `${greeting}\n\nYour ${leave} for ${span} was cancelled and the days were returned to your balance.`,
          }
        : {
            subject: `Leave of ${employee.name} cancelled`,
            text: `${greeting}\n\nThe ${leave} of ${employee.name} for ${span} was cancelled.`,
          };

    case 'synced':
      return {
        subject: 'Leave added to the team calendar',
        text: `${greeting}\n\nYour ${leave} for ${span} is now on the team calendar.`,
      };

    case 'sync_failed':
      return {
        subject: `Calendar sync failed for ${employee.name}`,
        text:
          `${greeting}\n\nThe approved ${leave} of ${employee.name} for ${span} could not be added to the team calendar.\n` +
          'The leave stays approved. An HR admin can re-drive or abandon the failed side effect.',
      };
  }
}
