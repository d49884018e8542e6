/**
 * Google Calendar adapter
 *
 * Places all-day busy blocks on the team calendar through the Calendar v3
 * API. The event id is derived from the side-effect idempotency key, so
 * replaying a create answers 409 and is treated as success.
 *
 * @module services/adapters/google-calendar
 */

import { google, type calendar_v3 } from 'googleapis';

import type { GoogleCalendarConfig } from '../../config/integrations.js';
import type { Employee, LeaveRequest } from '../../types/leave.js';
import { nextCalendarDate } from '../../utils/date.js';
import { digestIdempotencyKey } from '../../utils/idempotency.js';
import { classifyFailure, responseStatus } from './failures.js';
import { bearerTokenAuth } from './google-auth.js';
import type { CalendarAdapter } from './types.js';

export interface GoogleCalendarAdapterOptions {
  readonly timeoutMs: number;
}

export class GoogleCalendarAdapter implements CalendarAdapter {
  private readonly calendar: calendar_v3.Calendar;

  constructor(
    private readonly config: GoogleCalendarConfig,
    private readonly options: GoogleCalendarAdapterOptions
  ) {
    this.calendar = google.calendar({ version: 'v3', auth: bearerTokenAuth(config.accessToken) });
  }

  async createBusyBlock(employee: Employee, request: LeaveRequest, idempotencyKey: string): Promise<string> {
    const eventId = digestIdempotencyKey(idempotencyKey);

    let createdId: string;
    try {
      const response = await this.calendar.events.insert(
        {
          calendarId: this.config.calendarId,
          requestBody: {
            id: eventId,
            summary: `${employee.name}: ${request.leaveType} leave${request.halfDay ? ' (half day)' : ''}`,
            description: request.reason,
            start: { date: request.span.start, timeZone: this.config.timeZone },
            // All-day events end on the day after the last day of leave
            end: { date: nextCalendarDate(request.span.end), timeZone: this.config.timeZone },
            transparency: 'opaque',
            extendedProperties: {
              private: { leaveRequestId: request.id, idempotencyKey },
            },
          },
        },
        { timeout: this.options.timeoutMs }
      );
      createdId = response.data.id ?? eventId;
    } catch (error) {
      if (responseStatus(error) === 409) {
        console.log('[CALENDAR] Busy block already exists:', {
          requestId: request.id,
          eventId,
        });
        return eventId;
      }
      throw classifyFailure(error, 'Calendar event insert');
    }

    console.log('[CALENDAR] Busy block created:', {
      requestId: request.id,
      employeeId: employee.id,
      eventId: createdId,
      span: request.span,
    });

    return createdId;
  }

  async deleteBusyBlock(eventId: string): Promise<void> {
    try {
      await this.calendar.events.delete(
        { calendarId: this.config.calendarId, eventId },
        { timeout: this.options.timeoutMs }
      );
    } catch (error) {
      const status = responseStatus(error);
      if (status === 404 || status === 410) {
        console.log('[CALENDAR] Busy block already gone:', { eventId, status });
        return;
      }
      throw classifyFailure(error, 'Calendar event delete', status);
    }

    console.log('[CALENDAR] Busy block deleted:', { eventId });
  }
}
