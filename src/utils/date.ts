import {
  addDays,
  areIntervalsOverlapping,
  differenceInCalendarDays,
  format,
  isValid,
  parseISO,
} from 'date-fns';

import type { DateSpan } from '../types/leave.js';

/**
 * Calendar-date utilities for leave spans
 *
 * Leave spans are inclusive ranges of calendar dates written as `YYYY-MM-DD`
 * strings. Dates are parsed to local midnight and formatted back the same
 * way, so no time-of-day or timezone offset leaks into day arithmetic.
 *
 * @module utils/date
 */

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Result of date span validation
 */
export interface DateSpanValidationResult {
  /**
   * Whether the span is valid
   */
  readonly isValid: boolean;

  /**
   * Validation errors (empty if valid)
   */
  readonly errors: string[];
}

/**
 * Parse a `YYYY-MM-DD` calendar date
 *
 * Rejects anything that is not exactly a calendar date, including values
 * that date-fns would roll over (e.g. `2024-02-30`).
 *
 * @returns The date at local midnight, or null if the value is not a calendar date
 *
 * @example
 * parseCalendarDate('2024-06-01'); // Date for June 1st 2024
 * parseCalendarDate('2024-06-01T10:00:00Z'); // null
 */
export function parseCalendarDate(value: string): Date | null {
  if (!CALENDAR_DATE_PATTERN.test(value)) {
    return null;
  }

  const parsed = parseISO(value);
  if (!isValid(parsed)) {
    return null;
  }

  // parseISO accepts some out-of-range days; the round trip catches them
  return format(parsed, 'yyyy-MM-dd') === value ? parsed : null;
}

/**
 * Format a date as a `YYYY-MM-DD` calendar date
 */
export function formatCalendarDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Parse a calendar date that has already been validated
 *
 * @throws {Error} If the value is not a calendar date
 */
function requireCalendarDate(value: string): Date {
  const parsed = parseCalendarDate(value);
  if (!parsed) {
    throw new Error(`Invalid calendar date: ${value}`);
  }
  return parsed;
}

/**
 * Number of calendar days in an inclusive span
 *
 * @example
 * countSpanDays({ start: '2024-06-01', end: '2024-06-05' }); // 5
 * countSpanDays({ start: '2024-06-01', end: '2024-06-01' }); // 1
 *
 * @throws {Error} If either end is not a calendar date
 */
export function countSpanDays(span: DateSpan): number {
  const start = requireCalendarDate(span.start);
  const end = requireCalendarDate(span.end);

  return differenceInCalendarDays(end, start) + 1;
}

/**
 * Whether two inclusive spans share at least one day
 *
 * @example
 * spansOverlap(
 *   { start: '2024-06-01', end: '2024-06-05' },
 *   { start: '2024-06-05', end: '2024-06-07' }
 * ); // true
 *
 * @throws {Error} If any end is not a calendar date
 */
export function spansOverlap(a: DateSpan, b: DateSpan): boolean {
  return areIntervalsOverlapping(
    { start: requireCalendarDate(a.start), end: requireCalendarDate(a.end) },
    { start: requireCalendarDate(b.start), end: requireCalendarDate(b.end) },
    { inclusive: true }
  );
}

/**
 * The calendar date following the given one
 *
 * All-day calendar events use an exclusive end date, so a span ending on
 * `2024-06-05` is written with an end of `2024-06-06`.
 */
export function nextCalendarDate(value: string): string {
  return formatCalendarDate(addDays(requireCalendarDate(value), 1));
}

/**
 * Validate a leave span
 *
 * Checks that both ends are calendar dates, that start is on or before end,
 * and optionally that the span does not exceed a maximum length.
 */
export function validateDateSpan(
  span: { readonly start?: unknown; readonly end?: unknown },
  options?: { readonly maxSpanDays?: number }
): DateSpanValidationResult {
  const errors: string[] = [];

  const start = typeof span.start === 'string' ? parseCalendarDate(span.start) : null;
  const end = typeof span.end === 'string' ? parseCalendarDate(span.end) : null;

  if (!start) {
    errors.push('Start date must be a calendar date in YYYY-MM-DD format');
  }
  if (!end) {
    errors.push('End date must be a calendar date in YYYY-MM-DD format');
  }
  if (!start || !end) {
    return { isValid: false, errors };
  }

  const length = differenceInCalendarDays(end, start) + 1;

  if (length < 1) {
    errors.push('Start date must be before or equal to end date');
  } else if (options?.maxSpanDays !== undefined && length > options.maxSpanDays) {
    errors.push(`Leave span cannot exceed ${options.maxSpanDays} days`);
  }

  return {
    isValid: errors.length === 0,
    errors,
  };
}
