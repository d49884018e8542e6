/**
 * Failure classification shared by the Google and Twilio adapters
 *
 * Both googleapis (gaxios) and axios reject with an error carrying the HTTP
 * `response` when the server answered, and without one when the request
 * never completed.
 *
 * @module services/adapters/failures
 */

import { AdapterError } from '../../types/errors.js';

/**
 * Statuses worth retrying: timeouts, throttling and server errors
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * HTTP status of a client library error, when the server answered
 */
export function responseStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return undefined;
  }
  const response = error.response;
  if (typeof response === 'object' && response !== null && 'status' in response) {
    return typeof response.status === 'number' ? response.status : undefined;
  }
  return undefined;
}

/**
 * Turn a client library rejection into an AdapterError. Errors without a
 * response (timeouts, resets, DNS) are transient.
 */
export function classifyFailure(error: unknown, operation: string, status = responseStatus(error)): AdapterError {
  if (error instanceof AdapterError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);

  if (status === undefined) {
    return AdapterError.transient(`${operation} failed: ${message}`, { cause: error });
  }

  const described = `${operation} failed with HTTP ${status}: ${message}`;
  return isTransientStatus(status)
    ? AdapterError.transient(described, { status, cause: error })
    : AdapterError.permanent(described, { status, cause: error });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
