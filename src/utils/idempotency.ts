/**
 * Idempotency keys for scheduled side effects
 *
 * A key is derived only from the request id, the effect kind and the request
 * version produced by the scheduling transition, so the same effect always
 * carries the same key no matter how often it is retried or re-driven.
 *
 * @module utils/idempotency
 */

import crypto from 'crypto';

import type { SideEffectKind } from '../types/leave.js';

/**
 * Derive the idempotency key of a side effect
 *
 * @example
 * deriveIdempotencyKey('req-1', SideEffectKind.CalendarCreate, 3);
 * // 'leave:req-1:calendar_create:v3'
 */
export function deriveIdempotencyKey(
  requestId: string,
  kind: SideEffectKind,
  version: number
): string {
  return `leave:${requestId}:${kind}:v${version}`;
}

/**
 * Stable hex digest of an idempotency key
 *
 * Lowercase hex is a subset of the base32hex alphabet accepted for
 * client-chosen calendar event ids.
 */
export function digestIdempotencyKey(key: string): string {
  return crypto.createHash('sha256').update(key).digest('hex');
}
