import { createHash } from 'crypto';
import { describe, it, expect } from 'vitest';

import { SideEffectKind } from '../../../src/types/leave.js';
import { computeBackoffDelay } from '../../../src/utils/backoff.js';
import { deriveIdempotencyKey, digestIdempotencyKey } from '../../../src/utils/idempotency.js';

describe('Idempotency keys', () => {
  it('should derive the key from request id, kind and version only', () => {
    expect(deriveIdempotencyKey('req-1', SideEffectKind.CalendarCreate, 3)).toBe(
      'leave:req-1:calendar_create:v3'
    );
  });

  it('should derive distinct keys for distinct versions of the same kind', () => {
    expect(deriveIdempotencyKey('req-1', SideEffectKind.SheetSync, 3)).not.toBe(
      deriveIdempotencyKey('req-1', SideEffectKind.SheetSync, 6)
    );
  });

  it('should digest a key to lowercase sha256 hex', () => {
    const key = 'leave:req-1:calendar_create:v3';
    const digest = digestIdempotencyKey(key);

    expect(digest).toBe(createHash('sha256').update(key).digest('hex'));
    expect(digest).toMatch(/^[0-9a-f]{64}$/);
    expect(digestIdempotencyKey(key)).toBe(digest);
  });
});

describe('computeBackoffDelay', () => {
  it('should double the delay per attempt', () => {
    expect(computeBackoffDelay(1, 500, 10000)).toBe(500);
    expect(computeBackoffDelay(2, 500, 10000)).toBe(1000);
    expect(computeBackoffDelay(3, 500, 10000)).toBe(2000);
  });

  it('should cap the delay', () => {
    expect(computeBackoffDelay(10, 500, 10000)).toBe(10000);
  });

  it('should treat attempt 0 like the first attempt', () => {
    expect(computeBackoffDelay(0, 500, 10000)).toBe(500);
  });
});
