/**
 * Error taxonomy of the leave engine
 *
 * Every failure the engine reports to callers is a LeaveError carrying a
 * machine-readable code and the HTTP status the controllers answer with.
 * Adapter failures are classified as transient (retry with backoff) or
 * permanent (stop retrying, surface to an operator).
 *
 * @module types/errors
 */

/**
 * Specific reason a submission or approval was refused by the conflict checks
 */
export type ConflictReason = 'rejected_overlap' | 'rejected_insufficient_balance';

/**
 * Base class for engine errors
 */
export class LeaveError extends Error {
  /**
   * Error code for programmatic handling
   */
  public readonly code: string;

  /**
   * HTTP status code for the error
   */
  public readonly statusCode: number;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options?: {
      readonly statusCode?: number;
      readonly details?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'LeaveError';
    this.code = code;
    this.statusCode = options?.statusCode ?? 500;
    this.details = options?.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Malformed input: bad span, unknown leave type, missing reason.
 * Rejected synchronously with no state change.
 */
export class LeaveValidationError extends LeaveError {
  public readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(errors.join('; ') || 'Validation failed', 'VALIDATION_ERROR', {
      statusCode: 400,
      details: { errors },
    });
    this.name = 'LeaveValidationError';
    this.errors = errors;
  }
}

/**
 * Referenced employee, request or side effect does not exist
 */
export class NotFoundError extends LeaveError {
  constructor(entity: 'employee' | 'request' | 'side_effect', id: string) {
    super(`${entity.replace('_', ' ')} ${id} not found`, `${entity.toUpperCase()}_NOT_FOUND`, {
      statusCode: 404,
      details: { entity, id },
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Submission or approval refused by the conflict resolver
 */
export class ConflictRejectionError extends LeaveError {
  public readonly reason: ConflictReason;

  constructor(reason: ConflictReason, message: string, details?: Record<string, unknown>) {
    super(message, reason.toUpperCase(), {
      statusCode: 422,
      details: { reason, ...details },
    });
    this.name = 'ConflictRejectionError';
    this.reason = reason;
  }
}

/**
 * Write presented with a stale version. The caller must re-read and retry.
 */
export class VersionConflictError extends LeaveError {
  public readonly entityId: string;
  public readonly expectedVersion: number;
  public readonly actualVersion: number | null;

  constructor(entityId: string, expectedVersion: number, actualVersion: number | null) {
    super(
      `Version conflict on ${entityId}: expected ${expectedVersion}, found ${actualVersion ?? 'none'}`,
      'VERSION_CONFLICT',
      {
        statusCode: 409,
        details: { entityId, expectedVersion, actualVersion },
      }
    );
    this.name = 'VersionConflictError';
    this.entityId = entityId;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

/**
 * Action not permitted from the request's current state
 */
export class InvalidTransitionError extends LeaveError {
  constructor(message: string, details: Record<string, unknown>) {
    super(message, 'INVALID_TRANSITION', { statusCode: 409, details });
    this.name = 'InvalidTransitionError';
  }
}

/**
 * A side-effect record was completed under a lease its worker no longer
 * holds: the lease expired and the record was claimed again, or an operator
 * re-drove or abandoned it meanwhile
 */
export class LeaseLostError extends LeaveError {
  constructor(effectId: string) {
    super(`Lease on side effect ${effectId} is no longer held`, 'LEASE_LOST', {
      statusCode: 409,
      details: { effectId },
    });
    this.name = 'LeaseLostError';
  }
}

/**
 * Actor is not allowed to perform the action
 */
export class ForbiddenTransitionError extends LeaveError {
  constructor(message: string, details: Record<string, unknown>) {
    super(message, 'FORBIDDEN', { statusCode: 403, details });
    this.name = 'ForbiddenTransitionError';
  }
}

/**
 * Adapter failure classification
 */
export type AdapterErrorKind = 'transient' | 'permanent';

/**
 * Failure reported by a calendar, spreadsheet or messaging adapter
 */
export class AdapterError extends LeaveError {
  public readonly kind: AdapterErrorKind;

  constructor(
    kind: AdapterErrorKind,
    message: string,
    options?: { readonly status?: number; readonly cause?: unknown }
  ) {
    super(message, kind === 'transient' ? 'ADAPTER_TRANSIENT' : 'ADAPTER_PERMANENT', {
      statusCode: 502,
      details: options?.status !== undefined ? { status: options.status } : undefined,
    });
    this.name = 'AdapterError';
    this.kind = kind;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  static transient(message: string, options?: { readonly status?: number; readonly cause?: unknown }): AdapterError {
    return new AdapterError('transient', message, options);
  }

  static permanent(message: string, options?: { readonly status?: number; readonly cause?: unknown }): AdapterError {
    return new AdapterError('permanent', message, options);
  }
}

/**
 * A broken internal guarantee (e.g. debiting a request that is not approved).
 * Indicates a defect; never recovered from.
 */
export class InvariantViolationError extends LeaveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVARIANT_VIOLATION', { statusCode: 500, details });
    this.name = 'InvariantViolationError';
  }
}

/**
 * Classify an unknown thrown value as an adapter error. Anything that is not
 * already an AdapterError is treated as transient.
 */
export function toAdapterError(error: unknown): AdapterError {
  if (error instanceof AdapterError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return AdapterError.transient(message, { cause: error });
}
