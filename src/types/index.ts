/**
 * Central type definitions shared across the service
 *
 * Roles used to identify the actor of a leave transition, the common entity
 * shape, and the HTTP response envelopes.
 *
 * @module types
 */

/**
 * User role enumeration
 *
 * Roles decide who may act on a leave request. The role travels inside the
 * access token and becomes part of the transition actor.
 */
export enum UserRole {
  /**
   * HR Administrator - approves escalated requests and resolves failed
   * side effects
   */
  HRAdmin = 'HR_ADMIN',

  /**
   * Manager - approves or rejects standard-tier requests of direct reports
   */
  Manager = 'MANAGER',

  /**
   * Employee - submits, withdraws and cancels their own leave
   */
  Employee = 'EMPLOYEE',
}

/**
 * Base entity interface with common fields
 */
export interface BaseEntity {
  /**
   * Unique identifier for the entity
   */
  readonly id: string;

  /**
   * Timestamp when the entity was created
   */
  readonly createdAt: Date;

  /**
   * Timestamp when the entity was last updated
   */
  readonly updatedAt: Date;
}

/**
 * Successful API response envelope
 */
export interface ApiSuccessResponse<T> {
  readonly success: true;
  readonly data: T;
  readonly message?: string;
}

/**
 * Error API response envelope
 */
export interface ApiErrorResponse {
  /**
   * Always false for errors
   */
  readonly success: false;

  /**
   * Machine-readable error code
   */
  readonly code: string;

  /**
   * Human-readable message
   */
  readonly message: string;

  /**
   * Optional structured details (rejection reason, versions, ...)
   */
  readonly details?: Record<string, unknown>;

  /**
   * ISO timestamp of the failure
   */
  readonly timestamp: string;
}

/**
 * Type guard to check if a value is a valid UserRole
 *
 * @param value - Value to check
 * @returns True if value is a valid UserRole
 */
export function isUserRole(value: unknown): value is UserRole {
  return (
    typeof value === 'string' &&
    (Object.values(UserRole) as string[]).includes(value)
  );
}
