/**
 * Authentication Type Definitions
 *
 * Token payloads and the authenticated user attached to requests. The service
 * does not issue sessions of its own: it verifies bearer tokens minted by the
 * identity provider and reads the actor (user, role, employee record) from them.
 *
 * @module types/auth
 */

import { isUserRole, type UserRole } from './index.js';

/**
 * JWT Token Payload
 *
 * Decoded payload of an access token.
 */
export interface JWTPayload {
  /**
   * Unique identifier for the user
   */
  readonly userId: string;

  /**
   * User's email address
   */
  readonly email: string;

  /**
   * User's role (HR_ADMIN, MANAGER or EMPLOYEE)
   */
  readonly role: UserRole;

  /**
   * Employee record the user acts as
   */
  readonly employeeId: string;

  /**
   * Token issued at timestamp (Unix epoch in seconds)
   */
  readonly iat: number;

  /**
   * Token expiration timestamp (Unix epoch in seconds)
   */
  readonly exp: number;

  /**
   * Token type identifier
   */
  readonly type: 'access';

  /**
   * Optional JWT ID
   */
  readonly jti?: string;
}

/**
 * Authenticated User Information
 *
 * Attached to the request by the authenticate middleware.
 */
export interface AuthenticatedUser {
  readonly userId: string;
  readonly email: string;
  readonly role: UserRole;
  readonly employeeId: string;
  readonly iat: number;
  readonly exp: number;
  readonly jti?: string;
}

/**
 * Token Validation Result
 */
export interface TokenValidationResult {
  /**
   * Whether token is valid
   */
  readonly valid: boolean;

  /**
   * Decoded payload (if valid)
   */
  readonly payload?: JWTPayload;

  /**
   * Error message (if invalid)
   */
  readonly error?: string;

  /**
   * Error code for programmatic handling
   */
  readonly errorCode?: 'EXPIRED' | 'INVALID' | 'MALFORMED';

  /**
   * Whether token is expired
   */
  readonly expired?: boolean;

  /**
   * Timestamp of validation
   */
  readonly timestamp: Date;
}

/**
 * Type guard to check if a value is a valid JWTPayload
 *
 * @param value - Value to check
 * @returns True if value is a valid JWTPayload
 */
export function isJWTPayload(value: unknown): value is JWTPayload {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const payload = value as Record<string, unknown>;

  return (
    typeof payload.userId === 'string' &&
    typeof payload.email === 'string' &&
    isUserRole(payload.role) &&
    typeof payload.employeeId === 'string' &&
    payload.employeeId.length > 0 &&
    typeof payload.iat === 'number' &&
    typeof payload.exp === 'number' &&
    payload.type === 'access'
  );
}
