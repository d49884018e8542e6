/**
 * JWT Token Utilities Module
 *
 * Verifies the bearer tokens that identify who performs a leave operation,
 * and mints tokens of the same shape for local tooling and tests.
 *
 * @module utils/jwt
 */

import crypto from 'crypto';
import jwt, { type SignOptions, type VerifyOptions } from 'jsonwebtoken';

import { durationToSeconds, getAuthConfig, type AuthConfig } from '../config/auth.js';
import { isJWTPayload, type JWTPayload, type TokenValidationResult } from '../types/auth.js';
import type { UserRole } from '../types/index.js';

/**
 * Identity carried by an access token
 */
export interface TokenSubject {
  readonly userId: string;
  readonly email: string;
  readonly role: UserRole;
  readonly employeeId: string;
}

interface TokenOptions {
  readonly correlationId?: string;

  /**
   * Configuration to use instead of the process-wide one
   */
  readonly config?: AuthConfig;
}

/**
 * Generate JWT access token
 *
 * @throws {Error} If token generation fails
 *
 * @example
 * const token = generateAccessToken({
 *   userId: 'user-1',
 *   email: 'employee@example.com',
 *   role: UserRole.Employee,
 *   employeeId: 'emp-1',
 * });
 */
export function generateAccessToken(subject: TokenSubject, options?: TokenOptions): string {
  const correlationId = options?.correlationId ?? `token_gen_${Date.now()}`;

  try {
    const config = options?.config ?? getAuthConfig();
    const jti = crypto.randomBytes(16).toString('hex');

    const payload: Omit<JWTPayload, 'exp'> = {
      userId: subject.userId,
      email: subject.email,
      role: subject.role,
      employeeId: subject.employeeId,
      iat: Math.floor(Date.now() / 1000),
      type: 'access',
      jti,
    };

    const signOptions: SignOptions = {
      algorithm: config.jwt.algorithm,
      expiresIn: durationToSeconds(config.jwt.expiresIn) ?? 3600,
      issuer: config.jwt.issuer,
      audience: config.jwt.audience,
    };

    const token = jwt.sign(payload, config.jwt.secret, signOptions);

    console.log('[JWT] Access token generated:', {
      userId: subject.userId,
      employeeId: subject.employeeId,
      role: subject.role,
      jti,
      correlationId,
      timestamp: new Date().toISOString(),
    });

    return token;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    console.error('[JWT] Failed to generate access token:', {
      userId: subject.userId,
      error: errorMessage,
      correlationId,
      timestamp: new Date().toISOString(),
    });

    throw new Error(`[JWT] Access token generation failed: ${errorMessage}`);
  }
}

/**
 * Verify and decode JWT access token
 *
 * Validates signature, expiry, issuer, audience and payload shape. Never
 * throws; failures are reported in the result.
 */
export function verifyAccessToken(token: string, options?: TokenOptions): TokenValidationResult {
  const correlationId = options?.correlationId ?? `token_verify_${Date.now()}`;
  const timestamp = new Date();

  try {
    const config = options?.config ?? getAuthConfig();

    const verifyOptions: VerifyOptions = {
      algorithms: [config.jwt.algorithm],
      issuer: config.jwt.issuer,
      audience: config.jwt.audience,
    };

    const decoded: unknown = jwt.verify(token, config.jwt.secret, verifyOptions);

    if (!isJWTPayload(decoded)) {
      console.error('[JWT] Invalid access token payload structure:', {
        correlationId,
        timestamp: timestamp.toISOString(),
      });

      return {
        valid: false,
        error: 'Invalid token payload structure',
        errorCode: 'MALFORMED',
        timestamp,
      };
    }

    return { valid: true, payload: decoded, timestamp };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    let errorCode: TokenValidationResult['errorCode'] = 'INVALID';
    let expired = false;

    if (error instanceof jwt.TokenExpiredError) {
      errorCode = 'EXPIRED';
      expired = true;
    } else if (error instanceof jwt.JsonWebTokenError) {
      errorCode = 'MALFORMED';
    }

    console.warn('[JWT] Access token verification failed:', {
      error: errorMessage,
      errorCode,
      expired,
      correlationId,
      timestamp: timestamp.toISOString(),
    });

    return { valid: false, error: errorMessage, errorCode, expired, timestamp };
  }
}

/**
 * Extract JWT token from the Authorization header
 *
 * @returns The token, or null if the header is missing or not `Bearer <token>`
 */
export function extractTokenFromHeader(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const parts = authHeader.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0] !== 'Bearer') {
    console.warn('[JWT] Invalid authorization header format:', {
      format: 'Expected "Bearer <token>"',
      received: authHeader.substring(0, 20) + '...',
    });
    return null;
  }

  return parts[1] ?? null;
}
