/**
 * Authentication Middleware Module
 *
 * Verifies the bearer token on protected routes and attaches the
 * authenticated user, and a correlation id for log tracing, to the request.
 *
 * @module middleware/authenticate
 */

import { randomUUID } from 'crypto';
import { type NextFunction, type Request, type Response } from 'express';

import type { AuthenticatedUser, JWTPayload } from '../types/auth.js';
import type { Actor } from '../types/leave.js';
import { extractTokenFromHeader, verifyAccessToken } from '../utils/jwt.js';

/**
 * Express request after authentication
 */
export interface AuthenticatedRequest extends Request {
  /**
   * Authenticated user information (populated by authenticate middleware)
   */
  user?: AuthenticatedUser;

  /**
   * Correlation ID for request tracing
   */
  correlationId?: string;
}

/**
 * Authentication error response structure
 */
interface AuthErrorResponse {
  readonly success: false;
  readonly code: string;
  readonly message: string;
  readonly timestamp: string;
  readonly path: string;
}

function sendAuthError(res: Response, statusCode: number, code: string, message: string, path: string): void {
  const errorResponse: AuthErrorResponse = {
    success: false,
    code,
    message,
    timestamp: new Date().toISOString(),
    path,
  };

  res.status(statusCode).json(errorResponse);
}

function toAuthenticatedUser(payload: JWTPayload): AuthenticatedUser {
  return {
    userId: payload.userId,
    email: payload.email,
    role: payload.role,
    employeeId: payload.employeeId,
    iat: payload.iat,
    exp: payload.exp,
    jti: payload.jti,
  };
}

/**
 * The actor of a leave transition performed by this user
 */
export function toActor(user: AuthenticatedUser): Actor {
  return { employeeId: user.employeeId, role: user.role };
}

/**
 * Authentication Middleware
 *
 * @example
 * router.use(authenticate);
 * router.get('/my-requests', (req: AuthenticatedRequest, res) => {
 *   // req.user is defined here
 * });
 */
export function authenticate(req: AuthenticatedRequest, res: Response, next: NextFunction): void {
  const correlationId = req.get('x-correlation-id') ?? `req_${randomUUID()}`;
  req.correlationId = correlationId;

  const authHeader = req.get('authorization');
  if (!authHeader) {
    console.warn('[AUTH_MIDDLEWARE] Missing authorization header:', {
      correlationId,
      path: req.path,
      method: req.method,
      timestamp: new Date().toISOString(),
    });
    sendAuthError(res, 401, 'MISSING_TOKEN', 'Authorization header is required', req.path);
    return;
  }

  const token = extractTokenFromHeader(authHeader);
  if (!token) {
    sendAuthError(res, 401, 'INVALID_TOKEN_FORMAT', 'Authorization header must use Bearer scheme', req.path);
    return;
  }

  const validation = verifyAccessToken(token, { correlationId });
  if (!validation.valid || !validation.payload) {
    const expired = validation.errorCode === 'EXPIRED';

    console.warn('[AUTH_MIDDLEWARE] Token validation failed:', {
      correlationId,
      path: req.path,
      errorCode: validation.errorCode,
      error: validation.error,
      timestamp: new Date().toISOString(),
    });

    sendAuthError(
      res,
      401,
      expired ? 'TOKEN_EXPIRED' : 'INVALID_TOKEN',
      expired ? 'Authentication token has expired' : 'Invalid authentication token',
      req.path
    );
    return;
  }

  req.user = toAuthenticatedUser(validation.payload);

  console.log('[AUTH_MIDDLEWARE] Authentication successful:', {
    correlationId,
    path: req.path,
    userId: req.user.userId,
    employeeId: req.user.employeeId,
    role: req.user.role,
    timestamp: new Date().toISOString(),
  });

  next();
}
