/**
 * Authorization Middleware
 *
 * Role-based access control for routes that only some roles may call (the
 * side-effect operator routes). Rules about who may act on a particular leave
 * request live in the lifecycle engine, not here. Must run after
 * `authenticate`.
 *
 * @module middleware/authorize
 */

import { type NextFunction, type Response } from 'express';

import { UserRole } from '../types/index.js';
import type { AuthenticatedRequest } from './authenticate.js';

/**
 * Authorization Middleware Factory
 *
 * @param allowedRoles - Roles allowed to call the route
 * @throws {Error} When no roles, or an unknown role, is given
 *
 * @example
 * router.post('/side-effects/:id/redrive', authorize([UserRole.HRAdmin]), handler);
 */
export function authorize(
  allowedRoles: readonly UserRole[]
): (req: AuthenticatedRequest, res: Response, next: NextFunction) => void {
  if (allowedRoles.length === 0) {
    throw new Error('[AUTHZ] authorize() requires at least one allowed role');
  }

  const validRoles: readonly string[] = Object.values(UserRole);
  for (const role of allowedRoles) {
    if (!validRoles.includes(role)) {
      throw new Error(`[AUTHZ] Invalid role provided: ${role}. Must be one of: ${validRoles.join(', ')}`);
    }
  }

  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const user = req.user;

    if (!user) {
      console.error('[AUTHZ] Authorization failed: no authenticated user', {
        correlationId: req.correlationId,
        method: req.method,
        path: req.path,
        timestamp: new Date().toISOString(),
      });
      res.status(401).json({
        success: false,
        code: 'AUTHENTICATION_REQUIRED',
        message: 'Authentication required',
        timestamp: new Date().toISOString(),
      });
      return;
    }

    if (!allowedRoles.includes(user.role)) {
      console.error('[AUTHZ] Authorization failed:', {
        correlationId: req.correlationId,
        method: req.method,
        path: req.path,
        userRole: user.role,
        allowedRoles,
        timestamp: new Date().toISOString(),
      });
      res.status(403).json({
        success: false,
        code: 'INSUFFICIENT_PERMISSIONS',
        message: `Access denied. Required role: ${allowedRoles.join(' or ')}`,
        timestamp: new Date().toISOString(),
      });
      return;
    }

    next();
  };
}
