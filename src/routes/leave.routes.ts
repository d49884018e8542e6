/**
 * Leave Routes Module
 *
 * Express router for the leave lifecycle and the side-effect operator
 * endpoints. Every route requires authentication; who may act on a given
 * request is decided by the lifecycle engine. Side-effect operations are
 * restricted to HR administrators here, and team views and reports to
 * managers and HR administrators.
 *
 * @module routes/leave
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import rateLimit from 'express-rate-limit';

import type { RateLimitConfig } from '../config/auth.js';
import type { LeaveController } from '../controllers/leave.controller.js';
import { authenticate } from '../middleware/authenticate.js';
import { authorize } from '../middleware/authorize.js';
import { UserRole } from '../types/index.js';

function logRoute(name: string) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    console.log('[LEAVE_ROUTES] ' + name + ':', {
      path: req.path,
      method: req.method,
      ip: req.ip,
      timestamp: new Date().toISOString(),
    });
    next();
  };
}

/**
 * Create and configure the leave router
 *
 * Mutating routes share one rate limiter configured from the auth settings.
 *
 * @example
 * app.use('/api/leave', createLeaveRouter(new LeaveController(deps), getAuthConfig().rateLimit));
 */
export function createLeaveRouter(controller: LeaveController, rateLimitConfig: RateLimitConfig): Router {
  const router = Router();

  console.log('[LEAVE_ROUTES] Initializing leave routes');

  const mutationLimiter = rateLimit({
    windowMs: rateLimitConfig.windowMs,
    limit: rateLimitConfig.maxRequests,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    handler: (req, res) => {
      console.warn('[LEAVE_ROUTES] Rate limit exceeded:', {
        ip: req.ip,
        path: req.path,
        timestamp: new Date().toISOString(),
      });

      res.status(429).json({
        success: false,
        code: 'RATE_LIMIT_EXCEEDED',
        message: rateLimitConfig.message,
        timestamp: new Date().toISOString(),
      });
    },
  });

  const hrOnly = authorize([UserRole.HRAdmin]);
  const managersAndHr = authorize([UserRole.Manager, UserRole.HRAdmin]);

  router.use(authenticate);

  router.post('/requests', mutationLimiter, logRoute('Create leave request'), controller.createRequest);
  router.get('/requests/:id', controller.getRequest);
  router.post('/requests/:id/submit', mutationLimiter, logRoute('Submit leave request'), controller.submitRequest);
  router.post('/requests/:id/approve', mutationLimiter, logRoute('Approve leave request'), controller.approveRequest);
  router.post('/requests/:id/reject', mutationLimiter, logRoute('Reject leave request'), controller.rejectRequest);
  router.post('/requests/:id/withdraw', mutationLimiter, logRoute('Withdraw leave request'), controller.withdrawRequest);
  router.post('/requests/:id/revert', mutationLimiter, logRoute('Revert approved leave'), controller.revertRequest);

  router.get('/my-requests', controller.getMyRequests);
  router.get('/my-balance', controller.getMyBalance);
  router.get('/approvals', controller.getApprovals);
  router.get('/context/:employeeId', controller.getLeaveContext);

  router.get('/team/:managerId/calendar', managersAndHr, controller.getTeamCalendar);
  router.get('/team/:managerId/requests', managersAndHr, controller.getTeamRequests);
  router.get('/reports/upcoming', managersAndHr, controller.getUpcomingReport);

  router.get('/side-effects', hrOnly, controller.listSideEffects);
  router.post(
    '/side-effects/:id/redrive',
    hrOnly,
    mutationLimiter,
    logRoute('Redrive side effect'),
    controller.redriveSideEffect
  );
  router.post(
    '/side-effects/:id/abandon',
    hrOnly,
    mutationLimiter,
    logRoute('Abandon side effect'),
    controller.abandonSideEffect
  );

  console.log('[LEAVE_ROUTES] Leave routes initialized');

  return router;
}
