/**
 * Audit API routes.
 *
 * GET /audit: Query entries, newest first. Requesters only see their own.
 * GET /audit/stats: Counts per action and most active actors. Approvers only.
 */

import { Router } from 'express';
import { isAuditAction } from '../domain/audit';
import { LifecycleError, validationError } from '../domain/errors';
import { Permission, hasPermission } from '../domain/rbac';
import { AuditService } from '../audit/audit-service';
import { actorOf, asyncRoute, requirePermission } from './middleware';
import { queryInt, queryString } from './validation';

export function createAuditRoutes(auditService: AuditService): Router {
  const router = Router();

  router.get(
    '/',
    requirePermission(Permission.AuditRead),
    asyncRoute(async (req, res) => {
      const actor = actorOf(req);
      const action = queryString(req.query.action);
      if (action !== undefined && !isAuditAction(action)) {
        throw new LifecycleError(validationError(`Unknown audit action "${action}"`));
      }

      const actorEmail = hasPermission(actor, Permission.AuditReadAll)
        ? queryString(req.query.actorEmail)
        : actor.email;

      const result = await auditService.query({
        requestId: queryString(req.query.requestId),
        actorEmail,
        action,
        days: queryInt(req.query.days, 'days'),
        limit: Math.min(queryInt(req.query.limit, 'limit', 50) ?? 50, 500),
        offset: queryInt(req.query.offset, 'offset', 0),
      });
      res.json(result);
    }),
  );

  router.get(
    '/stats',
    requirePermission(Permission.AuditReadAll),
    asyncRoute(async (req, res) => {
      const days = queryInt(req.query.days, 'days', 30) ?? 30;
      res.json(await auditService.stats(days));
    }),
  );

  return router;
}
