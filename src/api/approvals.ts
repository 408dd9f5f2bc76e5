/**
 * Approval API routes. Approvers only.
 *
 * GET /approvals: Pending requests, oldest first
 * POST /approvals/:requestId/approve: Approve and trigger the pipeline
 * POST /approvals/:requestId/reject: Reject with a reason
 * POST /approvals/:requestId/retrigger: Retry a failed pipeline trigger
 */

import { Router } from 'express';
import { Permission } from '../domain/rbac';
import { RequestLifecycleEngine } from '../engine/lifecycle-engine';
import { actorOf, asyncRoute, contextOf, requirePermission } from './middleware';
import { bodyOf, optionalString } from './validation';

export function createApprovalRoutes(engine: RequestLifecycleEngine): Router {
  const router = Router();

  router.get(
    '/',
    requirePermission(Permission.RequestApprove),
    asyncRoute(async (_req, res) => {
      const requests = await engine.listPendingApprovals();
      res.json({ requests });
    }),
  );

  router.post(
    '/:requestId/approve',
    requirePermission(Permission.RequestApprove),
    asyncRoute(async (req, res) => {
      const request = await engine.approve(req.params.requestId, actorOf(req), contextOf(req));
      res.json({ request });
    }),
  );

  router.post(
    '/:requestId/reject',
    requirePermission(Permission.RequestReject),
    asyncRoute(async (req, res) => {
      // An absent reason reaches the engine as '' and fails its empty-reason guard.
      const reason = optionalString(bodyOf(req.body), 'reason') ?? '';
      const request = await engine.reject(req.params.requestId, actorOf(req), reason, contextOf(req));
      res.json({ request });
    }),
  );

  router.post(
    '/:requestId/retrigger',
    requirePermission(Permission.PipelineRetrigger),
    asyncRoute(async (req, res) => {
      const outcome = await engine.retriggerPipeline(req.params.requestId, actorOf(req), contextOf(req));
      res.json(outcome);
    }),
  );

  return router;
}
