/**
 * Day-2 operation routes for a requester's own deployments.
 *
 * GET /operations/active: Completed, unreleased deployments of the caller
 * POST /operations/:requestId/destroy: Request a destroy
 * POST /operations/:requestId/scale: Request a resize
 */

import { Router } from 'express';
import { Permission } from '../domain/rbac';
import { RequestLifecycleEngine } from '../engine/lifecycle-engine';
import { actorOf, asyncRoute, contextOf, requirePermission } from './middleware';
import { bodyOf, optionalString, requiredString } from './validation';

export function createOperationRoutes(engine: RequestLifecycleEngine): Router {
  const router = Router();

  router.get(
    '/active',
    requirePermission(Permission.RequestRead),
    asyncRoute(async (req, res) => {
      const deployments = await engine.listActiveDeployments(actorOf(req).email);
      res.json({ deployments });
    }),
  );

  router.post(
    '/:requestId/destroy',
    requirePermission(Permission.RequestCreate),
    asyncRoute(async (req, res) => {
      const body = bodyOf(req.body);
      const request = await engine.requestDestroy(
        req.params.requestId,
        actorOf(req),
        optionalString(body, 'reason'),
        contextOf(req),
      );
      res.status(201).json({ request });
    }),
  );

  router.post(
    '/:requestId/scale',
    requirePermission(Permission.RequestCreate),
    asyncRoute(async (req, res) => {
      const body = bodyOf(req.body);
      const request = await engine.requestScale(
        req.params.requestId,
        actorOf(req),
        requiredString(body, 'newSize'),
        optionalString(body, 'reason'),
        contextOf(req),
      );
      res.status(201).json({ request });
    }),
  );

  return router;
}
