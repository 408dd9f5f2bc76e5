/**
 * Pipeline status routes, called by operators or a pipeline callback.
 *
 * POST /pipeline/:requestId/result: Report the final outcome of a run
 * POST /pipeline/:requestId/reconcile: Poll the pipeline once
 */

import { Router } from 'express';
import { Permission } from '../domain/rbac';
import { RequestLifecycleEngine } from '../engine/lifecycle-engine';
import { asyncRoute, requirePermission } from './middleware';
import { bodyOf, optionalString, requiredBoolean } from './validation';

export function createPipelineRoutes(engine: RequestLifecycleEngine): Router {
  const router = Router();
  router.use(requirePermission(Permission.PipelineRetrigger));

  router.post(
    '/:requestId/result',
    asyncRoute(async (req, res) => {
      const body = bodyOf(req.body);
      const request = await engine.recordPipelineResult(
        req.params.requestId,
        requiredBoolean(body, 'success'),
        optionalString(body, 'output'),
      );
      res.json({ request });
    }),
  );

  router.post(
    '/:requestId/reconcile',
    asyncRoute(async (req, res) => {
      const outcome = await engine.reconcilePipelineStatus(req.params.requestId);
      res.json(outcome);
    }),
  );

  return router;
}
