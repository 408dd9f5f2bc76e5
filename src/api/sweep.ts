/**
 * Routes for the expiration, health and reminder collaborators.
 *
 * POST /sweep/run: One sweep pass
 * POST /sweep/:requestId/expiration-warned: Flip the warning flag
 * POST /sweep/:requestId/health: Record resource health
 * POST /sweep/:requestId/reminders: Record a sent reminder
 * GET /sweep/:requestId/reminder-due: Whether a reminder is due now
 */

import { Router } from 'express';
import { LifecycleError, validationError } from '../domain/errors';
import { Permission } from '../domain/rbac';
import { ReminderChannel } from '../domain/request';
import { RequestLifecycleEngine } from '../engine/lifecycle-engine';
import { LifecycleSweep } from '../engine/sweep';
import { asyncRoute, requirePermission } from './middleware';
import { bodyOf, optionalObject, requiredString } from './validation';

function parseChannel(value: string): ReminderChannel {
  if (value === 'email' || value === 'chat') return value;
  throw new LifecycleError(validationError(`Unknown reminder channel "${value}"`, { allowed: ['email', 'chat'] }));
}

export function createSweepRoutes(engine: RequestLifecycleEngine, sweep: LifecycleSweep): Router {
  const router = Router();
  router.use(requirePermission(Permission.PipelineRetrigger));

  router.post(
    '/run',
    asyncRoute(async (_req, res) => {
      res.json(await sweep.runOnce());
    }),
  );

  router.post(
    '/:requestId/expiration-warned',
    asyncRoute(async (req, res) => {
      res.json(await engine.markExpirationWarned(req.params.requestId));
    }),
  );

  router.post(
    '/:requestId/health',
    asyncRoute(async (req, res) => {
      const body = bodyOf(req.body);
      const request = await engine.recordHealth(
        req.params.requestId,
        requiredString(body, 'health'),
        optionalObject(body, 'details'),
      );
      res.json({ request });
    }),
  );

  router.post(
    '/:requestId/reminders',
    asyncRoute(async (req, res) => {
      const channel = parseChannel(requiredString(bodyOf(req.body), 'channel'));
      const reminder = await engine.recordReminder(req.params.requestId, channel);
      res.status(201).json({ reminder });
    }),
  );

  router.get(
    '/:requestId/reminder-due',
    asyncRoute(async (req, res) => {
      const due = await engine.isReminderDue(req.params.requestId);
      res.json({ requestId: req.params.requestId, due });
    }),
  );

  return router;
}
