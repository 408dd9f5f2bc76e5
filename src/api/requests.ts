/**
 * Request API routes.
 *
 * POST /requests: Submit a deploy, destroy or scale request
 * GET /requests/:requestId: Get a request
 * GET /requests/:requestId/audit: Audit trail of a request
 * GET /requests/:requestId/size: Current size of the request's lineage
 */

import { Router } from 'express';
import { DeploymentRequest, RequestTags, RequestType } from '../domain/request';
import { LifecycleError, forbiddenError, validationError } from '../domain/errors';
import { Actor, Permission } from '../domain/rbac';
import { RequestLifecycleEngine } from '../engine/lifecycle-engine';
import { actorOf, asyncRoute, contextOf, requirePermission } from './middleware';
import { bodyOf, optionalObject, optionalString, requiredString, stringRecord } from './validation';

function parseRequestType(value: string | undefined): RequestType {
  if (value === undefined) return RequestType.Deploy;
  const match = Object.values(RequestType).find((t) => t === value);
  if (!match) {
    throw new LifecycleError(
      validationError(`Unknown request type "${value}"`, { allowed: Object.values(RequestType) }),
    );
  }
  return match;
}

function parseTags(raw: Record<string, unknown> | undefined): RequestTags {
  if (!raw) return {};
  return {
    costCenter: optionalString(raw, 'costCenter'),
    environmentType: optionalString(raw, 'environmentType'),
    projectCode: optionalString(raw, 'projectCode'),
  };
}

/** Requesters see their own requests; approvers see all. */
export function assertCanRead(actor: Actor, request: DeploymentRequest): void {
  if (!actor.isApprover && request.requester.email.toLowerCase() !== actor.email.toLowerCase()) {
    throw new LifecycleError(forbiddenError('You can only view your own requests', request.id));
  }
}

export function createRequestRoutes(engine: RequestLifecycleEngine): Router {
  const router = Router();

  router.post(
    '/',
    requirePermission(Permission.RequestCreate),
    asyncRoute(async (req, res) => {
      const actor = actorOf(req);
      const body = bodyOf(req.body);
      const request = await engine.createRequest(
        {
          catalogItemId: requiredString(body, 'catalogItemId'),
          requestType: parseRequestType(optionalString(body, 'requestType')),
          requester: { email: actor.email, name: actor.name },
          parameters: stringRecord(body, 'parameters'),
          parentRequestId: optionalString(body, 'parentRequestId'),
          tags: parseTags(optionalObject(body, 'tags')),
          expiresAt: optionalString(body, 'expiresAt'),
          reason: optionalString(body, 'reason'),
          newSize: optionalString(body, 'newSize'),
        },
        contextOf(req),
      );
      res.status(201).json({ request });
    }),
  );

  router.get(
    '/:requestId',
    requirePermission(Permission.RequestRead),
    asyncRoute(async (req, res) => {
      const request = await engine.getRequest(req.params.requestId);
      assertCanRead(actorOf(req), request);
      res.json({ request });
    }),
  );

  router.get(
    '/:requestId/audit',
    requirePermission(Permission.RequestRead),
    asyncRoute(async (req, res) => {
      const request = await engine.getRequest(req.params.requestId);
      assertCanRead(actorOf(req), request);
      const entries = await engine.getAuditTrail(request.id);
      res.json({ entries });
    }),
  );

  router.get(
    '/:requestId/size',
    requirePermission(Permission.RequestRead),
    asyncRoute(async (req, res) => {
      const request = await engine.getRequest(req.params.requestId);
      assertCanRead(actorOf(req), request);
      const currentSize = await engine.resolveCurrentSize(request.id);
      res.json({ requestId: request.id, currentSize });
    }),
  );

  return router;
}
