/**
 * API middleware: identity and permission checks, error responses.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { RequestProvenance } from '../domain/audit';
import { Actor, Permission, hasPermission, resolveActor } from '../domain/rbac';
import {
  LifecycleError,
  TypedError,
  apiError,
  classifyError,
  createTypedError,
  validationError,
} from '../domain/errors';
import { normalizeProvenance } from '../audit/audit-service';
import { OperationContext } from '../engine/lifecycle-engine';
import { logger } from '../logger';

/** Extended request with identity and provenance context. */
export interface AuthenticatedRequest extends Request {
  actor?: Actor;
  provenance?: RequestProvenance;
}

const log = logger.child({ module: 'api' });

/**
 * Identity middleware.
 * The identity provider sits in front of this service and forwards the
 * signed-in user in `x-user-email` / `x-user-name`. The approver capability
 * comes from the configured allow-list, never from the caller.
 */
export function identityMiddleware(approverEmails: readonly string[]) {
  return (req: AuthenticatedRequest, _res: Response, next: NextFunction) => {
    const email = req.get('x-user-email')?.trim();
    if (email) {
      const name = req.get('x-user-name')?.trim() || email;
      req.actor = resolveActor(email, name, approverEmails);
    }
    req.provenance = normalizeProvenance({
      forwardedFor: req.get('x-forwarded-for'),
      remoteAddress: req.socket.remoteAddress,
      userAgent: req.get('user-agent'),
    });
    next();
  };
}

/** Reject calls without an identity. */
export function requireIdentity(req: AuthenticatedRequest, res: Response, next: NextFunction) {
  if (!req.actor) {
    res.status(401).json(
      apiError(
        createTypedError({
          code: 'AUTH.UNAUTHENTICATED',
          message: 'Authentication required',
          retryable: false,
        }),
      ),
    );
    return;
  }
  next();
}

/** RBAC authorization middleware factory. */
export function requirePermission(permission: Permission) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    if (!req.actor) {
      requireIdentity(req, res, next);
      return;
    }
    if (!hasPermission(req.actor, permission)) {
      res.status(403).json(
        apiError(
          createTypedError({
            code: 'AUTH.FORBIDDEN',
            message: `Insufficient permissions: ${permission}`,
            retryable: false,
            details: { requiredPermission: permission },
          }),
        ),
      );
      return;
    }
    next();
  };
}

/** The actor set by identityMiddleware. Only call behind requireIdentity. */
export function actorOf(req: AuthenticatedRequest): Actor {
  if (!req.actor) {
    throw new LifecycleError(
      createTypedError({ code: 'AUTH.UNAUTHENTICATED', message: 'Authentication required', retryable: false }),
    );
  }
  return req.actor;
}

export function contextOf(req: AuthenticatedRequest): OperationContext {
  return { provenance: req.provenance };
}

/** Forward async handler rejections to the error handler. */
export function asyncRoute(
  handler: (req: AuthenticatedRequest, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof LifecycleError) {
    const status = getHttpStatus(err.typedError);
    log.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  // express.json() parse failures
  if (err instanceof SyntaxError) {
    res.status(400).json(apiError(validationError(`Malformed JSON body: ${err.message}`)));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  log.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message,
        retryable: false,
      }),
    ),
  );
}

export function getHttpStatus(error: TypedError): number {
  if (error.code === 'AUTH.UNAUTHENTICATED') return 401;
  switch (classifyError(error)) {
    case 'not-found':
      return 404;
    case 'forbidden':
      return 403;
    case 'durability-failure':
      return 503;
    case 'best-effort-failure':
      return 502;
    case 'guard-violation':
      return error.code.startsWith('VALIDATION.') ? 400 : 409;
  }
}
