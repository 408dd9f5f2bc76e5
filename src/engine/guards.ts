/**
 * Transition guards.
 *
 * Pure functions of (record, actor, intent). Each returns the typed error
 * that blocks the transition, or null when it may proceed. The engine runs
 * them against the snapshot it is about to mutate, inside the transaction.
 */

import { Actor, Permission, hasPermission } from '../domain/rbac';
import {
  DeploymentRequest,
  IN_FLIGHT_STATUSES,
  RequestStatus,
  RequestType,
  ResourceHealth,
  parseResourceHealth,
} from '../domain/request';
import {
  TypedError,
  derivativeInProgressError,
  emptyReasonError,
  forbiddenError,
  invalidStateError,
  notCompletedDeployError,
  notCompletedError,
  resourcesReleasedError,
  sameSizeError,
  validationError,
} from '../domain/errors';
import { RequestEvent, applyRequestEvent } from './state-machine';

/** Approve or reject a pending request. */
export function guardDecision(
  request: DeploymentRequest,
  actor: Actor,
  intent: { event: 'approve' } | { event: 'reject'; reason: string },
): TypedError | null {
  const permission = intent.event === 'approve' ? Permission.RequestApprove : Permission.RequestReject;
  if (!hasPermission(actor, permission)) {
    return forbiddenError(`${actor.email} is not an approver`, request.id);
  }

  const transition = applyRequestEvent(request.id, request.status, intent.event);
  if (!transition.success) return transition.error;

  if (intent.event === 'reject' && intent.reason.trim().length === 0) {
    return emptyReasonError(request.id);
  }
  return null;
}

/** Manually retrigger the pipeline for an approved request. */
export function guardRetrigger(request: DeploymentRequest, actor: Actor): TypedError | null {
  if (!hasPermission(actor, Permission.PipelineRetrigger)) {
    return forbiddenError(`${actor.email} is not an approver`, request.id);
  }
  if (request.status !== RequestStatus.Approved) {
    return invalidStateError(request.id, request.status, 'retrigger');
  }
  return null;
}

/** A pipeline outcome for a request; only valid while deploying. */
export function guardPipelineResult(request: DeploymentRequest, event: RequestEvent): TypedError | null {
  const transition = applyRequestEvent(request.id, request.status, event);
  return transition.success ? null : transition.error;
}

/** What a destroy or scale request wants to do to its parent. */
export type DerivativeIntent =
  | { type: RequestType.Destroy }
  | { type: RequestType.Scale; newSize: string; currentSize: string | null };

/**
 * Open a destroy or scale request against `parent`.
 *
 * `openDerivatives` are the parent's destroy and scale requests that are
 * still in flight.
 */
export function guardDerivative(
  parent: DeploymentRequest,
  requester: Actor,
  openDerivatives: DeploymentRequest[],
  intent: DerivativeIntent,
): TypedError | null {
  if (parent.requester.email.toLowerCase() !== requester.email.toLowerCase()) {
    return forbiddenError(`Deployment ${parent.id} belongs to another requester`, parent.id);
  }

  if (parent.requestType !== RequestType.Deploy || parent.status !== RequestStatus.Completed) {
    return notCompletedDeployError(parent.id, {
      requestType: parent.requestType,
      status: parent.status,
    });
  }

  if (parent.resourcesReleasedAt) {
    return resourcesReleasedError(parent.id, parent.resourcesReleasedAt);
  }

  const open = openDerivatives.find((r) => IN_FLIGHT_STATUSES.includes(r.status));
  if (open) {
    return derivativeInProgressError(parent.id, open.id);
  }

  if (intent.type === RequestType.Scale) {
    if (intent.newSize.trim().length === 0) {
      return validationError('newSize is required for a scale request', { parentRequestId: parent.id });
    }
    if (intent.currentSize !== null && intent.newSize === intent.currentSize) {
      return sameSizeError(parent.id, intent.currentSize);
    }
  }
  return null;
}

/** Record health for provisioned resources. */
export function guardHealth(request: DeploymentRequest, health: string): TypedError | null {
  if (!parseResourceHealth(health)) {
    return validationError(`Unknown health value "${health}"`, {
      allowed: Object.values(ResourceHealth),
    });
  }
  if (request.status !== RequestStatus.Completed) {
    return notCompletedError(request.id, request.status);
  }
  return null;
}
