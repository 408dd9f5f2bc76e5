/**
 * Typed error model for machine-actionable error handling.
 *
 * Guards return typed errors rather than throwing; the engine wraps them in
 * a LifecycleError at its boundary so callers can branch on `code`.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'REQUEST'
  | 'AUTH'
  | 'VALIDATION'
  | 'PIPELINE'
  | 'NOTIFICATION'
  | 'CONFIG'
  | 'SYSTEM';

/** Typed suggested fix that a caller can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "REQUEST.INVALID_STATE"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated request if applicable. */
  requestId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  requestId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    requestId: params.requestId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Thrown at the engine boundary; carries the typed error. */
export class LifecycleError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'LifecycleError';
  }
}

/**
 * Error taxonomy.
 *
 * - guard-violation: the transition is not permitted from the current state.
 * - not-found: unknown request id.
 * - forbidden: the actor lacks the role the operation needs.
 * - durability-failure: the state or audit write did not commit.
 * - best-effort-failure: a pipeline call or notification failed; logged only.
 */
export type ErrorKind =
  | 'guard-violation'
  | 'not-found'
  | 'forbidden'
  | 'durability-failure'
  | 'best-effort-failure';

/** Map a typed error to its kind. */
export function classifyError(error: TypedError): ErrorKind {
  if (error.code.endsWith('.NOT_FOUND')) return 'not-found';
  if (error.code.startsWith('AUTH.')) return 'forbidden';
  if (error.code === 'SYSTEM.DURABILITY') return 'durability-failure';
  if (error.code.startsWith('PIPELINE.') || error.code.startsWith('NOTIFICATION.')) {
    return 'best-effort-failure';
  }
  return 'guard-violation';
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function forbiddenError(message: string, requestId?: string): TypedError {
  return createTypedError({
    code: 'AUTH.FORBIDDEN',
    message,
    requestId,
    retryable: false,
  });
}

export function requestNotFoundError(requestId: string): TypedError {
  return createTypedError({
    code: 'REQUEST.NOT_FOUND',
    message: `Request not found: ${requestId}`,
    requestId,
    retryable: false,
  });
}

export function invalidStateError(requestId: string, current: string, attempted: string): TypedError {
  return createTypedError({
    code: 'REQUEST.INVALID_STATE',
    message: `Cannot ${attempted} request in status "${current}"`,
    requestId,
    retryable: false,
    details: { current, attempted },
  });
}

export function emptyReasonError(requestId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.EMPTY_REASON',
    message: 'A rejection reason is required',
    requestId,
    retryable: false,
    suggestedFixes: [
      { type: 'PROVIDE_REASON', params: {}, description: 'Explain why the request is rejected' },
    ],
  });
}

export function notCompletedDeployError(parentRequestId: string, details: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'REQUEST.NOT_COMPLETED_DEPLOY',
    message: `Request ${parentRequestId} is not a completed deployment`,
    requestId: parentRequestId,
    retryable: false,
    details,
  });
}

export function sameSizeError(parentRequestId: string, size: string): TypedError {
  return createTypedError({
    code: 'REQUEST.SAME_SIZE',
    message: `New size must differ from current size "${size}"`,
    requestId: parentRequestId,
    retryable: false,
    details: { currentSize: size },
  });
}

export function notCompletedError(requestId: string, status: string): TypedError {
  return createTypedError({
    code: 'REQUEST.NOT_COMPLETED',
    message: `Health can only be recorded for completed requests (status "${status}")`,
    requestId,
    retryable: false,
    details: { status },
  });
}

export function derivativeInProgressError(parentRequestId: string, pendingRequestId: string): TypedError {
  return createTypedError({
    code: 'REQUEST.DERIVATIVE_IN_PROGRESS',
    message: `Deployment ${parentRequestId} already has an open request ${pendingRequestId}`,
    requestId: parentRequestId,
    retryable: true,
    details: { pendingRequestId },
    suggestedFixes: [
      { type: 'WAIT_FOR_REQUEST', params: { requestId: pendingRequestId } },
    ],
  });
}

export function resourcesReleasedError(parentRequestId: string, releasedAt: string): TypedError {
  return createTypedError({
    code: 'REQUEST.RESOURCES_RELEASED',
    message: `Deployment ${parentRequestId} was destroyed at ${releasedAt}`,
    requestId: parentRequestId,
    retryable: false,
    details: { releasedAt },
  });
}

export function durabilityError(message: string, requestId?: string): TypedError {
  return createTypedError({
    code: 'SYSTEM.DURABILITY',
    message,
    requestId,
    retryable: true,
    suggestedFixes: [
      { type: 'RETRY_OPERATION', params: {}, description: 'Nothing was committed; retry the whole operation' },
    ],
  });
}

export function pipelineTargetUnresolvedError(requestId: string, catalogItemId: string): TypedError {
  return createTypedError({
    code: 'PIPELINE.TARGET_UNRESOLVED',
    message: `No pipeline target configured for catalog item ${catalogItemId}`,
    requestId,
    retryable: false,
    details: { catalogItemId },
  });
}

export function pipelineTriggerError(requestId: string, message: string): TypedError {
  return createTypedError({
    code: 'PIPELINE.TRIGGER_FAILED',
    message,
    requestId,
    retryable: true,
    suggestedFixes: [
      { type: 'RETRIGGER_PIPELINE', params: { requestId }, description: 'An approver can retrigger the pipeline' },
    ],
  });
}

export function notificationError(kind: string, message: string, requestId?: string): TypedError {
  return createTypedError({
    code: 'NOTIFICATION.DELIVERY_FAILED',
    message,
    requestId,
    retryable: true,
    details: { kind },
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of the given secrets in a message with their
 * masked form.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join: secrets may contain regex metacharacters
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
