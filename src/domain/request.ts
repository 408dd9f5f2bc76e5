/**
 * Deployment request domain model.
 *
 * A request to deploy, destroy, or resize infrastructure built from a
 * catalog template. Destroy and scale requests always point back at the
 * deploy request that created the infrastructure (the lineage root).
 */

/** The three kinds of life-cycle request. */
export enum RequestType {
  Deploy = 'deploy',
  Destroy = 'destroy',
  Scale = 'scale',
}

/** Request life-cycle states. */
export enum RequestStatus {
  PendingApproval = 'pending_approval',
  Approved = 'approved',
  Rejected = 'rejected',
  Deploying = 'deploying',
  Completed = 'completed',
  Failed = 'failed',
}

/** Health of provisioned resources, as reported by the health collaborator. */
export enum ResourceHealth {
  Unknown = 'unknown',
  Healthy = 'healthy',
  Degraded = 'degraded',
  Unhealthy = 'unhealthy',
}

/** Valid status transitions for requests. */
export const VALID_REQUEST_TRANSITIONS: Record<RequestStatus, RequestStatus[]> = {
  [RequestStatus.PendingApproval]: [RequestStatus.Approved, RequestStatus.Rejected],
  [RequestStatus.Approved]: [RequestStatus.Deploying],
  [RequestStatus.Deploying]: [RequestStatus.Completed, RequestStatus.Failed],
  [RequestStatus.Rejected]: [],
  [RequestStatus.Completed]: [],
  [RequestStatus.Failed]: [],
};

/** Identity of the person who submitted a request. */
export interface Requester {
  email: string;
  name: string;
}

/**
 * Terminal approval decision. Stored once, never rewritten: an approved
 * request carries no rejection fields and vice versa.
 */
export type ApprovalDecision =
  | { kind: 'approved'; by: Requester; at: string }
  | { kind: 'rejected'; by: Requester; at: string; reason: string };

/** Link to the external pipeline run started for this request. */
export interface PipelineRunLink {
  buildId: string;
  url?: string;
  triggeredAt: string;
}

/** Cost and environment tags carried along a lineage. */
export interface RequestTags {
  costCenter?: string;
  environmentType?: string;
  projectCode?: string;
}

/** The request aggregate. */
export interface DeploymentRequest {
  id: string;
  requestType: RequestType;
  status: RequestStatus;
  catalogItemId: string;
  /** Parameter name to value, in submission order. */
  parameters: Record<string, string>;
  requester: Requester;
  decision: ApprovalDecision | null;
  pipelineRun: PipelineRunLink | null;
  /** Diagnostic output reported by the pipeline once it finished. */
  deploymentOutput?: string;
  /** When the pipeline reported a final result. */
  completedAt?: string;

  /** Lineage root. Set for destroy and scale requests only. */
  parentRequestId?: string;
  previousSize?: string;
  newSize?: string;
  /** Free-text justification for destroy and scale requests. */
  reason?: string;
  tags: RequestTags;

  expiresAt?: string;
  expirationWarningSent: boolean;
  /** Set on a deploy request once a destroy request against it completed. */
  resourcesReleasedAt?: string;

  resourceHealth: ResourceHealth;
  healthCheckedAt?: string;
  healthDetails?: Record<string, unknown>;

  createdAt: string;
  updatedAt: string;
}

/** Fields the engine may write after creation. Everything else is fixed at creation. */
export type MutableRequestFields = Pick<
  DeploymentRequest,
  | 'status'
  | 'decision'
  | 'pipelineRun'
  | 'deploymentOutput'
  | 'completedAt'
  | 'expirationWarningSent'
  | 'resourcesReleasedAt'
  | 'resourceHealth'
  | 'healthCheckedAt'
  | 'healthDetails'
  | 'updatedAt'
>;

/** Input for creating a request of any type. */
export interface CreateRequestInput {
  catalogItemId: string;
  requester: Requester;
  requestType: RequestType;
  parameters: Record<string, string>;
  parentRequestId?: string;
  tags?: RequestTags;
  expiresAt?: string;
  reason?: string;
  /** Required when requestType is scale. */
  newSize?: string;
}

/** Channel a pending-approval reminder went out on. */
export type ReminderChannel = 'email' | 'chat';

/** Append-only record of a reminder sent for a pending request. */
export interface ApprovalReminder {
  id: string;
  requestId: string;
  channel: ReminderChannel;
  sentAt: string;
}

/** Statuses in which a destroy or scale request is still in flight. */
export const IN_FLIGHT_STATUSES: readonly RequestStatus[] = [
  RequestStatus.PendingApproval,
  RequestStatus.Approved,
  RequestStatus.Deploying,
];

/** Narrow a raw value to a ResourceHealth, or null when it is not one. */
export function parseResourceHealth(value: string): ResourceHealth | null {
  return Object.values(ResourceHealth).find((h) => h === value) ?? null;
}
