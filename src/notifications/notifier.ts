/**
 * Notifier contract.
 *
 * Notifiers deliver messages about request transitions. Delivery is
 * best-effort: a notifier may throw, and the dispatcher absorbs it.
 */

import { RequestStatus, RequestType, Requester } from '../domain/request';

export type NotificationKind =
  | 'approval.requested'
  | 'approval.reminder'
  | 'request.approved'
  | 'request.rejected'
  | 'deployment.started'
  | 'deployment.completed'
  | 'deployment.failed'
  | 'expiration.warning';

/** Everything a channel needs to render a message. */
export interface NotificationPayload {
  requestId: string;
  requestType: RequestType;
  status: RequestStatus;
  catalogItemId: string;
  /** Catalog display name, or the catalog id when the catalog has no entry. */
  templateName: string;
  requester: Requester;
  /** Email addresses the message is meant for. */
  recipients: string[];
  /** Who caused the transition, when a person did. */
  actor?: Requester;
  reason?: string;
  parameters: Record<string, string>;
  pipelineUrl?: string;
  detailsUrl: string;
  hoursPending?: number;
  expiresAt?: string;
}

export interface Notifier {
  /** Channel name used in logs and the delivery log. */
  readonly channel: string;
  send(kind: NotificationKind, payload: NotificationPayload): Promise<void>;
}
