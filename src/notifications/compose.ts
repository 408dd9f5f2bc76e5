/**
 * Builds notification payloads from committed request records.
 */

import { CatalogLookup } from '../domain/catalog';
import { DeploymentRequest, Requester } from '../domain/request';
import { NotificationKind, NotificationPayload } from './notifier';

export interface ComposerOptions {
  portalBaseUrl: string;
  approverEmails: string[];
}

/** Optional fields a transition adds to its message. */
export interface PayloadExtras {
  actor?: Requester;
  reason?: string;
  pipelineUrl?: string;
  hoursPending?: number;
}

/** Kinds addressed to the approver list rather than the requester. */
const APPROVER_KINDS: readonly NotificationKind[] = ['approval.requested', 'approval.reminder'];

export class NotificationComposer {
  constructor(
    private catalog: CatalogLookup,
    private options: ComposerOptions,
  ) {}

  async compose(
    kind: NotificationKind,
    request: DeploymentRequest,
    extras: PayloadExtras = {},
  ): Promise<NotificationPayload> {
    const entry = await this.catalog.getById(request.catalogItemId);
    const recipients = APPROVER_KINDS.includes(kind)
      ? [...this.options.approverEmails]
      : [request.requester.email];

    return {
      requestId: request.id,
      requestType: request.requestType,
      status: request.status,
      catalogItemId: request.catalogItemId,
      templateName: entry?.name ?? request.catalogItemId,
      requester: { ...request.requester },
      recipients,
      actor: extras.actor,
      reason: extras.reason ?? request.reason,
      parameters: { ...request.parameters },
      pipelineUrl: extras.pipelineUrl ?? request.pipelineRun?.url,
      detailsUrl: `${this.options.portalBaseUrl.replace(/\/+$/, '')}/requests/${request.id}`,
      hoursPending: extras.hoursPending,
      expiresAt: request.expiresAt,
    };
  }
}
