/**
 * Channel-neutral message content for each notification kind.
 */

import { RequestType } from '../domain/request';
import { NotificationKind, NotificationPayload } from './notifier';

export interface MessageFact {
  name: string;
  value: string;
}

export interface MessageContent {
  title: string;
  text: string;
  /** Hex colour without '#'. */
  accent: string;
  facts: MessageFact[];
  action: { label: string; url: string };
}

const ACCENT = {
  info: '0078D4',
  warning: 'FFA500',
  success: '28A745',
  danger: 'DC3545',
  progress: '7B68EE',
} as const;

function operationLabel(type: RequestType): string {
  switch (type) {
    case RequestType.Destroy:
      return 'destroy';
    case RequestType.Scale:
      return 'scale';
    default:
      return 'deployment';
  }
}

function baseFacts(payload: NotificationPayload): MessageFact[] {
  const facts: MessageFact[] = [
    { name: 'Template', value: payload.templateName },
    { name: 'Request Type', value: payload.requestType },
    { name: 'Requested By', value: payload.requester.name || payload.requester.email },
  ];
  const size = payload.parameters.size;
  if (size) facts.push({ name: 'Size', value: size });
  return facts;
}

export function describeNotification(kind: NotificationKind, payload: NotificationPayload): MessageContent {
  const label = operationLabel(payload.requestType);
  const facts = baseFacts(payload);
  const details = { label: 'View Details', url: payload.detailsUrl };

  switch (kind) {
    case 'approval.requested':
      return {
        title: 'Approval Requested',
        text: `${payload.requester.name || payload.requester.email} requested a ${label} of ${payload.templateName}.`,
        accent: ACCENT.info,
        facts: payload.reason ? [...facts, { name: 'Reason', value: payload.reason }] : facts,
        action: { label: 'Review Request', url: payload.detailsUrl },
      };
    case 'approval.reminder': {
      const hours = Math.floor(payload.hoursPending ?? 0);
      return {
        title: 'Pending Approval Reminder',
        text: `A ${label} request has been waiting for approval for ${hours} hours.`,
        accent: ACCENT.warning,
        facts: [...facts, { name: 'Waiting', value: `${hours} hours` }],
        action: { label: 'Review Request', url: payload.detailsUrl },
      };
    }
    case 'request.approved':
      return {
        title: 'Request Approved',
        text: `Your ${label} request for ${payload.templateName} was approved.`,
        accent: ACCENT.success,
        facts: payload.actor ? [...facts, { name: 'Approved By', value: payload.actor.name }] : facts,
        action: details,
      };
    case 'request.rejected':
      return {
        title: 'Request Rejected',
        text: `Your ${label} request for ${payload.templateName} was rejected.`,
        accent: ACCENT.danger,
        facts: [
          ...facts,
          ...(payload.actor ? [{ name: 'Rejected By', value: payload.actor.name }] : []),
          { name: 'Reason', value: payload.reason ?? '' },
        ],
        action: details,
      };
    case 'deployment.started':
      return {
        title: 'Deployment Started',
        text: `The ${label} of ${payload.templateName} has started.`,
        accent: ACCENT.progress,
        facts,
        action: payload.pipelineUrl ? { label: 'View Pipeline', url: payload.pipelineUrl } : details,
      };
    case 'deployment.completed':
      return {
        title: 'Deployment Completed',
        text: `The ${label} of ${payload.templateName} completed successfully.`,
        accent: ACCENT.success,
        facts,
        action: details,
      };
    case 'deployment.failed':
      return {
        title: 'Deployment Failed',
        text: `The ${label} of ${payload.templateName} failed. Please investigate.`,
        accent: ACCENT.danger,
        facts,
        action: payload.pipelineUrl ? { label: 'View Pipeline', url: payload.pipelineUrl } : details,
      };
    case 'expiration.warning':
      return {
        title: 'Deployment Expiring',
        text: `Your deployment of ${payload.templateName} expires at ${payload.expiresAt ?? 'an unknown time'}.`,
        accent: ACCENT.warning,
        facts: payload.expiresAt ? [...facts, { name: 'Expires', value: payload.expiresAt }] : facts,
        action: details,
      };
  }
}
