/**
 * Notification dispatcher.
 *
 * Fans a committed transition out to every configured notifier. Runs only
 * after the transition committed; a failing notifier is logged and
 * recorded, never rethrown, and never affects the request.
 */

import { TypedError, notificationError } from '../domain/errors';
import { errorContext, logger } from '../logger';
import { NotificationKind, NotificationPayload, Notifier } from './notifier';

/** Outcome of one notifier for one notification. */
export interface DeliveryRecord {
  kind: NotificationKind;
  channel: string;
  requestId: string;
  success: boolean;
  error?: TypedError;
  timestamp: string;
}

const log = logger.child({ module: 'notifications' });

/** Keep the delivery log bounded; oldest records drop first. */
const MAX_DELIVERY_LOG = 1000;

export class NotificationDispatcher {
  private deliveryLog: DeliveryRecord[] = [];

  constructor(private notifiers: Notifier[] = []) {}

  /** Deliver to every notifier. Never rejects. */
  async dispatch(kind: NotificationKind, payload: NotificationPayload): Promise<DeliveryRecord[]> {
    const records = await Promise.all(this.notifiers.map((n) => this.deliver(n, kind, payload)));
    this.deliveryLog.push(...records);
    if (this.deliveryLog.length > MAX_DELIVERY_LOG) {
      this.deliveryLog.splice(0, this.deliveryLog.length - MAX_DELIVERY_LOG);
    }
    return records;
  }

  /** Get delivery log (for testing/audit). */
  getDeliveryLog(): DeliveryRecord[] {
    return [...this.deliveryLog];
  }

  private async deliver(
    notifier: Notifier,
    kind: NotificationKind,
    payload: NotificationPayload,
  ): Promise<DeliveryRecord> {
    const timestamp = new Date().toISOString();
    try {
      await notifier.send(kind, payload);
      return { kind, channel: notifier.channel, requestId: payload.requestId, success: true, timestamp };
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Notification delivery failed';
      log.warn('Notification failed', {
        kind,
        channel: notifier.channel,
        requestId: payload.requestId,
        ...errorContext(err),
      });
      return {
        kind,
        channel: notifier.channel,
        requestId: payload.requestId,
        success: false,
        error: notificationError(kind, message, payload.requestId),
        timestamp,
      };
    }
  }
}
