/**
 * Expiration and reminder sweep.
 *
 * One pass over pending approvals and expiring deployments. Scheduling the
 * pass is left to the host; each call is independent and safe to repeat.
 */

import { LifecycleError, TypedError, notificationError } from '../domain/errors';
import { ReminderChannel } from '../domain/request';
import { NotificationComposer } from '../notifications/compose';
import { NotificationDispatcher } from '../notifications/dispatcher';
import { errorContext, logger } from '../logger';
import { RequestLifecycleEngine } from './lifecycle-engine';

export interface SweepOptions {
  /** Warn about deployments expiring within this window. Default: 3 days. */
  expirationWindowMs?: number;
  /** Time source for passes run without an explicit `now`. */
  clock?: () => Date;
}

export interface SweepReport {
  remindersSent: string[];
  expirationWarnings: string[];
  errors: Array<{ requestId: string; error: TypedError }>;
}

const HOUR_MS = 60 * 60 * 1000;
const DEFAULT_EXPIRATION_WINDOW_MS = 3 * 24 * HOUR_MS;

const log = logger.child({ module: 'sweep' });

function isReminderChannel(channel: string): channel is ReminderChannel {
  return channel === 'email' || channel === 'chat';
}

function toTypedError(err: unknown, kind: string, requestId: string): TypedError {
  if (err instanceof LifecycleError) return err.typedError;
  return notificationError(kind, err instanceof Error ? err.message : String(err), requestId);
}

export class LifecycleSweep {
  private expirationWindowMs: number;
  private clock: () => Date;

  constructor(
    private engine: RequestLifecycleEngine,
    private composer: NotificationComposer,
    private dispatcher: NotificationDispatcher,
    options: SweepOptions = {},
  ) {
    this.expirationWindowMs = options.expirationWindowMs ?? DEFAULT_EXPIRATION_WINDOW_MS;
    this.clock = options.clock ?? (() => new Date());
  }

  async runOnce(now: Date = this.clock()): Promise<SweepReport> {
    const report: SweepReport = { remindersSent: [], expirationWarnings: [], errors: [] };

    for (const request of await this.engine.listPendingApprovals()) {
      try {
        if (!(await this.engine.isReminderDue(request.id, now))) continue;

        const hoursPending = (now.getTime() - Date.parse(request.createdAt)) / HOUR_MS;
        const payload = await this.composer.compose('approval.reminder', request, { hoursPending });
        const deliveries = await this.dispatcher.dispatch('approval.reminder', payload);

        let recorded = false;
        for (const delivery of deliveries) {
          if (delivery.success && isReminderChannel(delivery.channel)) {
            await this.engine.recordReminder(request.id, delivery.channel);
            recorded = true;
          }
        }
        if (recorded) report.remindersSent.push(request.id);
      } catch (err) {
        log.warn('Reminder failed', { requestId: request.id, ...errorContext(err) });
        report.errors.push({ requestId: request.id, error: toTypedError(err, 'approval.reminder', request.id) });
      }
    }

    for (const request of await this.engine.listExpiringDeployments(this.expirationWindowMs, now)) {
      try {
        // Flag first: a concurrent sweep that loses the flip sends nothing.
        const { request: marked, changed } = await this.engine.markExpirationWarned(request.id);
        if (!changed) continue;

        const payload = await this.composer.compose('expiration.warning', marked);
        await this.dispatcher.dispatch('expiration.warning', payload);
        report.expirationWarnings.push(request.id);
      } catch (err) {
        log.warn('Expiration warning failed', { requestId: request.id, ...errorContext(err) });
        report.errors.push({ requestId: request.id, error: toTypedError(err, 'expiration.warning', request.id) });
      }
    }

    log.info('Sweep finished', {
      remindersSent: report.remindersSent.length,
      expirationWarnings: report.expirationWarnings.length,
      errors: report.errors.length,
    });
    return report;
  }
}
