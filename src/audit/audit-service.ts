/**
 * Audit Trail Service.
 *
 * Records immutable audit entries for request transitions and answers
 * audit queries. `record` writes through whichever store session it is
 * given, so an entry commits or rolls back with the transition it
 * describes.
 */

import { v4 as uuid } from 'uuid';
import { AuditAction, AuditActor, AuditLogEntry, RequestProvenance } from '../domain/audit';
import { ListResult, Store, StoreSession } from '../storage/store';

/** Input for creating an audit entry. */
export interface AuditInput {
  actor: AuditActor;
  action: AuditAction;
  requestId?: string;
  catalogItemId?: string;
  details?: Record<string, unknown>;
  provenance?: RequestProvenance;
}

/** Audit query options. */
export interface AuditQueryOptions {
  requestId?: string;
  actorEmail?: string;
  action?: AuditAction;
  /** Only entries from the last N days. */
  days?: number;
  limit?: number;
  offset?: number;
}

/** Aggregate counts over a time window. */
export interface AuditStats {
  periodDays: number;
  actionCounts: Partial<Record<AuditAction, number>>;
  /** Up to ten most active actors, busiest first. */
  topActors: Array<{ email: string; count: number }>;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** Keep only the first hop of a forwarded-for chain and cap the user agent. */
export function normalizeProvenance(input: {
  forwardedFor?: string;
  remoteAddress?: string;
  userAgent?: string;
}): RequestProvenance {
  const forwarded = input.forwardedFor?.split(',')[0]?.trim();
  return {
    ipAddress: forwarded || input.remoteAddress || undefined,
    userAgent: input.userAgent ? input.userAgent.slice(0, 500) : undefined,
  };
}

/** The audit service. */
export class AuditService {
  constructor(
    private store: Store,
    private clock: () => Date = () => new Date(),
  ) {}

  /** Record an audit entry inside the given session. */
  async record(session: StoreSession, input: AuditInput): Promise<AuditLogEntry> {
    return session.audit.append({
      id: `aud_${uuid()}`,
      timestamp: this.clock().toISOString(),
      actor: { email: input.actor.email, name: input.actor.name },
      action: input.action,
      requestId: input.requestId,
      catalogItemId: input.catalogItemId,
      details: input.details,
      provenance: input.provenance,
    });
  }

  /** The full trail for one request, in commit order. */
  async trail(requestId: string): Promise<AuditLogEntry[]> {
    return this.store.audit.listByRequest(requestId);
  }

  /** Query audit entries, newest first. */
  async query(options: AuditQueryOptions = {}): Promise<ListResult<AuditLogEntry>> {
    return this.store.audit.query(
      {
        requestId: options.requestId,
        actorEmail: options.actorEmail,
        action: options.action,
        since: options.days ? this.cutoff(options.days) : undefined,
      },
      { limit: options.limit, offset: options.offset },
    );
  }

  /** Count entries per action and per actor over the last `days` days. */
  async stats(days = 30): Promise<AuditStats> {
    const since = this.cutoff(days);
    const actionCounts: Partial<Record<AuditAction, number>> = {};
    const actorCounts = new Map<string, number>();

    const pageSize = 500;
    let offset = 0;
    for (;;) {
      const page = await this.store.audit.query({ since }, { limit: pageSize, offset });
      for (const entry of page.items) {
        actionCounts[entry.action] = (actionCounts[entry.action] ?? 0) + 1;
        actorCounts.set(entry.actor.email, (actorCounts.get(entry.actor.email) ?? 0) + 1);
      }
      if (!page.hasMore) break;
      offset += pageSize;
    }

    const topActors = [...actorCounts.entries()]
      .map(([email, count]) => ({ email, count }))
      .sort((a, b) => b.count - a.count || a.email.localeCompare(b.email))
      .slice(0, 10);

    return { periodDays: days, actionCounts, topActors };
  }

  private cutoff(days: number): string {
    return new Date(this.clock().getTime() - days * DAY_MS).toISOString();
  }
}
