/**
 * Storage layer interfaces.
 *
 * Defines the contract for persistence with pluggable backends. Every
 * state transition runs inside `Store.transaction()`, which must give
 * serializable isolation: reads inside the callback see a consistent
 * snapshot plus the callback's own writes, and nothing becomes visible to
 * other callers unless the callback resolves.
 */

import { AuditAction, AuditLogEntry, NewAuditLogEntry } from '../domain/audit';
import {
  ApprovalReminder,
  DeploymentRequest,
  MutableRequestFields,
  RequestStatus,
  RequestType,
} from '../domain/request';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/** Filter for request listings. */
export interface RequestFilter {
  status?: RequestStatus[];
  requestType?: RequestType;
  requesterEmail?: string;
  parentRequestId?: string;
}

/** Filter for audit queries. */
export interface AuditFilter {
  requestId?: string;
  actorEmail?: string;
  action?: AuditAction;
  /** ISO timestamp; entries strictly before it are excluded. */
  since?: string;
}

/** Store interface for deployment requests. */
export interface RequestStore {
  create(request: DeploymentRequest): Promise<DeploymentRequest>;
  getById(id: string): Promise<DeploymentRequest | null>;
  /**
   * Compare-and-set on status. Applies `updates` only when the stored
   * status equals `expectedStatus`; returns null when the request is
   * missing or its status has moved.
   */
  updateIfStatus(
    id: string,
    expectedStatus: RequestStatus,
    updates: Partial<MutableRequestFields>,
  ): Promise<DeploymentRequest | null>;
  /** Update non-status fields. Returns null when the request is missing. */
  update(id: string, updates: Partial<Omit<MutableRequestFields, 'status'>>): Promise<DeploymentRequest | null>;
  /** Requests matching the filter, oldest first. Unbounded unless `options.limit` is set. */
  list(filter?: RequestFilter, options?: ListOptions): Promise<DeploymentRequest[]>;
}

/** Store interface for the append-only audit log. */
export interface AuditStore {
  /** Append an entry; the store assigns the next sequence number. */
  append(entry: NewAuditLogEntry): Promise<AuditLogEntry>;
  /** Entries for one request in commit order. */
  listByRequest(requestId: string): Promise<AuditLogEntry[]>;
  /** Entries matching the filter, newest first. */
  query(filter: AuditFilter, options?: ListOptions): Promise<ListResult<AuditLogEntry>>;
}

/** Store interface for approval reminders. */
export interface ReminderStore {
  create(reminder: ApprovalReminder): Promise<ApprovalReminder>;
  /** Reminders for one request, oldest first. */
  listByRequest(requestId: string): Promise<ApprovalReminder[]>;
}

/** The stores visible inside (or outside) a transaction. */
export interface StoreSession {
  requests: RequestStore;
  audit: AuditStore;
  reminders: ReminderStore;
}

/** Composite store interface. */
export interface Store extends StoreSession {
  /**
   * Run `work` as one serializable unit. If `work` rejects, none of its
   * writes are applied. Do not call the outer store's writers from inside
   * `work`; use the session passed to it.
   */
  transaction<T>(work: (tx: StoreSession) => Promise<T>): Promise<T>;
}

/** Build a paginated ListResult from items and total count. */
export function toListResult<T>(items: T[], total: number, options?: ListOptions): ListResult<T> {
  const limit = options?.limit ?? 100;
  const offset = options?.offset ?? 0;
  return {
    items,
    total,
    limit,
    offset,
    hasMore: offset + items.length < total,
  };
}
