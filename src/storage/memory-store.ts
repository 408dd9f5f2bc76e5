/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Transactions are
 * serialized through a single promise queue; each one stages its writes
 * and applies them only when its callback resolves.
 */

import { AuditLogEntry, NewAuditLogEntry } from '../domain/audit';
import { ApprovalReminder, DeploymentRequest, MutableRequestFields, RequestStatus } from '../domain/request';
import {
  Store,
  StoreSession,
  RequestStore,
  AuditStore,
  ReminderStore,
  RequestFilter,
  AuditFilter,
  ListOptions,
  ListResult,
  toListResult,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions, defaultLimit = 100): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? defaultLimit;
  return items.slice(offset, offset + limit);
}

/**
 * Callers receive copies, never the store's own objects, so mutating a
 * returned request cannot change stored state.
 */
function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

function matchesRequestFilter(request: DeploymentRequest, filter?: RequestFilter): boolean {
  if (!filter) return true;
  if (filter.status && !filter.status.includes(request.status)) return false;
  if (filter.requestType && request.requestType !== filter.requestType) return false;
  if (filter.requesterEmail && request.requester.email !== filter.requesterEmail) return false;
  if (filter.parentRequestId && request.parentRequestId !== filter.parentRequestId) return false;
  return true;
}

function matchesAuditFilter(entry: AuditLogEntry, filter: AuditFilter): boolean {
  if (filter.requestId && entry.requestId !== filter.requestId) return false;
  if (filter.actorEmail && entry.actor.email !== filter.actorEmail) return false;
  if (filter.action && entry.action !== filter.action) return false;
  if (filter.since && entry.timestamp < filter.since) return false;
  return true;
}

/** Committed state shared by all transactions. */
interface MemoryState {
  requests: Map<string, DeploymentRequest>;
  /** Insertion order of request ids, for stable oldest-first listing. */
  requestOrder: string[];
  audit: AuditLogEntry[];
  reminders: ApprovalReminder[];
  lastSequence: number;
}

/**
 * A view over committed state plus staged writes. Read-only views are
 * simply transactions that are never committed.
 */
class MemoryTransaction {
  private requestWrites = new Map<string, DeploymentRequest>();
  private newRequestIds: string[] = [];
  private auditWrites: AuditLogEntry[] = [];
  private reminderWrites: ApprovalReminder[] = [];

  constructor(private state: MemoryState) {}

  readRequest(id: string): DeploymentRequest | undefined {
    return this.requestWrites.get(id) ?? this.state.requests.get(id);
  }

  readRequests(): DeploymentRequest[] {
    const ids = [...this.state.requestOrder, ...this.newRequestIds];
    const result: DeploymentRequest[] = [];
    for (const id of ids) {
      const request = this.readRequest(id);
      if (request) result.push(request);
    }
    return result;
  }

  writeRequest(request: DeploymentRequest): void {
    if (!this.readRequest(request.id)) {
      this.newRequestIds.push(request.id);
    }
    this.requestWrites.set(request.id, deepCopy(request));
  }

  readAudit(): AuditLogEntry[] {
    return [...this.state.audit, ...this.auditWrites];
  }

  appendAudit(entry: NewAuditLogEntry): AuditLogEntry {
    const stored: AuditLogEntry = {
      ...deepCopy(entry),
      sequence: this.state.lastSequence + this.auditWrites.length + 1,
    };
    this.auditWrites.push(stored);
    return deepCopy(stored);
  }

  readReminders(): ApprovalReminder[] {
    return [...this.state.reminders, ...this.reminderWrites];
  }

  writeReminder(reminder: ApprovalReminder): void {
    this.reminderWrites.push(deepCopy(reminder));
  }

  commit(): void {
    for (const [id, request] of this.requestWrites) {
      this.state.requests.set(id, request);
    }
    this.state.requestOrder.push(...this.newRequestIds);
    this.state.audit.push(...this.auditWrites);
    this.state.lastSequence += this.auditWrites.length;
    this.state.reminders.push(...this.reminderWrites);
  }

  session(): StoreSession {
    return {
      requests: new MemoryRequestStore(this),
      audit: new MemoryAuditStore(this),
      reminders: new MemoryReminderStore(this),
    };
  }
}

class MemoryRequestStore implements RequestStore {
  constructor(private tx: MemoryTransaction) {}

  async create(request: DeploymentRequest): Promise<DeploymentRequest> {
    if (this.tx.readRequest(request.id)) {
      throw new Error(`Request already exists: ${request.id}`);
    }
    this.tx.writeRequest(request);
    return deepCopy(request);
  }

  async getById(id: string): Promise<DeploymentRequest | null> {
    const request = this.tx.readRequest(id);
    return request ? deepCopy(request) : null;
  }

  async updateIfStatus(
    id: string,
    expectedStatus: RequestStatus,
    updates: Partial<MutableRequestFields>,
  ): Promise<DeploymentRequest | null> {
    const existing = this.tx.readRequest(id);
    if (!existing || existing.status !== expectedStatus) return null;
    return this.apply(existing, updates);
  }

  async update(
    id: string,
    updates: Partial<Omit<MutableRequestFields, 'status'>>,
  ): Promise<DeploymentRequest | null> {
    const existing = this.tx.readRequest(id);
    if (!existing) return null;
    return this.apply(existing, updates);
  }

  async list(filter?: RequestFilter, options?: ListOptions): Promise<DeploymentRequest[]> {
    const items = this.tx.readRequests().filter((r) => matchesRequestFilter(r, filter));
    return applyListOptions(items.map(deepCopy), options, items.length);
  }

  private apply(existing: DeploymentRequest, updates: Partial<MutableRequestFields>): DeploymentRequest {
    const updated: DeploymentRequest = {
      ...deepCopy(existing),
      ...deepCopy(updates),
      updatedAt: updates.updatedAt ?? new Date().toISOString(),
    };
    this.tx.writeRequest(updated);
    return deepCopy(updated);
  }
}

class MemoryAuditStore implements AuditStore {
  constructor(private tx: MemoryTransaction) {}

  async append(entry: NewAuditLogEntry): Promise<AuditLogEntry> {
    return this.tx.appendAudit(entry);
  }

  async listByRequest(requestId: string): Promise<AuditLogEntry[]> {
    return this.tx
      .readAudit()
      .filter((e) => e.requestId === requestId)
      .sort((a, b) => a.sequence - b.sequence)
      .map(deepCopy);
  }

  async query(filter: AuditFilter, options?: ListOptions): Promise<ListResult<AuditLogEntry>> {
    const matching = this.tx
      .readAudit()
      .filter((e) => matchesAuditFilter(e, filter))
      .sort((a, b) => b.sequence - a.sequence);
    return toListResult(applyListOptions(matching, options).map(deepCopy), matching.length, options);
  }
}

class MemoryReminderStore implements ReminderStore {
  constructor(private tx: MemoryTransaction) {}

  async create(reminder: ApprovalReminder): Promise<ApprovalReminder> {
    this.tx.writeReminder(reminder);
    return deepCopy(reminder);
  }

  async listByRequest(requestId: string): Promise<ApprovalReminder[]> {
    return this.tx
      .readReminders()
      .filter((r) => r.requestId === requestId)
      .map(deepCopy);
  }
}

/** In-memory store with serializable transactions. */
export class MemoryStore implements Store {
  readonly requests: RequestStore;
  readonly audit: AuditStore;
  readonly reminders: ReminderStore;

  private state: MemoryState = {
    requests: new Map(),
    requestOrder: [],
    audit: [],
    reminders: [],
    lastSequence: 0,
  };
  private queue: Promise<void> = Promise.resolve();

  constructor() {
    // Outside a transaction, reads see committed state and each write
    // commits on its own.
    this.requests = {
      create: (request) => this.transaction((tx) => tx.requests.create(request)),
      getById: (id) => this.read().requests.getById(id),
      updateIfStatus: (id, expected, updates) =>
        this.transaction((tx) => tx.requests.updateIfStatus(id, expected, updates)),
      update: (id, updates) => this.transaction((tx) => tx.requests.update(id, updates)),
      list: (filter, options) => this.read().requests.list(filter, options),
    };
    this.audit = {
      append: (entry) => this.transaction((tx) => tx.audit.append(entry)),
      listByRequest: (requestId) => this.read().audit.listByRequest(requestId),
      query: (filter, options) => this.read().audit.query(filter, options),
    };
    this.reminders = {
      create: (reminder) => this.transaction((tx) => tx.reminders.create(reminder)),
      listByRequest: (requestId) => this.read().reminders.listByRequest(requestId),
    };
  }

  async transaction<T>(work: (tx: StoreSession) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const tx = new MemoryTransaction(this.state);
      const result = await work(tx.session());
      tx.commit();
      return result;
    });
    // A failed transaction must not block the ones queued behind it.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private read(): StoreSession {
    return new MemoryTransaction(this.state).session();
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return new MemoryStore();
}
