/**
 * Request Life-Cycle Engine: owns the DeploymentRequest aggregate.
 *
 * Every transition is one store transaction: the guard runs against the
 * snapshot being mutated, the status write is compare-and-set, and the
 * audit entry commits with it. Pipeline calls and notifications happen
 * only after commit and never throw past the engine.
 */

import { v4 as uuid } from 'uuid';
import { AuditLogEntry, RequestProvenance } from '../domain/audit';
import { CatalogEntry, CatalogLookup } from '../domain/catalog';
import {
  LifecycleError,
  TypedError,
  durabilityError,
  invalidStateError,
  pipelineTargetUnresolvedError,
  pipelineTriggerError,
  requestNotFoundError,
  validationError,
} from '../domain/errors';
import { Actor, SYSTEM_ACTOR } from '../domain/rbac';
import {
  ApprovalReminder,
  CreateRequestInput,
  DeploymentRequest,
  IN_FLIGHT_STATUSES,
  ReminderChannel,
  RequestStatus,
  RequestTags,
  RequestType,
  ResourceHealth,
  parseResourceHealth,
} from '../domain/request';
import { AuditService } from '../audit/audit-service';
import { PipelineClient, PipelineRunRef, PipelineRunStatus } from '../pipeline/client';
import { NotificationDispatcher } from '../notifications/dispatcher';
import { NotificationComposer, PayloadExtras } from '../notifications/compose';
import { NotificationKind } from '../notifications/notifier';
import { Store, StoreSession } from '../storage/store';
import { errorContext, logger } from '../logger';
import {
  DerivativeIntent,
  guardDecision,
  guardDerivative,
  guardHealth,
  guardPipelineResult,
  guardRetrigger,
} from './guards';

/** Engine configuration. */
export interface EngineConfig {
  /** Parameter that holds a deployment's size. */
  sizeParameter: string;
  /** Minimum gap between two reminders for the same pending request. */
  reminderCooldownHours: number;
  approverEmails: string[];
  /** Base URL for links in notifications. */
  portalBaseUrl: string;
}

const DEFAULT_CONFIG: EngineConfig = {
  sizeParameter: 'size',
  reminderCooldownHours: 4,
  approverEmails: [],
  portalBaseUrl: 'http://localhost:5000',
};

export interface EngineDeps {
  store: Store;
  catalog: CatalogLookup;
  pipeline: PipelineClient;
  dispatcher?: NotificationDispatcher;
  auditService?: AuditService;
  config?: Partial<EngineConfig>;
  clock?: () => Date;
}

/** Per-call context supplied by the calling surface. */
export interface OperationContext {
  provenance?: RequestProvenance;
}

/** Result of a pipeline trigger attempt. A failed attempt leaves the request approved. */
export interface TriggerOutcome {
  request: DeploymentRequest;
  triggered: boolean;
  error?: TypedError;
}

/** Result of one reconciliation poll. */
export interface ReconcileOutcome {
  request: DeploymentRequest;
  runStatus?: PipelineRunStatus;
  error?: TypedError;
}

/** Result of markExpirationWarned. `changed` is false on repeat calls. */
export interface ExpirationMarkOutcome {
  request: DeploymentRequest;
  changed: boolean;
}

const HOUR_MS = 60 * 60 * 1000;

const log = logger.child({ module: 'lifecycle-engine' });

function fail(error: TypedError): never {
  throw new LifecycleError(error);
}

export class RequestLifecycleEngine {
  private store: Store;
  private catalog: CatalogLookup;
  private pipeline: PipelineClient;
  private dispatcher: NotificationDispatcher;
  private audit: AuditService;
  private composer: NotificationComposer;
  private config: EngineConfig;
  private clock: () => Date;

  constructor(deps: EngineDeps) {
    this.store = deps.store;
    this.catalog = deps.catalog;
    this.pipeline = deps.pipeline;
    this.dispatcher = deps.dispatcher ?? new NotificationDispatcher();
    this.clock = deps.clock ?? (() => new Date());
    this.audit = deps.auditService ?? new AuditService(deps.store, this.clock);
    this.config = { ...DEFAULT_CONFIG, ...deps.config };
    this.composer = new NotificationComposer(deps.catalog, {
      portalBaseUrl: this.config.portalBaseUrl,
      approverEmails: this.config.approverEmails,
    });
  }

  // ─── Creation ────────────────────────────────────────────────────────────

  /** Create a request of any type. Destroy and scale go through the lineage guards. */
  async createRequest(input: CreateRequestInput, context: OperationContext = {}): Promise<DeploymentRequest> {
    if (!input.catalogItemId?.trim()) {
      fail(validationError('catalogItemId is required'));
    }
    if (!input.requester?.email?.trim()) {
      fail(validationError('requester email is required'));
    }
    if (input.expiresAt !== undefined && Number.isNaN(Date.parse(input.expiresAt))) {
      fail(validationError(`expiresAt is not a valid timestamp: "${input.expiresAt}"`));
    }

    const requester: Actor = { ...input.requester, isApprover: false };

    switch (input.requestType) {
      case RequestType.Deploy:
        if (input.parentRequestId) {
          fail(validationError('A deploy request cannot have a parent request'));
        }
        return this.createDeploy(input, context);
      case RequestType.Destroy:
        if (!input.parentRequestId) {
          fail(validationError('A destroy request needs parentRequestId'));
        }
        return this.requestDestroy(input.parentRequestId, requester, input.reason, context);
      case RequestType.Scale: {
        if (!input.parentRequestId) {
          fail(validationError('A scale request needs parentRequestId'));
        }
        const newSize = input.newSize ?? input.parameters[this.config.sizeParameter];
        if (newSize === undefined) {
          fail(validationError('A scale request needs newSize'));
        }
        return this.requestScale(input.parentRequestId, requester, newSize, input.reason, context);
      }
      default:
        return fail(validationError(`Unknown request type "${String(input.requestType)}"`));
    }
  }

  /** Open a destroy request against a completed deployment owned by `requester`. */
  async requestDestroy(
    parentRequestId: string,
    requester: Actor,
    reason?: string,
    context: OperationContext = {},
  ): Promise<DeploymentRequest> {
    return this.createDerivative(parentRequestId, requester, { type: RequestType.Destroy }, reason, context);
  }

  /** Open a scale request. `newSize` must differ from the lineage's current size. */
  async requestScale(
    parentRequestId: string,
    requester: Actor,
    newSize: string,
    reason?: string,
    context: OperationContext = {},
  ): Promise<DeploymentRequest> {
    return this.createDerivative(
      parentRequestId,
      requester,
      // currentSize is resolved inside the transaction
      { type: RequestType.Scale, newSize, currentSize: null },
      reason,
      context,
    );
  }

  // ─── Approval gate ───────────────────────────────────────────────────────

  /**
   * Approve a pending request, then attempt the pipeline trigger once.
   * A trigger failure is logged and leaves the request approved.
   */
  async approve(requestId: string, actor: Actor, context: OperationContext = {}): Promise<DeploymentRequest> {
    const approved = await this.commit(requestId, 'approve', async (tx) => {
      const current = await this.load(tx, requestId);
      const blocked = guardDecision(current, actor, { event: 'approve' });
      if (blocked) fail(blocked);

      const now = this.now();
      const updated = await tx.requests.updateIfStatus(requestId, RequestStatus.PendingApproval, {
        status: RequestStatus.Approved,
        decision: { kind: 'approved', by: { email: actor.email, name: actor.name }, at: now },
        updatedAt: now,
      });
      if (!updated) fail(invalidStateError(requestId, current.status, 'approve'));

      await this.audit.record(tx, {
        actor,
        action: 'request.approved',
        requestId,
        catalogItemId: current.catalogItemId,
        details: { requestType: current.requestType },
        provenance: context.provenance,
      });
      return updated;
    });

    log.info('Request approved', { requestId, approver: actor.email });
    await this.notify('request.approved', approved, { actor });

    const outcome = await this.attemptTrigger(approved, actor, context);
    return outcome.request;
  }

  /** Reject a pending request. The reason must be non-empty. */
  async reject(
    requestId: string,
    actor: Actor,
    reason: string,
    context: OperationContext = {},
  ): Promise<DeploymentRequest> {
    const rejected = await this.commit(requestId, 'reject', async (tx) => {
      const current = await this.load(tx, requestId);
      const blocked = guardDecision(current, actor, { event: 'reject', reason });
      if (blocked) fail(blocked);

      const trimmed = reason.trim();
      const now = this.now();
      const updated = await tx.requests.updateIfStatus(requestId, RequestStatus.PendingApproval, {
        status: RequestStatus.Rejected,
        decision: {
          kind: 'rejected',
          by: { email: actor.email, name: actor.name },
          at: now,
          reason: trimmed,
        },
        updatedAt: now,
      });
      if (!updated) fail(invalidStateError(requestId, current.status, 'reject'));

      await this.audit.record(tx, {
        actor,
        action: 'request.rejected',
        requestId,
        catalogItemId: current.catalogItemId,
        details: { requestType: current.requestType, reason: trimmed },
        provenance: context.provenance,
      });
      return updated;
    });

    log.info('Request rejected', { requestId, approver: actor.email });
    await this.notify('request.rejected', rejected, { actor, reason: reason.trim() });
    return rejected;
  }

  /** Manually retry the pipeline trigger for an approved request. Approvers only. */
  async retriggerPipeline(
    requestId: string,
    actor: Actor,
    context: OperationContext = {},
  ): Promise<TriggerOutcome> {
    const request = await this.requireRequest(requestId);
    const blocked = guardRetrigger(request, actor);
    if (blocked) fail(blocked);

    log.info('Pipeline retrigger requested', { requestId, actor: actor.email });
    return this.attemptTrigger(request, actor, context);
  }

  // ─── Pipeline status ─────────────────────────────────────────────────────

  /** Record the final outcome reported by the pipeline for a deploying request. */
  async recordPipelineResult(
    requestId: string,
    success: boolean,
    diagnosticText?: string,
  ): Promise<DeploymentRequest> {
    const event = success ? 'pipeline-succeeded' : 'pipeline-failed';
    const finished = await this.commit(requestId, 'record pipeline result', async (tx) => {
      const current = await this.load(tx, requestId);
      const blocked = guardPipelineResult(current, event);
      if (blocked) fail(blocked);

      const now = this.now();
      const updated = await tx.requests.updateIfStatus(requestId, RequestStatus.Deploying, {
        status: success ? RequestStatus.Completed : RequestStatus.Failed,
        completedAt: now,
        deploymentOutput: diagnosticText,
        updatedAt: now,
      });
      if (!updated) fail(invalidStateError(requestId, current.status, event));

      const details: Record<string, unknown> = {
        requestType: current.requestType,
        buildId: current.pipelineRun?.buildId,
      };
      if (success && current.requestType === RequestType.Destroy && current.parentRequestId) {
        await tx.requests.update(current.parentRequestId, { resourcesReleasedAt: now, updatedAt: now });
        details.releasedRequestId = current.parentRequestId;
      }
      if (current.requestType === RequestType.Scale) {
        details.previousSize = current.previousSize;
        details.newSize = current.newSize;
      }
      if (!success && diagnosticText) {
        details.output = diagnosticText.slice(0, 1000);
      }

      await this.audit.record(tx, {
        actor: SYSTEM_ACTOR,
        action: success ? 'deployment.completed' : 'deployment.failed',
        requestId,
        catalogItemId: current.catalogItemId,
        details,
      });
      return updated;
    });

    log.info('Pipeline result recorded', { requestId, status: finished.status });
    await this.notify(success ? 'deployment.completed' : 'deployment.failed', finished);
    return finished;
  }

  /**
   * Poll the pipeline once for a deploying request. A completed run is
   * recorded through recordPipelineResult; a canceled run counts as failed.
   */
  async reconcilePipelineStatus(requestId: string): Promise<ReconcileOutcome> {
    const request = await this.requireRequest(requestId);
    if (request.status !== RequestStatus.Deploying || !request.pipelineRun) {
      fail(invalidStateError(requestId, request.status, 'reconcile'));
    }

    const entry = await this.catalog.getById(request.catalogItemId);
    if (!entry?.pipelineTarget) {
      const error = pipelineTargetUnresolvedError(requestId, request.catalogItemId);
      log.warn('Cannot reconcile: no pipeline target', { requestId, code: error.code });
      return { request, error };
    }

    let runStatus: PipelineRunStatus;
    try {
      runStatus = await this.pipeline.pollStatus(entry.pipelineTarget, request.pipelineRun.buildId);
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Pipeline status poll failed';
      const error = pipelineTriggerError(requestId, message);
      log.warn('Pipeline status poll failed', { requestId, ...errorContext(err) });
      return { request, error };
    }

    if (runStatus.state !== 'completed') {
      return { request, runStatus };
    }

    const result = runStatus.result ?? 'failed';
    const finished = await this.recordPipelineResult(
      requestId,
      result === 'succeeded',
      `Pipeline run ${request.pipelineRun.buildId} finished: ${result}`,
    );
    return { request: finished, runStatus };
  }

  // ─── Expiration & health ─────────────────────────────────────────────────

  /** Flip the expiration warning flag. Repeat calls change nothing. */
  async markExpirationWarned(requestId: string): Promise<ExpirationMarkOutcome> {
    return this.commit(requestId, 'mark expiration warned', async (tx) => {
      const current = await this.load(tx, requestId);
      if (current.expirationWarningSent) {
        return { request: current, changed: false };
      }
      const updated = await tx.requests.update(requestId, { expirationWarningSent: true, updatedAt: this.now() });
      if (!updated) fail(requestNotFoundError(requestId));
      return { request: updated, changed: true };
    });
  }

  /** Overwrite the health of a completed request's resources. Never touches status. */
  async recordHealth(
    requestId: string,
    health: string,
    details?: Record<string, unknown>,
  ): Promise<DeploymentRequest> {
    return this.commit(requestId, 'record health', async (tx) => {
      const current = await this.load(tx, requestId);
      const blocked = guardHealth(current, health);
      if (blocked) fail(blocked);

      const now = this.now();
      const updated = await tx.requests.update(requestId, {
        resourceHealth: parseResourceHealth(health) ?? ResourceHealth.Unknown,
        healthCheckedAt: now,
        healthDetails: details,
        updatedAt: now,
      });
      if (!updated) fail(requestNotFoundError(requestId));
      return updated;
    });
  }

  /** Record that a reminder went out for a request. */
  async recordReminder(requestId: string, channel: ReminderChannel): Promise<ApprovalReminder> {
    return this.commit(requestId, 'record reminder', async (tx) => {
      await this.load(tx, requestId);
      return tx.reminders.create({
        id: `rem_${uuid()}`,
        requestId,
        channel,
        sentAt: this.now(),
      });
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────────

  async getRequest(requestId: string): Promise<DeploymentRequest> {
    return this.requireRequest(requestId);
  }

  async getAuditTrail(requestId: string): Promise<AuditLogEntry[]> {
    await this.requireRequest(requestId);
    return this.audit.trail(requestId);
  }

  /** Requests awaiting a decision, oldest first. */
  async listPendingApprovals(): Promise<DeploymentRequest[]> {
    return this.store.requests.list({ status: [RequestStatus.PendingApproval] });
  }

  /** Completed deployments whose resources have not been released. */
  async listActiveDeployments(requesterEmail?: string): Promise<DeploymentRequest[]> {
    const completed = await this.store.requests.list({
      status: [RequestStatus.Completed],
      requestType: RequestType.Deploy,
    });
    const email = requesterEmail?.toLowerCase();
    return completed.filter(
      (r) => !r.resourcesReleasedAt && (!email || r.requester.email.toLowerCase() === email),
    );
  }

  /** Active deployments expiring within the window that have not been warned. */
  async listExpiringDeployments(withinMs: number, now: Date = this.clock()): Promise<DeploymentRequest[]> {
    const horizon = now.getTime() + withinMs;
    const active = await this.listActiveDeployments();
    return active.filter(
      (r) => r.expiresAt !== undefined && !r.expirationWarningSent && Date.parse(r.expiresAt) <= horizon,
    );
  }

  /**
   * Current size of a lineage: `newSize` of the most recently completed
   * scale request, else the root deploy's size parameter. Accepts the root
   * or any request in its lineage.
   */
  async resolveCurrentSize(requestId: string): Promise<string | null> {
    const request = await this.requireRequest(requestId);
    const rootId = request.parentRequestId ?? request.id;
    const root = request.parentRequestId ? await this.requireRequest(rootId) : request;
    return this.currentSize(this.store, root);
  }

  /** Whether a pending request is due another approval reminder at `now`. */
  async isReminderDue(requestId: string, now: Date = this.clock()): Promise<boolean> {
    const request = await this.requireRequest(requestId);
    if (request.status !== RequestStatus.PendingApproval) return false;

    const reminders = await this.store.reminders.listByRequest(requestId);
    const last = reminders.reduce<string | null>(
      (latest, r) => (latest === null || r.sentAt > latest ? r.sentAt : latest),
      null,
    );
    const since = Date.parse(last ?? request.createdAt);
    return now.getTime() - since >= this.config.reminderCooldownHours * HOUR_MS;
  }

  // ─── Internals ───────────────────────────────────────────────────────────

  private async createDeploy(input: CreateRequestInput, context: OperationContext): Promise<DeploymentRequest> {
    const record = this.newRecord({
      requestType: RequestType.Deploy,
      catalogItemId: input.catalogItemId,
      parameters: { ...input.parameters },
      requester: { email: input.requester.email, name: input.requester.name },
      tags: { ...input.tags },
      expiresAt: input.expiresAt,
    });

    const created = await this.commit(record.id, 'create request', async (tx) => {
      const stored = await tx.requests.create(record);
      await this.audit.record(tx, {
        actor: record.requester,
        action: 'request.created',
        requestId: record.id,
        catalogItemId: record.catalogItemId,
        details: { requestType: record.requestType, parameters: record.parameters },
        provenance: context.provenance,
      });
      return stored;
    });

    log.info('Request created', { requestId: created.id, catalogItemId: created.catalogItemId });
    await this.notify('approval.requested', created);
    return created;
  }

  private async createDerivative(
    parentRequestId: string,
    requester: Actor,
    intent: DerivativeIntent,
    reason: string | undefined,
    context: OperationContext,
  ): Promise<DeploymentRequest> {
    const operation = intent.type === RequestType.Destroy ? 'request destroy' : 'request scale';
    const created = await this.commit(parentRequestId, operation, async (tx) => {
      const parent = await this.load(tx, parentRequestId);
      const open = await tx.requests.list({ parentRequestId, status: [...IN_FLIGHT_STATUSES] });
      const currentSize = await this.currentSize(tx, parent);
      const resolved: DerivativeIntent =
        intent.type === RequestType.Scale ? { ...intent, currentSize } : intent;

      const blocked = guardDerivative(parent, requester, open, resolved);
      if (blocked) fail(blocked);

      const parameters = { ...parent.parameters };
      if (currentSize !== null) parameters[this.config.sizeParameter] = currentSize;
      if (resolved.type === RequestType.Scale) parameters[this.config.sizeParameter] = resolved.newSize;

      const trimmedReason = reason?.trim() || undefined;
      const record = this.newRecord({
        requestType: resolved.type,
        catalogItemId: parent.catalogItemId,
        parameters,
        requester: { email: requester.email, name: requester.name },
        tags: { ...parent.tags },
        parentRequestId,
        reason: trimmedReason,
        previousSize: resolved.type === RequestType.Scale ? currentSize ?? undefined : undefined,
        newSize: resolved.type === RequestType.Scale ? resolved.newSize : undefined,
      });

      const stored = await tx.requests.create(record);
      await this.audit.record(tx, {
        actor: requester,
        action: resolved.type === RequestType.Destroy ? 'destroy.requested' : 'scale.requested',
        requestId: record.id,
        catalogItemId: record.catalogItemId,
        details:
          resolved.type === RequestType.Destroy
            ? { originalRequestId: parentRequestId, reason: trimmedReason }
            : {
                originalRequestId: parentRequestId,
                previousSize: record.previousSize,
                newSize: record.newSize,
                reason: trimmedReason,
              },
        provenance: context.provenance,
      });
      return stored;
    });

    log.info('Derivative request created', {
      requestId: created.id,
      requestType: created.requestType,
      parentRequestId,
    });
    await this.notify('approval.requested', created);
    return created;
  }

  /**
   * Resolve the pipeline target and trigger once. On success a second
   * transaction moves approved -> deploying and records the run. Nothing
   * here throws: the approval has already committed when this runs.
   */
  private async attemptTrigger(
    request: DeploymentRequest,
    actor: Actor,
    context: OperationContext,
  ): Promise<TriggerOutcome> {
    let entry: CatalogEntry | null;
    try {
      entry = await this.catalog.getById(request.catalogItemId);
    } catch (err) {
      const error = pipelineTriggerError(request.id, err instanceof Error ? err.message : 'Catalog lookup failed');
      log.warn('Pipeline trigger skipped: catalog lookup failed', { requestId: request.id, ...errorContext(err) });
      return { request, triggered: false, error };
    }

    if (!entry?.pipelineTarget) {
      const error = pipelineTargetUnresolvedError(request.id, request.catalogItemId);
      log.warn('Pipeline trigger skipped: no pipeline target', {
        requestId: request.id,
        catalogItemId: request.catalogItemId,
      });
      return { request, triggered: false, error };
    }

    let run: PipelineRunRef;
    try {
      run = await this.pipeline.trigger(entry.pipelineTarget, {
        ...request.parameters,
        request_type: request.requestType,
        request_id: request.id,
      });
    } catch (err) {
      const error = pipelineTriggerError(request.id, err instanceof Error ? err.message : 'Pipeline trigger failed');
      log.warn('Pipeline trigger failed; request stays approved', {
        requestId: request.id,
        ...errorContext(err),
      });
      return { request, triggered: false, error };
    }

    let started: DeploymentRequest;
    try {
      started = await this.commit(request.id, 'record pipeline run', async (tx) => {
        const current = await this.load(tx, request.id);
        const blocked = guardPipelineResult(current, 'trigger-succeeded');
        if (blocked) fail(blocked);

        const now = this.now();
        const updated = await tx.requests.updateIfStatus(request.id, RequestStatus.Approved, {
          status: RequestStatus.Deploying,
          pipelineRun: { buildId: run.buildId, url: run.url, triggeredAt: now },
          updatedAt: now,
        });
        if (!updated) fail(invalidStateError(request.id, current.status, 'trigger-succeeded'));

        await this.audit.record(tx, {
          actor,
          action: 'deployment.started',
          requestId: request.id,
          catalogItemId: current.catalogItemId,
          details: { requestType: current.requestType, buildId: run.buildId, pipelineUrl: run.url },
          provenance: context.provenance,
        });
        return updated;
      });
    } catch (err) {
      if (!(err instanceof LifecycleError)) throw err;
      // The run exists in the pipeline but not on the record; keep its id for reconciliation.
      log.warn('Pipeline run started but not recorded', {
        requestId: request.id,
        buildId: run.buildId,
        url: run.url,
        code: err.typedError.code,
      });
      return { request: await this.reread(request), triggered: false, error: err.typedError };
    }

    log.info('Pipeline triggered', { requestId: request.id, buildId: run.buildId });
    await this.notify('deployment.started', started, { pipelineUrl: run.url });
    return { request: started, triggered: true };
  }

  private async currentSize(session: StoreSession, root: DeploymentRequest): Promise<string | null> {
    const scales = await session.requests.list({
      parentRequestId: root.id,
      requestType: RequestType.Scale,
      status: [RequestStatus.Completed],
    });
    // Oldest-first listing: on equal completedAt the later entry wins.
    let latest: DeploymentRequest | null = null;
    for (const scale of scales) {
      if (latest === null || (scale.completedAt ?? '') >= (latest.completedAt ?? '')) {
        latest = scale;
      }
    }
    return latest?.newSize ?? root.parameters[this.config.sizeParameter] ?? null;
  }

  private newRecord(fields: {
    requestType: RequestType;
    catalogItemId: string;
    parameters: Record<string, string>;
    requester: { email: string; name: string };
    tags: RequestTags;
    parentRequestId?: string;
    reason?: string;
    previousSize?: string;
    newSize?: string;
    expiresAt?: string;
  }): DeploymentRequest {
    const now = this.now();
    return {
      id: `req_${uuid()}`,
      ...fields,
      status: RequestStatus.PendingApproval,
      decision: null,
      pipelineRun: null,
      expirationWarningSent: false,
      resourceHealth: ResourceHealth.Unknown,
      createdAt: now,
      updatedAt: now,
    };
  }

  private async load(session: StoreSession, requestId: string): Promise<DeploymentRequest> {
    const request = await session.requests.getById(requestId);
    if (!request) fail(requestNotFoundError(requestId));
    return request;
  }

  private async requireRequest(requestId: string): Promise<DeploymentRequest> {
    return this.load(this.store, requestId);
  }

  /** The stored record, or `fallback` when it cannot be read. */
  private async reread(fallback: DeploymentRequest): Promise<DeploymentRequest> {
    try {
      return (await this.store.requests.getById(fallback.id)) ?? fallback;
    } catch (err) {
      log.warn('Request re-read failed', { requestId: fallback.id, ...errorContext(err) });
      return fallback;
    }
  }

  /**
   * Run `work` as one transaction. Anything other than a LifecycleError
   * means the write did not commit and surfaces as SYSTEM.DURABILITY.
   */
  private async commit<T>(
    requestId: string,
    operation: string,
    work: (tx: StoreSession) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.store.transaction(work);
    } catch (err) {
      if (err instanceof LifecycleError) throw err;
      log.error('Transition did not commit', { requestId, operation, ...errorContext(err) });
      const message = err instanceof Error ? err.message : String(err);
      throw new LifecycleError(durabilityError(`${operation} did not commit: ${message}`, requestId));
    }
  }

  /** Best-effort: composing or delivering a message never fails the operation. */
  private async notify(kind: NotificationKind, request: DeploymentRequest, extras?: PayloadExtras): Promise<void> {
    try {
      const payload = await this.composer.compose(kind, request, extras);
      await this.dispatcher.dispatch(kind, payload);
    } catch (err) {
      log.warn('Notification skipped', { kind, requestId: request.id, ...errorContext(err) });
    }
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
