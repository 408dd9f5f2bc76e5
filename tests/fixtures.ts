import { CatalogEntry, PipelineTarget, StaticCatalog } from '../src/domain/catalog';
import { LifecycleError, TypedError } from '../src/domain/errors';
import { Actor } from '../src/domain/rbac';
import { CreateRequestInput, DeploymentRequest, RequestStatus, RequestType } from '../src/domain/request';
import { PipelineClient, PipelineRunRef, PipelineRunStatus } from '../src/pipeline/client';
import { NotificationKind, NotificationPayload, Notifier } from '../src/notifications/notifier';
import { NotificationDispatcher } from '../src/notifications/dispatcher';
import { RequestLifecycleEngine } from '../src/engine/lifecycle-engine';
import { createMemoryStore } from '../src/storage/memory-store';
import { Store } from '../src/storage/store';
import { LogEntry, resetLogHandler, setLogHandler } from '../src/logger';

export const APPROVER: Actor = { email: 'approver@example.com', name: 'Avery Approver', isApprover: true };
export const REQUESTER: Actor = { email: 'requester@example.com', name: 'Riley Requester', isApprover: false };
export const OTHER_REQUESTER: Actor = { email: 'other@example.com', name: 'Other Person', isApprover: false };

export const WEB_APP: CatalogEntry = {
  id: 'web-app',
  name: 'Web App',
  parameterSchema: [{ name: 'size', label: 'Size', type: 'select', required: true, options: ['small', 'large'] }],
  pipelineTarget: { project: 'infra', pipelineId: 7, branch: 'main', moduleName: 'web-app' },
};

export const NO_PIPELINE: CatalogEntry = {
  id: 'no-pipeline',
  name: 'Manual Template',
  parameterSchema: [],
  pipelineTarget: null,
};

/** Pipeline client that records calls and can be told to fail. */
export class FakePipelineClient implements PipelineClient {
  triggers: Array<{ target: PipelineTarget; parameters: Record<string, string> }> = [];
  polls: string[] = [];
  failTrigger = false;
  nextStatus: PipelineRunStatus = { state: 'in-progress' };
  private counter = 0;
  private held: { entered: () => void; released: Promise<void> } | null = null;

  /** Make the next trigger call wait until `release` is called. */
  holdNextTrigger(): { entered: Promise<void>; release: () => void } {
    let release = (): void => undefined;
    let signalEntered = (): void => undefined;
    const entered = new Promise<void>((resolve) => {
      signalEntered = () => resolve();
    });
    const released = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    this.held = { entered: signalEntered, released };
    return { entered, release: () => release() };
  }

  async trigger(target: PipelineTarget, parameters: Record<string, string>): Promise<PipelineRunRef> {
    this.triggers.push({ target, parameters });
    const held = this.held;
    if (held) {
      this.held = null;
      held.entered();
      await held.released;
    }
    if (this.failTrigger) {
      throw new Error('pipeline unavailable');
    }
    this.counter += 1;
    return { buildId: `build-${this.counter}`, url: `https://pipelines.example.com/build-${this.counter}` };
  }

  async pollStatus(_target: PipelineTarget, buildId: string): Promise<PipelineRunStatus> {
    this.polls.push(buildId);
    return this.nextStatus;
  }
}

/** Notifier that records every message it is asked to send. */
export class RecordingNotifier implements Notifier {
  sent: Array<{ kind: NotificationKind; payload: NotificationPayload }> = [];

  constructor(readonly channel: string = 'email') {}

  async send(kind: NotificationKind, payload: NotificationPayload): Promise<void> {
    this.sent.push({ kind, payload });
  }

  kinds(): NotificationKind[] {
    return this.sent.map((s) => s.kind);
  }
}

export class FailingNotifier implements Notifier {
  readonly channel = 'chat';
  attempts = 0;

  async send(): Promise<void> {
    this.attempts += 1;
    throw new Error('webhook down');
  }
}

export interface EngineHarness {
  engine: RequestLifecycleEngine;
  store: Store;
  pipeline: FakePipelineClient;
  notifier: RecordingNotifier;
  dispatcher: NotificationDispatcher;
  now: { value: Date };
}

export function createHarness(options: { store?: Store; notifiers?: Notifier[] } = {}): EngineHarness {
  const store = options.store ?? createMemoryStore();
  const pipeline = new FakePipelineClient();
  const notifier = new RecordingNotifier();
  const dispatcher = new NotificationDispatcher([notifier, ...(options.notifiers ?? [])]);
  const now = { value: new Date('2026-03-02T09:00:00.000Z') };
  const engine = new RequestLifecycleEngine({
    store,
    catalog: new StaticCatalog([WEB_APP, NO_PIPELINE]),
    pipeline,
    dispatcher,
    clock: () => now.value,
    config: {
      approverEmails: [APPROVER.email],
      portalBaseUrl: 'https://portal.example.com',
      reminderCooldownHours: 4,
    },
  });
  return { engine, store, pipeline, notifier, dispatcher, now };
}

export function deployInput(overrides: Partial<CreateRequestInput> = {}): CreateRequestInput {
  return {
    catalogItemId: WEB_APP.id,
    requester: { email: REQUESTER.email, name: REQUESTER.name },
    requestType: RequestType.Deploy,
    parameters: { size: 'small', app_name: 'shop' },
    ...overrides,
  };
}

/** Create a deploy request and drive it to completed. */
export async function completedDeploy(
  engine: RequestLifecycleEngine,
  overrides: Partial<CreateRequestInput> = {},
): Promise<DeploymentRequest> {
  const created = await engine.createRequest(deployInput(overrides));
  await engine.approve(created.id, APPROVER);
  return engine.recordPipelineResult(created.id, true, 'apply complete');
}

/** Capture log entries for the duration of a test. */
export function captureLogs(): { entries: LogEntry[]; restore: () => void } {
  const entries: LogEntry[] = [];
  setLogHandler((entry) => entries.push(entry));
  return { entries, restore: resetLogHandler };
}

/** Await a promise expected to reject with a LifecycleError and return its typed error. */
export async function lifecycleErrorOf(promise: Promise<unknown>): Promise<TypedError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof LifecycleError) return err.typedError;
    throw err;
  }
  throw new Error('Expected the operation to fail');
}

export function notificationPayload(overrides: Partial<NotificationPayload> = {}): NotificationPayload {
  return {
    requestId: 'req_1',
    requestType: RequestType.Deploy,
    status: RequestStatus.PendingApproval,
    catalogItemId: WEB_APP.id,
    templateName: WEB_APP.name,
    requester: { email: REQUESTER.email, name: REQUESTER.name },
    recipients: [APPROVER.email],
    parameters: { size: 'small' },
    detailsUrl: 'https://portal.example.com/requests/req_1',
    ...overrides,
  };
}
