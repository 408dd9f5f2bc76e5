import { RequestStatus, RequestType, ResourceHealth } from '../../src/domain/request';
import { createMemoryStore } from '../../src/storage/memory-store';
import { LogLevel } from '../../src/logger';
import { Store, StoreSession } from '../../src/storage/store';
import {
  APPROVER,
  FailingNotifier,
  NO_PIPELINE,
  OTHER_REQUESTER,
  REQUESTER,
  captureLogs,
  completedDeploy,
  createHarness,
  deployInput,
  lifecycleErrorOf,
} from '../fixtures';

const T0 = '2026-03-02T09:00:00.000Z';

/**
 * Store whose audit appends fail inside transactions while `failAudit` is
 * set, or for the one action named by `failAction`.
 */
class FlakyAuditStore implements Store {
  failAudit = false;
  failAction: string | null = null;
  private inner = createMemoryStore();

  get requests() {
    return this.inner.requests;
  }
  get audit() {
    return this.inner.audit;
  }
  get reminders() {
    return this.inner.reminders;
  }

  transaction<T>(work: (tx: StoreSession) => Promise<T>): Promise<T> {
    return this.inner.transaction((tx) =>
      work({
        ...tx,
        audit: {
          append: async (entry) => {
            if (this.failAudit || entry.action === this.failAction) throw new Error('audit volume full');
            return tx.audit.append(entry);
          },
          listByRequest: (requestId) => tx.audit.listByRequest(requestId),
          query: (filter, options) => tx.audit.query(filter, options),
        },
      }),
    );
  }
}

describe('RequestLifecycleEngine', () => {
  let logs: ReturnType<typeof captureLogs>;

  beforeEach(() => {
    logs = captureLogs();
  });

  afterEach(() => {
    logs.restore();
  });

  describe('createRequest', () => {
    test('creates a pending deploy request with an audit entry', async () => {
      const { engine } = createHarness();
      const request = await engine.createRequest(deployInput({ tags: { costCenter: 'CC-100' } }));

      expect(request.id).toMatch(/^req_/);
      expect(request.status).toBe(RequestStatus.PendingApproval);
      expect(request.requestType).toBe(RequestType.Deploy);
      expect(request.decision).toBeNull();
      expect(request.pipelineRun).toBeNull();
      expect(request.resourceHealth).toBe(ResourceHealth.Unknown);
      expect(request.expirationWarningSent).toBe(false);
      expect(request.tags).toEqual({ costCenter: 'CC-100' });

      const trail = await engine.getAuditTrail(request.id);
      expect(trail.map((e) => e.action)).toEqual(['request.created']);
      expect(trail[0].actor).toEqual({ email: REQUESTER.email, name: REQUESTER.name });
      expect(trail[0].details).toEqual({
        requestType: 'deploy',
        parameters: { size: 'small', app_name: 'shop' },
      });
    });

    test('notifies approvers that a decision is needed', async () => {
      const { engine, notifier } = createHarness();
      const request = await engine.createRequest(deployInput());

      expect(notifier.sent).toHaveLength(1);
      const { kind, payload } = notifier.sent[0];
      expect(kind).toBe('approval.requested');
      expect(payload.recipients).toEqual([APPROVER.email]);
      expect(payload.templateName).toBe('Web App');
      expect(payload.detailsUrl).toBe(`https://portal.example.com/requests/${request.id}`);
    });

    test('refuses a deploy request with a parent', async () => {
      const { engine, store } = createHarness();
      const error = await lifecycleErrorOf(engine.createRequest(deployInput({ parentRequestId: 'req_x' })));
      expect(error.code).toBe('VALIDATION.SCHEMA');
      expect(await store.requests.list()).toHaveLength(0);
    });

    test('refuses a destroy request without a parent', async () => {
      const { engine } = createHarness();
      const error = await lifecycleErrorOf(
        engine.createRequest(deployInput({ requestType: RequestType.Destroy })),
      );
      expect(error.code).toBe('VALIDATION.SCHEMA');
    });

    test('refuses an unparseable expiry', async () => {
      const { engine } = createHarness();
      const error = await lifecycleErrorOf(engine.createRequest(deployInput({ expiresAt: 'next tuesday' })));
      expect(error.code).toBe('VALIDATION.SCHEMA');
    });

    test('routes a scale request through the lineage guards, taking the size parameter as newSize', async () => {
      const { engine } = createHarness();
      const parent = await completedDeploy(engine);

      const scale = await engine.createRequest(
        deployInput({
          requestType: RequestType.Scale,
          parentRequestId: parent.id,
          parameters: { size: 'large' },
        }),
      );

      expect(scale.requestType).toBe(RequestType.Scale);
      expect(scale.previousSize).toBe('small');
      expect(scale.newSize).toBe('large');
    });
  });

  describe('approval gate', () => {
    test('approve records the decision and triggers the pipeline', async () => {
      const { engine, pipeline } = createHarness();
      const created = await engine.createRequest(deployInput());

      const result = await engine.approve(created.id, APPROVER);

      expect(result.status).toBe(RequestStatus.Deploying);
      expect(result.decision).toEqual({
        kind: 'approved',
        by: { email: APPROVER.email, name: APPROVER.name },
        at: T0,
      });
      expect(result.pipelineRun).toEqual({
        buildId: 'build-1',
        url: 'https://pipelines.example.com/build-1',
        triggeredAt: T0,
      });
      expect(pipeline.triggers).toHaveLength(1);
      expect(pipeline.triggers[0].target.pipelineId).toBe(7);
      expect(pipeline.triggers[0].parameters).toEqual({
        size: 'small',
        app_name: 'shop',
        request_type: 'deploy',
        request_id: created.id,
      });

      const trail = await engine.getAuditTrail(created.id);
      expect(trail.map((e) => e.action)).toEqual(['request.created', 'request.approved', 'deployment.started']);
      expect(trail[2].details).toEqual({
        requestType: 'deploy',
        buildId: 'build-1',
        pipelineUrl: 'https://pipelines.example.com/build-1',
      });
    });

    test('a non-approver cannot approve', async () => {
      const { engine } = createHarness();
      const created = await engine.createRequest(deployInput());

      const error = await lifecycleErrorOf(engine.approve(created.id, REQUESTER));

      expect(error.code).toBe('AUTH.FORBIDDEN');
      expect((await engine.getRequest(created.id)).status).toBe(RequestStatus.PendingApproval);
    });

    test('approving twice fails cleanly without a second audit entry', async () => {
      const { engine } = createHarness();
      const created = await engine.createRequest(deployInput());
      await engine.approve(created.id, APPROVER);

      const error = await lifecycleErrorOf(engine.approve(created.id, APPROVER));

      expect(error.code).toBe('REQUEST.INVALID_STATE');
      const approvals = (await engine.getAuditTrail(created.id)).filter((e) => e.action === 'request.approved');
      expect(approvals).toHaveLength(1);
    });

    test('concurrent approvals: exactly one succeeds', async () => {
      const { engine, pipeline } = createHarness();
      const created = await engine.createRequest(deployInput());

      const results = await Promise.allSettled([
        engine.approve(created.id, APPROVER),
        engine.approve(created.id, APPROVER),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      expect(results.filter((r) => r.status === 'rejected')).toHaveLength(1);
      expect(pipeline.triggers).toHaveLength(1);
      const approvals = (await engine.getAuditTrail(created.id)).filter((e) => e.action === 'request.approved');
      expect(approvals).toHaveLength(1);
    });

    test('updatedAt follows the engine clock', async () => {
      const { engine, now } = createHarness();
      now.value = new Date('2031-01-01T00:00:00.000Z');
      const created = await engine.createRequest(deployInput());
      now.value = new Date('2031-01-01T00:05:00.000Z');

      const approved = await engine.approve(created.id, APPROVER);

      expect(created.updatedAt).toBe('2031-01-01T00:00:00.000Z');
      expect(approved.updatedAt).toBe('2031-01-01T00:05:00.000Z');
      expect(approved.updatedAt >= approved.createdAt).toBe(true);
      expect((await engine.getRequest(created.id)).updatedAt).toBe('2031-01-01T00:05:00.000Z');
    });

    describe('a refused decision leaves the record unchanged', () => {
      test('non-approver approve and reject', async () => {
        const { engine } = createHarness();
        const created = await engine.createRequest(deployInput());
        const before = await engine.getRequest(created.id);

        await lifecycleErrorOf(engine.approve(created.id, REQUESTER));
        await lifecycleErrorOf(engine.reject(created.id, REQUESTER, 'not mine to decide'));

        expect(await engine.getRequest(created.id)).toEqual(before);
      });

      test('reject with an empty reason', async () => {
        const { engine } = createHarness();
        const created = await engine.createRequest(deployInput());
        const before = await engine.getRequest(created.id);

        await lifecycleErrorOf(engine.reject(created.id, APPROVER, ''));

        expect(await engine.getRequest(created.id)).toEqual(before);
      });

      test('an already decided request', async () => {
        const { engine, now } = createHarness();
        const created = await engine.createRequest(deployInput());
        await engine.reject(created.id, APPROVER, 'duplicate');
        const before = await engine.getRequest(created.id);
        now.value = new Date('2026-03-02T10:00:00.000Z');

        await lifecycleErrorOf(engine.approve(created.id, APPROVER));
        await lifecycleErrorOf(engine.reject(created.id, APPROVER, 'again'));

        expect(await engine.getRequest(created.id)).toEqual(before);
      });

      test('approve on a deploying request', async () => {
        const { engine, now } = createHarness();
        const created = await engine.createRequest(deployInput());
        await engine.approve(created.id, APPROVER);
        const before = await engine.getRequest(created.id);
        now.value = new Date('2026-03-02T10:00:00.000Z');

        expect((await lifecycleErrorOf(engine.approve(created.id, APPROVER))).code).toBe('REQUEST.INVALID_STATE');

        expect(await engine.getRequest(created.id)).toEqual(before);
      });

      test('approve and reject on a completed request', async () => {
        const { engine, now } = createHarness();
        const completed = await completedDeploy(engine);
        const before = await engine.getRequest(completed.id);
        now.value = new Date('2026-03-02T10:00:00.000Z');

        await lifecycleErrorOf(engine.approve(completed.id, APPROVER));
        await lifecycleErrorOf(engine.reject(completed.id, APPROVER, 'too late'));

        expect(await engine.getRequest(completed.id)).toEqual(before);
      });
    });

    test('unknown request is not found', async () => {
      const { engine } = createHarness();
      const error = await lifecycleErrorOf(engine.approve('req_missing', APPROVER));
      expect(error.code).toBe('REQUEST.NOT_FOUND');
    });

    test('reject stores the reason and notifies the requester', async () => {
      const { engine, notifier, pipeline } = createHarness();
      const created = await engine.createRequest(deployInput());

      const rejected = await engine.reject(created.id, APPROVER, '  too large for a sandbox  ');

      expect(rejected.status).toBe(RequestStatus.Rejected);
      expect(rejected.decision).toEqual({
        kind: 'rejected',
        by: { email: APPROVER.email, name: APPROVER.name },
        at: T0,
        reason: 'too large for a sandbox',
      });
      expect(pipeline.triggers).toHaveLength(0);

      const last = notifier.sent[notifier.sent.length - 1];
      expect(last.kind).toBe('request.rejected');
      expect(last.payload.recipients).toEqual([REQUESTER.email]);
      expect(last.payload.reason).toBe('too large for a sandbox');

      const trail = await engine.getAuditTrail(created.id);
      expect(trail[1].action).toBe('request.rejected');
      expect(trail[1].details).toEqual({ requestType: 'deploy', reason: 'too large for a sandbox' });
    });

    test('reject needs a non-empty reason', async () => {
      const { engine } = createHarness();
      const created = await engine.createRequest(deployInput());

      const error = await lifecycleErrorOf(engine.reject(created.id, APPROVER, '   '));

      expect(error.code).toBe('VALIDATION.EMPTY_REASON');
      expect((await engine.getRequest(created.id)).status).toBe(RequestStatus.PendingApproval);
    });

    test('a rejected request cannot be approved', async () => {
      const { engine } = createHarness();
      const created = await engine.createRequest(deployInput());
      await engine.reject(created.id, APPROVER, 'duplicate');

      const error = await lifecycleErrorOf(engine.approve(created.id, APPROVER));

      expect(error.code).toBe('REQUEST.INVALID_STATE');
      expect(error.message).toBe('Cannot approve request in status "rejected"');
    });
  });

  describe('pipeline trigger failure and retrigger', () => {
    test('a failed trigger leaves the request approved; a manual retrigger moves it to deploying', async () => {
      const { engine, pipeline } = createHarness();
      const created = await engine.createRequest(deployInput());

      pipeline.failTrigger = true;
      const approved = await engine.approve(created.id, APPROVER);
      expect(approved.status).toBe(RequestStatus.Approved);
      expect(approved.pipelineRun).toBeNull();
      expect(logs.entries.some((e) => e.message === 'Pipeline trigger failed; request stays approved')).toBe(true);

      pipeline.failTrigger = false;
      const outcome = await engine.retriggerPipeline(created.id, APPROVER);

      expect(outcome.triggered).toBe(true);
      expect(outcome.request.status).toBe(RequestStatus.Deploying);
      expect(outcome.request.pipelineRun?.buildId).toBe('build-1');
      expect(pipeline.triggers).toHaveLength(2);

      const trail = await engine.getAuditTrail(created.id);
      expect(trail.map((e) => e.action)).toEqual(['request.created', 'request.approved', 'deployment.started']);
    });

    test('approve resolves when a retrigger records its run first', async () => {
      const { engine, pipeline } = createHarness();
      const created = await engine.createRequest(deployInput());

      const hold = pipeline.holdNextTrigger();
      const approving = engine.approve(created.id, APPROVER);
      await hold.entered;
      const retriggered = await engine.retriggerPipeline(created.id, APPROVER);
      hold.release();
      const approved = await approving;

      expect(retriggered.triggered).toBe(true);
      expect(retriggered.request.pipelineRun?.buildId).toBe('build-1');
      expect(approved.status).toBe(RequestStatus.Deploying);
      expect(approved.pipelineRun?.buildId).toBe('build-1');
      expect(pipeline.triggers).toHaveLength(2);

      const trail = await engine.getAuditTrail(created.id);
      expect(trail.map((e) => e.action)).toEqual(['request.created', 'request.approved', 'deployment.started']);

      const orphan = logs.entries.find((e) => e.message === 'Pipeline run started but not recorded');
      expect(orphan?.level).toBe(LogLevel.Warn);
      expect(orphan?.context).toMatchObject({
        requestId: created.id,
        buildId: 'build-2',
        url: 'https://pipelines.example.com/build-2',
        code: 'REQUEST.INVALID_STATE',
      });
    });

    test('retrigger reports a failed attempt without throwing', async () => {
      const { engine, pipeline } = createHarness();
      const created = await engine.createRequest(deployInput());
      pipeline.failTrigger = true;
      await engine.approve(created.id, APPROVER);

      const outcome = await engine.retriggerPipeline(created.id, APPROVER);

      expect(outcome.triggered).toBe(false);
      expect(outcome.error?.code).toBe('PIPELINE.TRIGGER_FAILED');
      expect(outcome.request.status).toBe(RequestStatus.Approved);
    });

    test('a template without a pipeline target stays approved', async () => {
      const { engine, pipeline } = createHarness();
      const created = await engine.createRequest(deployInput({ catalogItemId: NO_PIPELINE.id, parameters: {} }));

      const approved = await engine.approve(created.id, APPROVER);
      const outcome = await engine.retriggerPipeline(created.id, APPROVER);

      expect(approved.status).toBe(RequestStatus.Approved);
      expect(outcome.error?.code).toBe('PIPELINE.TARGET_UNRESOLVED');
      expect(pipeline.triggers).toHaveLength(0);
    });

    test('retrigger is approver-only and needs an approved request', async () => {
      const { engine, pipeline } = createHarness();
      const created = await engine.createRequest(deployInput());

      expect((await lifecycleErrorOf(engine.retriggerPipeline(created.id, APPROVER))).code).toBe(
        'REQUEST.INVALID_STATE',
      );

      pipeline.failTrigger = true;
      await engine.approve(created.id, APPROVER);
      expect((await lifecycleErrorOf(engine.retriggerPipeline(created.id, REQUESTER))).code).toBe('AUTH.FORBIDDEN');
    });
  });

  describe('recordPipelineResult', () => {
    test('success completes the request', async () => {
      const { engine } = createHarness();
      const completed = await completedDeploy(engine);

      expect(completed.status).toBe(RequestStatus.Completed);
      expect(completed.completedAt).toBe(T0);
      expect(completed.deploymentOutput).toBe('apply complete');
    });

    test('failure stores the diagnostic output', async () => {
      const { engine, notifier } = createHarness();
      const created = await engine.createRequest(deployInput());
      await engine.approve(created.id, APPROVER);

      const failed = await engine.recordPipelineResult(created.id, false, 'quota exceeded');

      expect(failed.status).toBe(RequestStatus.Failed);
      expect(failed.deploymentOutput).toBe('quota exceeded');
      const trail = await engine.getAuditTrail(created.id);
      expect(trail[3].action).toBe('deployment.failed');
      expect(trail[3].actor.email).toBe('system@request-lifecycle.local');
      expect(trail[3].details).toEqual({ requestType: 'deploy', buildId: 'build-1', output: 'quota exceeded' });
      expect(notifier.kinds()).toEqual([
        'approval.requested',
        'request.approved',
        'deployment.started',
        'deployment.failed',
      ]);
    });

    test('only a deploying request accepts a result', async () => {
      const { engine } = createHarness();
      const created = await engine.createRequest(deployInput());

      const error = await lifecycleErrorOf(engine.recordPipelineResult(created.id, true));

      expect(error.code).toBe('REQUEST.INVALID_STATE');
      expect((await engine.getAuditTrail(created.id)).map((e) => e.action)).toEqual(['request.created']);
    });

    test('audit sequence strictly increases and timestamps never go backwards', async () => {
      const { engine, now } = createHarness();
      const created = await engine.createRequest(deployInput());
      now.value = new Date('2026-03-02T10:00:00.000Z');
      await engine.approve(created.id, APPROVER);
      now.value = new Date('2026-03-02T11:00:00.000Z');
      await engine.recordPipelineResult(created.id, true);

      const trail = await engine.getAuditTrail(created.id);
      expect(trail).toHaveLength(4);
      for (let i = 1; i < trail.length; i++) {
        expect(trail[i].sequence).toBeGreaterThan(trail[i - 1].sequence);
        expect(trail[i].timestamp >= trail[i - 1].timestamp).toBe(true);
      }
    });
  });

  describe('lineage: scale and destroy', () => {
    test('R1 deploy then R2 scale: the lineage resolves to the new size', async () => {
      const { engine } = createHarness();

      const r1 = await engine.createRequest(deployInput({ parameters: { size: 'small' } }));
      const deploying = await engine.approve(r1.id, APPROVER);
      expect(deploying.status).toBe(RequestStatus.Deploying);
      expect(deploying.pipelineRun?.buildId).toBeTruthy();
      expect((await engine.recordPipelineResult(r1.id, true)).status).toBe(RequestStatus.Completed);

      const r2 = await engine.requestScale(r1.id, REQUESTER, 'large');
      expect(r2.parentRequestId).toBe(r1.id);
      expect(r2.parameters).toEqual({ size: 'large' });
      await engine.approve(r2.id, APPROVER);
      expect((await engine.recordPipelineResult(r2.id, true)).status).toBe(RequestStatus.Completed);

      const r1After = await engine.getRequest(r1.id);
      expect(r1After.status).toBe(RequestStatus.Completed);
      expect(r1After.parameters).toEqual({ size: 'small' });
      expect(await engine.resolveCurrentSize(r1.id)).toBe('large');
      expect(await engine.resolveCurrentSize(r2.id)).toBe('large');
    });

    test('the most recently completed scale wins', async () => {
      const { engine, now } = createHarness();
      const parent = await completedDeploy(engine);

      const toMedium = await engine.requestScale(parent.id, REQUESTER, 'medium');
      await engine.approve(toMedium.id, APPROVER);
      now.value = new Date('2026-03-03T09:00:00.000Z');
      await engine.recordPipelineResult(toMedium.id, true);

      const toLarge = await engine.requestScale(parent.id, REQUESTER, 'large');
      expect(toLarge.previousSize).toBe('medium');
      await engine.approve(toLarge.id, APPROVER);
      await engine.recordPipelineResult(toLarge.id, false, 'capacity');
      expect(await engine.resolveCurrentSize(parent.id)).toBe('medium');
    });

    test('scale to the current size is refused and creates nothing', async () => {
      const { engine, store } = createHarness();
      const parent = await completedDeploy(engine);

      const error = await lifecycleErrorOf(engine.requestScale(parent.id, REQUESTER, 'small'));

      expect(error.code).toBe('REQUEST.SAME_SIZE');
      expect(await store.requests.list()).toHaveLength(1);
    });

    test('destroy against a pending parent fails with NOT_COMPLETED_DEPLOY and creates nothing', async () => {
      const { engine, store } = createHarness();
      const pending = await engine.createRequest(deployInput());

      const error = await lifecycleErrorOf(engine.requestDestroy(pending.id, REQUESTER, 'not needed'));

      expect(error.code).toBe('REQUEST.NOT_COMPLETED_DEPLOY');
      expect(error.details).toEqual({ requestType: 'deploy', status: 'pending_approval' });
      expect(await store.requests.list()).toHaveLength(1);
      expect((await engine.getAuditTrail(pending.id)).map((e) => e.action)).toEqual(['request.created']);
    });

    test('destroy against a scale request is refused', async () => {
      const { engine } = createHarness();
      const parent = await completedDeploy(engine);
      const scale = await engine.requestScale(parent.id, REQUESTER, 'large');
      await engine.approve(scale.id, APPROVER);
      await engine.recordPipelineResult(scale.id, true);

      const error = await lifecycleErrorOf(engine.requestDestroy(scale.id, REQUESTER));

      expect(error.code).toBe('REQUEST.NOT_COMPLETED_DEPLOY');
    });

    test('only the owner can destroy or scale a deployment', async () => {
      const { engine } = createHarness();
      const parent = await completedDeploy(engine);

      expect((await lifecycleErrorOf(engine.requestDestroy(parent.id, OTHER_REQUESTER))).code).toBe('AUTH.FORBIDDEN');
      expect((await lifecycleErrorOf(engine.requestScale(parent.id, OTHER_REQUESTER, 'large'))).code).toBe(
        'AUTH.FORBIDDEN',
      );
    });

    test('a second open derivative against the same parent is refused', async () => {
      const { engine } = createHarness();
      const parent = await completedDeploy(engine);
      const scale = await engine.requestScale(parent.id, REQUESTER, 'large');

      const error = await lifecycleErrorOf(engine.requestDestroy(parent.id, REQUESTER));

      expect(error.code).toBe('REQUEST.DERIVATIVE_IN_PROGRESS');
      expect(error.details).toEqual({ pendingRequestId: scale.id });
    });

    test('a derivative closed by rejection no longer blocks a new one', async () => {
      const { engine } = createHarness();
      const parent = await completedDeploy(engine);
      const scale = await engine.requestScale(parent.id, REQUESTER, 'large');
      await engine.reject(scale.id, APPROVER, 'not now');

      const destroy = await engine.requestDestroy(parent.id, REQUESTER);

      expect(destroy.status).toBe(RequestStatus.PendingApproval);
    });

    test('a completed destroy releases the parent and blocks further derivatives', async () => {
      const { engine } = createHarness();
      const parent = await completedDeploy(engine, { tags: { costCenter: 'CC-7', projectCode: 'P-1' } });

      const destroy = await engine.requestDestroy(parent.id, REQUESTER, ' end of project ');
      expect(destroy.requestType).toBe(RequestType.Destroy);
      expect(destroy.tags).toEqual({ costCenter: 'CC-7', projectCode: 'P-1' });
      expect(destroy.reason).toBe('end of project');
      expect(destroy.catalogItemId).toBe(parent.catalogItemId);

      const trail = await engine.getAuditTrail(destroy.id);
      expect(trail[0].action).toBe('destroy.requested');
      expect(trail[0].details).toEqual({ originalRequestId: parent.id, reason: 'end of project' });

      await engine.approve(destroy.id, APPROVER);
      await engine.recordPipelineResult(destroy.id, true);

      const released = await engine.getRequest(parent.id);
      expect(released.status).toBe(RequestStatus.Completed);
      expect(released.resourcesReleasedAt).toBe(T0);
      expect(await engine.listActiveDeployments(REQUESTER.email)).toEqual([]);

      const error = await lifecycleErrorOf(engine.requestScale(parent.id, REQUESTER, 'large'));
      expect(error.code).toBe('REQUEST.RESOURCES_RELEASED');
    });

    test('a failed destroy leaves the parent active', async () => {
      const { engine } = createHarness();
      const parent = await completedDeploy(engine);
      const destroy = await engine.requestDestroy(parent.id, REQUESTER);
      await engine.approve(destroy.id, APPROVER);
      await engine.recordPipelineResult(destroy.id, false, 'lock held');

      expect((await engine.getRequest(parent.id)).resourcesReleasedAt).toBeUndefined();
      expect((await engine.listActiveDeployments()).map((r) => r.id)).toEqual([parent.id]);
    });
  });

  describe('best-effort notifications', () => {
    test('a failing notifier does not affect the approval or its audit entry', async () => {
      const failing = new FailingNotifier();
      const { engine, dispatcher } = createHarness({ notifiers: [failing] });
      const created = await engine.createRequest(deployInput());

      const approved = await engine.approve(created.id, APPROVER);

      expect(approved.status).toBe(RequestStatus.Deploying);
      expect((await engine.getRequest(created.id)).status).toBe(RequestStatus.Deploying);
      const actions = (await engine.getAuditTrail(created.id)).map((e) => e.action);
      expect(actions).toContain('request.approved');

      expect(failing.attempts).toBe(3);
      const failures = dispatcher.getDeliveryLog().filter((d) => !d.success);
      expect(failures.map((d) => d.kind)).toEqual(['approval.requested', 'request.approved', 'deployment.started']);
      expect(failures[0].error?.code).toBe('NOTIFICATION.DELIVERY_FAILED');
      expect(logs.entries.filter((e) => e.message === 'Notification failed')).toHaveLength(3);
    });
  });

  describe('durability', () => {
    test('a failed audit write aborts the approval', async () => {
      const store = new FlakyAuditStore();
      const { engine, pipeline, notifier } = createHarness({ store });
      const created = await engine.createRequest(deployInput());

      store.failAudit = true;
      const error = await lifecycleErrorOf(engine.approve(created.id, APPROVER));

      expect(error.code).toBe('SYSTEM.DURABILITY');
      expect(error.retryable).toBe(true);
      expect((await engine.getRequest(created.id)).status).toBe(RequestStatus.PendingApproval);
      expect(pipeline.triggers).toHaveLength(0);
      expect(notifier.kinds()).toEqual(['approval.requested']);
      expect(logs.entries.some((e) => e.level === LogLevel.Error && e.message === 'Transition did not commit')).toBe(true);
    });

    test('a run that cannot be recorded leaves the approval standing', async () => {
      const store = new FlakyAuditStore();
      const { engine, pipeline } = createHarness({ store });
      const created = await engine.createRequest(deployInput());

      store.failAction = 'deployment.started';
      const approved = await engine.approve(created.id, APPROVER);

      expect(approved.status).toBe(RequestStatus.Approved);
      expect(approved.pipelineRun).toBeNull();
      expect(pipeline.triggers).toHaveLength(1);
      const orphan = logs.entries.find((e) => e.message === 'Pipeline run started but not recorded');
      expect(orphan?.context).toMatchObject({
        requestId: created.id,
        buildId: 'build-1',
        url: 'https://pipelines.example.com/build-1',
        code: 'SYSTEM.DURABILITY',
      });

      store.failAction = null;
      const outcome = await engine.retriggerPipeline(created.id, APPROVER);
      expect(outcome.triggered).toBe(true);
      expect(outcome.request.pipelineRun?.buildId).toBe('build-2');
    });

    test('a failed audit write leaves no request behind', async () => {
      const store = new FlakyAuditStore();
      store.failAudit = true;
      const { engine } = createHarness({ store });

      const error = await lifecycleErrorOf(engine.createRequest(deployInput()));

      expect(error.code).toBe('SYSTEM.DURABILITY');
      expect(await store.requests.list()).toHaveLength(0);
    });
  });

  describe('reconcilePipelineStatus', () => {
    test('an in-flight run leaves the request deploying', async () => {
      const { engine, pipeline } = createHarness();
      const created = await engine.createRequest(deployInput());
      await engine.approve(created.id, APPROVER);

      const outcome = await engine.reconcilePipelineStatus(created.id);

      expect(pipeline.polls).toEqual(['build-1']);
      expect(outcome.runStatus).toEqual({ state: 'in-progress' });
      expect(outcome.request.status).toBe(RequestStatus.Deploying);
    });

    test('a completed run is recorded; canceled counts as failed', async () => {
      const { engine, pipeline } = createHarness();
      const created = await engine.createRequest(deployInput());
      await engine.approve(created.id, APPROVER);
      pipeline.nextStatus = { state: 'completed', result: 'canceled' };

      const outcome = await engine.reconcilePipelineStatus(created.id);

      expect(outcome.request.status).toBe(RequestStatus.Failed);
      expect(outcome.request.deploymentOutput).toBe('Pipeline run build-1 finished: canceled');
    });

    test('a succeeded run completes the request', async () => {
      const { engine, pipeline } = createHarness();
      const created = await engine.createRequest(deployInput());
      await engine.approve(created.id, APPROVER);
      pipeline.nextStatus = { state: 'completed', result: 'succeeded' };

      expect((await engine.reconcilePipelineStatus(created.id)).request.status).toBe(RequestStatus.Completed);
    });

    test('only deploying requests can be reconciled', async () => {
      const { engine } = createHarness();
      const created = await engine.createRequest(deployInput());
      expect((await lifecycleErrorOf(engine.reconcilePipelineStatus(created.id))).code).toBe('REQUEST.INVALID_STATE');
    });
  });

  describe('expiration and health', () => {
    test('markExpirationWarned flips the flag once', async () => {
      const { engine } = createHarness();
      const parent = await completedDeploy(engine);

      const first = await engine.markExpirationWarned(parent.id);
      const second = await engine.markExpirationWarned(parent.id);

      expect(first.changed).toBe(true);
      expect(first.request.expirationWarningSent).toBe(true);
      expect(second.changed).toBe(false);
      expect(second.request.expirationWarningSent).toBe(true);
      expect((await lifecycleErrorOf(engine.markExpirationWarned('req_missing'))).code).toBe('REQUEST.NOT_FOUND');
    });

    test('recordHealth overwrites health on completed requests only', async () => {
      const { engine } = createHarness();
      const parent = await completedDeploy(engine);
      const auditBefore = (await engine.getAuditTrail(parent.id)).length;

      const updated = await engine.recordHealth(parent.id, ResourceHealth.Degraded, { cpu: 93 });

      expect(updated.resourceHealth).toBe(ResourceHealth.Degraded);
      expect(updated.healthCheckedAt).toBe(T0);
      expect(updated.healthDetails).toEqual({ cpu: 93 });
      expect(updated.status).toBe(RequestStatus.Completed);
      expect(await engine.getAuditTrail(parent.id)).toHaveLength(auditBefore);

      const pending = await engine.createRequest(deployInput());
      expect((await lifecycleErrorOf(engine.recordHealth(pending.id, ResourceHealth.Healthy))).code).toBe(
        'REQUEST.NOT_COMPLETED',
      );
      expect((await lifecycleErrorOf(engine.recordHealth(parent.id, 'purple'))).code).toBe('VALIDATION.SCHEMA');
    });

    test('listExpiringDeployments honours the window and the warning flag', async () => {
      const { engine, now } = createHarness();
      const parent = await completedDeploy(engine, { expiresAt: '2026-03-04T09:00:00.000Z' });
      await completedDeploy(engine);
      const day = 24 * 60 * 60 * 1000;

      expect((await engine.listExpiringDeployments(3 * day, now.value)).map((r) => r.id)).toEqual([parent.id]);
      expect(await engine.listExpiringDeployments(1 * day, now.value)).toEqual([]);

      await engine.markExpirationWarned(parent.id);
      expect(await engine.listExpiringDeployments(3 * day, now.value)).toEqual([]);
    });
  });

  describe('reminders', () => {
    test('a reminder is due once the cool-down has passed since creation or the last reminder', async () => {
      const { engine, now } = createHarness();
      const created = await engine.createRequest(deployInput());

      expect(await engine.isReminderDue(created.id, new Date('2026-03-02T12:00:00.000Z'))).toBe(false);
      expect(await engine.isReminderDue(created.id, new Date('2026-03-02T13:00:00.000Z'))).toBe(true);

      now.value = new Date('2026-03-02T13:00:00.000Z');
      const reminder = await engine.recordReminder(created.id, 'chat');
      expect(reminder).toMatchObject({ requestId: created.id, channel: 'chat', sentAt: '2026-03-02T13:00:00.000Z' });

      expect(await engine.isReminderDue(created.id, new Date('2026-03-02T14:00:00.000Z'))).toBe(false);
      expect(await engine.isReminderDue(created.id, new Date('2026-03-02T17:00:00.000Z'))).toBe(true);
    });

    test('decided requests are never due', async () => {
      const { engine } = createHarness();
      const created = await engine.createRequest(deployInput());
      await engine.reject(created.id, APPROVER, 'no budget');

      expect(await engine.isReminderDue(created.id, new Date('2026-03-09T09:00:00.000Z'))).toBe(false);
    });
  });

  describe('queries', () => {
    test('listPendingApprovals returns pending requests oldest first', async () => {
      const { engine } = createHarness();
      const first = await engine.createRequest(deployInput());
      const second = await engine.createRequest(deployInput());
      const third = await engine.createRequest(deployInput());
      await engine.reject(second.id, APPROVER, 'duplicate');

      expect((await engine.listPendingApprovals()).map((r) => r.id)).toEqual([first.id, third.id]);
    });

    test('listActiveDeployments filters by requester', async () => {
      const { engine } = createHarness();
      const mine = await completedDeploy(engine);
      await completedDeploy(engine, {
        requester: { email: OTHER_REQUESTER.email, name: OTHER_REQUESTER.name },
      });

      expect((await engine.listActiveDeployments('REQUESTER@example.com')).map((r) => r.id)).toEqual([mine.id]);
      expect(await engine.listActiveDeployments()).toHaveLength(2);
    });
  });
});
