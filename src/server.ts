/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { LifecycleConfig, loadConfig } from './config';
import { CatalogLookup } from './domain/catalog';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { loadCatalogFile } from './catalog/file-catalog';
import { PipelineClient } from './pipeline/client';
import { AzureDevOpsPipelineClient } from './pipeline/azure-devops';
import { AuditService } from './audit/audit-service';
import { NotificationDispatcher } from './notifications/dispatcher';
import { NotificationComposer } from './notifications/compose';
import { Notifier } from './notifications/notifier';
import { ChatWebhookNotifier } from './notifications/webhook';
import { EmailNotifier, EmailTransport, LogEmailTransport } from './notifications/email';
import { RequestLifecycleEngine } from './engine/lifecycle-engine';
import { LifecycleSweep } from './engine/sweep';
import { errorHandler, identityMiddleware } from './api/middleware';
import { createRequestRoutes } from './api/requests';
import { createApprovalRoutes } from './api/approvals';
import { createOperationRoutes } from './api/operations';
import { createPipelineRoutes } from './api/pipeline';
import { createSweepRoutes } from './api/sweep';
import { createAuditRoutes } from './api/audit';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: LifecycleConfig;
  store: Store;
  catalog: CatalogLookup;
  pipeline: PipelineClient;
  dispatcher: NotificationDispatcher;
  auditService: AuditService;
  engine: RequestLifecycleEngine;
  sweep: LifecycleSweep;
}

/** Collaborators a host or test may supply instead of the defaults. */
export interface AppContextOverrides {
  config?: LifecycleConfig;
  store?: Store;
  catalog?: CatalogLookup;
  pipeline?: PipelineClient;
  notifiers?: Notifier[];
  emailTransport?: EmailTransport;
  clock?: () => Date;
}

function defaultNotifiers(config: LifecycleConfig, emailTransport?: EmailTransport): Notifier[] {
  const notifiers: Notifier[] = [
    new EmailNotifier({ transport: emailTransport ?? new LogEmailTransport(), from: config.emailFrom }),
  ];
  if (config.chatWebhook) {
    notifiers.push(
      new ChatWebhookNotifier({
        url: config.chatWebhook.url,
        signingSecret: config.chatWebhook.signingSecret,
      }),
    );
  }
  return notifiers;
}

/** Create the application context with all services. */
export function createAppContext(overrides: AppContextOverrides = {}): AppContext {
  const config = overrides.config ?? loadConfig().config;
  const clock = overrides.clock ?? (() => new Date());
  const store = overrides.store ?? createMemoryStore();
  const catalog = overrides.catalog ?? loadCatalogFile(config.catalogFile);
  const pipeline =
    overrides.pipeline ??
    new AzureDevOpsPipelineClient({
      orgUrl: config.pipeline.orgUrl,
      personalAccessToken: config.pipeline.personalAccessToken,
    });
  const dispatcher = new NotificationDispatcher(
    overrides.notifiers ?? defaultNotifiers(config, overrides.emailTransport),
  );
  const auditService = new AuditService(store, clock);

  const engine = new RequestLifecycleEngine({
    store,
    catalog,
    pipeline,
    dispatcher,
    auditService,
    clock,
    config: {
      sizeParameter: config.sizeParameter,
      reminderCooldownHours: config.reminderCooldownHours,
      approverEmails: config.approverEmails,
      portalBaseUrl: config.portalBaseUrl,
    },
  });

  const composer = new NotificationComposer(catalog, {
    portalBaseUrl: config.portalBaseUrl,
    approverEmails: config.approverEmails,
  });
  const sweep = new LifecycleSweep(engine, composer, dispatcher, { clock });

  return { config, store, catalog, pipeline, dispatcher, auditService, engine, sweep };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
    });
  });

  app.use('/api', identityMiddleware(ctx.config.approverEmails));
  app.use('/api/requests', createRequestRoutes(ctx.engine));
  app.use('/api/approvals', createApprovalRoutes(ctx.engine));
  app.use('/api/operations', createOperationRoutes(ctx.engine));
  app.use('/api/pipeline', createPipelineRoutes(ctx.engine));
  app.use('/api/sweep', createSweepRoutes(ctx.engine, ctx.sweep));
  app.use('/api/audit', createAuditRoutes(ctx.auditService));

  app.use(errorHandler);

  return app;
}
