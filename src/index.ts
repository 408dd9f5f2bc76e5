/**
 * Request Life-Cycle Engine
 *
 * Entry point for the HTTP service, and public exports for programmatic use.
 */

import { loadConfig } from './config';
import { createApp, createAppContext } from './server';
import { logger, setLogLevel } from './logger';

export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOverrides } from './server';
export * from './domain';
export * from './config';
export * from './logger';
export * from './storage/store';
export * from './storage/memory-store';
export * from './audit/audit-service';
export * from './catalog/file-catalog';
export * from './pipeline/client';
export * from './pipeline/azure-devops';
export * from './notifications/notifier';
export * from './notifications/dispatcher';
export * from './notifications/compose';
export * from './notifications/webhook';
export * from './notifications/email';
export * from './engine/state-machine';
export * from './engine/guards';
export * from './engine/lifecycle-engine';
export * from './engine/sweep';

if (require.main === module) {
  const { config, errors } = loadConfig();
  setLogLevel(config.logLevel);
  for (const error of errors) {
    logger.warn('Configuration problem', { code: error.code, message: error.message });
  }

  const app = createApp(createAppContext({ config }));
  app.listen(config.port, () => {
    logger.info('Request life-cycle service listening', { port: config.port });
  });
}
