/**
 * Runtime configuration, read from environment variables.
 *
 *   PORT                         HTTP port (default 5000)
 *   APPROVER_EMAILS              comma-separated approver allow-list
 *   PIPELINE_ORG_URL             pipeline organisation URL
 *   PIPELINE_PAT                 personal access token for the pipeline API
 *   CHAT_WEBHOOK_URL             chat channel incoming webhook
 *   CHAT_WEBHOOK_SIGNING_SECRET  HMAC secret for webhook payloads
 *   PORTAL_BASE_URL              base URL used in notification links
 *   APPROVAL_REMINDER_HOURS      reminder cool-down (default 4)
 *   SIZE_PARAMETER               parameter holding a deployment's size (default "size")
 *   CATALOG_FILE                 JSON catalog of templates (default config/catalog.json)
 *   EMAIL_FROM                   sender address for notification email
 *   LOG_LEVEL                    debug | info | warn | error
 */

import { TypedError, createTypedError } from './domain/errors';
import { LogLevel, parseLogLevel } from './logger';

export interface LifecycleConfig {
  port: number;
  approverEmails: string[];
  pipeline: {
    orgUrl: string;
    personalAccessToken?: string;
  };
  chatWebhook?: {
    url: string;
    signingSecret?: string;
  };
  portalBaseUrl: string;
  reminderCooldownHours: number;
  sizeParameter: string;
  catalogFile: string;
  emailFrom: string;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<LifecycleConfig> = {
  port: 5000,
  approverEmails: [],
  pipeline: { orgUrl: 'https://dev.azure.com/your-org' },
  portalBaseUrl: 'http://localhost:5000',
  reminderCooldownHours: 4,
  sizeParameter: 'size',
  catalogFile: 'config/catalog.json',
  emailFrom: 'noreply@request-lifecycle.local',
  logLevel: LogLevel.Info,
};

/** Result of loading configuration. */
export interface ConfigResult {
  valid: boolean;
  config: LifecycleConfig;
  errors: TypedError[];
}

function configError(key: string, message: string): TypedError {
  return createTypedError({
    code: 'CONFIG.INVALID',
    message: `${key}: ${message}`,
    retryable: false,
    details: { key },
  });
}

function parsePositiveInt(
  env: Record<string, string | undefined>,
  key: string,
  fallback: number,
  errors: TypedError[],
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    errors.push(configError(key, `expected a positive integer, got "${raw}"`));
    return fallback;
  }
  return value;
}

function parseList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/** Build a configuration from an environment map, collecting every problem found. */
export function loadConfig(env: Record<string, string | undefined> = process.env): ConfigResult {
  const errors: TypedError[] = [];

  const orgUrl = (env.PIPELINE_ORG_URL ?? DEFAULT_CONFIG.pipeline.orgUrl).replace(/\/+$/, '');
  if (!/^https?:\/\//.test(orgUrl)) {
    errors.push(configError('PIPELINE_ORG_URL', 'must be an http(s) URL'));
  }

  const webhookUrl = env.CHAT_WEBHOOK_URL?.trim();

  const config: LifecycleConfig = {
    port: parsePositiveInt(env, 'PORT', DEFAULT_CONFIG.port, errors),
    approverEmails: parseList(env.APPROVER_EMAILS),
    pipeline: {
      orgUrl,
      personalAccessToken: env.PIPELINE_PAT || undefined,
    },
    chatWebhook: webhookUrl
      ? { url: webhookUrl, signingSecret: env.CHAT_WEBHOOK_SIGNING_SECRET || undefined }
      : undefined,
    portalBaseUrl: (env.PORTAL_BASE_URL ?? DEFAULT_CONFIG.portalBaseUrl).replace(/\/+$/, ''),
    reminderCooldownHours: parsePositiveInt(
      env,
      'APPROVAL_REMINDER_HOURS',
      DEFAULT_CONFIG.reminderCooldownHours,
      errors,
    ),
    sizeParameter: env.SIZE_PARAMETER?.trim() || DEFAULT_CONFIG.sizeParameter,
    catalogFile: env.CATALOG_FILE?.trim() || DEFAULT_CONFIG.catalogFile,
    emailFrom: env.EMAIL_FROM?.trim() || DEFAULT_CONFIG.emailFrom,
    logLevel: parseLogLevel(env.LOG_LEVEL, DEFAULT_CONFIG.logLevel),
  };

  if (config.approverEmails.length === 0) {
    errors.push(configError('APPROVER_EMAILS', 'no approvers configured; nothing can be approved'));
  }

  return { valid: errors.length === 0, config, errors };
}
