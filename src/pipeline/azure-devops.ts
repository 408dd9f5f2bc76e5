/**
 * Azure DevOps pipeline client.
 *
 * Starts pipeline runs through the Pipelines REST API and reads run status
 * through the Build API. Authenticates with a personal access token sent as
 * basic auth with an empty user name.
 */

import { PipelineTarget } from '../domain/catalog';
import { maskSecretsInMessage } from '../domain/errors';
import {
  PipelineClient,
  PipelineClientError,
  PipelineRunRef,
  PipelineRunResult,
  PipelineRunStatus,
} from './client';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface AzureDevOpsClientOptions {
  orgUrl: string;
  personalAccessToken?: string;
  /** Per-call timeout. Default: 30_000. */
  timeoutMs?: number;
  /** Injectable for testing. Defaults to global fetch. */
  fetchFn?: FetchFn;
}

const API_VERSION = '7.0';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read `_links.web.href` from an API response. */
function webLink(data: Record<string, unknown>): string | undefined {
  const links = data._links;
  if (!isRecord(links)) return undefined;
  const web = links.web;
  if (!isRecord(web)) return undefined;
  return typeof web.href === 'string' ? web.href : undefined;
}

function mapResult(result: unknown): PipelineRunResult {
  if (result === 'succeeded') return 'succeeded';
  if (result === 'canceled') return 'canceled';
  // failed, partiallySucceeded, none
  return 'failed';
}

/** Map a build's `status`/`result` pair onto the engine's run status. */
export function mapBuildStatus(data: Record<string, unknown>): PipelineRunStatus {
  const url = webLink(data);
  switch (data.status) {
    case 'notStarted':
      return { state: 'not-started', url };
    case 'completed':
      return { state: 'completed', result: mapResult(data.result), url };
    default:
      // inProgress, cancelling, postponed
      return { state: 'in-progress', url };
  }
}

export class AzureDevOpsPipelineClient implements PipelineClient {
  private orgUrl: string;
  private fetchFn: FetchFn;
  private timeoutMs: number;

  constructor(private options: AzureDevOpsClientOptions) {
    this.orgUrl = options.orgUrl.replace(/\/+$/, '');
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async trigger(target: PipelineTarget, parameters: Record<string, string>): Promise<PipelineRunRef> {
    const url =
      `${this.orgUrl}/${encodeURIComponent(target.project)}/_apis/pipelines/` +
      `${target.pipelineId}/runs?api-version=${API_VERSION}`;

    const templateParameters: Record<string, string> = { ...parameters };
    if (target.moduleName) {
      templateParameters.module_name = target.moduleName;
    }

    const data = await this.call(url, {
      method: 'POST',
      body: JSON.stringify({
        resources: {
          repositories: {
            self: { refName: `refs/heads/${target.branch}` },
          },
        },
        templateParameters,
      }),
    });

    if (typeof data.id !== 'number' && typeof data.id !== 'string') {
      throw new PipelineClientError('Pipeline run response did not include a run id');
    }
    return { buildId: String(data.id), url: webLink(data) };
  }

  async pollStatus(target: PipelineTarget, buildId: string): Promise<PipelineRunStatus> {
    const url =
      `${this.orgUrl}/${encodeURIComponent(target.project)}/_apis/build/builds/` +
      `${encodeURIComponent(buildId)}?api-version=${API_VERSION}`;
    return mapBuildStatus(await this.call(url, { method: 'GET' }));
  }

  private authHeader(): string {
    const token = this.options.personalAccessToken;
    if (!token) {
      throw new PipelineClientError('Pipeline personal access token is not configured');
    }
    return `Basic ${Buffer.from(`:${token}`).toString('base64')}`;
  }

  private async call(url: string, init: RequestInit): Promise<Record<string, unknown>> {
    const headers: Record<string, string> = {
      Authorization: this.authHeader(),
      'Content-Type': 'application/json',
    };

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(url, { ...init, headers, signal: controller.signal });
    } catch (err) {
      throw new PipelineClientError(this.scrub(err instanceof Error ? err.message : 'Pipeline request failed'));
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new PipelineClientError(
        this.scrub(`Pipeline API returned HTTP ${response.status}${body ? `: ${body.slice(0, 300)}` : ''}`),
        response.status,
      );
    }

    const data: unknown = await response.json();
    if (!isRecord(data)) {
      throw new PipelineClientError('Pipeline API returned a non-object body', response.status);
    }
    return data;
  }

  private scrub(message: string): string {
    const token = this.options.personalAccessToken;
    return token ? maskSecretsInMessage(message, [token]) : message;
  }
}
