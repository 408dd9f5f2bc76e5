/**
 * Pipeline trigger client contract.
 *
 * A client starts one remote pipeline run per `trigger` call and never
 * retries on its own: a run may have started even when the call failed,
 * so only an operator decides whether to trigger again.
 */

import { PipelineTarget } from '../domain/catalog';

/** Reference to a started pipeline run. */
export interface PipelineRunRef {
  buildId: string;
  url?: string;
}

export type PipelineRunState = 'not-started' | 'in-progress' | 'completed';

export type PipelineRunResult = 'succeeded' | 'failed' | 'canceled';

/** Status snapshot returned by a poll. `result` is set once `state` is completed. */
export interface PipelineRunStatus {
  state: PipelineRunState;
  result?: PipelineRunResult;
  url?: string;
}

export interface PipelineClient {
  trigger(target: PipelineTarget, parameters: Record<string, string>): Promise<PipelineRunRef>;
  pollStatus(target: PipelineTarget, buildId: string): Promise<PipelineRunStatus>;
}

/** Raised by pipeline clients; the engine logs it and never rethrows. */
export class PipelineClientError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
  ) {
    super(message);
    this.name = 'PipelineClientError';
  }
}
