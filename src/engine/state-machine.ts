/**
 * Request state machine.
 *
 * Maps (status, event) pairs to the next status. Any pair missing from the
 * table is a guard violation.
 */

import { RequestStatus, VALID_REQUEST_TRANSITIONS } from '../domain/request';
import { TypedError, invalidStateError } from '../domain/errors';

/** Events that move a request through its life cycle. */
export type RequestEvent =
  | 'approve'
  | 'reject'
  | 'trigger-succeeded'
  | 'pipeline-succeeded'
  | 'pipeline-failed';

/** Event-driven transition table. */
export const REQUEST_EVENT_TRANSITIONS: Record<RequestStatus, Partial<Record<RequestEvent, RequestStatus>>> = {
  [RequestStatus.PendingApproval]: {
    approve: RequestStatus.Approved,
    reject: RequestStatus.Rejected,
  },
  [RequestStatus.Approved]: {
    'trigger-succeeded': RequestStatus.Deploying,
  },
  [RequestStatus.Deploying]: {
    'pipeline-succeeded': RequestStatus.Completed,
    'pipeline-failed': RequestStatus.Failed,
  },
  [RequestStatus.Rejected]: {},
  [RequestStatus.Completed]: {},
  [RequestStatus.Failed]: {},
};

/** Result of a state transition attempt. */
export type TransitionResult =
  | { success: true; from: RequestStatus; to: RequestStatus }
  | { success: false; error: TypedError };

/** Attempt a transition driven by an event. */
export function applyRequestEvent(
  requestId: string,
  current: RequestStatus,
  event: RequestEvent,
): TransitionResult {
  const target = REQUEST_EVENT_TRANSITIONS[current][event];
  if (!target || !VALID_REQUEST_TRANSITIONS[current].includes(target)) {
    return { success: false, error: invalidStateError(requestId, current, event) };
  }
  return { success: true, from: current, to: target };
}

/** Check if a status is terminal. */
export function isTerminalRequestStatus(status: RequestStatus): boolean {
  return VALID_REQUEST_TRANSITIONS[status].length === 0;
}

/** All statuses reachable from the initial status. */
export function reachableStatuses(from: RequestStatus = RequestStatus.PendingApproval): Set<RequestStatus> {
  const seen = new Set<RequestStatus>([from]);
  const frontier: RequestStatus[] = [from];
  while (frontier.length > 0) {
    const status = frontier.pop();
    if (status === undefined) break;
    for (const next of Object.values(REQUEST_EVENT_TRANSITIONS[status])) {
      if (next && !seen.has(next)) {
        seen.add(next);
        frontier.push(next);
      }
    }
  }
  return seen;
}
