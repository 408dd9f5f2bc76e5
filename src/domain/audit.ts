/**
 * Audit trail domain model.
 *
 * Immutable, ordered records of every request transition.
 */

/** Audit event kinds. */
export type AuditAction =
  // Creation
  | 'request.created'
  | 'destroy.requested'
  | 'scale.requested'
  // Approval gate
  | 'request.approved'
  | 'request.rejected'
  // Pipeline
  | 'deployment.started'
  | 'deployment.completed'
  | 'deployment.failed';

export const AUDIT_ACTIONS: readonly AuditAction[] = [
  'request.created',
  'destroy.requested',
  'scale.requested',
  'request.approved',
  'request.rejected',
  'deployment.started',
  'deployment.completed',
  'deployment.failed',
];

/** Who performed an audited action. */
export interface AuditActor {
  email: string;
  name: string;
}

/** Where an audited call came from, when the caller supplied it. */
export interface RequestProvenance {
  ipAddress?: string;
  userAgent?: string;
}

/** An immutable audit record. */
export interface AuditLogEntry {
  id: string;
  /** Store-assigned, strictly increasing. Orders entries regardless of clock skew. */
  sequence: number;
  timestamp: string;
  actor: AuditActor;
  action: AuditAction;
  requestId?: string;
  catalogItemId?: string;
  /** Additional context about the action. */
  details?: Record<string, unknown>;
  provenance?: RequestProvenance;
}

/** An audit entry before the store assigns its sequence number. */
export type NewAuditLogEntry = Omit<AuditLogEntry, 'sequence'>;

export function isAuditAction(value: string): value is AuditAction {
  return (AUDIT_ACTIONS as readonly string[]).includes(value);
}
