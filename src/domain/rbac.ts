/**
 * Role-based access model.
 *
 * Every life-cycle operation receives the acting identity explicitly.
 * Guards never consult ambient "current user" state.
 */

/** Built-in roles. */
export enum Role {
  /** Submit requests and manage one's own deployments. */
  Requester = 'requester',
  /** Approve or reject pending requests, retrigger pipelines, read the full audit log. */
  Approver = 'approver',
}

/** Permissions that roles grant. */
export enum Permission {
  RequestCreate = 'request:create',
  RequestRead = 'request:read',
  RequestApprove = 'request:approve',
  RequestReject = 'request:reject',
  PipelineRetrigger = 'pipeline:retrigger',
  AuditRead = 'audit:read',
  AuditReadAll = 'audit:read-all',
}

/** Mapping of roles to their granted permissions. */
export const ROLE_PERMISSIONS: Record<Role, Permission[]> = {
  [Role.Requester]: [
    Permission.RequestCreate,
    Permission.RequestRead,
    Permission.AuditRead,
  ],
  [Role.Approver]: Object.values(Permission),
};

/** The identity acting on a request. */
export interface Actor {
  email: string;
  name: string;
  isApprover: boolean;
}

/** Identity used for transitions driven by collaborators rather than people. */
export const SYSTEM_ACTOR: Actor = {
  email: 'system@request-lifecycle.local',
  name: 'Pipeline Reconciler',
  isApprover: false,
};

/** Roles held by an actor. */
export function rolesOf(actor: Actor): Role[] {
  return actor.isApprover ? [Role.Requester, Role.Approver] : [Role.Requester];
}

/** Check if an actor holds a permission. */
export function hasPermission(actor: Actor, permission: Permission): boolean {
  return rolesOf(actor).some((role) => ROLE_PERMISSIONS[role].includes(permission));
}

/** Build an actor, deriving the approver capability from a configured allow-list. */
export function resolveActor(email: string, name: string, approverEmails: readonly string[]): Actor {
  const normalized = email.trim().toLowerCase();
  return {
    email,
    name,
    isApprover: approverEmails.some((a) => a.trim().toLowerCase() === normalized),
  };
}
