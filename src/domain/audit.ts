/**
 * Audit trail domain model.
 *
 * Immutable records of every mutating action, queryable per account or
 * per project.
 */

/** Audit event categories. */
export type AuditAction =
  | 'account.registered'
  | 'account.updated'
  | 'account.password_changed'
  | 'account.deactivated'
  | 'session.created'
  | 'session.revoked'
  | 'project.created'
  | 'project.updated'
  | 'project.status_changed'
  | 'project.archived'
  | 'deployment.recorded'
  | 'invitation.created'
  | 'invitation.resent'
  | 'invitation.accepted'
  | 'invitation.declined'
  | 'invitation.expired'
  | 'invitation.canceled'
  | 'collaborator.added'
  | 'collaborator.updated'
  | 'collaborator.removed';

/** Resource types for audit records. */
export type AuditResourceType =
  | 'account'
  | 'session'
  | 'project'
  | 'deployment'
  | 'invitation'
  | 'collaborator';

/** Audit outcome. */
export type AuditOutcome = 'success' | 'failure';

/** An immutable audit record. */
export interface AuditRecord {
  id: string;
  timestamp: string;
  actorId: string;
  projectId?: string;
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId: string;
  outcome: AuditOutcome;
  /** Additional context about the action. */
  details?: Record<string, unknown>;
}
