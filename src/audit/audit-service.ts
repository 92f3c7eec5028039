/**
 * Audit Trail Service.
 *
 * Records immutable audit records for every mutating action. A failure to
 * write the audit trail is logged and does not undo the action it describes.
 */

import { v4 as uuid } from 'uuid';
import { AuditRecord, AuditAction, AuditResourceType, AuditOutcome } from '../domain/audit';
import { Store } from '../storage/store';
import { Logger } from '../logger';

/** Input for creating an audit record. */
export interface AuditInput {
  actorId: string;
  projectId?: string;
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId: string;
  outcome?: AuditOutcome;
  details?: Record<string, unknown>;
}

/** The audit service. */
export class AuditService {
  constructor(private store: Store) {}

  /** Record an audit event. */
  async record(input: AuditInput): Promise<AuditRecord> {
    const record: AuditRecord = {
      id: `aud_${uuid()}`,
      timestamp: new Date().toISOString(),
      actorId: input.actorId,
      projectId: input.projectId,
      action: input.action,
      resourceType: input.resourceType,
      resourceId: input.resourceId,
      outcome: input.outcome ?? 'success',
      details: input.details,
    };

    return this.store.audit.create(record);
  }

  /** Record an audit event, logging instead of throwing when the write fails. */
  async tryRecord(input: AuditInput, log: Logger): Promise<void> {
    try {
      await this.record(input);
    } catch (err) {
      log.error('Audit logging failed', {
        action: input.action,
        resourceType: input.resourceType,
        error: err instanceof Error ? err.message : 'Unknown error',
      });
    }
  }
}
