/**
 * Collaboration Service.
 *
 * Invitations and collaborator membership. Every invitation transition runs
 * under the invitation's own transaction key and re-reads the record first;
 * a pending invitation past its expiry is persisted as expired before any
 * other transition is considered.
 */

import { v4 as uuid } from 'uuid';
import { Permission } from '../domain/access';
import { Account, AccountStatus, AccountSummary, normalizeEmail, toAccountSummary } from '../domain/account';
import {
  Collaborator,
  CollaboratorRole,
  Invitation,
  InvitationStatus,
  isAddressedTo,
  isInvitationExpired,
  isTerminalInvitationStatus,
} from '../domain/collaboration';
import { RequestContext } from '../domain/context';
import {
  ServiceError,
  authorizationError,
  conflictError,
  createTypedError,
  invalidTransitionError,
  notFoundError,
  validationError,
} from '../domain/errors';
import { Project, ProjectStatus } from '../domain/project';
import { transitionInvitationStatus } from '../domain/state-machine';
import { collaboratorRoleSchema, inviteSchema, parseInput } from '../domain/validation';
import { AuditService } from '../audit/audit-service';
import { InvitationNotifier } from '../notifications/invitation-notifier';
import { Store } from '../storage/store';
import { ProjectAccessResolver } from './project-access';

export interface InviteInput {
  inviteeId?: string;
  email?: string;
  role?: CollaboratorRole;
}

export interface CollaboratorWithAccount extends Collaborator {
  account: AccountSummary | null;
}

export interface Collaboration {
  collaborator: Collaborator;
  project: Pick<Project, 'id' | 'name' | 'status' | 'ownerId'>;
}

export interface CollaborationServiceOptions {
  invitationTtlDays: number;
  /** Base for the accept/decline links in invitation mails. */
  publicBaseUrl: string;
  now?: () => Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function invitationKey(invitationId: string): string {
  return `invitation:${invitationId}`;
}

function membersKey(projectId: string): string {
  return `members:${projectId}`;
}

export class CollaborationService {
  private readonly access: ProjectAccessResolver;
  private readonly now: () => Date;

  constructor(
    private readonly store: Store,
    private readonly auditService: AuditService,
    private readonly notifier: InvitationNotifier,
    private readonly options: CollaborationServiceOptions,
  ) {
    this.access = new ProjectAccessResolver(store);
    this.now = options.now ?? (() => new Date());
  }

  /** Invite a registered account or an email address to a project. */
  async invite(ctx: RequestContext, projectId: string, input: InviteInput): Promise<Invitation> {
    const parsed = parseInput(inviteSchema, input);
    const { project } = await this.access.require(ctx, projectId, Permission.InvitationManage);
    if (project.status === ProjectStatus.Archived) {
      throw new ServiceError(validationError('Archived projects cannot take new collaborators'));
    }

    const recipient = await this.resolveRecipient(parsed);
    if (recipient.account?.id === project.ownerId) {
      throw new ServiceError(validationError('The project owner cannot be invited'));
    }

    const stale: Invitation[] = [];
    const invitation = await this.store.transaction(membersKey(projectId), async () => {
      if (recipient.account && (await this.store.collaborators.find(projectId, recipient.account.id))) {
        throw new ServiceError(conflictError('Account is already a collaborator on this project'));
      }

      const pending = await this.store.invitations.listByProject(projectId, {
        status: InvitationStatus.Pending,
        limit: Number.MAX_SAFE_INTEGER,
      });
      for (const existing of pending) {
        const sameRecipient = recipient.account
          ? existing.inviteeId === recipient.account.id || existing.email === recipient.account.email
          : existing.email === recipient.email;
        if (!sameRecipient) continue;
        if (!isInvitationExpired(existing, this.now())) {
          throw new ServiceError(conflictError('A pending invitation already exists for this recipient'));
        }
        stale.push(existing);
      }

      const now = this.now();
      return this.store.invitations.create({
        id: `inv_${uuid()}`,
        token: uuid(),
        projectId,
        inviterId: ctx.actorId,
        inviteeId: recipient.account?.id,
        email: recipient.account ? undefined : recipient.email,
        role: parsed.role ?? CollaboratorRole.Viewer,
        status: InvitationStatus.Pending,
        createdAt: now.toISOString(),
        expiresAt: new Date(now.getTime() + this.options.invitationTtlDays * DAY_MS).toISOString(),
      });
    });

    await this.auditService.tryRecord(
      {
        actorId: ctx.actorId,
        projectId,
        action: 'invitation.created',
        resourceType: 'invitation',
        resourceId: invitation.id,
        details: { role: invitation.role, registered: Boolean(invitation.inviteeId) },
      },
      ctx.logger,
    );
    // Never take an invitation lock while holding the members lock.
    for (const existing of stale) await this.refresh(ctx, existing);
    await this.notify(ctx, invitation, project, recipient.account?.email ?? recipient.email);
    return invitation;
  }

  /** All invitations of a project, newest first. Members only. */
  async listInvitations(ctx: RequestContext, projectId: string): Promise<Invitation[]> {
    await this.access.require(ctx, projectId, Permission.InvitationRead);
    const invitations = await this.store.invitations.listByProject(projectId, { limit: Number.MAX_SAFE_INTEGER });
    return Promise.all(invitations.map((i) => this.refresh(ctx, i)));
  }

  /** Pending invitations addressed to the actor by id or email. */
  async listMyInvitations(ctx: RequestContext): Promise<Invitation[]> {
    const account = await this.actorAccount(ctx);
    const invitations = await this.store.invitations.listForRecipient(
      account.id,
      account.email,
      InvitationStatus.Pending,
    );
    const current = await Promise.all(invitations.map((i) => this.refresh(ctx, i)));
    return current.filter((i) => i.status === InvitationStatus.Pending);
  }

  /** Accept an invitation; the actor becomes a collaborator with the invited role. */
  async acceptInvitation(ctx: RequestContext, token: string): Promise<Collaborator> {
    const account = await this.actorAccount(ctx);
    const found = await this.invitationByToken(token);

    const { invitation, collaborator } = await this.store.transaction(invitationKey(found.id), async () => {
      const current = await this.reload(ctx, found.id);
      this.requireRecipient(current, account);
      this.requireTransition(current, InvitationStatus.Accepted);

      const project = await this.store.projects.getById(current.projectId);
      if (!project || project.status === ProjectStatus.Archived) {
        throw new ServiceError(validationError('The project is no longer available'));
      }
      if (project.ownerId === account.id) {
        throw new ServiceError(validationError('The project owner cannot be added as a collaborator'));
      }

      const added = await this.store.transaction(membersKey(current.projectId), async () => {
        if (await this.store.collaborators.find(current.projectId, account.id)) {
          throw new ServiceError(conflictError('Account is already a collaborator on this project'));
        }
        return this.store.collaborators.create({
          id: `col_${uuid()}`,
          projectId: current.projectId,
          accountId: account.id,
          role: current.role,
          addedBy: current.inviterId,
          addedAt: this.now().toISOString(),
        });
      });

      const accepted = await this.saveInvitation(current.id, {
        status: InvitationStatus.Accepted,
        respondedAt: this.now().toISOString(),
        inviteeId: account.id,
      });
      return { invitation: accepted, collaborator: added };
    });

    await this.auditService.tryRecord(
      {
        actorId: ctx.actorId,
        projectId: invitation.projectId,
        action: 'invitation.accepted',
        resourceType: 'invitation',
        resourceId: invitation.id,
      },
      ctx.logger,
    );
    await this.auditService.tryRecord(
      {
        actorId: ctx.actorId,
        projectId: collaborator.projectId,
        action: 'collaborator.added',
        resourceType: 'collaborator',
        resourceId: collaborator.id,
        details: { role: collaborator.role },
      },
      ctx.logger,
    );
    ctx.logger.info('Invitation accepted', { invitationId: invitation.id, projectId: invitation.projectId });
    return collaborator;
  }

  async declineInvitation(ctx: RequestContext, token: string): Promise<Invitation> {
    const account = await this.actorAccount(ctx);
    const found = await this.invitationByToken(token);

    const invitation = await this.store.transaction(invitationKey(found.id), async () => {
      const current = await this.reload(ctx, found.id);
      this.requireRecipient(current, account);
      this.requireTransition(current, InvitationStatus.Declined);
      return this.saveInvitation(current.id, {
        status: InvitationStatus.Declined,
        respondedAt: this.now().toISOString(),
      });
    });

    await this.auditService.tryRecord(
      {
        actorId: ctx.actorId,
        projectId: invitation.projectId,
        action: 'invitation.declined',
        resourceType: 'invitation',
        resourceId: invitation.id,
      },
      ctx.logger,
    );
    return invitation;
  }

  /** Withdraw a pending invitation. It ends in the expired state. */
  async cancelInvitation(ctx: RequestContext, invitationId: string): Promise<Invitation> {
    const found = await this.invitationById(invitationId);
    await this.access.require(ctx, found.projectId, Permission.InvitationManage);

    const invitation = await this.store.transaction(invitationKey(invitationId), async () => {
      const current = await this.reload(ctx, invitationId);
      this.requireTransition(current, InvitationStatus.Expired);
      return this.saveInvitation(invitationId, {
        status: InvitationStatus.Expired,
        respondedAt: this.now().toISOString(),
      });
    });

    await this.auditService.tryRecord(
      {
        actorId: ctx.actorId,
        projectId: invitation.projectId,
        action: 'invitation.canceled',
        resourceType: 'invitation',
        resourceId: invitation.id,
      },
      ctx.logger,
    );
    return invitation;
  }

  /** Push a pending invitation's expiry out by a full TTL and send it again. */
  async resendInvitation(ctx: RequestContext, invitationId: string): Promise<Invitation> {
    const found = await this.invitationById(invitationId);
    const { project } = await this.access.require(ctx, found.projectId, Permission.InvitationManage);

    const invitation = await this.store.transaction(invitationKey(invitationId), async () => {
      const current = await this.reload(ctx, invitationId);
      if (current.status !== InvitationStatus.Pending) {
        throw new ServiceError(
          createTypedError({
            code: 'STATE.INVALID_TRANSITION',
            message: 'Invitation is not pending',
            details: { resourceType: 'invitation', status: current.status },
          }),
        );
      }
      const expiresAt = new Date(this.now().getTime() + this.options.invitationTtlDays * DAY_MS).toISOString();
      return this.saveInvitation(invitationId, { expiresAt });
    });

    await this.auditService.tryRecord(
      {
        actorId: ctx.actorId,
        projectId: invitation.projectId,
        action: 'invitation.resent',
        resourceType: 'invitation',
        resourceId: invitation.id,
      },
      ctx.logger,
    );
    const recipient = invitation.inviteeId ? await this.store.accounts.getById(invitation.inviteeId) : null;
    await this.notify(ctx, invitation, project, recipient?.email ?? invitation.email);
    return invitation;
  }

  async listCollaborators(ctx: RequestContext, projectId: string): Promise<CollaboratorWithAccount[]> {
    await this.access.require(ctx, projectId, Permission.CollaboratorRead);
    const collaborators = await this.store.collaborators.listByProject(projectId);
    return Promise.all(
      collaborators.map(async (c) => {
        const account = await this.store.accounts.getById(c.accountId);
        return { ...c, account: account ? toAccountSummary(account) : null };
      }),
    );
  }

  /** Projects the actor collaborates on, most recently joined first. */
  async listMyCollaborations(ctx: RequestContext): Promise<Collaboration[]> {
    const memberships = await this.store.collaborators.listByAccount(ctx.actorId);
    const result: Collaboration[] = [];
    for (const collaborator of memberships) {
      const project = await this.store.projects.getById(collaborator.projectId);
      if (!project) continue;
      result.push({
        collaborator,
        project: { id: project.id, name: project.name, status: project.status, ownerId: project.ownerId },
      });
    }
    return result;
  }

  async updateCollaboratorRole(
    ctx: RequestContext,
    projectId: string,
    collaboratorId: string,
    role: CollaboratorRole,
  ): Promise<Collaborator> {
    const newRole = parseInput(collaboratorRoleSchema, role);
    await this.access.require(ctx, projectId, Permission.CollaboratorManage);

    const { previous, updated } = await this.store.transaction(membersKey(projectId), async () => {
      const collaborator = await this.collaboratorInProject(projectId, collaboratorId);
      const saved = await this.store.collaborators.update(collaboratorId, { role: newRole });
      if (!saved) throw new ServiceError(notFoundError('Collaborator', collaboratorId));
      return { previous: collaborator.role, updated: saved };
    });

    await this.auditService.tryRecord(
      {
        actorId: ctx.actorId,
        projectId,
        action: 'collaborator.updated',
        resourceType: 'collaborator',
        resourceId: collaboratorId,
        details: { from: previous, to: newRole },
      },
      ctx.logger,
    );
    return updated;
  }

  /** Remove a collaborator. Managers may remove anyone; collaborators may leave. */
  async removeCollaborator(ctx: RequestContext, projectId: string, collaboratorId: string): Promise<void> {
    await this.access.require(ctx, projectId, Permission.CollaboratorRead);
    const found = await this.collaboratorInProject(projectId, collaboratorId);
    if (found.accountId !== ctx.actorId) {
      await this.access.require(ctx, projectId, Permission.CollaboratorManage);
    }

    await this.store.transaction(membersKey(projectId), async () => {
      await this.collaboratorInProject(projectId, collaboratorId);
      await this.store.collaborators.delete(collaboratorId);
    });

    await this.auditService.tryRecord(
      {
        actorId: ctx.actorId,
        projectId,
        action: 'collaborator.removed',
        resourceType: 'collaborator',
        resourceId: collaboratorId,
        details: { accountId: found.accountId },
      },
      ctx.logger,
    );
  }

  private async resolveRecipient(input: {
    inviteeId?: string;
    email?: string;
  }): Promise<{ account: Account | null; email?: string }> {
    if (input.inviteeId) {
      const account = await this.store.accounts.getById(input.inviteeId);
      if (!account || account.status !== AccountStatus.Active) {
        throw new ServiceError(notFoundError('Account', input.inviteeId));
      }
      return { account };
    }
    const email = normalizeEmail(input.email ?? '');
    const account = await this.store.accounts.getByEmail(email);
    if (account && account.status === AccountStatus.Active) return { account };
    return { account: null, email };
  }

  private async actorAccount(ctx: RequestContext): Promise<Account> {
    const account = await this.store.accounts.getById(ctx.actorId);
    if (!account) throw new ServiceError(notFoundError('Account', ctx.actorId));
    return account;
  }

  private async invitationByToken(token: string): Promise<Invitation> {
    const invitation = await this.store.invitations.getByToken(token);
    if (!invitation) throw new ServiceError(notFoundError('Invitation', token));
    return invitation;
  }

  private async invitationById(invitationId: string): Promise<Invitation> {
    const invitation = await this.store.invitations.getById(invitationId);
    if (!invitation) throw new ServiceError(notFoundError('Invitation', invitationId));
    return invitation;
  }

  private async collaboratorInProject(projectId: string, collaboratorId: string): Promise<Collaborator> {
    const collaborator = await this.store.collaborators.getById(collaboratorId);
    if (!collaborator || collaborator.projectId !== projectId) {
      throw new ServiceError(notFoundError('Collaborator', collaboratorId));
    }
    return collaborator;
  }

  /** Re-read inside a transaction, applying expiry. */
  private async reload(ctx: RequestContext, invitationId: string): Promise<Invitation> {
    return this.expireIfStale(ctx, await this.invitationById(invitationId));
  }

  /** Bring a listed snapshot up to date; one that looks stale is re-read under its lock before expiring. */
  private async refresh(ctx: RequestContext, snapshot: Invitation): Promise<Invitation> {
    if (isTerminalInvitationStatus(snapshot.status) || !isInvitationExpired(snapshot, this.now())) {
      return snapshot;
    }
    return this.store.transaction(invitationKey(snapshot.id), () => this.reload(ctx, snapshot.id));
  }

  /** Persist pending → expired when the TTL has run out. The caller holds the invitation lock. */
  private async expireIfStale(ctx: RequestContext, invitation: Invitation): Promise<Invitation> {
    if (isTerminalInvitationStatus(invitation.status) || !isInvitationExpired(invitation, this.now())) {
      return invitation;
    }
    const expired = await this.saveInvitation(invitation.id, { status: InvitationStatus.Expired });
    await this.auditService.tryRecord(
      {
        actorId: ctx.actorId,
        projectId: invitation.projectId,
        action: 'invitation.expired',
        resourceType: 'invitation',
        resourceId: invitation.id,
        details: { expiresAt: invitation.expiresAt },
      },
      ctx.logger,
    );
    return expired;
  }

  private requireRecipient(invitation: Invitation, account: Account): void {
    if (!isAddressedTo(invitation, account)) {
      throw new ServiceError(authorizationError('This invitation is addressed to someone else'));
    }
  }

  private requireTransition(invitation: Invitation, target: InvitationStatus): void {
    const result = transitionInvitationStatus(invitation.status, target);
    if (!result.success) {
      throw new ServiceError(result.error ?? invalidTransitionError('invitation', invitation.status, target));
    }
  }

  private async saveInvitation(invitationId: string, updates: Partial<Invitation>): Promise<Invitation> {
    const saved = await this.store.invitations.update(invitationId, updates);
    if (!saved) throw new ServiceError(notFoundError('Invitation', invitationId));
    return saved;
  }

  /** Delivery failures are logged; the invitation stands either way. */
  private async notify(
    ctx: RequestContext,
    invitation: Invitation,
    project: Project,
    to: string | undefined,
  ): Promise<void> {
    if (!to) return;
    const inviter = await this.store.accounts.getById(invitation.inviterId);
    const base = this.options.publicBaseUrl.replace(/\/+$/, '');
    try {
      await this.notifier.sendInvitation({
        to,
        projectName: project.name,
        inviterName: inviter?.fullName ?? 'A project member',
        role: invitation.role,
        acceptUrl: `${base}/collaboration/invitations/${invitation.token}/accept`,
        declineUrl: `${base}/collaboration/invitations/${invitation.token}/decline`,
        expiresAt: invitation.expiresAt,
      });
    } catch (err) {
      ctx.logger.warn('Invitation created but notification could not be sent', {
        invitationId: invitation.id,
        error: err instanceof Error ? err.message : 'Unknown error',
      });
    }
  }
}
