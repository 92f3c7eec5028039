/**
 * Collaboration domain model.
 *
 * Collaborators hold a role on a project. Invitations move through a small
 * state machine; accepted, declined and expired are terminal.
 */

export enum CollaboratorRole {
  Viewer = 'viewer',
  Contributor = 'contributor',
  Admin = 'admin',
}

export interface Collaborator {
  id: string;
  projectId: string;
  accountId: string;
  role: CollaboratorRole;
  addedBy: string;
  addedAt: string;
}

export enum InvitationStatus {
  Pending = 'pending',
  Accepted = 'accepted',
  Declined = 'declined',
  Expired = 'expired',
}

export const VALID_INVITATION_TRANSITIONS: Record<InvitationStatus, InvitationStatus[]> = {
  [InvitationStatus.Pending]: [InvitationStatus.Accepted, InvitationStatus.Declined, InvitationStatus.Expired],
  [InvitationStatus.Accepted]: [],
  [InvitationStatus.Declined]: [],
  [InvitationStatus.Expired]: [],
};

export interface Invitation {
  id: string;
  /** Opaque token the invited party acts on. */
  token: string;
  projectId: string;
  inviterId: string;
  /** Set for registered recipients; set on acceptance for email invitations. */
  inviteeId?: string;
  /** Set for recipients invited by email who had no account at the time. */
  email?: string;
  /** Role granted on acceptance. */
  role: CollaboratorRole;
  status: InvitationStatus;
  createdAt: string;
  expiresAt: string;
  respondedAt?: string;
}

export function isTerminalInvitationStatus(status: InvitationStatus): boolean {
  return VALID_INVITATION_TRANSITIONS[status].length === 0;
}

export function isInvitationExpired(invitation: Invitation, now: Date = new Date()): boolean {
  return now.getTime() > new Date(invitation.expiresAt).getTime();
}

/** Whether an invitation is addressed to the given account. */
export function isAddressedTo(invitation: Invitation, account: { id: string; email: string }): boolean {
  if (invitation.inviteeId) return invitation.inviteeId === account.id;
  return invitation.email !== undefined && invitation.email === account.email;
}
