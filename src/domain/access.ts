/**
 * Project access control.
 *
 * An account's role on a project is derived from ownership or a
 * collaborator record; each role grants a fixed set of permissions.
 */

import { Collaborator, CollaboratorRole } from './collaboration';
import { Project } from './project';

/** Effective roles on a project, owner included. */
export type ProjectRole = 'owner' | CollaboratorRole;

/** Permissions that project roles grant. */
export enum Permission {
  ProjectRead = 'project:read',
  ProjectUpdate = 'project:update',
  ProjectArchive = 'project:archive',
  DeploymentRead = 'deployment:read',
  DeploymentRecord = 'deployment:record',
  InvitationRead = 'invitation:read',
  InvitationManage = 'invitation:manage',
  CollaboratorRead = 'collaborator:read',
  CollaboratorManage = 'collaborator:manage',
}

const READ_PERMISSIONS = [
  Permission.ProjectRead,
  Permission.DeploymentRead,
  Permission.InvitationRead,
  Permission.CollaboratorRead,
];

const WRITE_PERMISSIONS = [
  ...READ_PERMISSIONS,
  Permission.ProjectUpdate,
  Permission.DeploymentRecord,
];

/** Mapping of roles to their granted permissions. */
export const ROLE_PERMISSIONS: Record<ProjectRole, Permission[]> = {
  owner: Object.values(Permission),
  [CollaboratorRole.Admin]: [...WRITE_PERMISSIONS, Permission.InvitationManage, Permission.CollaboratorManage],
  [CollaboratorRole.Contributor]: WRITE_PERMISSIONS,
  [CollaboratorRole.Viewer]: READ_PERMISSIONS,
};

/** Resolve the role an account holds on a project, or null for outsiders. */
export function resolveProjectRole(
  project: Project,
  accountId: string,
  collaborator: Collaborator | null,
): ProjectRole | null {
  if (project.ownerId === accountId) return 'owner';
  if (collaborator && collaborator.projectId === project.id && collaborator.accountId === accountId) {
    return collaborator.role;
  }
  return null;
}

export function roleHasPermission(role: ProjectRole | null, permission: Permission): boolean {
  if (!role) return false;
  return ROLE_PERMISSIONS[role].includes(permission);
}
