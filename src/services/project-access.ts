/**
 * Loads a project together with the actor's role on it and enforces
 * permissions. Shared by the project and collaboration services.
 */

import { Permission, ProjectRole, resolveProjectRole, roleHasPermission } from '../domain/access';
import { RequestContext } from '../domain/context';
import { ServiceError, authorizationError, notFoundError } from '../domain/errors';
import { Project } from '../domain/project';
import { Store } from '../storage/store';

export interface ProjectAccess {
  project: Project;
  role: ProjectRole | null;
}

export class ProjectAccessResolver {
  constructor(private readonly store: Store) {}

  async resolve(ctx: RequestContext, projectId: string): Promise<ProjectAccess> {
    const project = await this.store.projects.getById(projectId);
    if (!project) throw new ServiceError(notFoundError('Project', projectId));
    const collaborator =
      project.ownerId === ctx.actorId ? null : await this.store.collaborators.find(projectId, ctx.actorId);
    return { project, role: resolveProjectRole(project, ctx.actorId, collaborator) };
  }

  /**
   * Require a permission on a project.
   *
   * Accounts with no role at all get NOT_FOUND for read permissions, so a
   * project's existence is only visible to its members; every other denial
   * is FORBIDDEN.
   */
  async require(ctx: RequestContext, projectId: string, permission: Permission): Promise<ProjectAccess> {
    const access = await this.resolve(ctx, projectId);
    if (roleHasPermission(access.role, permission)) return access;

    if (access.role === null && permission.endsWith(':read')) {
      throw new ServiceError(notFoundError('Project', projectId));
    }
    ctx.logger.warn('Permission denied', { projectId, permission, role: access.role });
    throw new ServiceError(
      authorizationError(`Insufficient permissions: ${permission}`, { requiredPermission: permission }),
    );
  }
}
