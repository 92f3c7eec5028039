/**
 * Project/Tracking Service.
 *
 * Projects, their status lifecycle and the append-only deployment log.
 * Status changes and deployment appends run inside a per-project
 * transaction that re-reads the project before writing.
 */

import { v4 as uuid } from 'uuid';
import { Permission } from '../domain/access';
import { RequestContext } from '../domain/context';
import {
  ServiceError,
  conflictError,
  invalidTransitionError,
  notFoundError,
  validationError,
} from '../domain/errors';
import {
  DeploymentOutcome,
  DeploymentRecord,
  DeploymentTarget,
  Project,
  ProjectDashboard,
  ProjectFilters,
  ProjectStatus,
  statusAfterDeployment,
} from '../domain/project';
import { transitionProjectStatus } from '../domain/state-machine';
import {
  createProjectSchema,
  parseInput,
  projectFiltersSchema,
  projectStatusSchema,
  recordDeploymentSchema,
  repositoryOwnerMismatch,
  updateProjectSchema,
} from '../domain/validation';
import { AuditService } from '../audit/audit-service';
import { Store } from '../storage/store';
import { ProjectAccessResolver } from './project-access';

export interface CreateProjectInput extends DeploymentTarget {
  name: string;
  description?: string;
}

export type UpdateProjectInput = Partial<CreateProjectInput>;

export interface RecordDeploymentInput {
  outcome: DeploymentOutcome;
  notes?: string;
}

const DEFAULT_PAGE_SIZE = 20;
const DASHBOARD_RECENT = 5;

function projectKey(projectId: string): string {
  return `project:${projectId}`;
}

/** Guards name uniqueness across one owner's projects. Taken after a project key, never before. */
function ownerProjectsKey(ownerId: string): string {
  return `owner:${ownerId}:projects`;
}

export class ProjectService {
  private readonly access: ProjectAccessResolver;

  constructor(
    private readonly store: Store,
    private readonly auditService: AuditService,
  ) {
    this.access = new ProjectAccessResolver(store);
  }

  /** Create a project owned by the actor, starting in `planned`. */
  async createProject(ctx: RequestContext, input: CreateProjectInput): Promise<Project> {
    const parsed = parseInput(createProjectSchema, input);
    this.checkRepositoryOwner(parsed.githubUsername, parsed.repositoryUrl);

    const owner = await this.store.accounts.getById(ctx.actorId);
    if (!owner) throw new ServiceError(notFoundError('Account', ctx.actorId));

    const project = await this.store.transaction(ownerProjectsKey(ctx.actorId), async () => {
      if (await this.store.projects.findByOwnerAndName(ctx.actorId, parsed.name)) {
        throw new ServiceError(conflictError(`A project named "${parsed.name}" already exists`, { field: 'name' }));
      }
      const now = new Date().toISOString();
      return this.store.projects.create({
        id: `proj_${uuid()}`,
        ownerId: ctx.actorId,
        name: parsed.name,
        description: parsed.description,
        githubUsername: parsed.githubUsername,
        repositoryUrl: parsed.repositoryUrl,
        domainName: parsed.domainName,
        databaseName: parsed.databaseName,
        status: ProjectStatus.Planned,
        createdAt: now,
        updatedAt: now,
      });
    });

    await this.auditService.tryRecord(
      {
        actorId: ctx.actorId,
        projectId: project.id,
        action: 'project.created',
        resourceType: 'project',
        resourceId: project.id,
      },
      ctx.logger,
    );
    ctx.logger.info('Project created', { projectId: project.id });
    return project;
  }

  async getProject(ctx: RequestContext, projectId: string): Promise<Project> {
    const { project } = await this.access.require(ctx, projectId, Permission.ProjectRead);
    return project;
  }

  /**
   * Projects the actor owns or collaborates on, newest first.
   *
   * The result is lazy and restartable: each iteration starts over and
   * reads the store one page at a time, so it reflects writes made between
   * iterations.
   */
  listProjects(ctx: RequestContext, filters: ProjectFilters = {}): AsyncIterable<Project> {
    const parsed = parseInput(projectFiltersSchema, filters);
    const pageSize = parsed.pageSize ?? DEFAULT_PAGE_SIZE;
    const store = this.store;
    const accountId = ctx.actorId;

    return {
      async *[Symbol.asyncIterator]() {
        const memberships = await store.collaborators.listByAccount(accountId);
        const projectIds = memberships.map((m) => m.projectId);
        let offset = 0;
        while (true) {
          const page = await store.projects.list({
            ownerId: accountId,
            projectIds,
            status: parsed.status,
            includeArchived: parsed.includeArchived,
            limit: pageSize,
            offset,
          });
          yield* page;
          if (page.length < pageSize) return;
          offset += pageSize;
        }
      },
    };
  }

  /** Change name, description or deployment target. */
  async updateProject(ctx: RequestContext, projectId: string, fields: UpdateProjectInput): Promise<Project> {
    const parsed = parseInput(updateProjectSchema, fields);

    const updated = await this.store.transaction(projectKey(projectId), async () => {
      const { project } = await this.access.require(ctx, projectId, Permission.ProjectUpdate);
      if (project.status === ProjectStatus.Archived) {
        throw new ServiceError(validationError('Archived projects cannot be modified'));
      }
      this.checkRepositoryOwner(
        parsed.githubUsername ?? project.githubUsername,
        parsed.repositoryUrl ?? project.repositoryUrl,
      );
      const newName = parsed.name;
      if (newName === undefined || newName.toLowerCase() === project.name.toLowerCase()) {
        return this.saveProject(projectId, parsed);
      }
      return this.store.transaction(ownerProjectsKey(project.ownerId), async () => {
        const clash = await this.store.projects.findByOwnerAndName(project.ownerId, newName);
        if (clash && clash.id !== projectId) {
          throw new ServiceError(conflictError(`A project named "${newName}" already exists`, { field: 'name' }));
        }
        return this.saveProject(projectId, parsed);
      });
    });

    await this.auditService.tryRecord(
      {
        actorId: ctx.actorId,
        projectId,
        action: 'project.updated',
        resourceType: 'project',
        resourceId: projectId,
        details: { fields: Object.keys(parsed) },
      },
      ctx.logger,
    );
    return updated;
  }

  /** Move a project to a new status; requires write access. */
  async updateStatus(ctx: RequestContext, projectId: string, newStatus: ProjectStatus): Promise<Project> {
    const target = parseInput(projectStatusSchema, newStatus);
    const permission = target === ProjectStatus.Archived ? Permission.ProjectArchive : Permission.ProjectUpdate;

    const { previous, updated } = await this.store.transaction(projectKey(projectId), async () => {
      const { project } = await this.access.require(ctx, projectId, permission);
      const result = transitionProjectStatus(project.status, target);
      if (!result.success) {
        throw new ServiceError(result.error ?? invalidTransitionError('project', project.status, target));
      }
      const saved = await this.store.projects.update(projectId, { status: target });
      if (!saved) throw new ServiceError(notFoundError('Project', projectId));
      return { previous: project.status, updated: saved };
    });

    await this.auditService.tryRecord(
      {
        actorId: ctx.actorId,
        projectId,
        action: target === ProjectStatus.Archived ? 'project.archived' : 'project.status_changed',
        resourceType: 'project',
        resourceId: projectId,
        details: { from: previous, to: target },
      },
      ctx.logger,
    );
    ctx.logger.info('Project status changed', { projectId, from: previous, to: target });
    return updated;
  }

  /** Archive instead of delete. Owner only. */
  async archiveProject(ctx: RequestContext, projectId: string): Promise<Project> {
    return this.updateStatus(ctx, projectId, ProjectStatus.Archived);
  }

  /** Append a deployment to the project's history. Earlier entries are never touched. */
  async recordDeployment(
    ctx: RequestContext,
    projectId: string,
    input: RecordDeploymentInput,
  ): Promise<DeploymentRecord> {
    const parsed = parseInput(recordDeploymentSchema, input);

    const record = await this.store.transaction(projectKey(projectId), async () => {
      const { project } = await this.access.require(ctx, projectId, Permission.DeploymentRecord);
      if (project.status === ProjectStatus.Archived) {
        throw new ServiceError(validationError('Deployments cannot be recorded for archived projects'));
      }

      const nextStatus = statusAfterDeployment(project.status, parsed.outcome);
      if (nextStatus !== project.status) {
        await this.store.projects.update(projectId, { status: nextStatus });
      }

      const sequence = (await this.store.deployments.countByProject(projectId)) + 1;
      return this.store.deployments.append({
        id: `dep_${uuid()}`,
        projectId,
        sequence,
        outcome: parsed.outcome,
        projectStatus: nextStatus,
        triggeredBy: ctx.actorId,
        notes: parsed.notes,
        createdAt: new Date().toISOString(),
      });
    });

    await this.auditService.tryRecord(
      {
        actorId: ctx.actorId,
        projectId,
        action: 'deployment.recorded',
        resourceType: 'deployment',
        resourceId: record.id,
        details: { outcome: record.outcome, sequence: record.sequence },
      },
      ctx.logger,
    );
    return record;
  }

  /** Deployment history, oldest first. */
  async listDeployments(ctx: RequestContext, projectId: string): Promise<DeploymentRecord[]> {
    await this.access.require(ctx, projectId, Permission.DeploymentRead);
    const total = await this.store.deployments.countByProject(projectId);
    return this.store.deployments.listByProject(projectId, { limit: total });
  }

  /** Counts of the actor's own live projects by status, plus the latest few. */
  async getDashboard(ctx: RequestContext): Promise<ProjectDashboard> {
    const byStatus = {
      [ProjectStatus.Planned]: 0,
      [ProjectStatus.Active]: 0,
      [ProjectStatus.Deployed]: 0,
    };
    const recent: Project[] = [];
    let total = 0;
    let offset = 0;
    const pageSize = 100;
    while (true) {
      const page = await this.store.projects.list({ ownerId: ctx.actorId, limit: pageSize, offset });
      for (const project of page) {
        if (project.status === ProjectStatus.Archived) continue;
        total++;
        byStatus[project.status]++;
        if (recent.length < DASHBOARD_RECENT) recent.push(project);
      }
      if (page.length < pageSize) break;
      offset += pageSize;
    }
    return { total, byStatus, recent };
  }

  private async saveProject(projectId: string, updates: Partial<Project>): Promise<Project> {
    const saved = await this.store.projects.update(projectId, updates);
    if (!saved) throw new ServiceError(notFoundError('Project', projectId));
    return saved;
  }

  private checkRepositoryOwner(githubUsername?: string, repositoryUrl?: string): void {
    const mismatch = repositoryOwnerMismatch(githubUsername, repositoryUrl);
    if (mismatch) {
      throw new ServiceError(validationError(mismatch, { field: 'repositoryUrl' }));
    }
  }
}
