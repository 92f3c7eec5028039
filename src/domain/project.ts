/**
 * Project and deployment domain model.
 *
 * A project is a tracked unit of work owned by exactly one account. Its
 * status follows a fixed transition table; deployments are recorded as an
 * append-only log.
 */

export enum ProjectStatus {
  Planned = 'planned',
  Active = 'active',
  Deployed = 'deployed',
  Archived = 'archived',
}

/** Valid status transitions for projects. Archived is final. */
export const VALID_PROJECT_TRANSITIONS: Record<ProjectStatus, ProjectStatus[]> = {
  [ProjectStatus.Planned]: [ProjectStatus.Active, ProjectStatus.Archived],
  [ProjectStatus.Active]: [ProjectStatus.Planned, ProjectStatus.Deployed, ProjectStatus.Archived],
  [ProjectStatus.Deployed]: [ProjectStatus.Active, ProjectStatus.Archived],
  [ProjectStatus.Archived]: [],
};

/** Where and how a project is deployed. All fields optional. */
export interface DeploymentTarget {
  githubUsername?: string;
  repositoryUrl?: string;
  domainName?: string;
  databaseName?: string;
}

export interface Project extends DeploymentTarget {
  id: string;
  ownerId: string;
  name: string;
  description?: string;
  status: ProjectStatus;
  createdAt: string;
  updatedAt: string;
}

export enum DeploymentOutcome {
  Succeeded = 'succeeded',
  Failed = 'failed',
}

export interface DeploymentRecord {
  id: string;
  projectId: string;
  /** 1-based position in the project's deployment history. */
  sequence: number;
  outcome: DeploymentOutcome;
  /** Project status after this deployment was recorded. */
  projectStatus: ProjectStatus;
  triggeredBy: string;
  notes?: string;
  createdAt: string;
}

/** Filters accepted by project listing. */
export interface ProjectFilters {
  status?: ProjectStatus;
  includeArchived?: boolean;
  pageSize?: number;
}

/** Per-status counts for an owner's dashboard. */
export interface ProjectDashboard {
  total: number;
  byStatus: Record<Exclude<ProjectStatus, ProjectStatus.Archived>, number>;
  recent: Project[];
}

/** Status a deployment outcome moves the project to, if any. */
export function statusAfterDeployment(current: ProjectStatus, outcome: DeploymentOutcome): ProjectStatus {
  if (outcome === DeploymentOutcome.Succeeded && current === ProjectStatus.Active) return ProjectStatus.Deployed;
  if (outcome === DeploymentOutcome.Failed && current === ProjectStatus.Deployed) return ProjectStatus.Active;
  return current;
}

/** The URL a deployed project is served from. */
export function deploymentUrl(project: Project): string | undefined {
  return project.domainName ? `https://${project.domainName}` : undefined;
}

/** Repository name taken from the last path segment of the repository URL. */
export function repositoryName(project: Project): string | undefined {
  if (!project.repositoryUrl) return undefined;
  const parts = project.repositoryUrl.replace(/\/+$/, '').split('/');
  return parts.length >= 2 ? parts[parts.length - 1] : undefined;
}
