/**
 * Project API routes.
 *
 * Projects, status changes and the deployment log. Every route requires a
 * bearer token; per-project permissions are enforced by ProjectService.
 */

import { Router } from 'express';
import { Project, ProjectFilters, ProjectStatus, deploymentUrl, repositoryName } from '../domain/project';
import { ServiceError, validationError } from '../domain/errors';
import { ProjectService } from '../services/project-service';
import { asyncHandler, contextOf } from './middleware';

const PROJECT_STATUSES: string[] = Object.values(ProjectStatus);

function isProjectStatus(value: string): value is ProjectStatus {
  return PROJECT_STATUSES.includes(value);
}

/** Translate query-string filters; the service validates ranges. */
function parseFilters(query: Record<string, unknown>): ProjectFilters {
  const filters: ProjectFilters = {};
  if (typeof query.status === 'string') {
    if (!isProjectStatus(query.status)) {
      throw new ServiceError(validationError(`Unknown project status: ${query.status}`, { field: 'status' }));
    }
    filters.status = query.status;
  }
  if (typeof query.includeArchived === 'string') {
    filters.includeArchived = query.includeArchived === 'true' || query.includeArchived === '1';
  }
  if (typeof query.pageSize === 'string') {
    filters.pageSize = Number(query.pageSize);
  }
  return filters;
}

export function createProjectRoutes(projectService: ProjectService): Router {
  const router = Router();

  /**
   * GET /projects
   * Projects the caller owns or collaborates on, newest first.
   * Query: status, includeArchived, pageSize (store page size).
   */
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const projects: Project[] = [];
      for await (const project of projectService.listProjects(contextOf(req), parseFilters(req.query))) {
        projects.push(project);
      }
      res.json({ projects });
    }),
  );

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const project = await projectService.createProject(contextOf(req), req.body);
      res.status(201).json({ project });
    }),
  );

  router.get(
    '/dashboard',
    asyncHandler(async (req, res) => {
      const dashboard = await projectService.getDashboard(contextOf(req));
      res.json(dashboard);
    }),
  );

  /** GET /projects/:projectId, with the derived deployment URL and repository name. */
  router.get(
    '/:projectId',
    asyncHandler(async (req, res) => {
      const project = await projectService.getProject(contextOf(req), req.params.projectId);
      res.json({
        project,
        deploymentUrl: deploymentUrl(project) ?? null,
        repositoryName: repositoryName(project) ?? null,
      });
    }),
  );

  router.patch(
    '/:projectId',
    asyncHandler(async (req, res) => {
      const project = await projectService.updateProject(contextOf(req), req.params.projectId, req.body);
      res.json({ project });
    }),
  );

  /**
   * POST /projects/:projectId/status
   * Body: { status }. Illegal transitions answer 409.
   */
  router.post(
    '/:projectId/status',
    asyncHandler(async (req, res) => {
      const body: { status?: unknown } = req.body ?? {};
      if (typeof body.status !== 'string' || !isProjectStatus(body.status)) {
        throw new ServiceError(
          validationError(`Unknown project status: ${String(body.status)}`, {
            field: 'status',
            validStatuses: PROJECT_STATUSES,
          }),
        );
      }
      const project = await projectService.updateStatus(contextOf(req), req.params.projectId, body.status);
      res.json({ project });
    }),
  );

  router.post(
    '/:projectId/archive',
    asyncHandler(async (req, res) => {
      const project = await projectService.archiveProject(contextOf(req), req.params.projectId);
      res.json({ project });
    }),
  );

  router.get(
    '/:projectId/deployments',
    asyncHandler(async (req, res) => {
      const deployments = await projectService.listDeployments(contextOf(req), req.params.projectId);
      res.json({ deployments });
    }),
  );

  /**
   * POST /projects/:projectId/deployments
   * Body: { outcome: "succeeded" | "failed", notes? }. Appends to the log.
   */
  router.post(
    '/:projectId/deployments',
    asyncHandler(async (req, res) => {
      const deployment = await projectService.recordDeployment(contextOf(req), req.params.projectId, req.body);
      res.status(201).json({ deployment });
    }),
  );

  return router;
}
