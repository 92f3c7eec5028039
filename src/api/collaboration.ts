/**
 * Collaboration API routes: invitations and collaborators.
 */

import { Router } from 'express';
import { collaboratorRoleSchema, parseInput } from '../domain/validation';
import { CollaborationService } from '../services/collaboration-service';
import { asyncHandler, contextOf } from './middleware';

export function createCollaborationRoutes(collaborationService: CollaborationService): Router {
  const router = Router();

  router.get(
    '/projects/:projectId/invitations',
    asyncHandler(async (req, res) => {
      const invitations = await collaborationService.listInvitations(contextOf(req), req.params.projectId);
      res.json({ invitations });
    }),
  );

  /**
   * POST /collaboration/projects/:projectId/invitations
   * Body: { inviteeId } or { email }, optional role (default viewer).
   */
  router.post(
    '/projects/:projectId/invitations',
    asyncHandler(async (req, res) => {
      const invitation = await collaborationService.invite(contextOf(req), req.params.projectId, req.body);
      res.status(201).json({ invitation });
    }),
  );

  router.get(
    '/invitations/mine',
    asyncHandler(async (req, res) => {
      const invitations = await collaborationService.listMyInvitations(contextOf(req));
      res.json({ invitations });
    }),
  );

  router.post(
    '/invitations/:token/accept',
    asyncHandler(async (req, res) => {
      const collaborator = await collaborationService.acceptInvitation(contextOf(req), req.params.token);
      res.json({ collaborator });
    }),
  );

  router.post(
    '/invitations/:token/decline',
    asyncHandler(async (req, res) => {
      const invitation = await collaborationService.declineInvitation(contextOf(req), req.params.token);
      res.json({ invitation });
    }),
  );

  router.post(
    '/invitations/by-id/:invitationId/cancel',
    asyncHandler(async (req, res) => {
      const invitation = await collaborationService.cancelInvitation(contextOf(req), req.params.invitationId);
      res.json({ invitation });
    }),
  );

  router.post(
    '/invitations/by-id/:invitationId/resend',
    asyncHandler(async (req, res) => {
      const invitation = await collaborationService.resendInvitation(contextOf(req), req.params.invitationId);
      res.json({ invitation });
    }),
  );

  router.get(
    '/projects/:projectId/collaborators',
    asyncHandler(async (req, res) => {
      const collaborators = await collaborationService.listCollaborators(contextOf(req), req.params.projectId);
      res.json({ collaborators });
    }),
  );

  /**
   * PATCH /collaboration/projects/:projectId/collaborators/:collaboratorId
   * Body: { role }.
   */
  router.patch(
    '/projects/:projectId/collaborators/:collaboratorId',
    asyncHandler(async (req, res) => {
      const body: { role?: unknown } = req.body ?? {};
      const collaborator = await collaborationService.updateCollaboratorRole(
        contextOf(req),
        req.params.projectId,
        req.params.collaboratorId,
        parseInput(collaboratorRoleSchema, body.role),
      );
      res.json({ collaborator });
    }),
  );

  router.delete(
    '/projects/:projectId/collaborators/:collaboratorId',
    asyncHandler(async (req, res) => {
      await collaborationService.removeCollaborator(contextOf(req), req.params.projectId, req.params.collaboratorId);
      res.status(204).end();
    }),
  );

  router.get(
    '/mine',
    asyncHandler(async (req, res) => {
      const collaborations = await collaborationService.listMyCollaborations(contextOf(req));
      res.json({ collaborations });
    }),
  );

  return router;
}
