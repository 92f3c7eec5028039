/**
 * Auth API routes.
 *
 * POST /auth/register, /auth/login and /auth/logout, plus the signed-in
 * account's own profile under /auth/me.
 */

import { RequestHandler, Router } from 'express';
import { AccountService } from '../services/account-service';
import { ServiceError, authError } from '../domain/errors';
import { asyncHandler, contextOf } from './middleware';

export function createAuthRoutes(
  accountService: AccountService,
  authenticate: RequestHandler,
  loginLimiter: RequestHandler,
): Router {
  const router = Router();

  /**
   * POST /auth/register
   * Create an account. The response never carries credential material.
   */
  router.post(
    '/register',
    asyncHandler(async (req, res) => {
      const account = await accountService.register(req.body);
      res.status(201).json({ account });
    }),
  );

  /**
   * POST /auth/login
   * Exchange email + password for a bearer token.
   */
  router.post(
    '/login',
    loginLimiter,
    asyncHandler(async (req, res) => {
      const session = await accountService.authenticate(req.body);
      res.json(session);
    }),
  );

  router.post(
    '/logout',
    authenticate,
    asyncHandler(async (req, res) => {
      if (!req.sessionIdentity) throw new ServiceError(authError('Authentication required'));
      await accountService.logout(contextOf(req), req.sessionIdentity);
      res.status(204).end();
    }),
  );

  router.get(
    '/me',
    authenticate,
    asyncHandler(async (req, res) => {
      const ctx = contextOf(req);
      const account = await accountService.getAccount(ctx, ctx.actorId);
      res.json({ account });
    }),
  );

  router.patch(
    '/me',
    authenticate,
    asyncHandler(async (req, res) => {
      const ctx = contextOf(req);
      const account = await accountService.updateProfile(ctx, ctx.actorId, req.body);
      res.json({ account });
    }),
  );

  router.post(
    '/me/password',
    authenticate,
    asyncHandler(async (req, res) => {
      const body: { currentPassword?: unknown; newPassword?: unknown } = req.body ?? {};
      await accountService.changePassword(
        contextOf(req),
        typeof body.currentPassword === 'string' ? body.currentPassword : '',
        typeof body.newPassword === 'string' ? body.newPassword : '',
      );
      res.status(204).end();
    }),
  );

  router.post(
    '/me/deactivate',
    authenticate,
    asyncHandler(async (req, res) => {
      const ctx = contextOf(req);
      const account = await accountService.deactivate(ctx, ctx.actorId);
      res.json({ account });
    }),
  );

  /**
   * GET /auth/accounts/search?q=
   * Other active accounts matching the query, for choosing invitees.
   */
  router.get(
    '/accounts/search',
    authenticate,
    asyncHandler(async (req, res) => {
      const q = typeof req.query.q === 'string' ? req.query.q : '';
      const accounts = await accountService.searchAccounts(contextOf(req), q);
      res.json({ accounts });
    }),
  );

  return router;
}
