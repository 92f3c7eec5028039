/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { AppConfig } from './config';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { AuditService } from './audit/audit-service';
import { PasswordHasher } from './auth/password';
import { SessionTokens } from './auth/session-tokens';
import { InvitationNotifier, createInvitationNotifier } from './notifications/invitation-notifier';
import { AccountService } from './services/account-service';
import { ProjectService } from './services/project-service';
import { CollaborationService } from './services/collaboration-service';
import { HealthService, httpProbe, storeProbe } from './health/health-service';
import { authenticate, errorHandler, requestContext } from './api/middleware';
import { rateLimit } from './api/rate-limit';
import { createAuthRoutes } from './api/auth';
import { createProjectRoutes } from './api/projects';
import { createCollaborationRoutes } from './api/collaboration';
import { createSystemRoutes } from './api/system';
import { ServiceError, notFoundError } from './domain/errors';
import { Logger, logger as rootLogger } from './logger';
import { APP_VERSION } from './version';

/** Application context containing all services. */
export interface AppContext {
  config: AppConfig;
  store: Store;
  logger: Logger;
  auditService: AuditService;
  accountService: AccountService;
  projectService: ProjectService;
  collaborationService: CollaborationService;
  healthService: HealthService;
}

/** Collaborators that tests and embedders may replace. */
export interface AppContextOverrides {
  store?: Store;
  notifier?: InvitationNotifier;
  logger?: Logger;
  /** Process start, for uptime. Defaults to now. */
  startedAt?: number;
}

/** Create the application context with all services. */
export function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): AppContext {
  const store = overrides.store ?? createMemoryStore();
  const log = overrides.logger ?? rootLogger;
  const auditService = new AuditService(store);

  const accountService = new AccountService(
    store,
    new PasswordHasher(config.auth.passwordHashIterations),
    new SessionTokens(config.session.secret, config.session.ttlSeconds),
    auditService,
    log.child({ service: 'account' }),
    { authMinDurationMs: config.auth.minDurationMs },
  );
  const projectService = new ProjectService(store, auditService);
  const collaborationService = new CollaborationService(
    store,
    auditService,
    overrides.notifier ?? createInvitationNotifier(config.mail),
    {
      invitationTtlDays: config.collaboration.invitationTtlDays,
      publicBaseUrl: config.collaboration.publicBaseUrl,
    },
  );
  const healthService = new HealthService(
    [storeProbe(store), ...config.health.dependencies.map(httpProbe)],
    log.child({ service: 'health' }),
    { timeoutMs: config.health.timeoutMs, version: APP_VERSION, startedAt: overrides.startedAt ?? Date.now() },
  );

  return {
    config,
    store,
    logger: log,
    auditService,
    accountService,
    projectService,
    collaborationService,
    healthService,
  };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));
  app.use(requestContext(ctx.logger));

  const requireSession = authenticate(ctx.accountService);
  const loginLimiter = rateLimit({
    maxRequests: ctx.config.auth.loginRateLimit,
    windowMs: ctx.config.auth.loginRateWindowMs,
  });

  app.use('/system', createSystemRoutes(ctx.healthService));
  app.use('/auth', createAuthRoutes(ctx.accountService, requireSession, loginLimiter));
  app.use('/projects', requireSession, createProjectRoutes(ctx.projectService));
  app.use('/collaboration', requireSession, createCollaborationRoutes(ctx.collaborationService));

  app.use((req, _res, next) => {
    next(new ServiceError(notFoundError('Route', `${req.method} ${req.path}`)));
  });

  // Error handler
  app.use(errorHandler);

  return app;
}
