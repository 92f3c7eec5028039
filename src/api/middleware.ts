/**
 * API Middleware: request context, authentication, and error handling.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuid } from 'uuid';
import { RequestContext } from '../domain/context';
import {
  ServiceError,
  apiError,
  authError,
  httpStatusFor,
  internalError,
  isServiceError,
  validationError,
} from '../domain/errors';
import { AccountService, SessionIdentity } from '../services/account-service';
import { Logger, logger as rootLogger } from '../logger';

/** Extended request with the per-request logger and, once authenticated, the context. */
export interface AuthenticatedRequest extends Request {
  requestId?: string;
  log?: Logger;
  context?: RequestContext;
  sessionIdentity?: SessionIdentity;
}

const REQUEST_ID_HEADER = 'x-request-id';
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

/** Assign a request id (honouring a well-formed inbound one) and a child logger. */
export function requestContext(baseLogger: Logger = rootLogger) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    const inbound = req.get(REQUEST_ID_HEADER);
    const requestId = inbound && REQUEST_ID_PATTERN.test(inbound) ? inbound : `req_${uuid()}`;
    req.requestId = requestId;
    req.log = baseLogger.child({ requestId });
    res.set(REQUEST_ID_HEADER, requestId);
    next();
  };
}

/** Wrap an async route handler so rejections reach the error handler. */
export function asyncHandler(
  fn: (req: AuthenticatedRequest, res: Response) => Promise<void>,
): RequestHandler {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

/** Bearer-token authentication. Populates `req.context` or answers 401. */
export function authenticate(accountService: AccountService) {
  const resolve = async (req: AuthenticatedRequest): Promise<void> => {
    const header = req.get('authorization') ?? '';
    const match = /^Bearer\s+(\S+)$/i.exec(header);
    if (!match) {
      throw new ServiceError(authError('Authentication required'));
    }
    const identity = await accountService.verifySession(match[1]);
    const requestId = req.requestId ?? `req_${uuid()}`;
    const log = (req.log ?? rootLogger).child({ accountId: identity.accountId });
    req.sessionIdentity = identity;
    req.context = { actorId: identity.accountId, requestId, logger: log };
  };

  return (req: AuthenticatedRequest, _res: Response, next: NextFunction) => {
    resolve(req).then(() => next(), next);
  };
}

/** The context set by `authenticate`; routes mounted behind it always have one. */
export function contextOf(req: AuthenticatedRequest): RequestContext {
  if (!req.context) throw new ServiceError(authError('Authentication required'));
  return req.context;
}

function isMalformedBody(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, req: AuthenticatedRequest, res: Response, _next: NextFunction) {
  const log = req.log ?? rootLogger;

  if (isServiceError(err)) {
    const status = httpStatusFor(err.typedError);
    log.warn('Request error', { code: err.typedError.code, status, method: req.method, path: req.path });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  if (isMalformedBody(err)) {
    log.warn('Request error', { code: 'VALIDATION.SCHEMA', status: 400, method: req.method, path: req.path });
    res.status(400).json(apiError(validationError('Request body is not valid JSON')));
    return;
  }

  log.error('Unhandled request error', {
    method: req.method,
    path: req.path,
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(apiError(internalError()));
}
