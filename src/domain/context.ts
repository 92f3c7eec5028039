/**
 * Request-scoped context passed explicitly to every service call.
 */

import { Logger } from '../logger';

export interface RequestContext {
  /** Authenticated account id. */
  actorId: string;
  /** Correlates log lines and audit records of one request. */
  requestId: string;
  logger: Logger;
}
