/**
 * System routes. GET /system/health needs no authentication.
 */

import { Router } from 'express';
import { HealthService } from '../health/health-service';
import { asyncHandler } from './middleware';

export function createSystemRoutes(healthService: HealthService): Router {
  const router = Router();

  /**
   * GET /system/health
   * 200 while ok or degraded, 503 when down. The body is the full report.
   */
  router.get(
    '/health',
    asyncHandler(async (_req, res) => {
      const report = await healthService.check();
      res.status(report.status === 'down' ? 503 : 200).json(report);
    }),
  );

  return router;
}
