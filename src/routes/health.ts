import { Router, Request, Response } from 'express';
import type { HealthChecker } from '../monitoring/health';

export function createHealthRouter(healthChecker: HealthChecker): Router {
  const router = Router();

  // GET /api/health/summary - database, API and performance roll-up
  router.get('/health/summary', async (_req: Request, res: Response) => {
    try {
      const summary = await healthChecker.getHealthSummary();
      res.status(summary.overallStatus === 'unhealthy' ? 503 : 200).json({ success: true, ...summary });
    } catch (error) {
      console.error('[API] Health summary error:', error);
      res.status(500).json({ success: false, error: 'Health check failed' });
    }
  });

  return router;
}
