/**
 * Metrics Routes
 *
 * Prometheus exposition of the retention counters (snapshots classified,
 * created, destroyed, reclaimable bytes, failed runs).
 */

import { Router, Request, Response } from 'express';
import { metricsRegistry } from '../metrics/retention-metrics';

const router = Router();

router.get('/metrics', async (req: Request, res: Response) => {
  res.set('Content-Type', metricsRegistry.contentType);
  res.end(await metricsRegistry.metrics());
});

export { router as metricsRoutes };
