/**
 * Health Check Routes
 *
 * Used by whatever supervises `snapkeep serve` (systemd watchdog, container
 * probes). Healthy means the zfs binary answers.
 */

import { Router, Request, Response } from 'express';
import { config } from '../config';
import { zfs } from '../zfs/client';

const router = Router();

router.get('/health', async (req: Request, res: Response) => {
  const zfsAvailable = await zfs.healthCheck();

  if (zfsAvailable) {
    res.json({
      status: 'healthy',
      service: config.service.name,
      timestamp: new Date().toISOString(),
      checks: {
        zfs: 'ok',
      },
    });
    return;
  }

  res.status(503).json({
    status: 'unhealthy',
    service: config.service.name,
    timestamp: new Date().toISOString(),
    checks: {
      zfs: 'failed',
    },
  });
});

router.get('/health/ready', (req: Request, res: Response) => {
  res.json({
    ready: true,
    timestamp: new Date().toISOString(),
  });
});

export { router as healthRoutes };
