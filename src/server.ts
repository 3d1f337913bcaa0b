/**
 * `snapkeep serve`
 *
 * Health and metrics endpoints, plus a gc pass on startup. Without
 * CONTINUOUS_MODE the process exits once that pass is done, so a cron job or
 * systemd timer can run it like any other one-shot command while still being
 * probed and scraped.
 */

import type { Server } from 'node:http';
import express from 'express';
import { logger } from './config/logger';
import { healthRoutes } from './api/health-routes';
import { metricsRoutes } from './api/metrics-routes';
import type { RetentionOrchestrator } from './services/retention-orchestrator';

export interface ServeOptions {
  port: number;
  runOnStartup: boolean;
  continuousMode: boolean;
  dryRun: boolean;
  /** Defaults to process.exit */
  exit?: (code: number) => void;
}

export function createApp(): express.Application {
  const app = express();

  app.set('trust proxy', true);
  app.use(express.json());

  app.use(healthRoutes);
  app.use(metricsRoutes);

  return app;
}

/**
 * Startup gc pass. Exits 1 on failure, and 0 afterwards unless running
 * continuously.
 */
export async function collectOnStartup(
  orchestrator: Pick<RetentionOrchestrator, 'gc'>,
  options: ServeOptions
): Promise<void> {
  const exit = options.exit ?? ((code: number) => process.exit(code));

  try {
    const result = await orchestrator.gc({ dryRun: options.dryRun });
    logger.info('snapkeep serve: Startup gc complete', {
      deleted: result.deleted.length,
      kept: result.decision.keep.length,
      dryRun: result.dryRun,
    });
  } catch (error) {
    logger.error('snapkeep serve: Startup gc failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    exit(1);
    return;
  }

  if (!options.continuousMode) {
    logger.info('snapkeep serve: Exiting after gc (one-shot mode)');
    exit(0);
  }
}

export function startServer(orchestrator: Pick<RetentionOrchestrator, 'gc'>, options: ServeOptions): Promise<Server> {
  const app = createApp();

  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, () => {
      logger.info(`snapkeep serve: Server started on port ${options.port}`);

      if (options.runOnStartup) {
        void collectOnStartup(orchestrator, options);
      }
      resolve(server);
    });

    server.once('error', (error) => {
      logger.error('snapkeep serve: Server failed to start', { error: error.message });
      reject(error);
    });

    server.once('listening', () => {
      process.once('SIGTERM', () => {
        logger.info('snapkeep serve: SIGTERM received, shutting down gracefully');
        server.close(() => {
          logger.info('snapkeep serve: Server closed');
          process.exit(0);
        });
      });
    });
  });
}
