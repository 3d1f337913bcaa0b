#!/usr/bin/env node
/**
 * snapkeep
 *
 * Process entry point: wires the zfs-backed repositories into the
 * orchestrator and hands the command line to the CLI.
 */

import { config } from './config';
import { logger } from './config/logger';
import { runCli } from './cli';
import { DatasetRepository } from './repositories/dataset.repository';
import { SnapshotRepository } from './repositories/snapshot.repository';
import { startServer } from './server';
import { DatasetAggregator } from './services/dataset-aggregator';
import { RetentionOrchestrator } from './services/retention-orchestrator';
import { zfs } from './zfs/client';

const snapshotRepo = new SnapshotRepository(zfs, {
  propertyKey: config.retention.propertyKey,
  snapshotSuffix: config.retention.snapshotSuffix,
});
const datasetRepo = new DatasetRepository(zfs, config.retention.propertyKey);
const aggregator = new DatasetAggregator(datasetRepo, config.retention.propertyKey);
const orchestrator = new RetentionOrchestrator(snapshotRepo, datasetRepo, aggregator);

runCli(process.argv.slice(2), {
  orchestrator,
  serve: () =>
    startServer(orchestrator, {
      port: config.port,
      runOnStartup: config.serve.runOnStartup,
      continuousMode: config.serve.continuousMode,
      dryRun: config.serve.dryRun,
    }),
  version: config.service.version,
  propertyKey: config.retention.propertyKey,
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
}).then(
  (exitCode) => {
    // serve keeps the event loop alive; setting exitCode leaves it running
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    logger.error('snapkeep: Unexpected failure', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  }
);
