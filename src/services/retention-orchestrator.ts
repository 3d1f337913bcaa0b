/**
 * RetentionOrchestrator
 *
 * Runs the three retention flows against the storage collaborators:
 *   - status: compute the fleet-wide keep/delete decision, no side effects
 *   - snap:   take one snapshot of every tracked dataset
 *   - gc:     compute the decision, then destroy every snapshot marked delete
 *
 * Each run gets a runId on its log lines. Errors are logged, counted and
 * rethrown; gc stops at the first failed destroy.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'winston';
import { logger } from '../config/logger';
import {
  reclaimableBytes,
  runFailures,
  snapshotsClassified,
  snapshotsCreated,
  snapshotsDestroyed,
} from '../metrics/retention-metrics';
import type {
  DatasetLister,
  SnapshotCreator,
  SnapshotDestroyer,
  SnapshotLister,
} from '../repositories/repository.interface';
import { explainRetention } from '../retention/check-age';
import type { AgeCheckResult, RetainedSnapshot, SnapshotRecord } from '../retention/retention.interface';
import type { DatasetAggregator, DatasetDecision } from './dataset-aggregator';
import { mergeDecisions } from './dataset-aggregator';

export type SnapshotStore = SnapshotLister & SnapshotCreator & SnapshotDestroyer;

export type RunCommand = 'status' | 'snap' | 'gc';

export interface StatusReport extends AgeCheckResult {
  /** Kept snapshots with the periods that retained them */
  retained: RetainedSnapshot[];
}

export interface GcOptions {
  dryRun: boolean;
  /** Called once the decision is made, before anything is destroyed */
  onDecision?: (decision: AgeCheckResult) => void;
  /** Called for each snapshot right before it is destroyed, or skipped in a dry run */
  onBeforeDestroy?: (snapshot: SnapshotRecord) => void;
}

export interface GcResult {
  decision: AgeCheckResult;
  /** Destroyed snapshots, or the ones that would have been in a dry run */
  deleted: SnapshotRecord[];
  dryRun: boolean;
}

interface FleetDecision {
  decisions: DatasetDecision[];
  merged: AgeCheckResult;
}

function totalBytes(snapshots: readonly SnapshotRecord[]): number {
  return snapshots.reduce((sum, snapshot) => sum + snapshot.usedBytes, 0);
}

export class RetentionOrchestrator {
  constructor(
    private snapshots: SnapshotStore,
    private datasets: DatasetLister,
    private aggregator: Pick<DatasetAggregator, 'decide'>
  ) {}

  async status(): Promise<StatusReport> {
    return this.track('status', async () => {
      const { decisions, merged } = await this.decide();
      const retained = decisions.flatMap((decision) => explainRetention(decision.snapshots, decision.policy));

      return { ...merged, retained };
    });
  }

  async snap(): Promise<SnapshotRecord[]> {
    return this.track('snap', async (log) => {
      const datasets = await this.datasets.listTracked();
      log.info('RetentionOrchestrator: Snapshotting tracked datasets', { datasetsCount: datasets.length });

      const created: SnapshotRecord[] = [];
      for (const dataset of datasets) {
        const snapshot = await this.snapshots.create(dataset);
        snapshotsCreated.inc();
        log.info('RetentionOrchestrator: Snapshot created', {
          snapshot: snapshot.name,
          usedBytes: snapshot.usedBytes,
        });
        created.push(snapshot);
      }

      return created;
    });
  }

  async gc(options: GcOptions): Promise<GcResult> {
    return this.track('gc', async (log) => {
      const { merged } = await this.decide();

      log.info('RetentionOrchestrator: Collecting expired snapshots', {
        deleteCount: merged.delete.length,
        reclaimableBytes: totalBytes(merged.delete),
        dryRun: options.dryRun,
      });
      options.onDecision?.(merged);

      const deleted: SnapshotRecord[] = [];
      for (const snapshot of merged.delete) {
        options.onBeforeDestroy?.(snapshot);
        if (!options.dryRun) {
          await this.snapshots.destroy(snapshot);
          snapshotsDestroyed.inc();
        }
        log.info(options.dryRun ? 'RetentionOrchestrator: Would destroy snapshot' : 'RetentionOrchestrator: Snapshot destroyed', {
          snapshot: snapshot.name,
          usedBytes: snapshot.usedBytes,
        });
        deleted.push(snapshot);
      }

      return { decision: merged, deleted, dryRun: options.dryRun };
    });
  }

  private async decide(): Promise<FleetDecision> {
    const snapshots = await this.snapshots.listTracked();
    const decisions = await this.aggregator.decide(snapshots);
    const merged = mergeDecisions(decisions);

    snapshotsClassified.inc({ decision: 'keep' }, merged.keep.length);
    snapshotsClassified.inc({ decision: 'delete' }, merged.delete.length);
    reclaimableBytes.set(totalBytes(merged.delete));

    return { decisions, merged };
  }

  private async track<T>(command: RunCommand, work: (log: Logger) => Promise<T>): Promise<T> {
    const log = logger.child({ runId: uuidv4(), command });
    log.info('RetentionOrchestrator: Run started');

    try {
      const result = await work(log);
      log.info('RetentionOrchestrator: Run complete');
      return result;
    } catch (error) {
      runFailures.inc({ command });
      log.error('RetentionOrchestrator: Run failed', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      throw error;
    }
  }
}
