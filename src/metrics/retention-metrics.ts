/**
 * Prometheus metrics for retention runs. Registered on the prom-client default
 * registry, which the /metrics route serves.
 */

import { Counter, Gauge } from 'prom-client';

export const snapshotsClassified = new Counter({
  name: 'snapkeep_snapshots_classified_total',
  help: 'Snapshots classified by the retention engine',
  labelNames: ['decision'] as const,
});

export const snapshotsCreated = new Counter({
  name: 'snapkeep_snapshots_created_total',
  help: 'Snapshots created by snap runs',
});

export const snapshotsDestroyed = new Counter({
  name: 'snapkeep_snapshots_destroyed_total',
  help: 'Snapshots destroyed by gc runs',
});

export const reclaimableBytes = new Gauge({
  name: 'snapkeep_reclaimable_bytes',
  help: 'Combined used size of the snapshots marked for deletion by the last decision',
});

export const runFailures = new Counter({
  name: 'snapkeep_run_failures_total',
  help: 'Runs aborted by an error',
  labelNames: ['command'] as const,
});

export { register as metricsRegistry } from 'prom-client';
