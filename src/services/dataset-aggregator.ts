/**
 * DatasetAggregator
 *
 * Turns the fleet-wide snapshot list into one keep/delete decision:
 *   - group snapshots by owning dataset
 *   - read each dataset's policy string (one lookup per dataset)
 *   - run the decision engine per group and merge
 *
 * A failed lookup aborts the whole run. The result feeds `gc`, which must
 * never act on a partial picture.
 */

import { logger } from '../config/logger';
import { PolicyLookupError } from '../errors';
import type { PropertyStore } from '../repositories/repository.interface';
import { checkAge } from '../retention/check-age';
import { formatPolicySpec, parsePolicySpec } from '../retention/policy-parser';
import type { AgeCheckResult, RetentionPolicySpec, SnapshotRecord } from '../retention/retention.interface';

export interface DatasetDecision {
  dataset: string;
  policy: RetentionPolicySpec;
  snapshots: SnapshotRecord[];
  result: AgeCheckResult;
}

/**
 * Dataset part of `pool/fs@snap`. A name without "@" is its own dataset.
 */
export function datasetOf(snapshotName: string): string {
  const at = snapshotName.indexOf('@');
  return at === -1 ? snapshotName : snapshotName.slice(0, at);
}

export function groupByDataset(snapshots: readonly SnapshotRecord[]): Map<string, SnapshotRecord[]> {
  const groups = new Map<string, SnapshotRecord[]>();
  for (const snapshot of snapshots) {
    const dataset = datasetOf(snapshot.name);
    const group = groups.get(dataset);
    if (group) {
      group.push(snapshot);
    } else {
      groups.set(dataset, [snapshot]);
    }
  }
  return groups;
}

export class DatasetAggregator {
  constructor(
    private propertyStore: PropertyStore,
    private propertyKey: string
  ) {}

  async decide(snapshots: readonly SnapshotRecord[]): Promise<DatasetDecision[]> {
    const decisions: DatasetDecision[] = [];

    for (const [dataset, group] of groupByDataset(snapshots)) {
      let spec: string;
      try {
        spec = await this.propertyStore.getProperty(dataset, this.propertyKey);
      } catch (error) {
        throw new PolicyLookupError(dataset, error);
      }

      const policy = parsePolicySpec(spec);
      const result = checkAge(group, policy);

      logger.debug('DatasetAggregator: dataset classified', {
        dataset,
        policy: formatPolicySpec(policy),
        snapshots: group.length,
        keep: result.keep.length,
        delete: result.delete.length,
      });

      decisions.push({ dataset, policy, snapshots: group, result });
    }

    return decisions;
  }

  async aggregate(snapshots: readonly SnapshotRecord[]): Promise<AgeCheckResult> {
    return mergeDecisions(await this.decide(snapshots));
  }
}

export function mergeDecisions(decisions: readonly DatasetDecision[]): AgeCheckResult {
  const merged: AgeCheckResult = { keep: [], delete: [] };
  for (const { result } of decisions) {
    merged.keep.push(...result.keep);
    merged.delete.push(...result.delete);
  }
  return merged;
}
