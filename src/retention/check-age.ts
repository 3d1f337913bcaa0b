/**
 * Retention decision engine
 *
 * Splits one dataset's snapshots into keep and delete under a generational
 * policy: for every configured period, keep the newest snapshot of each of the
 * N most recent distinct period buckets.
 *
 * Pure and synchronous. The input array is never mutated; both output lists
 * are newest first.
 */

import { RETENTION_RULES } from './bucket-rules';
import type {
  AgeCheckResult,
  RetainedSnapshot,
  RetentionPeriod,
  RetentionPolicySpec,
  SnapshotRecord,
} from './retention.interface';

interface Classification {
  sorted: SnapshotRecord[];
  // Indexed like `sorted`; an empty entry means no rule kept the snapshot.
  retainedBy: RetentionPeriod[][];
}

function classify(snapshots: readonly SnapshotRecord[], policy: RetentionPolicySpec): Classification {
  // Array.prototype.sort is stable, so timestamp ties keep their input order.
  const sorted = [...snapshots].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  const retainedBy: RetentionPeriod[][] = sorted.map(() => []);

  for (const rule of RETENTION_RULES) {
    const wanted = policy[rule.period] ?? 0;
    if (wanted === 0) {
      continue;
    }

    let lastBucket: string | undefined;
    let kept = 0;
    for (let i = 0; i < sorted.length && kept < wanted; i++) {
      const bucket = rule.bucketKey(sorted[i].createdAt);
      if (bucket !== lastBucket) {
        lastBucket = bucket;
        retainedBy[i].push(rule.period);
        kept++;
      }
    }
  }

  return { sorted, retainedBy };
}

export function checkAge(snapshots: readonly SnapshotRecord[], policy: RetentionPolicySpec): AgeCheckResult {
  const { sorted, retainedBy } = classify(snapshots, policy);
  const result: AgeCheckResult = { keep: [], delete: [] };

  sorted.forEach((snapshot, i) => {
    if (retainedBy[i].length > 0) {
      result.keep.push(snapshot);
    } else {
      result.delete.push(snapshot);
    }
  });

  return result;
}

/**
 * Same decision as checkAge, reporting which periods retained each kept snapshot.
 */
export function explainRetention(
  snapshots: readonly SnapshotRecord[],
  policy: RetentionPolicySpec
): RetainedSnapshot[] {
  const { sorted, retainedBy } = classify(snapshots, policy);

  return sorted.flatMap((snapshot, i) =>
    retainedBy[i].length > 0 ? [{ snapshot, retainedBy: retainedBy[i] }] : []
  );
}
