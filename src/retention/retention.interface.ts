/**
 * Retention Data Model
 *
 * Types shared by the policy parser, the decision engine and the aggregator.
 */

export type RetentionPeriod = 'hourly' | 'daily' | 'weekly' | 'monthly' | 'yearly';

/**
 * Number of period buckets to keep per granularity. An unset count and a
 * count of zero both retain nothing.
 */
export type RetentionPolicySpec = {
  [P in RetentionPeriod]?: number;
};

export interface SnapshotRecord {
  /** `<dataset>@<suffix>` */
  readonly name: string;
  readonly createdAt: Date;
  readonly usedBytes: number;
}

export interface AgeCheckResult {
  keep: SnapshotRecord[];
  delete: SnapshotRecord[];
}

export interface RetentionRule {
  readonly period: RetentionPeriod;
  bucketKey(createdAt: Date): string;
}

export interface RetainedSnapshot {
  snapshot: SnapshotRecord;
  retainedBy: RetentionPeriod[];
}
