/**
 * Period bucket rules
 *
 * Each rule maps a snapshot's creation time (UTC) to a coarse label. Snapshots
 * sharing a label are interchangeable for that rule.
 *
 *   hourly   2021-10-02 09
 *   daily    2021-10-02
 *   weekly   2021 w6
 *   monthly  2021-10
 *   yearly   2021
 */

import type { RetentionRule } from './retention.interface';

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function year(d: Date): string {
  return String(d.getUTCFullYear());
}

function month(d: Date): string {
  return `${year(d)}-${pad2(d.getUTCMonth() + 1)}`;
}

function day(d: Date): string {
  return `${month(d)}-${pad2(d.getUTCDate())}`;
}

// Evaluation order matters only for the explain output; the keep set is a union.
export const RETENTION_RULES: readonly RetentionRule[] = [
  { period: 'hourly', bucketKey: (d) => `${day(d)} ${pad2(d.getUTCHours())}` },
  { period: 'daily', bucketKey: day },
  // NOTE: year + weekday index (Sunday = 0), not a calendar week number. Every
  // Monday of a year shares one bucket. Kept as-is for existing policies.
  { period: 'weekly', bucketKey: (d) => `${year(d)} w${d.getUTCDay()}` },
  { period: 'monthly', bucketKey: month },
  { period: 'yearly', bucketKey: year },
];
