/**
 * Report formatting
 *
 * Plain text, one snapshot per line, tab-separated so the output greps and
 * cuts cleanly:
 *
 *   keep: 14.21 GiB
 *   keep: tank/home@2021-10-02T09:00:00Z-autosnap	2021-10-02T09:00:00Z	1.50 MiB
 */

import type { RetainedSnapshot, SnapshotRecord } from '../retention/retention.interface';

const BINARY_UNITS = ['KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB'];

/**
 * Human-readable size in binary units, e.g. 1536 -> "1.50 KiB".
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }

  let value = bytes;
  let unit = -1;
  while (value >= 1024 && unit < BINARY_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(2)} ${BINARY_UNITS[unit]}`;
}

/**
 * `2021-10-02T09:59:00Z`: RFC 3339, UTC, whole seconds. Also used in snapshot names.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function formatRecord(label: string, snapshot: SnapshotRecord): string {
  return `${label}: ${snapshot.name}\t${formatTimestamp(snapshot.createdAt)}\t${formatBytes(snapshot.usedBytes)}`;
}

export function formatSectionHeader(label: string, snapshots: readonly SnapshotRecord[]): string {
  const total = snapshots.reduce((sum, snapshot) => sum + snapshot.usedBytes, 0);
  return `${label}: ${formatBytes(total)}`;
}

/**
 * Header line with the combined size, then one line per snapshot. Nothing at
 * all for an empty list.
 */
export function formatSection(label: string, snapshots: readonly SnapshotRecord[]): string[] {
  if (snapshots.length === 0) {
    return [];
  }

  return [formatSectionHeader(label, snapshots), ...snapshots.map((snapshot) => formatRecord(label, snapshot))];
}

/**
 * Keep section with the retaining periods appended to each line.
 */
export function formatRetainedSection(label: string, retained: readonly RetainedSnapshot[]): string[] {
  if (retained.length === 0) {
    return [];
  }

  const total = retained.reduce((sum, { snapshot }) => sum + snapshot.usedBytes, 0);
  return [
    `${label}: ${formatBytes(total)}`,
    ...retained.map(({ snapshot, retainedBy }) => `${formatRecord(label, snapshot)}\t${retainedBy.join(',')}`),
  ];
}
