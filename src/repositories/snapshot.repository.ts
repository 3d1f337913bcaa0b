/**
 * SnapshotRepository
 *
 * Lists, creates and destroys snapshots through zfs(8). Listing uses parsable
 * mode (`-p`) so creation comes back as epoch seconds and sizes as plain bytes.
 */

import { NotASnapshotError, ZfsOutputParseError } from '../errors';
import { formatTimestamp } from '../report/report-formatter';
import type { SnapshotRecord } from '../retention/retention.interface';
import type { ZfsCommandClient } from '../zfs/zfs-cli';
import type { SnapshotCreator, SnapshotDestroyer, SnapshotLister } from './repository.interface';

export interface SnapshotRepositoryOptions {
  propertyKey: string;
  snapshotSuffix: string;
  now?: () => Date;
}

const UNTRACKED = '-';
const DIGITS = /^\d+$/;

function parseCreation(value: string, name: string): Date {
  if (!DIGITS.test(value)) {
    throw new ZfsOutputParseError(`Invalid creation time for ${name}: ${value}`, { name, value });
  }
  return new Date(Number(value) * 1000);
}

function parseUsed(value: string, name: string): number {
  if (!DIGITS.test(value)) {
    throw new ZfsOutputParseError(`Invalid used size for ${name}: ${value}`, { name, value });
  }
  return Number(value);
}

export class SnapshotRepository implements SnapshotLister, SnapshotCreator, SnapshotDestroyer {
  private propertyKey: string;
  private snapshotSuffix: string;
  private now: () => Date;

  constructor(
    private zfs: ZfsCommandClient,
    options: SnapshotRepositoryOptions
  ) {
    this.propertyKey = options.propertyKey;
    this.snapshotSuffix = options.snapshotSuffix;
    this.now = options.now ?? (() => new Date());
  }

  async listTracked(): Promise<SnapshotRecord[]> {
    // zfs list -H -p -t snapshot -o name,creation,used,<property>
    const rows = await this.zfs.read('list', [
      '-p',
      '-t',
      'snapshot',
      '-o',
      `name,creation,used,${this.propertyKey}`,
    ]);

    const snapshots: SnapshotRecord[] = [];
    for (const row of rows) {
      if (row.length !== 4) {
        throw new ZfsOutputParseError('list snapshots parse error', { row });
      }
      const [name, creation, used, policy] = row;

      // A snapshot that did not inherit the property belongs to an untracked
      // dataset; "-" set on the snapshot itself opts it out explicitly.
      if (policy === UNTRACKED) {
        continue;
      }

      snapshots.push({
        name,
        createdAt: parseCreation(creation, name),
        usedBytes: parseUsed(used, name),
      });
    }

    return snapshots;
  }

  async create(dataset: string): Promise<SnapshotRecord> {
    // zfs keeps creation at second precision
    const createdAt = new Date(Math.floor(this.now().getTime() / 1000) * 1000);
    const name = `${dataset}@${formatTimestamp(createdAt)}-${this.snapshotSuffix}`;

    await this.zfs.run('snapshot', [name]);

    const rows = await this.zfs.read('get', ['-p', '-o', 'value', 'used', name]);
    const used = rows[0]?.[0];
    if (used === undefined) {
      throw new ZfsOutputParseError(`No used size reported for ${name}`, { name });
    }

    return { name, createdAt, usedBytes: parseUsed(used, name) };
  }

  async destroy(snapshot: SnapshotRecord): Promise<void> {
    // `zfs destroy` removes whole datasets too; refuse anything that is not dataset@snapshot.
    if (!snapshot.name.includes('@')) {
      throw new NotASnapshotError(snapshot.name);
    }
    await this.zfs.run('destroy', [snapshot.name]);
  }
}
