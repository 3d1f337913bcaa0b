/**
 * DatasetRepository
 *
 * Dataset-level reads: property lookup for the aggregator and the list of
 * datasets `snap` should cover.
 */

import { ZfsOutputParseError } from '../errors';
import type { ZfsCommandClient } from '../zfs/zfs-cli';
import type { DatasetLister, PropertyStore } from './repository.interface';

export class DatasetRepository implements PropertyStore, DatasetLister {
  constructor(
    private zfs: ZfsCommandClient,
    private propertyKey: string
  ) {}

  async getProperty(name: string, propertyKey: string): Promise<string> {
    // zfs get -H -o value <property> <name>
    const rows = await this.zfs.read('get', ['-o', 'value', propertyKey, name]);
    const value = rows[0]?.[0];
    if (value === undefined) {
      throw new ZfsOutputParseError(`No value reported for ${propertyKey} on ${name}`, {
        name,
        propertyKey,
      });
    }
    return value;
  }

  async listTracked(): Promise<string[]> {
    // zfs get -H -t filesystem,volume -o name,value <property>
    const rows = await this.zfs.read('get', ['-t', 'filesystem,volume', '-o', 'name,value', this.propertyKey]);

    return rows
      .map((row) => {
        if (row.length !== 2) {
          throw new ZfsOutputParseError('list datasets parse error', { row });
        }
        return { name: row[0], value: row[1] };
      })
      .filter((dataset) => dataset.value !== '-')
      .map((dataset) => dataset.name);
  }
}
