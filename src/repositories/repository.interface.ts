/**
 * Storage collaborator contracts
 *
 * The decision engine never talks to zfs directly; it sees the storage system
 * only through these interfaces.
 */

import type { SnapshotRecord } from '../retention/retention.interface';

export interface SnapshotLister {
  /** Every snapshot whose retention annotation is not "-". */
  listTracked(): Promise<SnapshotRecord[]>;
}

export interface SnapshotCreator {
  create(dataset: string): Promise<SnapshotRecord>;
}

export interface SnapshotDestroyer {
  /** Rejects with NotASnapshotError when the name has no "@". */
  destroy(snapshot: SnapshotRecord): Promise<void>;
}

export interface PropertyStore {
  getProperty(name: string, propertyKey: string): Promise<string>;
}

export interface DatasetLister {
  /** Filesystems and volumes whose retention annotation is not "-". */
  listTracked(): Promise<string[]>;
}
