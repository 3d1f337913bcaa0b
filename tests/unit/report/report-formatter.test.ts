/**
 * Report Formatter Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatBytes,
  formatRecord,
  formatRetainedSection,
  formatSection,
  formatSectionHeader,
  formatTimestamp,
} from '../../../src/report/report-formatter';
import type { SnapshotRecord } from '../../../src/retention/retention.interface';

const first: SnapshotRecord = {
  name: 'tank/home@first',
  createdAt: new Date('2021-10-02T09:59:00Z'),
  usedBytes: 1536,
};

const second: SnapshotRecord = {
  name: 'tank/home@second',
  createdAt: new Date('2021-10-01T19:59:00Z'),
  usedBytes: 512,
};

describe('formatBytes', () => {
  it('should print small sizes in bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
  });

  it('should switch to binary units at 1024', () => {
    expect(formatBytes(1024)).toBe('1.00 KiB');
    expect(formatBytes(1536)).toBe('1.50 KiB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.00 MiB');
    expect(formatBytes(13 * 1024 ** 3)).toBe('13.00 GiB');
  });

  it('should stop at EiB', () => {
    expect(formatBytes(2 * 1024 ** 6)).toBe('2.00 EiB');
    expect(formatBytes(1024 ** 7)).toBe('1024.00 EiB');
  });
});

describe('formatTimestamp', () => {
  it('should print RFC 3339 UTC to the second', () => {
    expect(formatTimestamp(new Date('2021-10-02T09:59:42.987Z'))).toBe('2021-10-02T09:59:42Z');
  });
});

describe('formatRecord', () => {
  it('should print label, name, creation and size separated by tabs', () => {
    expect(formatRecord('keep', first)).toBe('keep: tank/home@first\t2021-10-02T09:59:00Z\t1.50 KiB');
  });
});

describe('formatSectionHeader', () => {
  it('should print the label and combined size', () => {
    expect(formatSectionHeader('delete', [first, second])).toBe('delete: 2.00 KiB');
  });
});

describe('formatSection', () => {
  it('should print the total size and then every snapshot', () => {
    expect(formatSection('delete', [first, second])).toEqual([
      'delete: 2.00 KiB',
      'delete: tank/home@first\t2021-10-02T09:59:00Z\t1.50 KiB',
      'delete: tank/home@second\t2021-10-01T19:59:00Z\t512 B',
    ]);
  });

  it('should print nothing for an empty list', () => {
    expect(formatSection('keep', [])).toEqual([]);
  });
});

describe('formatRetainedSection', () => {
  it('should append the retaining periods to each line', () => {
    expect(
      formatRetainedSection('keep', [
        { snapshot: first, retainedBy: ['hourly', 'daily'] },
        { snapshot: second, retainedBy: ['monthly'] },
      ])
    ).toEqual([
      'keep: 2.00 KiB',
      'keep: tank/home@first\t2021-10-02T09:59:00Z\t1.50 KiB\thourly,daily',
      'keep: tank/home@second\t2021-10-01T19:59:00Z\t512 B\tmonthly',
    ]);
  });

  it('should print nothing when nothing is kept', () => {
    expect(formatRetainedSection('keep', [])).toEqual([]);
  });
});
