/**
 * CLI Unit Tests
 *
 * runCli against a faked orchestrator, capturing stdout and stderr writes.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { runCli, UNKNOWN_COMMAND_EXIT_CODE } from '../../src/cli';
import type { CliDependencies } from '../../src/cli';
import type { SnapshotRecord } from '../../src/retention/retention.interface';
import { DatasetAggregator } from '../../src/services/dataset-aggregator';
import { RetentionOrchestrator } from '../../src/services/retention-orchestrator';
import type { SnapshotStore } from '../../src/services/retention-orchestrator';

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

describe('runCli', () => {
  let out: string[];
  let err: string[];
  let orchestrator: {
    status: Mock<RetentionOrchestrator['status']>;
    snap: Mock<RetentionOrchestrator['snap']>;
    gc: Mock<RetentionOrchestrator['gc']>;
  };
  let serve: Mock<() => Promise<unknown>>;
  let deps: CliDependencies;

  beforeEach(() => {
    out = [];
    err = [];
    orchestrator = {
      status: vi.fn<RetentionOrchestrator['status']>().mockResolvedValue({
        keep: [first],
        delete: [second],
        retained: [{ snapshot: first, retainedBy: ['hourly', 'yearly'] }],
      }),
      snap: vi.fn<RetentionOrchestrator['snap']>().mockResolvedValue([first]),
      gc: vi.fn<RetentionOrchestrator['gc']>(async (options) => {
        const decision = { keep: [first], delete: [second] };
        options.onDecision?.(decision);
        options.onBeforeDestroy?.(second);
        return { decision, deleted: [second], dryRun: options.dryRun };
      }),
    };
    serve = vi.fn<() => Promise<unknown>>().mockResolvedValue(undefined);
    deps = {
      orchestrator,
      serve,
      version: '0.1.0',
      propertyKey: 'snapkeep:policy',
      writeOut: (text) => {
        out.push(text);
      },
      writeErr: (text) => {
        err.push(text);
      },
    };
  });

  describe('status', () => {
    it('should print the keep and delete sections', async () => {
      const exitCode = await runCli(['status'], deps);

      expect(exitCode).toBe(0);
      expect(out.join('')).toBe(
        [
          'keep: 1.50 KiB',
          'keep: tank/home@first\t2021-10-02T09:59:00Z\t1.50 KiB',
          'delete: 512 B',
          'delete: tank/home@second\t2021-10-01T19:59:00Z\t512 B',
          '',
        ].join('\n')
      );
    });

    it('should add the retaining periods with --verbose', async () => {
      await runCli(['status', '--verbose'], deps);

      expect(out[1]).toBe('keep: tank/home@first\t2021-10-02T09:59:00Z\t1.50 KiB\thourly,yearly\n');
    });

    it('should print nothing when there are no snapshots', async () => {
      orchestrator.status.mockResolvedValue({ keep: [], delete: [], retained: [] });

      expect(await runCli(['status'], deps)).toBe(0);
      expect(out).toEqual([]);
    });
  });

  describe('snap', () => {
    it('should print every created snapshot', async () => {
      const exitCode = await runCli(['snap'], deps);

      expect(exitCode).toBe(0);
      expect(out).toEqual(['snapshot: tank/home@first\n']);
    });
  });

  describe('gc', () => {
    it('should destroy and print the deleted snapshots', async () => {
      const exitCode = await runCli(['gc'], deps);

      expect(exitCode).toBe(0);
      expect(orchestrator.gc).toHaveBeenCalledWith(expect.objectContaining({ dryRun: false }));
      expect(out).toEqual(['delete: 512 B\n', 'delete: tank/home@second\t2021-10-01T19:59:00Z\t512 B\n']);
    });

    it('should pass --dry-run through', async () => {
      await runCli(['gc', '--dry-run'], deps);

      expect(orchestrator.gc).toHaveBeenCalledWith(expect.objectContaining({ dryRun: true }));
      expect(out).toEqual(['delete: 512 B\n', 'delete: tank/home@second\t2021-10-01T19:59:00Z\t512 B\n']);
    });

    it('should print nothing when no snapshot is marked delete', async () => {
      orchestrator.gc.mockImplementation(async (options) => {
        const decision = { keep: [first], delete: [] };
        options.onDecision?.(decision);
        return { decision, deleted: [], dryRun: options.dryRun };
      });

      expect(await runCli(['gc'], deps)).toBe(0);
      expect(out).toEqual([]);
    });

    it('should print the snapshots destroyed before a failed destroy', async () => {
      const a: SnapshotRecord = { name: 'tank@a', createdAt: new Date('2021-10-02T00:00:00Z'), usedBytes: 100 };
      const b: SnapshotRecord = { name: 'tank@b', createdAt: new Date('2021-10-01T00:00:00Z'), usedBytes: 200 };
      const destroyed: string[] = [];
      const store = {
        listTracked: vi.fn<SnapshotStore['listTracked']>().mockResolvedValue([a, b]),
        create: vi.fn<SnapshotStore['create']>(),
        destroy: vi.fn<SnapshotStore['destroy']>(async (snapshot) => {
          if (snapshot.name === 'tank@b') {
            throw new Error('zfs destroy failed: dataset is busy');
          }
          destroyed.push(snapshot.name);
        }),
      };
      const aggregator = new DatasetAggregator({ getProperty: async () => '' }, 'snapkeep:policy');
      deps.orchestrator = new RetentionOrchestrator(store, { listTracked: async () => ['tank'] }, aggregator);

      const exitCode = await runCli(['gc'], deps);

      expect(exitCode).toBe(1);
      expect(destroyed).toEqual(['tank@a']);
      expect(out).toEqual([
        'delete: 300 B\n',
        'delete: tank@a\t2021-10-02T00:00:00Z\t100 B\n',
        'delete: tank@b\t2021-10-01T00:00:00Z\t200 B\n',
      ]);
      expect(err).toEqual(['error: zfs destroy failed: dataset is busy\n']);
    });

    it('should exit 1 and report the error when gc fails', async () => {
      orchestrator.gc.mockRejectedValue(new Error('Tried to destroy something that is not a snapshot: tank'));

      const exitCode = await runCli(['gc'], deps);

      expect(exitCode).toBe(1);
      expect(err).toEqual(['error: Tried to destroy something that is not a snapshot: tank\n']);
    });
  });

  describe('serve', () => {
    it('should start the server', async () => {
      expect(await runCli(['serve'], deps)).toBe(0);
      expect(serve).toHaveBeenCalledTimes(1);
    });
  });

  describe('help and version', () => {
    it('should print help with tips when run without arguments', async () => {
      const exitCode = await runCli([], deps);
      const help = out.join('');

      expect(exitCode).toBe(0);
      expect(help).toContain("  use 'zfs set snapkeep:policy=h24d30w8m6y1 some/dataset' to enable.\n");
      expect(help).toContain("  use 'zfs set snapkeep:policy=- some/dataset@some-snap' to retain.\n");
      expect(help).toContain('snapkeep v0.1.0');
    });

    it('should print help for the help command', async () => {
      const exitCode = await runCli(['help'], deps);

      expect(exitCode).toBe(0);
      expect(out.join('')).toContain('Usage: snapkeep [options] [command]');
    });

    it('should print the version for the version command', async () => {
      expect(await runCli(['version'], deps)).toBe(0);
      expect(out).toEqual(['snapkeep v0.1.0\n']);
    });

    it('should print the version for --version and -v', async () => {
      expect(await runCli(['--version'], deps)).toBe(0);
      expect(await runCli(['-v'], deps)).toBe(0);
      expect(out).toEqual(['snapkeep v0.1.0\n', 'snapkeep v0.1.0\n']);
    });

    it('should print help to stderr and exit 111 for an unknown command', async () => {
      const exitCode = await runCli(['frobnicate'], deps);

      expect(exitCode).toBe(UNKNOWN_COMMAND_EXIT_CODE);
      expect(err[0]).toBe("error: unknown command 'frobnicate'\n");
      expect(err.join('')).toContain('Usage: snapkeep [options] [command]');
      expect(orchestrator.gc).not.toHaveBeenCalled();
    });
  });
});
