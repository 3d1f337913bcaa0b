/**
 * snapkeep command line
 *
 * Usage:
 *   snapkeep status [--verbose]   # show what gc would keep and delete
 *   snapkeep snap                 # snapshot every tracked dataset
 *   snapkeep gc [--dry-run]       # destroy every snapshot marked delete
 *   snapkeep serve                # health/metrics server, gc on startup
 *   snapkeep help | version
 *
 * Reports go to stdout, logs to stderr.
 */

import { Command, CommanderError } from 'commander';
import {
  formatRecord,
  formatRetainedSection,
  formatSection,
  formatSectionHeader,
} from './report/report-formatter';
import type { RetentionOrchestrator } from './services/retention-orchestrator';

export interface CliDependencies {
  orchestrator: Pick<RetentionOrchestrator, 'status' | 'snap' | 'gc'>;
  serve: () => Promise<unknown>;
  version: string;
  propertyKey: string;
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
}

export const UNKNOWN_COMMAND_EXIT_CODE = 111;

function helpTips(propertyKey: string): string {
  return [
    'Tips:',
    `  use 'zfs set ${propertyKey}=h24d30w8m6y1 some/dataset' to enable.`,
    `  use 'zfs set ${propertyKey}=- some/dataset@some-snap' to retain.`,
    "  add 'snapkeep snap' to cron.hourly.",
    "  add 'snapkeep gc'   to cron.daily.",
  ].join('\n');
}

export function createProgram(deps: CliDependencies): Command {
  const versionLine = `snapkeep v${deps.version}`;
  const print = (lines: readonly string[]) => {
    for (const line of lines) {
      deps.writeOut(`${line}\n`);
    }
  };

  const program = new Command();

  program
    .name('snapkeep')
    .description('Generational (grandfather-father-son) snapshot retention for ZFS datasets')
    .version(versionLine, '-v, --version', 'print the version')
    .configureOutput({ writeOut: deps.writeOut, writeErr: deps.writeErr })
    .addHelpText('after', `\n${helpTips(deps.propertyKey)}\n\n${versionLine}`)
    .exitOverride();

  program
    .command('status')
    .description('show which snapshots would be kept and deleted')
    .option('--verbose', 'show the retention periods keeping each snapshot')
    .action(async (options: { verbose?: boolean }) => {
      const report = await deps.orchestrator.status();
      print(options.verbose ? formatRetainedSection('keep', report.retained) : formatSection('keep', report.keep));
      print(formatSection('delete', report.delete));
    });

  program
    .command('snap')
    .description('take a snapshot of every tracked dataset')
    .action(async () => {
      const created = await deps.orchestrator.snap();
      print(created.map((snapshot) => `snapshot: ${snapshot.name}`));
    });

  program
    .command('gc')
    .description('destroy every snapshot the retention policy no longer keeps')
    .option('--dry-run', 'report what would be destroyed without destroying it')
    .action(async (options: { dryRun?: boolean }) => {
      // each line goes out before its destroy
      await deps.orchestrator.gc({
        dryRun: options.dryRun === true,
        onDecision: (decision) => {
          if (decision.delete.length > 0) {
            print([formatSectionHeader('delete', decision.delete)]);
          }
        },
        onBeforeDestroy: (snapshot) => print([formatRecord('delete', snapshot)]),
      });
    });

  program
    .command('serve')
    .description('serve /health and /metrics, running gc on startup')
    .action(async () => {
      await deps.serve();
    });

  program
    .command('version')
    .description('print the version')
    .action(() => {
      deps.writeOut(`${versionLine}\n`);
    });

  program.on('command:*', (operands: string[]) => {
    deps.writeErr(`error: unknown command '${operands[0]}'\n`);
    program.outputHelp({ error: true });
    throw new CommanderError(UNKNOWN_COMMAND_EXIT_CODE, 'snapkeep.unknownCommand', `unknown command '${operands[0]}'`);
  });

  return program;
}

/**
 * Runs one command line (without the node and script arguments) and returns
 * the exit status.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
  const program = createProgram(deps);

  if (argv.length === 0) {
    program.outputHelp();
    return 0;
  }

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    deps.writeErr(`error: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}
