/**
 * ZfsCli
 *
 * Thin wrapper around the zfs(8) binary. Reads use scripted mode (`-H`): no
 * header, one row per line, columns separated by tabs.
 */

import type { Logger } from 'winston';
import { ZfsCommandError } from '../errors';
import type { CommandResult, CommandRunner } from './command-runner';

/**
 * The part of ZfsCli the repositories depend on.
 */
export interface ZfsCommandClient {
  read(action: string, args: readonly string[]): Promise<string[][]>;
  run(action: string, args: readonly string[]): Promise<void>;
}

export interface ZfsCliOptions {
  runner: CommandRunner;
  binary: string;
  logger: Logger;
}

export class ZfsCli implements ZfsCommandClient {
  private runner: CommandRunner;
  private binary: string;
  private logger: Logger;

  constructor(options: ZfsCliOptions) {
    this.runner = options.runner;
    this.binary = options.binary;
    this.logger = options.logger;
  }

  /**
   * `zfs <action> -H <args>` split into rows of columns. Blank lines are dropped.
   */
  async read(action: string, args: readonly string[]): Promise<string[][]> {
    const result = await this.exec(action, [action, '-H', ...args]);

    return result.stdout
      .split('\n')
      .filter((line) => line !== '')
      .map((line) => line.split('\t'));
  }

  /**
   * `zfs <action> <args>` for its side effect (snapshot, destroy).
   */
  async run(action: string, args: readonly string[]): Promise<void> {
    await this.exec(action, [action, ...args]);
  }

  /**
   * True when the binary answers `zfs version`.
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.exec('version', ['version']);
      return true;
    } catch (error) {
      this.logger.warn('ZfsCli: health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private async exec(action: string, args: readonly string[]): Promise<CommandResult> {
    this.logger.debug('ZfsCli: running command', { binary: this.binary, args });

    let result: CommandResult;
    try {
      result = await this.runner.run(this.binary, args);
    } catch (error) {
      throw new ZfsCommandError(action, args, { exitCode: null, stderr: '', cause: error });
    }

    if (result.exitCode !== 0) {
      throw new ZfsCommandError(action, args, { exitCode: result.exitCode, stderr: result.stderr });
    }

    return result;
  }
}
