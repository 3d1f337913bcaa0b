/**
 * Shared zfs client
 *
 * One ZfsCli for the process, configured from the environment. Repositories
 * receive it through their constructors; the health route imports it directly.
 */

import { config } from '../config';
import { logger } from '../config/logger';
import { SpawnCommandRunner } from './command-runner';
import { ZfsCli } from './zfs-cli';

export const zfs = new ZfsCli({
  runner: new SpawnCommandRunner(config.zfs.commandTimeoutMs),
  binary: config.zfs.binary,
  logger,
});
