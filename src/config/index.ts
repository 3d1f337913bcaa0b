/**
 * Configuration Loader
 *
 * Loads environment variables and provides typed configuration for snapkeep.
 * Uses dotenv so a local `.env` can override the defaults below.
 */

import dotenv from 'dotenv';

dotenv.config();

export interface Config {
  nodeEnv: string;
  logLevel: string;

  // HTTP (serve mode only)
  port: number;

  zfs: {
    binary: string;
    commandTimeoutMs: number;
  };

  retention: {
    // ZFS user property holding the policy string; "-" marks a dataset or snapshot untracked
    propertyKey: string;
    snapshotSuffix: string;
  };

  serve: {
    runOnStartup: boolean;
    continuousMode: boolean;
    dryRun: boolean;
  };

  service: {
    name: string;
    version: string;
  };
}

const nodeEnv = process.env.NODE_ENV || 'development';

export const config: Config = {
  nodeEnv,
  logLevel: process.env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),

  port: parseInt(process.env.PORT || '3000', 10),

  zfs: {
    binary: process.env.ZFS_BIN || 'zfs',
    commandTimeoutMs: parseInt(process.env.ZFS_COMMAND_TIMEOUT_MS || '30000', 10),
  },

  retention: {
    propertyKey: process.env.SNAPKEEP_PROPERTY || 'snapkeep:policy',
    snapshotSuffix: process.env.SNAPKEEP_SUFFIX || 'autosnap',
  },

  serve: {
    runOnStartup: process.env.RUN_ON_STARTUP !== 'false',
    continuousMode: process.env.CONTINUOUS_MODE === 'true',
    dryRun: process.env.DRY_RUN === 'true',
  },

  service: {
    name: process.env.SERVICE_NAME || 'snapkeep',
    version: process.env.npm_package_version || '0.1.0',
  },
};
