/**
 * Winston Logger Configuration
 *
 * Structured JSON logging. Every level goes to stderr: stdout is reserved for
 * the reports printed by the CLI, so `snapkeep status | grep delete` stays clean.
 */

import winston from 'winston';
import { config } from './index';

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: config.service.name,
    version: config.service.version,
  },
  transports: [
    new winston.transports.Console({
      stderrLevels: Object.keys(winston.config.npm.levels),
    }),
  ],
});
