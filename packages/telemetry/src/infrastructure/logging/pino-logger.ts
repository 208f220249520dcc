/**
 * @file pino-logger.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { toPinoLevel, toStreamLevel, type LogLevel } from './log-level.js';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
  /** Extra destination receiving every record, e.g. the log bridge */
  bridge?: DestinationStream;
}

/**
 * Creates a configured pino logger instance.
 */
export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    name: config.name,
    level: toPinoLevel(config.level),
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  // Use pino-pretty for development
  const stdout: DestinationStream = config.pretty
    ? pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      })
    : pino.destination(1);

  if (!config.bridge) {
    return pino(options, stdout);
  }

  const streamLevel = toStreamLevel(config.level);
  return pino(
    options,
    pino.multistream([
      { level: streamLevel, stream: stdout },
      { level: streamLevel, stream: config.bridge },
    ])
  );
}

export type { Logger } from 'pino';
