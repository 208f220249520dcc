/**
 * @file log-level.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Level, LevelWithSilent } from 'pino';

export type LogLevel = 'off' | 'trace' | 'debug' | 'info' | 'warn' | 'critical';

/**
 * Administrative verbosity → severity floor. 4 and 5 are both warn.
 */
const VERBOSITY_LEVELS: Readonly<Record<number, LogLevel>> = {
  0: 'off',
  1: 'trace',
  2: 'debug',
  3: 'info',
  4: 'warn',
  5: 'warn',
  6: 'critical',
};

/**
 * Maps an integer verbosity to a log level.
 * Values outside 0-6 select trace.
 */
export function resolveLogLevel(verbosity: number): LogLevel {
  return VERBOSITY_LEVELS[verbosity] ?? 'trace';
}

/**
 * pino has no "critical"; fatal is its highest severity.
 */
export function toPinoLevel(level: LogLevel): LevelWithSilent {
  switch (level) {
    case 'off':
      return 'silent';
    case 'critical':
      return 'fatal';
    default:
      return level;
  }
}

/**
 * Level for an individual multistream destination, which cannot be silent.
 */
export function toStreamLevel(level: LogLevel): Level {
  const pinoLevel = toPinoLevel(level);
  return pinoLevel === 'silent' ? 'fatal' : pinoLevel;
}
