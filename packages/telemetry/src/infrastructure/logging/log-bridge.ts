/**
 * @file log-bridge.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import pino, { type DestinationStream } from 'pino';
import { PERMISSIONS } from '../../config/constants.js';
import { LogRecordSchema } from '../../protocol/schemas.js';

/**
 * The part of the router the bridge needs.
 */
export interface LogBroadcaster {
  broadcastToPermission(payload: string, permission: string): number;
}

/**
 * Renders one pino JSON line as client-facing text.
 * Returning undefined skips the line.
 */
export type LogLineFormatter = (line: string) => string | undefined;

/**
 * Formats a pino line as `[HH:MM:SS] LEVEL component: message` (UTC).
 * Lines that are not pino records are passed through without the newline.
 */
export function formatLogLine(line: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return line.trimEnd();
  }

  const result = LogRecordSchema.safeParse(parsed);
  if (!result.success) {
    return line.trimEnd();
  }

  const { level, time, msg, name, component } = result.data;
  const clock = new Date(time).toISOString().slice(11, 19);
  const label = (typeof level === 'number' ? pino.levels.labels[level] ?? String(level) : level).toUpperCase();
  const source = component ?? name;

  return source ? `[${clock}] ${label} ${source}: ${msg}` : `[${clock}] ${label}: ${msg}`;
}

/**
 * pino destination that forwards log lines to connections holding the
 * "logs" permission.
 *
 * Created before the router exists; lines written before {@link install}
 * are not forwarded. Lines produced while a forward is in progress are
 * dropped on this channel.
 */
export class LogBridge implements DestinationStream {
  private router: LogBroadcaster | null = null;
  private forwarding = false;
  private readonly format: LogLineFormatter;

  constructor(format: LogLineFormatter = formatLogLine) {
    this.format = format;
  }

  install(router: LogBroadcaster): void {
    this.router = router;
  }

  uninstall(): void {
    this.router = null;
  }

  get isInstalled(): boolean {
    return this.router !== null;
  }

  write(line: string): void {
    if (!this.router || this.forwarding) {
      return;
    }

    const text = this.format(line);
    if (text === undefined) {
      return;
    }

    this.forwarding = true;
    try {
      this.router.broadcastToPermission(text, PERMISSIONS.LOGS);
    } finally {
      this.forwarding = false;
    }
  }
}
