/**
 * @file broadcast-router.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { ConnectionRegistry } from '../domain/ports/connection-registry.js';
import type { Transport } from '../domain/ports/transport.js';
import { WriteFailureError } from '../domain/errors/domain-errors.js';
import { CLOSE_CODES } from '../config/constants.js';
import type { ConnectionLifecycle } from './connection-lifecycle.js';

export interface BroadcastRouterDeps {
  registry: ConnectionRegistry;
  transport: Transport;
  lifecycle: ConnectionLifecycle;
  logger: Logger;
}

export interface FlushResult {
  /** Payloads fully accepted by the transport */
  written: number;
  /** Payloads discarded after a failed write, including the failed one */
  dropped: number;
  failed: boolean;
}

/**
 * Buffered multicast over the connection registry.
 *
 * Sending only appends to a connection's outbound buffer; bytes move when the
 * transport reports the socket writable and calls {@link flush}.
 * The send and broadcast paths never log, because the log bridge calls them.
 */
export class BroadcastRouter {
  private readonly deps: BroadcastRouterDeps;
  private readonly logger: Logger;

  constructor(deps: BroadcastRouterDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'BroadcastRouter' });
  }

  /**
   * Queues a payload for one connection.
   * Returns false when the connection is gone.
   */
  send(id: number, payload: string): boolean {
    const connection = this.deps.registry.get(id);
    if (!connection) {
      return false;
    }
    connection.enqueue(payload);
    this.deps.transport.requestWritable(id);
    return true;
  }

  /**
   * Writes buffered payloads in order until the buffer is empty.
   *
   * A write that transmits fewer bytes than the payload ends the flush: the
   * remaining payloads are dropped without retry and the connection is failed
   * and closed.
   */
  flush(id: number): FlushResult {
    const connection = this.deps.registry.get(id);
    if (!connection) {
      return { written: 0, dropped: 0, failed: false };
    }

    let written = 0;
    for (let payload = connection.peek(); payload !== undefined; payload = connection.peek()) {
      const expected = Buffer.byteLength(payload, 'utf8');
      const accepted = this.deps.transport.write(id, payload);

      if (accepted < expected) {
        const error = new WriteFailureError(id, expected, accepted);
        const dropped = connection.pendingCount;
        this.logger.warn({ connectionId: id, dropped, error: error.toJSON() }, 'Write failed');
        this.deps.lifecycle.fail(id, 'Error writing to socket');
        this.deps.transport.close(id, CLOSE_CODES.INTERNAL_ERROR, 'Write failure');
        return { written, dropped, failed: true };
      }

      connection.shift();
      written++;
    }

    return { written, dropped: 0, failed: false };
  }

  /**
   * Queues a payload for every registered connection.
   * Returns the number of recipients.
   */
  broadcast(payload: string): number {
    let recipients = 0;
    for (const id of this.deps.registry.ids()) {
      if (this.send(id, payload)) {
        recipients++;
      }
    }
    return recipients;
  }

  /**
   * Queues a payload for every connection holding `permission`.
   * Returns the number of recipients.
   */
  broadcastToPermission(payload: string, permission: string): number {
    let recipients = 0;
    for (const id of this.deps.registry.ids()) {
      if (this.deps.registry.get(id)?.hasPermission(permission) && this.send(id, payload)) {
        recipients++;
      }
    }
    return recipients;
  }

  /**
   * Returns false when the connection is gone.
   */
  setAttribute(id: number, key: string, value: string): boolean {
    const connection = this.deps.registry.get(id);
    if (!connection) {
      return false;
    }
    connection.setAttribute(key, value);
    return true;
  }

  /**
   * Returns an empty string for an unknown connection or unset key.
   */
  getAttribute(id: number, key: string): string {
    return this.deps.registry.get(id)?.getAttribute(key) ?? '';
  }

  grantPermission(id: number, permission: string): boolean {
    const connection = this.deps.registry.get(id);
    if (!connection) {
      return false;
    }
    connection.grant(permission);
    return true;
  }

  revokePermission(id: number, permission: string): boolean {
    return this.deps.registry.get(id)?.revoke(permission) ?? false;
  }

  connectionCount(): number {
    return this.deps.registry.count();
  }
}
