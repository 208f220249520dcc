/**
 * @file in-memory-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import { Connection } from '../../domain/entities/connection.js';
import { DuplicateConnectionError } from '../../domain/errors/domain-errors.js';
import type { ConnectionRegistry } from '../../domain/ports/connection-registry.js';

/**
 * In-memory implementation of ConnectionRegistry.
 * Stores connections in a Map indexed by transport id.
 *
 * A connect for an id that is still registered is rejected: the existing
 * connection is kept and DuplicateConnectionError is thrown to the caller.
 */
export class InMemoryConnectionRegistry implements ConnectionRegistry {
  private readonly connections = new Map<number, Connection>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'ConnectionRegistry' });
  }

  onConnect(id: number, permissions?: Iterable<string>): Connection {
    if (this.connections.has(id)) {
      throw new DuplicateConnectionError(id);
    }
    const connection = new Connection({ id, permissions });
    this.connections.set(id, connection);
    return connection;
  }

  onDisconnect(id: number): boolean {
    return this.remove(id);
  }

  onError(id: number, message: string): boolean {
    if (!this.connections.has(id)) {
      this.logger.debug({ connectionId: id, message }, 'Error for unknown connection ignored');
      return false;
    }
    this.logger.warn({ connectionId: id }, `Error: ${message} on connection ${id}`);
    return this.remove(id);
  }

  get(id: number): Connection | undefined {
    return this.connections.get(id);
  }

  has(id: number): boolean {
    return this.connections.has(id);
  }

  ids(): number[] {
    return Array.from(this.connections.keys());
  }

  getAll(): Connection[] {
    return Array.from(this.connections.values());
  }

  count(): number {
    return this.connections.size;
  }

  private remove(id: number): boolean {
    const connection = this.connections.get(id);
    if (!connection) {
      return false;
    }
    this.connections.delete(id);
    const dropped = connection.clearBuffer();
    if (dropped > 0) {
      this.logger.debug({ connectionId: id, dropped }, 'Dropped pending payloads on removal');
    }
    return true;
  }
}
