/**
 * @file connection-lifecycle.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { Connection } from '../domain/entities/connection.js';
import type { ConnectionRegistry } from '../domain/ports/connection-registry.js';
import type { ConnectionObserver } from '../domain/ports/connection-observer.js';

export interface ConnectionLifecycleDeps {
  registry: ConnectionRegistry;
  /** Permissions granted to every new connection */
  defaultPermissions?: readonly string[];
  logger: Logger;
}

/**
 * Use case for connection lifecycle events reported by the transport.
 * Observers hear about a removal only when a registered connection was
 * actually removed, so duplicate close/error notifications are silent.
 */
export class ConnectionLifecycle {
  private readonly registry: ConnectionRegistry;
  private readonly defaultPermissions: readonly string[];
  private readonly observers: ConnectionObserver[] = [];
  private readonly logger: Logger;

  constructor(deps: ConnectionLifecycleDeps) {
    this.registry = deps.registry;
    this.defaultPermissions = deps.defaultPermissions ?? [];
    this.logger = deps.logger.child({ component: 'ConnectionLifecycle' });
  }

  addObserver(observer: ConnectionObserver): void {
    this.observers.push(observer);
  }

  /**
   * Registers a newly connected socket.
   * Throws DuplicateConnectionError if the id is still registered.
   */
  connect(id: number): Connection {
    const connection = this.registry.onConnect(id, this.defaultPermissions);
    for (const observer of this.observers) {
      observer.onClientConnect(id);
    }
    this.logger.info(
      { connectionId: id, permissions: connection.permissions, connections: this.registry.count() },
      'Client connected'
    );
    return connection;
  }

  /**
   * Handles a socket close. Returns false if the id was already gone.
   */
  disconnect(id: number): boolean {
    const removed = this.registry.onDisconnect(id);
    if (removed) {
      this.notifyRemoved(id);
      this.logger.info(
        { connectionId: id, connections: this.registry.count() },
        'Client disconnected'
      );
    }
    return removed;
  }

  /**
   * Handles a socket or write error. Returns false if the id was already gone.
   */
  fail(id: number, message: string): boolean {
    const removed = this.registry.onError(id, message);
    if (removed) {
      this.notifyRemoved(id);
    }
    return removed;
  }

  private notifyRemoved(id: number): void {
    for (const observer of this.observers) {
      observer.onClientDisconnect(id);
    }
  }
}
