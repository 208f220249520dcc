/**
 * @file connection-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Connection } from '../entities/connection.js';

/**
 * Port (interface) for the connection registry.
 * Exclusive owner of every live Connection, keyed by transport id.
 */
export interface ConnectionRegistry {
  /**
   * Creates and stores a Connection for a newly connected socket.
   * Throws DuplicateConnectionError if the id is already registered.
   */
  onConnect(id: number, permissions?: Iterable<string>): Connection;

  /**
   * Removes the connection. Returns false if the id was not registered.
   */
  onDisconnect(id: number): boolean;

  /**
   * Logs the error and removes the connection.
   * Returns false if the id was not registered.
   */
  onError(id: number, message: string): boolean;

  /**
   * Retrieves a connection by id.
   */
  get(id: number): Connection | undefined;

  /**
   * Checks if an id is registered.
   */
  has(id: number): boolean;

  /**
   * Returns a snapshot of registered ids.
   */
  ids(): number[];

  /**
   * Returns all registered connections.
   */
  getAll(): Connection[];

  /**
   * Returns the count of registered connections.
   */
  count(): number;
}
