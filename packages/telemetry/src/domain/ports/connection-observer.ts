/**
 * @file connection-observer.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Receives connection lifecycle notifications.
 * Each registered id produces exactly one connect and at most one disconnect.
 */
export interface ConnectionObserver {
  onClientConnect(id: number): void;
  onClientDisconnect(id: number): void;
}
