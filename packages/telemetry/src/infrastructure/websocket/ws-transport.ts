/**
 * @file ws-transport.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { WebSocket } from 'ws';
import type { Logger } from 'pino';
import type { Transport } from '../../domain/ports/transport.js';

export interface WsTransportConfig {
  /** Bytes buffered in a socket before writable notifications pause */
  highWaterMark: number;
  /** Delay before re-checking a socket above the high-water mark */
  drainRetryMs: number;
}

/**
 * The part of a `ws` socket the transport and connection handler use.
 */
export interface ClientSocket {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: 'message', listener: (data: Buffer | ArrayBuffer | Buffer[]) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * Callbacks the transport raises back into the application.
 */
export interface TransportEvents {
  onWritable(id: number): void;
  onSendError(id: number, error: Error): void;
}

/**
 * Transport over `ws` sockets, addressed by small integer ids.
 *
 * Ids are the lowest free integer starting at 1, so an id is handed out again
 * only after its previous socket was detached.
 */
export class WsTransport implements Transport {
  private readonly sockets = new Map<number, ClientSocket>();
  private readonly pendingWritable = new Set<number>();
  private readonly config: WsTransportConfig;
  private readonly logger: Logger;
  private events: TransportEvents | null = null;

  constructor(config: WsTransportConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ component: 'WsTransport' });
  }

  /**
   * Connects the transport's callbacks. Must be called before sockets attach.
   */
  bind(events: TransportEvents): void {
    this.events = events;
  }

  /**
   * Assigns an id to a new socket.
   */
  attach(socket: ClientSocket): number {
    let id = 1;
    while (this.sockets.has(id)) {
      id++;
    }
    this.sockets.set(id, socket);
    return id;
  }

  /**
   * Releases the id. Call once the socket has closed.
   */
  detach(id: number): void {
    this.sockets.delete(id);
    this.pendingWritable.delete(id);
  }

  get size(): number {
    return this.sockets.size;
  }

  write(id: number, payload: string): number {
    const socket = this.sockets.get(id);
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return 0;
    }

    try {
      socket.send(payload, (error) => {
        if (error) {
          this.events?.onSendError(id, error);
        }
      });
    } catch (error) {
      this.logger.debug({ connectionId: id, error }, 'Socket send threw');
      return 0;
    }
    return Buffer.byteLength(payload, 'utf8');
  }

  requestWritable(id: number): void {
    if (this.pendingWritable.has(id) || !this.sockets.has(id)) {
      return;
    }
    this.pendingWritable.add(id);
    setImmediate(() => this.fireWritable(id));
  }

  close(id: number, code?: number, reason?: string): void {
    const socket = this.sockets.get(id);
    if (!socket) {
      return;
    }
    this.pendingWritable.delete(id);
    try {
      socket.close(code, reason);
    } catch (error) {
      this.logger.debug({ connectionId: id, error }, 'Socket close threw, terminating');
      socket.terminate();
    }
  }

  private fireWritable(id: number): void {
    const socket = this.sockets.get(id);
    if (!socket || !this.pendingWritable.has(id)) {
      this.pendingWritable.delete(id);
      return;
    }

    if (socket.bufferedAmount > this.config.highWaterMark) {
      const retry = setTimeout(() => this.fireWritable(id), this.config.drainRetryMs);
      retry.unref();
      return;
    }

    this.pendingWritable.delete(id);
    this.events?.onWritable(id);
  }
}
