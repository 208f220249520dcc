/**
 * @file websocket-server.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { WebSocketServer as WSServer, type WebSocket } from 'ws';
import type { Server } from 'http';
import type { Logger } from 'pino';
import { TransportInitError } from '../../domain/errors/domain-errors.js';
import { CLOSE_CODES, WEBSOCKET_CONFIG } from '../../config/constants.js';

export interface WebSocketServerConfig {
  path: string;
  heartbeatIntervalMs: number;
  maxPayload?: number;
}

/**
 * Receives every socket that completes the upgrade.
 */
export interface ConnectionAcceptor {
  handleConnection(socket: WebSocket): unknown;
}

export interface WebSocketServerDeps {
  connectionHandler: ConnectionAcceptor;
  logger: Logger;
}

/**
 * WebSocket server wrapper that integrates with the HTTP server
 * and manages the WebSocket lifecycle.
 */
export class WebSocketServerWrapper {
  private wss: WSServer | null = null;
  private heartbeatInterval: NodeJS.Timeout | null = null;
  private readonly alive = new WeakMap<WebSocket, boolean>();
  private readonly config: WebSocketServerConfig;
  private readonly deps: WebSocketServerDeps;
  private readonly logger: Logger;

  constructor(config: WebSocketServerConfig, deps: WebSocketServerDeps) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'WebSocketServer' });
  }

  /**
   * Attaches the WebSocket server to an HTTP server.
   * Throws TransportInitError if the server cannot be created.
   */
  attach(httpServer: Server): void {
    try {
      this.wss = new WSServer({
        server: httpServer,
        path: this.config.path,
        maxPayload: this.config.maxPayload ?? WEBSOCKET_CONFIG.MAX_PAYLOAD,
      });
    } catch (error) {
      throw new TransportInitError(error instanceof Error ? error.message : String(error));
    }

    this.wss.on('connection', (socket: WebSocket) => {
      this.alive.set(socket, true);
      socket.on('pong', () => {
        this.alive.set(socket, true);
      });
      this.deps.connectionHandler.handleConnection(socket);
    });

    this.wss.on('error', (error) => {
      this.logger.error({ error }, 'WebSocket server error');
    });

    // Start keep-alive ping interval
    this.startHeartbeatCheck();

    this.logger.info({ path: this.config.path }, 'WebSocket server attached');
  }

  /**
   * Pings every client; a client that missed the previous pong is terminated.
   */
  private startHeartbeatCheck(): void {
    this.heartbeatInterval = setInterval(() => {
      this.wss?.clients.forEach((client) => {
        if (this.alive.get(client) === false) {
          this.logger.debug('Terminating unresponsive client');
          client.terminate();
          return;
        }
        this.alive.set(client, false);
        client.ping();
      });
    }, this.config.heartbeatIntervalMs);
    this.heartbeatInterval.unref();
  }

  /**
   * Closes the WebSocket server gracefully with timeout.
   * @param timeoutMs - Maximum time to wait for graceful close (default: 5000ms)
   */
  async close(timeoutMs = 5000): Promise<void> {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }

    const wss = this.wss;
    if (!wss) return;
    this.wss = null;

    const clientCount = wss.clients.size;
    this.logger.info({ clientCount }, 'Closing WebSocket server');

    // Send close frame to all clients
    wss.clients.forEach((client) => {
      client.close(CLOSE_CODES.GOING_AWAY, 'Server shutting down');
    });

    // Wait for graceful close with timeout
    let timeout: NodeJS.Timeout | undefined;
    const closePromise = new Promise<void>((resolve, reject) => {
      wss.close((err) => {
        if (err) {
          this.logger.error({ error: err }, 'Error closing WebSocket server');
          reject(err);
        } else {
          this.logger.info('WebSocket server closed gracefully');
          resolve();
        }
      });
    });

    const timeoutPromise = new Promise<void>((resolve) => {
      timeout = setTimeout(() => {
        this.logger.warn(
          { timeoutMs, remainingClients: wss.clients.size },
          'WebSocket graceful close timed out, forcing termination'
        );

        // Force terminate all remaining connections
        wss.clients.forEach((client) => {
          client.terminate();
        });

        resolve();
      }, timeoutMs);
    });

    try {
      // Race between graceful close and timeout
      await Promise.race([closePromise, timeoutPromise]);
    } finally {
      clearTimeout(timeout);
    }
  }
}
