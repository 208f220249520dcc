/**
 * @file connection-handler.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { ConnectionLifecycle } from '../../application/connection-lifecycle.js';
import type { BroadcastRouter } from '../../application/broadcast-router.js';
import type { CommandDispatcher } from '../../application/command-dispatcher.js';
import { DuplicateConnectionError } from '../../domain/errors/domain-errors.js';
import { CLOSE_CODES } from '../../config/constants.js';
import type { ReactorPulse } from './reactor-pulse.js';
import type { ClientSocket, WsTransport } from './ws-transport.js';

export interface ConnectionHandlerDeps {
  lifecycle: ConnectionLifecycle;
  router: BroadcastRouter;
  dispatcher: CommandDispatcher;
  transport: WsTransport;
  pulse: ReactorPulse;
  logger: Logger;
}

/**
 * Handles individual WebSocket connections.
 * Turns socket events into lifecycle calls, command dispatch and buffer
 * flushes, and pulses the reactor on every event.
 */
export class ConnectionHandler {
  private readonly deps: ConnectionHandlerDeps;
  private readonly logger: Logger;

  constructor(deps: ConnectionHandlerDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'ConnectionHandler' });

    deps.transport.bind({
      onWritable: (id) => this.handleWritable(id),
      onSendError: (id, error) => this.handleError(id, error),
    });
  }

  /**
   * Sets up event handlers for a new WebSocket connection.
   * Returns the connection id, or undefined if the connection was rejected.
   */
  handleConnection(socket: ClientSocket): number | undefined {
    const id = this.deps.transport.attach(socket);
    this.deps.pulse.notify();

    try {
      this.deps.lifecycle.connect(id);
    } catch (error) {
      if (error instanceof DuplicateConnectionError) {
        this.logger.error({ connectionId: id, error: error.toJSON() }, 'Rejected duplicate connection');
        this.deps.transport.detach(id);
        socket.close(CLOSE_CODES.INTERNAL_ERROR, 'Duplicate connection');
        return undefined;
      }
      throw error;
    }

    socket.on('message', (data: Buffer | ArrayBuffer | Buffer[]) => {
      let message: string;
      if (Array.isArray(data)) {
        message = Buffer.concat(data).toString('utf8');
      } else if (data instanceof ArrayBuffer) {
        message = Buffer.from(new Uint8Array(data)).toString('utf8');
      } else {
        message = data.toString('utf8');
      }
      this.deps.pulse.notify();
      this.deps.dispatcher.dispatch(id, message);
    });

    socket.on('close', () => {
      this.deps.pulse.notify();
      this.deps.transport.detach(id);
      this.deps.lifecycle.disconnect(id);
    });

    socket.on('error', (error: Error) => {
      this.handleError(id, error);
    });

    return id;
  }

  private handleWritable(id: number): void {
    this.deps.pulse.notify();
    this.deps.router.flush(id);
  }

  private handleError(id: number, error: Error): void {
    this.deps.pulse.notify();
    this.deps.lifecycle.fail(id, error.message);
  }
}
