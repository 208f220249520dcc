/**
 * @file command-dispatcher.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import { CommandParseError } from '../domain/errors/domain-errors.js';
import { parseCommand } from '../protocol/commands.js';
import type { ClientCommand } from '../protocol/messages.js';
import { PERMISSIONS } from '../config/constants.js';
import type { BroadcastRouter } from './broadcast-router.js';

export type CommandHandler = (connectionId: number, parameter: number) => void;

/**
 * Routes inbound "<command>:<integer>" messages to registered handlers.
 * Commands without a handler are parsed and logged only; nothing is sent back.
 */
export class CommandDispatcher {
  private readonly handlers = new Map<string, CommandHandler>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'CommandDispatcher' });
  }

  register(command: string, handler: CommandHandler): void {
    this.handlers.set(command, handler);
  }

  has(command: string): boolean {
    return this.handlers.has(command);
  }

  /**
   * Parses and dispatches one message.
   * Returns the parsed command, or undefined when the message was dropped.
   */
  dispatch(connectionId: number, text: string): ClientCommand | undefined {
    let parsed: ClientCommand;
    try {
      parsed = parseCommand(text);
    } catch (error) {
      if (error instanceof CommandParseError) {
        this.logger.warn({ connectionId, error: error.toJSON() }, 'Dropped client command');
        return undefined;
      }
      throw error;
    }

    this.logger.info(
      { connectionId, command: parsed.command, parameter: parsed.parameter },
      'Client command'
    );

    this.handlers.get(parsed.command)?.(connectionId, parsed.parameter);
    return parsed;
  }
}

/**
 * Handler for "logs:<n>": a non-zero parameter grants the logs permission to
 * the sender, zero revokes it.
 */
export function createLogSubscriptionHandler(
  router: Pick<BroadcastRouter, 'grantPermission' | 'revokePermission'>
): CommandHandler {
  return (connectionId, parameter) => {
    if (parameter !== 0) {
      router.grantPermission(connectionId, PERMISSIONS.LOGS);
    } else {
      router.revokePermission(connectionId, PERMISSIONS.LOGS);
    }
  };
}
