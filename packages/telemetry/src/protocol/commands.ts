/**
 * @file commands.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { CommandParseError } from '../domain/errors/domain-errors.js';
import type { ClientCommand } from './messages.js';

const INTEGER_PREFIX = /^\s*([+-]?\d+)/;
const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

/**
 * Parses "<command>:<integer>".
 *
 * The command is everything before the first colon. Without a colon the whole
 * text is the command and the parameter is 0. The parameter is read as a
 * leading signed integer; characters after the digits are ignored.
 *
 * @throws CommandParseError when the parameter has no leading integer or does
 * not fit in 32 bits
 */
export function parseCommand(input: string): ClientCommand {
  const colon = input.indexOf(':');
  if (colon === -1) {
    return { command: input, parameter: 0 };
  }

  const command = input.slice(0, colon);
  const match = INTEGER_PREFIX.exec(input.slice(colon + 1));
  const digits = match?.[1];
  if (digits === undefined) {
    throw new CommandParseError(input, 'parameter is not an integer');
  }

  const parameter = Number.parseInt(digits, 10);
  if (parameter < INT32_MIN || parameter > INT32_MAX) {
    throw new CommandParseError(input, 'parameter is out of range');
  }

  return { command, parameter };
}
