/**
 * @file commands.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from 'vitest';
import { parseCommand } from '../../../src/protocol/index.js';
import { CommandParseError } from '../../../src/domain/errors/domain-errors.js';

describe('parseCommand', () => {
  it('should split command and parameter', () => {
    expect(parseCommand('tune:1000')).toEqual({ command: 'tune', parameter: 1000 });
  });

  it('should default the parameter to zero without a colon', () => {
    expect(parseCommand('ping')).toEqual({ command: 'ping', parameter: 0 });
  });

  it('should accept signed parameters', () => {
    expect(parseCommand('gain:-5')).toEqual({ command: 'gain', parameter: -5 });
    expect(parseCommand('gain:+7')).toEqual({ command: 'gain', parameter: 7 });
  });

  it('should read only the leading integer', () => {
    expect(parseCommand('gain: 12abc')).toEqual({ command: 'gain', parameter: 12 });
  });

  it('should split at the first colon', () => {
    expect(parseCommand(':5')).toEqual({ command: '', parameter: 5 });
    expect(() => parseCommand('a:b:3')).toThrow(CommandParseError);
  });

  it('should reject a non-integer parameter', () => {
    expect(() => parseCommand('tune:abc')).toThrow(
      'Cannot parse command "tune:abc": parameter is not an integer'
    );
    expect(() => parseCommand('tune:')).toThrow(CommandParseError);
  });

  it('should reject parameters outside 32 bits', () => {
    expect(() => parseCommand('tune:99999999999')).toThrow(
      'Cannot parse command "tune:99999999999": parameter is out of range'
    );
    expect(parseCommand('tune:2147483647').parameter).toBe(2147483647);
    expect(parseCommand('tune:-2147483648').parameter).toBe(-2147483648);
  });
});
