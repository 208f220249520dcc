/**
 * @file in-memory-registry.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryConnectionRegistry } from '../../../src/infrastructure/persistence/in-memory-registry.js';
import { DuplicateConnectionError } from '../../../src/domain/errors/domain-errors.js';
import { createCapturingLogger, type CapturedRecord } from '../../helpers/logger.js';

describe('InMemoryConnectionRegistry', () => {
  let registry: InMemoryConnectionRegistry;
  let records: CapturedRecord[];

  beforeEach(() => {
    const captured = createCapturingLogger();
    records = captured.records;
    registry = new InMemoryConnectionRegistry(captured.logger);
  });

  it('should register connections with their permissions', () => {
    const connection = registry.onConnect(1, ['logs']);

    expect(connection.id).toBe(1);
    expect(connection.hasPermission('logs')).toBe(true);
    expect(registry.get(1)).toBe(connection);
    expect(registry.has(1)).toBe(true);
    expect(registry.count()).toBe(1);
  });

  it('should reject a duplicate id and keep the existing connection', () => {
    const first = registry.onConnect(1);

    expect(() => registry.onConnect(1)).toThrow(DuplicateConnectionError);
    expect(registry.get(1)).toBe(first);
    expect(registry.count()).toBe(1);
  });

  it('should list ids in registration order', () => {
    registry.onConnect(4);
    registry.onConnect(2);
    registry.onConnect(9);

    expect(registry.ids()).toEqual([4, 2, 9]);
    expect(registry.getAll().map((c) => c.id)).toEqual([4, 2, 9]);
  });

  it('should remove on disconnect only once', () => {
    registry.onConnect(1);

    expect(registry.onDisconnect(1)).toBe(true);
    expect(registry.onDisconnect(1)).toBe(false);
    expect(registry.count()).toBe(0);
  });

  it('should discard pending payloads when a connection is removed', () => {
    const connection = registry.onConnect(1);
    connection.enqueue('frame');

    registry.onDisconnect(1);

    expect(connection.pendingCount).toBe(0);
  });

  it('should log and remove on error', () => {
    registry.onConnect(2);

    expect(registry.onError(2, 'boom')).toBe(true);
    expect(registry.has(2)).toBe(false);

    const warning = records.find((r) => r.level === 'warn');
    expect(warning?.msg).toBe('Error: boom on connection 2');
    expect(warning?.component).toBe('ConnectionRegistry');
  });

  it('should ignore errors for unknown connections', () => {
    expect(registry.onError(5, 'late')).toBe(false);
    expect(records.filter((r) => r.level === 'warn')).toHaveLength(0);
  });
});
