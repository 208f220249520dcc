/**
 * @file reactor-pulse.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ReactorPulse } from '../../../src/infrastructure/websocket/index.js';

describe('ReactorPulse', () => {
  let pulse: ReactorPulse;

  beforeEach(() => {
    vi.useFakeTimers();
    pulse = new ReactorPulse();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should wake every waiter on notify', async () => {
    const first = pulse.wait(1000);
    const second = pulse.wait(1000);
    expect(pulse.waiting).toBe(2);

    pulse.notify();

    await expect(first).resolves.toBe('event');
    await expect(second).resolves.toBe('event');
    expect(pulse.waiting).toBe(0);
  });

  it('should time out', async () => {
    const outcome = pulse.wait(100);

    vi.advanceTimersByTime(100);

    await expect(outcome).resolves.toBe('timeout');
    expect(pulse.waiting).toBe(0);
  });

  it('should resolve aborted when the signal fires', async () => {
    const controller = new AbortController();
    const outcome = pulse.wait(1000, controller.signal);

    controller.abort();

    await expect(outcome).resolves.toBe('aborted');
    expect(pulse.waiting).toBe(0);
  });

  it('should not wait on an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(pulse.wait(1000, controller.signal)).resolves.toBe('aborted');
    expect(pulse.waiting).toBe(0);
  });

  it('should ignore notify without waiters', () => {
    expect(() => pulse.notify()).not.toThrow();
  });

  it('should only wake waiters registered before the notify', async () => {
    pulse.notify();
    const later = pulse.wait(100);

    vi.advanceTimersByTime(100);

    await expect(later).resolves.toBe('timeout');
  });
});
