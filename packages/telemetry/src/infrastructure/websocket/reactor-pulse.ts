/**
 * @file reactor-pulse.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { ReactorWait, WaitOutcome } from '../../domain/ports/reactor-wait.js';

/**
 * Wait primitive shared by the transport and the streaming worker.
 * The transport calls {@link notify} on every socket event; waiters wake on
 * the next event, their timeout, or their abort signal.
 */
export class ReactorPulse implements ReactorWait {
  private readonly waiters = new Set<(outcome: WaitOutcome) => void>();

  /**
   * Wakes every current waiter.
   */
  notify(): void {
    if (this.waiters.size === 0) {
      return;
    }
    const pending = Array.from(this.waiters);
    this.waiters.clear();
    for (const settle of pending) {
      settle('event');
    }
  }

  wait(timeoutMs: number, signal?: AbortSignal): Promise<WaitOutcome> {
    if (signal?.aborted) {
      return Promise.resolve('aborted');
    }

    return new Promise<WaitOutcome>((resolve) => {
      const onAbort = (): void => settle('aborted');

      const timer = setTimeout(() => settle('timeout'), timeoutMs);
      // Allow process to exit even if a wait is pending
      timer.unref();

      const settle = (outcome: WaitOutcome): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.waiters.delete(settle);
        resolve(outcome);
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.add(settle);
    });
  }

  /**
   * Number of callers currently waiting.
   */
  get waiting(): number {
    return this.waiters.size;
  }
}
