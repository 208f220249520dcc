/**
 * @file reactor-wait.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export type WaitOutcome = 'event' | 'timeout' | 'aborted';

/**
 * Port for the shared wait primitive that paces the streaming worker.
 */
export interface ReactorWait {
  /**
   * Resolves on the next transport event, after `timeoutMs`, or when
   * `signal` aborts, whichever comes first. Never rejects.
   */
  wait(timeoutMs: number, signal?: AbortSignal): Promise<WaitOutcome>;
}
