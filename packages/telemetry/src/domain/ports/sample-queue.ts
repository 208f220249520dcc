/**
 * @file sample-queue.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { SampleBatch } from '../value-objects/sample-batch.js';

/**
 * Port for the bounded queue that sits between the radio and the pipeline.
 */
export interface SampleQueue {
  /**
   * Appends a batch. Returns the number of batches dropped to make room.
   */
  push(batch: SampleBatch): number;

  /**
   * Removes and returns the oldest batch.
   */
  shift(): SampleBatch | undefined;

  /**
   * Number of pending batches.
   */
  readonly size: number;
}
