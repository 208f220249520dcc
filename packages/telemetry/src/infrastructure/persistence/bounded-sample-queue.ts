/**
 * @file bounded-sample-queue.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { SampleBatch } from '../../domain/value-objects/sample-batch.js';
import type { SampleQueue } from '../../domain/ports/sample-queue.js';
import { InvalidConfigurationError } from '../../domain/errors/domain-errors.js';

/**
 * FIFO of sample batches with a fixed capacity.
 * Pushing onto a full queue drops the oldest batch.
 */
export class BoundedSampleQueue implements SampleQueue {
  private readonly batches: SampleBatch[] = [];
  private readonly _capacity: number;
  private _dropped = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InvalidConfigurationError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this._capacity = capacity;
  }

  push(batch: SampleBatch): number {
    this.batches.push(batch);
    let dropped = 0;
    while (this.batches.length > this._capacity) {
      this.batches.shift();
      dropped++;
    }
    this._dropped += dropped;
    return dropped;
  }

  shift(): SampleBatch | undefined {
    return this.batches.shift();
  }

  get size(): number {
    return this.batches.length;
  }

  get capacity(): number {
    return this._capacity;
  }

  /**
   * Total batches dropped since construction.
   */
  get droppedCount(): number {
    return this._dropped;
  }
}
