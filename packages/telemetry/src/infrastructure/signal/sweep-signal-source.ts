/**
 * @file sweep-signal-source.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 *
 * Synthetic upstream producer: a complex tone sweeping across the band.
 */

import type { Logger } from 'pino';
import type { SampleQueue } from '../../domain/ports/sample-queue.js';
import { SampleBatch } from '../../domain/value-objects/sample-batch.js';

/**
 * Default sweep advance per batch, in cycles/sample.
 */
const DEFAULT_SWEEP_STEP = 1 / 256;

/**
 * Default peak amplitude of the uniform noise floor.
 */
const DEFAULT_NOISE_AMPLITUDE = 0.01;

export interface SweepSignalSourceConfig {
  /** Complex samples per batch */
  batchSize: number;
  /** Milliseconds between batches */
  intervalMs: number;
  /** Frequency advance per batch in cycles/sample */
  sweepStep?: number;
  noiseAmplitude?: number;
}

export interface SweepSignalSourceDeps {
  queue: SampleQueue;
  logger: Logger;
  /** Uniform [0, 1) source for the noise floor */
  random?: () => number;
}

/**
 * Pushes batches of a unit-amplitude complex tone onto the sample queue.
 * The tone's normalized frequency starts at -0.5, moves by `sweepStep` after
 * every batch and wraps at +0.5.
 */
export class SweepSignalSource {
  private timer: NodeJS.Timeout | null = null;
  private phase = 0;
  private frequency = -0.5;
  private dropped = 0;

  private readonly batchSize: number;
  private readonly intervalMs: number;
  private readonly sweepStep: number;
  private readonly noiseAmplitude: number;
  private readonly deps: SweepSignalSourceDeps;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(config: SweepSignalSourceConfig, deps: SweepSignalSourceDeps) {
    this.batchSize = config.batchSize;
    this.intervalMs = config.intervalMs;
    this.sweepStep = config.sweepStep ?? DEFAULT_SWEEP_STEP;
    this.noiseAmplitude = config.noiseAmplitude ?? DEFAULT_NOISE_AMPLITUDE;
    this.deps = deps;
    this.random = deps.random ?? Math.random;
    this.logger = deps.logger.child({ component: 'SweepSignalSource' });
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Normalized frequency (cycles/sample) of the next batch.
   */
  get currentFrequency(): number {
    return this.frequency;
  }

  /**
   * Batches the queue has dropped while this source was pushing.
   */
  get droppedBatches(): number {
    return this.dropped;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.dropped += this.deps.queue.push(this.nextBatch());
    }, this.intervalMs);
    // Allow process to exit even if the source is running
    this.timer.unref();
    this.logger.info(
      { batchSize: this.batchSize, intervalMs: this.intervalMs },
      'Sweep source started'
    );
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info({ droppedBatches: this.dropped }, 'Sweep source stopped');
  }

  /**
   * Generates the next batch and advances the sweep.
   */
  nextBatch(): SampleBatch {
    const samples = new Float32Array(this.batchSize * 2);
    const increment = 2 * Math.PI * this.frequency;

    for (let n = 0; n < this.batchSize; n++) {
      samples[2 * n] = Math.cos(this.phase) + this.noise();
      samples[2 * n + 1] = Math.sin(this.phase) + this.noise();
      this.phase = (this.phase + increment) % (2 * Math.PI);
    }

    this.frequency += this.sweepStep;
    if (this.frequency >= 0.5) {
      this.frequency -= 1;
    }

    return SampleBatch.fromInterleaved(samples);
  }

  private noise(): number {
    if (this.noiseAmplitude === 0) {
      return 0;
    }
    return (this.random() * 2 - 1) * this.noiseAmplitude;
  }
}
