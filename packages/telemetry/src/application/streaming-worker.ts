/**
 * @file streaming-worker.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 *
 * Drains the sample queue, estimates a spectrum per batch and broadcasts it.
 */

import type { Logger } from 'pino';
import type { ConnectionObserver } from '../domain/ports/connection-observer.js';
import type { ReactorWait } from '../domain/ports/reactor-wait.js';
import type { SampleQueue } from '../domain/ports/sample-queue.js';
import type { SpectralEstimator } from '../domain/ports/spectral-estimator.js';
import { InvalidConfigurationError, PipelineError } from '../domain/errors/domain-errors.js';
import { encodeSpectrumPayload } from '../protocol/spectrum.js';
import type { BroadcastRouter } from './broadcast-router.js';

export type WorkerState = 'created' | 'running' | 'stopping' | 'terminated';

/**
 * Result of one pipeline cycle.
 * - idle: the queue held no more than the low-water mark
 * - unsubscribed: a batch was dequeued and discarded, nobody is listening
 * - broadcast: a frame was computed and queued for every connection
 */
export type CycleOutcome = 'idle' | 'unsubscribed' | 'broadcast';

export interface StreamingWorkerConfig {
  /** Transform size; every frame carries exactly this many bins */
  nfft: number;
  /** Batches that must be pending before one is dequeued */
  lowWaterMark: number;
  /** Upper bound on a single wait, and so on shutdown latency */
  waitTimeoutMs: number;
  centerFrequency: number;
  span: number;
}

export interface StreamingWorkerDeps {
  queue: SampleQueue;
  estimator: SpectralEstimator;
  broadcaster: Pick<BroadcastRouter, 'broadcast'>;
  pulse: ReactorWait;
  logger: Logger;
}

/**
 * Background spectrum pipeline.
 *
 * State moves created → running → stopping → terminated and never back.
 * `isStopping` is always set before `isTerminated`, including when the loop
 * exits by exception, so a supervisor never sees terminated without stopping.
 */
export class StreamingWorker implements ConnectionObserver {
  private _state: WorkerState = 'created';
  private _stopping = false;
  private _terminated = false;
  private started = false;
  private subscriberCount = 0;
  private centerFrequency: number;
  private span: number;
  private cycles = 0;
  private frames = 0;

  private readonly config: StreamingWorkerConfig;
  private readonly deps: StreamingWorkerDeps;
  private readonly logger: Logger;
  private readonly abortController = new AbortController();
  private readonly workingBuffer: Float32Array;
  private readonly terminationWaiters: Array<() => void> = [];

  constructor(config: StreamingWorkerConfig, deps: StreamingWorkerDeps) {
    if (!Number.isInteger(config.nfft) || config.nfft < 1) {
      throw new InvalidConfigurationError(`nfft must be a positive integer, got ${config.nfft}`);
    }
    if (!Number.isInteger(config.lowWaterMark) || config.lowWaterMark < 0) {
      throw new InvalidConfigurationError(
        `lowWaterMark must be a non-negative integer, got ${config.lowWaterMark}`
      );
    }
    if (!(config.waitTimeoutMs > 0) || !Number.isFinite(config.waitTimeoutMs)) {
      throw new InvalidConfigurationError(
        `waitTimeoutMs must be a finite positive number, got ${config.waitTimeoutMs}`
      );
    }

    this.config = config;
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'StreamingWorker' });
    this.centerFrequency = config.centerFrequency;
    this.span = config.span;
    this.workingBuffer = new Float32Array(config.nfft * 2);
  }

  get state(): WorkerState {
    return this._state;
  }

  get isStopping(): boolean {
    return this._stopping;
  }

  get isTerminated(): boolean {
    return this._terminated;
  }

  get subscribers(): number {
    return this.subscriberCount;
  }

  get hasSubscribers(): boolean {
    return this.subscriberCount > 0;
  }

  get stats(): { cycles: number; frames: number } {
    return { cycles: this.cycles, frames: this.frames };
  }

  setCenterFrequency(hz: number): void {
    this.centerFrequency = hz;
  }

  setSpan(hz: number): void {
    this.span = hz;
  }

  onClientConnect(_id: number): void {
    this.subscriberCount++;
  }

  onClientDisconnect(_id: number): void {
    if (this.subscriberCount > 0) {
      this.subscriberCount--;
    }
  }

  /**
   * Starts the loop. The returned promise settles when the loop exits and
   * rejects with the failure that stopped it.
   */
  start(): Promise<void> {
    if (this.started) {
      return Promise.reject(new PipelineError(`Worker already started (state: ${this._state})`));
    }
    this.started = true;
    if (this._state === 'created') {
      this._state = 'running';
    }
    return this.run();
  }

  /**
   * Requests the loop to stop. Does not wait for it.
   */
  terminate(): void {
    if (this._stopping) {
      return;
    }
    this._stopping = true;
    this._state = 'stopping';
    this.abortController.abort();
  }

  /**
   * Resolves once the worker is terminated. Never rejects.
   */
  waitForTermination(): Promise<void> {
    if (this._terminated) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.terminationWaiters.push(resolve);
    });
  }

  /**
   * Runs one pipeline cycle without waiting.
   */
  runCycle(): CycleOutcome {
    this.cycles++;

    if (this.deps.queue.size <= this.config.lowWaterMark) {
      return 'idle';
    }
    const batch = this.deps.queue.shift();
    if (!batch) {
      return 'idle';
    }

    // Subscriber check, estimate and broadcast run without yielding, so
    // connects and disconnects cannot interleave with them.
    if (!this.hasSubscribers) {
      return 'unsubscribed';
    }

    batch.copyInto(this.workingBuffer);
    const powers = this.deps.estimator.estimate(this.workingBuffer, this.config.nfft);
    if (powers.length !== this.config.nfft) {
      throw new PipelineError(
        `Estimator returned ${powers.length} bins, expected ${this.config.nfft}`
      );
    }

    const payload = encodeSpectrumPayload({
      centerFrequency: this.centerFrequency,
      span: this.span,
      powers,
    });
    this.deps.broadcaster.broadcast(payload);
    this.frames++;
    return 'broadcast';
  }

  private async run(): Promise<void> {
    this.logger.debug({ nfft: this.config.nfft, lowWaterMark: this.config.lowWaterMark }, 'Worker running');

    try {
      while (!this._stopping) {
        await this.deps.pulse.wait(this.config.waitTimeoutMs, this.abortController.signal);
        if (this._stopping) {
          break;
        }
        this.runCycle();
      }
    } catch (error) {
      this.markTerminated();
      this.logger.error({ error, stats: this.stats }, 'Worker failed');
      throw error;
    }

    this.markTerminated();
    this.logger.debug({ stats: this.stats }, 'Worker terminated');
  }

  private markTerminated(): void {
    this._stopping = true;
    this._terminated = true;
    this._state = 'terminated';
    for (const resolve of this.terminationWaiters.splice(0)) {
      resolve();
    }
  }
}
