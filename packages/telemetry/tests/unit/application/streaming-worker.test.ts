/**
 * @file streaming-worker.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { StreamingWorker, type StreamingWorkerConfig } from '../../../src/application/index.js';
import { BoundedSampleQueue } from '../../../src/infrastructure/persistence/bounded-sample-queue.js';
import { PeriodogramEstimator } from '../../../src/infrastructure/dsp/periodogram-estimator.js';
import { ReactorPulse } from '../../../src/infrastructure/websocket/reactor-pulse.js';
import { SampleBatch } from '../../../src/domain/value-objects/sample-batch.js';
import type { SpectralEstimator } from '../../../src/domain/ports/spectral-estimator.js';
import { InvalidConfigurationError, PipelineError } from '../../../src/domain/errors/domain-errors.js';
import { parseSpectrumPayload } from '../../../src/protocol/schemas.js';
import { createTestLogger } from '../../helpers/logger.js';

const CONFIG: StreamingWorkerConfig = {
  nfft: 512,
  lowWaterMark: 5,
  waitTimeoutMs: 100,
  centerFrequency: 100_000_000,
  span: 2_000_000,
};

class CountingEstimator implements SpectralEstimator {
  calls = 0;
  private readonly inner: SpectralEstimator;

  constructor(inner: SpectralEstimator) {
    this.inner = inner;
  }

  estimate(samples: Float32Array, nfft: number): Float32Array {
    this.calls++;
    return this.inner.estimate(samples, nfft);
  }
}

describe('StreamingWorker', () => {
  let queue: BoundedSampleQueue;
  let estimator: CountingEstimator;
  let pulse: ReactorPulse;
  let payloads: string[];

  const broadcaster = {
    broadcast: (payload: string): number => {
      payloads.push(payload);
      return 1;
    },
  };

  function createWorker(
    overrides: Partial<StreamingWorkerConfig> = {},
    dsp: SpectralEstimator = estimator
  ): StreamingWorker {
    return new StreamingWorker(
      { ...CONFIG, ...overrides },
      { queue, estimator: dsp, broadcaster, pulse, logger: createTestLogger() }
    );
  }

  function fill(count: number): void {
    for (let i = 0; i < count; i++) {
      queue.push(SampleBatch.zeros(512));
    }
  }

  beforeEach(() => {
    queue = new BoundedSampleQueue(64);
    estimator = new CountingEstimator(new PeriodogramEstimator(512));
    pulse = new ReactorPulse();
    payloads = [];
  });

  describe('runCycle', () => {
    it('should stay idle at or below the low-water mark', () => {
      const worker = createWorker();
      worker.onClientConnect(1);
      fill(5);

      expect(worker.runCycle()).toBe('idle');
      expect(queue.size).toBe(5);
      expect(estimator.calls).toBe(0);
      expect(payloads).toEqual([]);
    });

    it('should discard a batch when nobody is subscribed', () => {
      const worker = createWorker();
      fill(6);

      expect(worker.runCycle()).toBe('unsubscribed');
      expect(queue.size).toBe(5);
      expect(estimator.calls).toBe(0);
      expect(payloads).toEqual([]);
    });

    it('should broadcast one frame with nfft entries', () => {
      const worker = createWorker();
      worker.onClientConnect(1);
      fill(6);

      expect(worker.runCycle()).toBe('broadcast');
      expect(queue.size).toBe(5);
      expect(payloads).toHaveLength(1);

      const payload = parseSpectrumPayload(payloads[0] ?? '');
      expect(payload?.center).toEqual([100_000_000]);
      expect(payload?.span).toEqual([2_000_000]);
      expect(payload?.s).toHaveLength(512);
      expect(payload?.s.every((value) => value === -120)).toBe(true);
      expect(worker.stats).toEqual({ cycles: 1, frames: 1 });
    });

    it('should use the latest tuning', () => {
      const worker = createWorker();
      worker.onClientConnect(1);
      worker.setCenterFrequency(50_000_000);
      worker.setSpan(1_000_000);
      fill(6);

      worker.runCycle();

      const payload = parseSpectrumPayload(payloads[0] ?? '');
      expect(payload?.center).toEqual([50_000_000]);
      expect(payload?.span).toEqual([1_000_000]);
    });

    it('should reject an estimator output of the wrong length', () => {
      const worker = createWorker({}, { estimate: () => new Float32Array(10) });
      worker.onClientConnect(1);
      fill(6);

      expect(() => worker.runCycle()).toThrow(PipelineError);
      expect(payloads).toEqual([]);
    });
  });

  describe('subscribers', () => {
    it('should count connects and disconnects', () => {
      const worker = createWorker();
      worker.onClientConnect(1);
      worker.onClientConnect(2);
      worker.onClientDisconnect(1);

      expect(worker.subscribers).toBe(1);
      expect(worker.hasSubscribers).toBe(true);

      worker.onClientDisconnect(2);
      worker.onClientDisconnect(2);

      expect(worker.subscribers).toBe(0);
      expect(worker.hasSubscribers).toBe(false);
    });
  });

  describe('lifecycle', () => {
    it('should reject invalid configuration', () => {
      expect(() => createWorker({ nfft: 0 })).toThrow(InvalidConfigurationError);
      expect(() => createWorker({ lowWaterMark: -1 })).toThrow(InvalidConfigurationError);
      expect(() => createWorker({ waitTimeoutMs: 0 })).toThrow(InvalidConfigurationError);
    });

    it('should stop promptly on terminate', async () => {
      const worker = createWorker({ waitTimeoutMs: 60_000 });
      const running = worker.start();

      expect(worker.state).toBe('running');
      worker.terminate();
      expect(worker.isStopping).toBe(true);

      await running;
      expect(worker.isTerminated).toBe(true);
      expect(worker.state).toBe('terminated');
      await expect(worker.waitForTermination()).resolves.toBeUndefined();
    });

    it('should refuse a second start', async () => {
      const worker = createWorker();
      const running = worker.start();

      await expect(worker.start()).rejects.toThrow(PipelineError);

      worker.terminate();
      await running;
    });

    it('should process a cycle when the reactor pulses', async () => {
      const worker = createWorker({ waitTimeoutMs: 60_000 });
      worker.onClientConnect(1);
      fill(6);
      const running = worker.start();

      pulse.notify();
      await vi.waitFor(() => expect(payloads).toHaveLength(1));

      worker.terminate();
      await running;
      expect(worker.stats.frames).toBe(1);
    });

    it('should set stopping and terminated when the pipeline fails', async () => {
      const failing: SpectralEstimator = {
        estimate: () => {
          throw new Error('dsp exploded');
        },
      };
      const worker = createWorker({ waitTimeoutMs: 60_000 }, failing);
      worker.onClientConnect(1);
      fill(6);
      const running = worker.start();
      const terminated = worker.waitForTermination();

      pulse.notify();

      await expect(running).rejects.toThrow('dsp exploded');
      await terminated;
      expect(worker.isStopping).toBe(true);
      expect(worker.isTerminated).toBe(true);
    });

    it('should exit immediately when terminated before start', async () => {
      const worker = createWorker();
      worker.terminate();

      await worker.start();
      expect(worker.isTerminated).toBe(true);
      expect(worker.stats.cycles).toBe(0);
    });
  });
});
