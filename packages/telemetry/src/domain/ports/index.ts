/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export type { ConnectionRegistry } from './connection-registry.js';
export type { ConnectionObserver } from './connection-observer.js';
export type { Transport } from './transport.js';
export type { SpectralEstimator } from './spectral-estimator.js';
export type { SampleQueue } from './sample-queue.js';
export type { ReactorWait, WaitOutcome } from './reactor-wait.js';
