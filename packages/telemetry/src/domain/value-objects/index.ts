/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export { SampleBatch } from './sample-batch.js';
export type { SpectrumFrame } from './spectrum-frame.js';
