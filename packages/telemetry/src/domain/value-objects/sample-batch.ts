/**
 * @file sample-batch.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Value object holding one chunk of complex baseband samples.
 * Samples are interleaved I/Q: `[re0, im0, re1, im1, ...]`.
 */
export class SampleBatch {
  private readonly _samples: Float32Array;

  private constructor(samples: Float32Array) {
    this._samples = samples;
  }

  get samples(): Float32Array {
    return this._samples;
  }

  /**
   * Number of complex samples (half the interleaved length).
   */
  get sampleCount(): number {
    return this._samples.length / 2;
  }

  static fromInterleaved(samples: Float32Array): SampleBatch {
    if (samples.length % 2 !== 0) {
      throw new Error('SampleBatch requires an even number of interleaved values');
    }
    return new SampleBatch(samples);
  }

  /**
   * Builds a batch of `count` complex zeros.
   */
  static zeros(count: number): SampleBatch {
    return new SampleBatch(new Float32Array(count * 2));
  }

  /**
   * Copies up to `target.length / 2` complex samples into `target`,
   * zero-filling whatever the batch does not cover. Returns the number of
   * complex samples copied.
   */
  copyInto(target: Float32Array): number {
    const length = Math.min(this._samples.length, target.length);
    target.set(this._samples.subarray(0, length));
    target.fill(0, length);
    return length / 2;
  }
}
