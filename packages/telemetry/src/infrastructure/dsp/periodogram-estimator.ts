/**
 * @file periodogram-estimator.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 *
 * Welch periodogram over complex samples.
 */

import type { SpectralEstimator } from '../../domain/ports/spectral-estimator.js';
import { InvalidConfigurationError } from '../../domain/errors/domain-errors.js';

/**
 * Added to every bin before taking the logarithm; silence reads -120 dB.
 */
const POWER_EPSILON = 1e-12;

/**
 * Default DSP engine: Hann-windowed Welch average with 50% overlap and a
 * radix-2 FFT. Output is FFT-shifted (most negative frequency first, DC at
 * bin nfft/2) and scaled so a full-scale tone centered on a bin reads 0 dB.
 *
 * Inputs shorter than nfft are zero-padded into a single window.
 */
export class PeriodogramEstimator implements SpectralEstimator {
  private readonly nfft: number;
  private readonly window: Float64Array;
  private readonly windowGain: number;
  private readonly bitReversed: Uint32Array;
  private readonly cosTable: Float64Array;
  private readonly sinTable: Float64Array;
  private readonly re: Float64Array;
  private readonly im: Float64Array;
  private readonly accumulator: Float64Array;

  constructor(nfft: number) {
    if (!Number.isInteger(nfft) || nfft < 2 || (nfft & (nfft - 1)) !== 0) {
      throw new InvalidConfigurationError(`nfft must be a power of two >= 2, got ${nfft}`);
    }
    this.nfft = nfft;

    this.window = new Float64Array(nfft);
    let sum = 0;
    for (let n = 0; n < nfft; n++) {
      const w = 0.5 - 0.5 * Math.cos((2 * Math.PI * n) / nfft);
      this.window[n] = w;
      sum += w;
    }
    this.windowGain = sum * sum;

    const bits = Math.log2(nfft);
    this.bitReversed = new Uint32Array(nfft);
    for (let i = 0; i < nfft; i++) {
      let reversed = 0;
      for (let b = 0; b < bits; b++) {
        reversed = (reversed << 1) | ((i >> b) & 1);
      }
      this.bitReversed[i] = reversed;
    }

    this.cosTable = new Float64Array(nfft / 2);
    this.sinTable = new Float64Array(nfft / 2);
    for (let k = 0; k < nfft / 2; k++) {
      this.cosTable[k] = Math.cos((2 * Math.PI * k) / nfft);
      this.sinTable[k] = -Math.sin((2 * Math.PI * k) / nfft);
    }

    this.re = new Float64Array(nfft);
    this.im = new Float64Array(nfft);
    this.accumulator = new Float64Array(nfft);
  }

  estimate(samples: Float32Array, nfft: number): Float32Array {
    if (nfft !== this.nfft) {
      throw new InvalidConfigurationError(
        `Estimator built for nfft=${this.nfft}, called with ${nfft}`
      );
    }

    const count = Math.floor(samples.length / 2);
    const hop = nfft / 2;
    this.accumulator.fill(0);

    let windows = 0;
    if (count <= nfft) {
      this.accumulateWindow(samples, 0, count);
      windows = 1;
    } else {
      for (let start = 0; start + nfft <= count; start += hop) {
        this.accumulateWindow(samples, start, nfft);
        windows++;
      }
    }

    const psd = new Float32Array(nfft);
    const scale = 1 / (windows * this.windowGain);
    for (let i = 0; i < nfft; i++) {
      const power = (this.accumulator[(i + hop) % nfft] ?? 0) * scale;
      psd[i] = 10 * Math.log10(power + POWER_EPSILON);
    }
    return psd;
  }

  /**
   * Windows `length` complex samples starting at `start`, transforms them and
   * adds |X|² into the accumulator.
   */
  private accumulateWindow(samples: Float32Array, start: number, length: number): void {
    const { re, im, window, bitReversed } = this;
    re.fill(0);
    im.fill(0);

    for (let n = 0; n < length; n++) {
      const target = bitReversed[n] ?? 0;
      const w = window[n] ?? 0;
      re[target] = (samples[2 * (start + n)] ?? 0) * w;
      im[target] = (samples[2 * (start + n) + 1] ?? 0) * w;
    }

    this.transform();

    for (let k = 0; k < this.nfft; k++) {
      const a = re[k] ?? 0;
      const b = im[k] ?? 0;
      this.accumulator[k] = (this.accumulator[k] ?? 0) + a * a + b * b;
    }
  }

  /**
   * In-place iterative radix-2 FFT on bit-reversed input.
   */
  private transform(): void {
    const { re, im, cosTable, sinTable, nfft } = this;

    for (let size = 2; size <= nfft; size *= 2) {
      const half = size / 2;
      const step = nfft / size;
      for (let offset = 0; offset < nfft; offset += size) {
        for (let j = 0; j < half; j++) {
          const twiddleRe = cosTable[j * step] ?? 1;
          const twiddleIm = sinTable[j * step] ?? 0;
          const even = offset + j;
          const odd = even + half;
          const oddRe = re[odd] ?? 0;
          const oddIm = im[odd] ?? 0;
          const tRe = oddRe * twiddleRe - oddIm * twiddleIm;
          const tIm = oddRe * twiddleIm + oddIm * twiddleRe;
          const evenRe = re[even] ?? 0;
          const evenIm = im[even] ?? 0;
          re[odd] = evenRe - tRe;
          im[odd] = evenIm - tIm;
          re[even] = evenRe + tRe;
          im[even] = evenIm + tIm;
        }
      }
    }
  }
}
