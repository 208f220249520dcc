/**
 * @file spectral-estimator.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Port for the DSP engine that turns complex samples into a power spectrum.
 */
export interface SpectralEstimator {
  /**
   * Computes `nfft` power values from interleaved I/Q samples.
   * Values are in dB; the wire encoding clamps them to [-200, 200] and
   * truncates toward zero, so linear power does not survive the trip.
   */
  estimate(samples: Float32Array, nfft: number): Float32Array;
}
