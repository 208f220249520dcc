/**
 * @file spectrum-frame.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * One power-per-bin estimate plus the tuning it was taken at.
 * Lives only for a single encode-and-broadcast cycle.
 */
export interface SpectrumFrame {
  /** Center frequency in Hz */
  readonly centerFrequency: number;
  /** Displayed bandwidth in Hz */
  readonly span: number;
  /** Power per bin in dB, ascending bin order */
  readonly powers: ArrayLike<number>;
}
