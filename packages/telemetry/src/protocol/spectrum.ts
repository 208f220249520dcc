/**
 * @file spectrum.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { SPECTRUM_CONFIG } from '../config/constants.js';
import type { SpectrumFrame } from '../domain/value-objects/spectrum-frame.js';
import type { SpectrumPayload } from './messages.js';

/**
 * Converts a dB power value to the integer written on the wire.
 * Truncates toward zero after clamping to [-200, 200] dB; NaN becomes the floor.
 */
export function toWirePower(value: number): number {
  if (Number.isNaN(value)) {
    return SPECTRUM_CONFIG.POWER_FLOOR_DB;
  }
  const clamped = Math.min(
    SPECTRUM_CONFIG.POWER_CEILING_DB,
    Math.max(SPECTRUM_CONFIG.POWER_FLOOR_DB, value)
  );
  // + 0 turns -0 into 0
  return Math.trunc(clamped) + 0;
}

/**
 * Encodes a spectrum frame as the broadcast text payload.
 */
export function encodeSpectrumPayload(frame: SpectrumFrame): string {
  const s = new Array<number>(frame.powers.length);
  for (let i = 0; i < frame.powers.length; i++) {
    s[i] = toWirePower(frame.powers[i] ?? Number.NaN);
  }

  const payload: SpectrumPayload = {
    center: [frame.centerFrequency],
    span: [frame.span],
    s,
  };
  return JSON.stringify(payload);
}
