/**
 * @file schemas.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import type { SpectrumPayload } from './messages.js';

// ============================================================================
// Spectrum Schemas
// ============================================================================

export const SpectrumPayloadSchema = z
  .object({
    center: z.tuple([z.number()]),
    span: z.tuple([z.number()]),
    s: z.array(z.number().int()),
  })
  .strict();

// ============================================================================
// Log Record Schemas
// ============================================================================

/**
 * Subset of a pino JSON line used to render log text for clients.
 */
export const LogRecordSchema = z.object({
  level: z.union([z.string(), z.number()]),
  time: z.number(),
  msg: z.string().default(''),
  name: z.string().optional(),
  component: z.string().optional(),
});

export type LogRecord = z.infer<typeof LogRecordSchema>;

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Parses a spectrum payload from its wire text.
 * Returns undefined if the text is not a valid payload.
 */
export function parseSpectrumPayload(text: string): SpectrumPayload | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  const result = SpectrumPayloadSchema.safeParse(parsed);
  if (result.success) {
    return result.data;
  }
  return undefined;
}
