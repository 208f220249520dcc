/**
 * @file messages.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

// ============================================================================
// Server → Client
// ============================================================================

/**
 * Spectrum frame broadcast to every connected client.
 * Wire form: {"center":[c],"span":[s],"s":[p0,p1,...]}
 */
export interface SpectrumPayload {
  center: [number];
  span: [number];
  /** One integer power value (dB) per bin, ascending bin order */
  s: number[];
}

// ============================================================================
// Client → Server
// ============================================================================

/**
 * Parsed form of an inbound "<command>:<integer>" text message.
 */
export interface ClientCommand {
  command: string;
  parameter: number;
}
