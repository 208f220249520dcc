/**
 * @file constants.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Permission tokens carried by connections.
 */
export const PERMISSIONS = {
  /** Eligible to receive log lines */
  LOGS: 'logs',
} as const;

/**
 * Spectrum pipeline defaults.
 */
export const SPECTRUM_CONFIG = {
  /** Transform size (bins per frame) */
  NFFT: 512,

  /** Batches that must be pending before the worker dequeues one */
  QUEUE_LOW_WATER_MARK: 5,

  /** Maximum batches held before the oldest is dropped */
  QUEUE_CAPACITY: 64,

  /** Lowest power value written to a payload (dB) */
  POWER_FLOOR_DB: -200,

  /** Highest power value written to a payload (dB) */
  POWER_CEILING_DB: 200,
} as const;

/**
 * Timing constants (in milliseconds).
 */
export const CONNECTION_TIMING = {
  /** Upper bound on one worker wait, and so on shutdown latency */
  WORKER_WAIT_TIMEOUT_MS: 100,

  /** Keep-alive ping interval; a socket missing one pong is terminated */
  HEARTBEAT_INTERVAL_MS: 30_000,

  /** Retry delay while a socket's send buffer is above the high-water mark */
  DRAIN_RETRY_MS: 20,

  /** Maximum time for the WebSocket server to close gracefully */
  CLOSE_TIMEOUT_MS: 5_000,
} as const;

/**
 * WebSocket configuration.
 */
export const WEBSOCKET_CONFIG = {
  /** Path for WebSocket endpoint */
  PATH: '/',

  /** Bytes buffered in a socket before writable notifications pause */
  SEND_HIGH_WATER_MARK: 1024 * 1024,

  /** Largest inbound frame accepted from a client */
  MAX_PAYLOAD: 64 * 1024,
} as const;

/**
 * Close codes sent by the server.
 */
export const CLOSE_CODES = {
  GOING_AWAY: 1001,
  INTERNAL_ERROR: 1011,
} as const;
