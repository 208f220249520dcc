/**
 * @file env.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import { config } from 'dotenv';
import { CONNECTION_TIMING, SPECTRUM_CONFIG, WEBSOCKET_CONFIG } from './constants.js';

// Load environment variables from .env files
config({ path: '.env.local' });
config({ path: '.env' });

/**
 * Parses "true"/"false"/"1"/"0". z.coerce.boolean() would treat "false" as true.
 */
const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

/**
 * Schema for environment variables validation.
 */
const EnvSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().default('0.0.0.0'),

  /**
   * Administrative log verbosity, 0 (off) to 6 (critical).
   * Unknown values fall back to trace.
   */
  LOG_VERBOSITY: z.coerce.number().int().default(3),

  // TLS: both must be set to serve wss://
  TLS_CERT_PATH: z.string().min(1).optional(),
  TLS_KEY_PATH: z.string().min(1).optional(),

  /**
   * WebSocket path (defaults to /).
   */
  WS_PATH: z.string().default(WEBSOCKET_CONFIG.PATH),

  // Spectrum pipeline
  NFFT: z.coerce
    .number()
    .int()
    .positive()
    .refine((n) => (n & (n - 1)) === 0, { message: 'NFFT must be a power of two' })
    .default(SPECTRUM_CONFIG.NFFT),
  QUEUE_CAPACITY: z.coerce.number().int().positive().default(SPECTRUM_CONFIG.QUEUE_CAPACITY),
  QUEUE_LOW_WATER_MARK: z.coerce
    .number()
    .int()
    .min(0)
    .default(SPECTRUM_CONFIG.QUEUE_LOW_WATER_MARK),
  WORKER_WAIT_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(CONNECTION_TIMING.WORKER_WAIT_TIMEOUT_MS),
  CENTER_FREQUENCY_HZ: z.coerce.number().default(100_000_000),
  SPAN_HZ: z.coerce.number().positive().default(2_000_000),

  /**
   * Upstream sample producer. "sweep" generates a sweeping test tone.
   */
  SAMPLE_SOURCE: z.enum(['none', 'sweep']).default('none'),
  SWEEP_BATCH_SIZE: z.coerce.number().int().positive().default(1024),
  SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(20),

  // Connections
  HEARTBEAT_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(CONNECTION_TIMING.HEARTBEAT_INTERVAL_MS),

  /**
   * Comma-separated permissions granted to every new connection.
   * Example: "logs"
   */
  DEFAULT_PERMISSIONS: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((permission) => permission.trim())
        .filter((permission) => permission.length > 0)
    ),

  /**
   * Lets clients toggle the logs permission with "logs:1" / "logs:0".
   */
  ALLOW_LOG_SUBSCRIPTION: BooleanFlag,
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validates an environment record without touching the process.
 */
export function parseEnv(source: NodeJS.ProcessEnv): ReturnType<typeof EnvSchema.safeParse> {
  return EnvSchema.safeParse(source);
}

/**
 * Loads and validates environment variables.
 * Exits the process if validation fails.
 */
export function loadEnv(): Env {
  const result = parseEnv(process.env);

  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

/**
 * Returns the TLS file paths when both are configured.
 */
export function getTlsPaths(env: Env): { certPath: string; keyPath: string } | undefined {
  if (env.TLS_CERT_PATH && env.TLS_KEY_PATH) {
    return { certPath: env.TLS_CERT_PATH, keyPath: env.TLS_KEY_PATH };
  }
  return undefined;
}

// Singleton env instance
let envInstance: Env | null = null;

/**
 * Gets the environment configuration singleton.
 */
export function getEnv(): Env {
  envInstance ??= loadEnv();
  return envInstance;
}
