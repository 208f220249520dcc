/**
 * @file env.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from 'vitest';
import { getTlsPaths, parseEnv, type Env } from '../../../src/config/env.js';

function parsed(source: NodeJS.ProcessEnv): Env {
  const result = parseEnv(source);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

describe('parseEnv', () => {
  it('should apply defaults', () => {
    const env = parsed({});

    expect(env.PORT).toBe(8080);
    expect(env.WS_PATH).toBe('/');
    expect(env.LOG_VERBOSITY).toBe(3);
    expect(env.NFFT).toBe(512);
    expect(env.QUEUE_CAPACITY).toBe(64);
    expect(env.QUEUE_LOW_WATER_MARK).toBe(5);
    expect(env.WORKER_WAIT_TIMEOUT_MS).toBe(100);
    expect(env.SAMPLE_SOURCE).toBe('none');
    expect(env.DEFAULT_PERMISSIONS).toEqual([]);
    expect(env.ALLOW_LOG_SUBSCRIPTION).toBe(false);
  });

  it('should coerce numbers and split permissions', () => {
    const env = parsed({
      PORT: '9000',
      LOG_VERBOSITY: '6',
      DEFAULT_PERMISSIONS: ' logs , extra ,',
      ALLOW_LOG_SUBSCRIPTION: 'true',
    });

    expect(env.PORT).toBe(9000);
    expect(env.LOG_VERBOSITY).toBe(6);
    expect(env.DEFAULT_PERMISSIONS).toEqual(['logs', 'extra']);
    expect(env.ALLOW_LOG_SUBSCRIPTION).toBe(true);
  });

  it('should read "false" and "0" as false', () => {
    expect(parsed({ ALLOW_LOG_SUBSCRIPTION: 'false' }).ALLOW_LOG_SUBSCRIPTION).toBe(false);
    expect(parsed({ ALLOW_LOG_SUBSCRIPTION: '0' }).ALLOW_LOG_SUBSCRIPTION).toBe(false);
    expect(parsed({ ALLOW_LOG_SUBSCRIPTION: '1' }).ALLOW_LOG_SUBSCRIPTION).toBe(true);
  });

  it('should reject invalid values', () => {
    expect(parseEnv({ PORT: 'abc' }).success).toBe(false);
    expect(parseEnv({ SAMPLE_SOURCE: 'radio' }).success).toBe(false);
    expect(parseEnv({ ALLOW_LOG_SUBSCRIPTION: 'yes' }).success).toBe(false);
    expect(parseEnv({ NFFT: '0' }).success).toBe(false);
  });

  it('should require NFFT to be a power of two', () => {
    const result = parseEnv({ NFFT: '48' });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('NFFT must be a power of two');
    expect(parsed({ NFFT: '256' }).NFFT).toBe(256);
  });
});

describe('getTlsPaths', () => {
  it('should require both paths', () => {
    expect(getTlsPaths(parsed({ TLS_CERT_PATH: 'cert.pem', TLS_KEY_PATH: 'key.pem' }))).toEqual({
      certPath: 'cert.pem',
      keyPath: 'key.pem',
    });
    expect(getTlsPaths(parsed({ TLS_CERT_PATH: 'cert.pem' }))).toBeUndefined();
  });
});
