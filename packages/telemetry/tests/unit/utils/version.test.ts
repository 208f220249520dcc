/**
 * @file version.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from 'vitest';
import { getRelayVersion } from '../../../src/utils/version.js';

describe('getRelayVersion', () => {
  it('should read the package version', () => {
    expect(getRelayVersion()).toBe('0.1.0');
  });
});
