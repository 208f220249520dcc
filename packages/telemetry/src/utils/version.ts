/**
 * @file version.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

/**
 * npm package name checked when locating package.json.
 */
export const PACKAGE_NAME = 'sdr-telemetry-relay';

/**
 * Reads the relay version from package.json.
 */
export function getRelayVersion(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = dirname(__filename);
  // "../package.json" from dist/, "../../package.json" from src/utils/
  const possiblePaths = [
    join(__dirname, '../package.json'),
    join(__dirname, '../../package.json'),
  ];

  for (const packageJsonPath of possiblePaths) {
    const version = readVersion(packageJsonPath);
    if (version) {
      return version;
    }
  }
  return 'unknown';
}

function readVersion(packageJsonPath: string): string | undefined {
  let content: string;
  try {
    content = readFileSync(packageJsonPath, 'utf8');
  } catch {
    return undefined;
  }

  const packageJson: unknown = JSON.parse(content);
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'name' in packageJson &&
    'version' in packageJson &&
    packageJson.name === PACKAGE_NAME &&
    typeof packageJson.version === 'string' &&
    packageJson.version.length > 0
  ) {
    return packageJson.version;
  }
  return undefined;
}
