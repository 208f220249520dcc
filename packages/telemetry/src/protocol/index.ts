/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export * from './messages.js';
export * from './schemas.js';
export * from './commands.js';
export * from './spectrum.js';
