/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  DomainError,
  TransportInitError,
  WriteFailureError,
  DuplicateConnectionError,
  CommandParseError,
  PipelineError,
  InvalidConfigurationError,
} from './domain-errors.js';
