/**
 * @file domain-errors.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Base class for all domain errors.
 * Provides structured error information for logs and the health endpoint.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { code: string; message: string } {
    return {
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Error thrown when the WebSocket listener cannot be created or bound.
 * Fatal at startup.
 */
export class TransportInitError extends DomainError {
  readonly code = 'TRANSPORT_INIT_FAILED';
  readonly statusCode = 500;

  constructor(reason: string) {
    super(`Transport initialization failed: ${reason}`);
  }
}

/**
 * Describes a write that transmitted fewer bytes than the payload length.
 * The affected connection is removed; other connections are unaffected.
 */
export class WriteFailureError extends DomainError {
  readonly code = 'WRITE_FAILURE';
  readonly statusCode = 500;
  readonly connectionId: number;
  readonly expectedBytes: number;
  readonly writtenBytes: number;

  constructor(connectionId: number, expectedBytes: number, writtenBytes: number) {
    super(
      `Partial write on connection ${connectionId}: ${writtenBytes}/${expectedBytes} bytes`
    );
    this.connectionId = connectionId;
    this.expectedBytes = expectedBytes;
    this.writtenBytes = writtenBytes;
  }
}

/**
 * Error thrown when the transport reports a connect for an id that is
 * still registered.
 */
export class DuplicateConnectionError extends DomainError {
  readonly code = 'DUPLICATE_CONNECTION';
  readonly statusCode = 409;
  readonly connectionId: number;

  constructor(connectionId: number) {
    super(`Connection already registered: ${connectionId}`);
    this.connectionId = connectionId;
  }
}

/**
 * Error thrown when an inbound client command carries an unparseable parameter.
 */
export class CommandParseError extends DomainError {
  readonly code = 'COMMAND_PARSE_ERROR';
  readonly statusCode = 400;
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Cannot parse command "${input}": ${reason}`);
    this.input = input;
  }
}

/**
 * Unrecoverable failure inside the spectral pipeline.
 */
export class PipelineError extends DomainError {
  readonly code = 'PIPELINE_FAILURE';
  readonly statusCode = 500;
}

/**
 * Error thrown when a component is constructed with unusable settings.
 */
export class InvalidConfigurationError extends DomainError {
  readonly code = 'INVALID_CONFIGURATION';
  readonly statusCode = 500;
}
