/**
 * Style Engine Errors
 *
 * - ValidationError: malformed token registration or theme override (fail fast)
 * - LookupError: unknown token family, index, key or breakpoint (fail fast)
 * - ConfigError: responsive value with no usable entry (recoverable per declaration)
 * - SerializationError: value cannot be emitted in style-sheet syntax (recoverable per artifact)
 */

export type StyleEngineErrorCode = 'VALIDATION' | 'LOOKUP' | 'CONFIG' | 'SERIALIZATION';

/** Extra context attached to an error for diagnostics */
export interface StyleErrorDetails {
  /** Offending prop, property or token path */
  path?: string;
  /** Offending raw value */
  value?: unknown;
  /** Individual problems (schema validation) */
  issues?: readonly string[];
}

export class StyleEngineError extends Error {
  readonly code: StyleEngineErrorCode;
  readonly details?: StyleErrorDetails;

  constructor(code: StyleEngineErrorCode, message: string, details?: StyleErrorDetails) {
    super(message);
    this.name = 'StyleEngineError';
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends StyleEngineError {
  constructor(message: string, details?: StyleErrorDetails) {
    super('VALIDATION', message, details);
    this.name = 'ValidationError';
  }
}

export class LookupError extends StyleEngineError {
  constructor(message: string, details?: StyleErrorDetails) {
    super('LOOKUP', message, details);
    this.name = 'LookupError';
  }
}

export class ConfigError extends StyleEngineError {
  constructor(message: string, details?: StyleErrorDetails) {
    super('CONFIG', message, details);
    this.name = 'ConfigError';
  }
}

export class SerializationError extends StyleEngineError {
  constructor(message: string, details?: StyleErrorDetails) {
    super('SERIALIZATION', message, details);
    this.name = 'SerializationError';
  }
}

export function isStyleEngineError(error: unknown): error is StyleEngineError {
  return error instanceof StyleEngineError;
}

/** Render any thrown value as a one-line message */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
