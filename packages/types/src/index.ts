/**
 * @vowline/types — Shared error taxonomy, Result type, logging and retry.
 *
 * Every other Vowline package depends on this one and nothing else in the
 * monorepo, so it carries no protocol logic of its own.
 *
 * @packageDocumentation
 */

import { ValidationError, VowlineErrorCode } from './errors';

// ─── Errors ─────────────────────────────────────────────────────────────────────

export {
  VowlineErrorCode,
  VowlineError,
  KeyIOError,
  EncodingError,
  ValidationError,
  TransportError,
  TimeoutError,
  EmptyResultError,
  ValidationRejected,
  ExecutionRejected,
  DecodeError,
  formatError,
  isVowlineError,
} from './errors';
export type { VowlineErrorOptions, TransportErrorDetails } from './errors';

// ─── Validation utilities ───────────────────────────────────────────────────────

/**
 * Assert that a string value is non-empty (not empty and not only whitespace).
 *
 * @param value - The value to validate.
 * @param name  - Name of the parameter or flag, used in the message.
 * @throws {ValidationError} When the value is empty or whitespace-only.
 *
 * @example
 * ```typescript
 * validateNonEmpty(args.text, '--text'); // throws if blank
 * ```
 */
export function validateNonEmpty(value: string | undefined, name: string): asserts value is string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(
      `${name} is required`,
      name,
      VowlineErrorCode.INVALID_ARGUMENT,
    );
  }
}

// ─── Protocol constants ─────────────────────────────────────────────────────────

/** Current Vowline client version string. */
export const VOWLINE_VERSION = '0.1.0';

// ─── Result type ────────────────────────────────────────────────────────────────

/**
 * A discriminated union representing either a successful value or an error:
 *   - `{ ok: true, value: T }`
 *   - `{ ok: false, error: E }`
 */
export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * Construct a successful Result.
 *
 * @example
 * ```typescript
 * const result = ok(42);
 * if (result.ok) console.log(result.value); // 42
 * ```
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/** Construct a failed Result. */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Return the value of a successful Result or throw its error.
 *
 * Bridges the Result-returning client layer to callers that prefer
 * exceptions.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

// ─── Runtime type guards & sanitization ─────────────────────────────────────────

export {
  isPlainObject,
  isSafeInteger,
  isBase64,
  sanitizeJsonInput,
  assertNoDangerousKeys,
  freezeDeep,
} from './guards';

// ─── Structured logging ─────────────────────────────────────────────────────────

export { Logger, createLogger, silentLogger, parseLogLevel, LogLevel } from './logger';
export type { LogEntry, LogOutput, LoggerOptions } from './logger';

// ─── Retry ──────────────────────────────────────────────────────────────────────

export { withRetry } from './retry';
export type { RetryOptions } from './retry';
