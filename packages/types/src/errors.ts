/**
 * Error code system for the Vowline client.
 *
 * Every error has a unique, documentable code (VOWLINE_Exxx) that maps
 * to one failure mode of the ledger client: local key storage, canonical
 * encoding, argument validation, the RPC transport, and the two remote
 * rejection stages (pre-validation and execution).
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All Vowline error codes. */
export enum VowlineErrorCode {
  // Key storage (1xx)
  /** The key directory or a key file could not be read or written. */
  KEY_IO = 'VOWLINE_E100',
  /** A persisted key file has the wrong length or disagrees with its pair. */
  KEY_CORRUPT = 'VOWLINE_E101',

  // Encoding (2xx)
  /** A value could not be canonically encoded. */
  ENCODING_FAILED = 'VOWLINE_E200',
  /** An envelope could not be parsed back into a body and signature. */
  ENVELOPE_MALFORMED = 'VOWLINE_E201',

  // Local validation (3xx)
  /** A caller-supplied argument was missing or invalid. */
  INVALID_ARGUMENT = 'VOWLINE_E300',
  /** A date or timestamp argument could not be parsed. */
  INVALID_TIMESTAMP = 'VOWLINE_E301',
  /** A query alias is not one of the known entity names. */
  UNKNOWN_ALIAS = 'VOWLINE_E302',

  // Transport (4xx)
  /** The endpoint could not be reached or answered with a non-JSON body. */
  TRANSPORT_FAILED = 'VOWLINE_E400',
  /** The JSON-RPC response carried an `error` object. */
  RPC_ERROR = 'VOWLINE_E401',
  /** The call did not complete within the configured timeout. */
  TIMEOUT = 'VOWLINE_E402',
  /** The response carried neither an error nor a result. */
  EMPTY_RESULT = 'VOWLINE_E403',

  // Remote rejection (5xx)
  /** The transaction failed the ledger's pre-validation (check_tx). */
  VALIDATION_REJECTED = 'VOWLINE_E500',
  /** The transaction passed pre-validation but failed during execution (deliver_tx). */
  EXECUTION_REJECTED = 'VOWLINE_E501',

  // Query decoding (6xx)
  /** A query response value was not valid base64. */
  DECODE_FAILED = 'VOWLINE_E600',

  // Crypto (9xx)
  /** A signing key was missing, malformed, or of the wrong length. */
  CRYPTO_INVALID_KEY = 'VOWLINE_E900',
  /** The Ed25519 signing operation failed. */
  CRYPTO_SIGNATURE_FAILED = 'VOWLINE_E901',
}

// ─── Base class ─────────────────────────────────────────────────────────────────

/** Options for constructing a VowlineError. */
export interface VowlineErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error, for error chaining. */
  cause?: unknown;
}

/**
 * Base error class for all Vowline errors.
 *
 * @example
 * ```typescript
 * throw new VowlineError(
 *   VowlineErrorCode.INVALID_ARGUMENT,
 *   '--text is required',
 *   { hint: 'Pass the promise text with --text' }
 * );
 * ```
 */
export class VowlineError extends Error {
  readonly code: VowlineErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: VowlineErrorCode, message: string, options?: VowlineErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'VowlineError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /** Structured representation suitable for logging. */
  toJSON(): { code: string; name: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; name: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      name: this.name,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

// ─── Taxonomy ───────────────────────────────────────────────────────────────────

/** Local key persistence or load failure. Fatal, never retried. */
export class KeyIOError extends VowlineError {
  /** The file or directory the failing operation touched. */
  readonly path: string;

  constructor(message: string, path: string, options?: VowlineErrorOptions & { code?: VowlineErrorCode }) {
    super(options?.code ?? VowlineErrorCode.KEY_IO, message, {
      ...options,
      context: { path, ...options?.context },
    });
    this.name = 'KeyIOError';
    this.path = path;
  }
}

/** Canonical serialization failure. Indicates a programming defect. */
export class EncodingError extends VowlineError {
  constructor(message: string, options?: VowlineErrorOptions & { code?: VowlineErrorCode }) {
    super(options?.code ?? VowlineErrorCode.ENCODING_FAILED, message, options);
    this.name = 'EncodingError';
  }
}

/** A caller-supplied argument failed a local check before anything was sent. */
export class ValidationError extends VowlineError {
  /** The name of the field or flag that failed validation. */
  readonly field: string;

  constructor(
    message: string,
    field: string,
    code: VowlineErrorCode = VowlineErrorCode.INVALID_ARGUMENT,
    options?: VowlineErrorOptions,
  ) {
    super(code, message, { ...options, context: { field, ...options?.context } });
    this.name = 'ValidationError';
    this.field = field;
  }
}

/** Fields carried by a {@link TransportError}. */
export interface TransportErrorDetails {
  /** JSON-RPC error code, when the remote returned an `error` object. */
  rpcCode?: number;
  /** JSON-RPC error message. */
  rpcMessage?: string;
  /** JSON-RPC auxiliary error data, verbatim. */
  rpcData?: unknown;
  /** HTTP status of the response, when one was received. */
  status?: number;
  /** The endpoint URL the request was sent to. */
  url?: string;
}

/**
 * Network or connection failure, or an RPC-level protocol error.
 *
 * `network` is true when no response was received at all; only those
 * failures are eligible for a retry.
 */
export class TransportError extends VowlineError {
  readonly rpcCode?: number;
  readonly rpcMessage?: string;
  readonly rpcData?: unknown;
  readonly status?: number;
  readonly network: boolean;

  constructor(
    message: string,
    details: TransportErrorDetails = {},
    options?: VowlineErrorOptions & { network?: boolean },
  ) {
    super(
      details.rpcCode !== undefined ? VowlineErrorCode.RPC_ERROR : VowlineErrorCode.TRANSPORT_FAILED,
      message,
      { ...options, context: { ...details, ...options?.context } },
    );
    this.name = 'TransportError';
    this.rpcCode = details.rpcCode;
    this.rpcMessage = details.rpcMessage;
    this.rpcData = details.rpcData;
    this.status = details.status;
    this.network = options?.network ?? false;
  }
}

/** The call did not complete within the configured bound. */
export class TimeoutError extends VowlineError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: VowlineErrorOptions) {
    super(VowlineErrorCode.TIMEOUT, message, { ...options, context: { timeoutMs, ...options?.context } });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** The remote response had an unexpected shape: no error and no result. */
export class EmptyResultError extends VowlineError {
  constructor(message = 'empty result', options?: VowlineErrorOptions) {
    super(VowlineErrorCode.EMPTY_RESULT, message, options);
    this.name = 'EmptyResultError';
  }
}

/** Common shape of the two remote rejection stages. */
abstract class RejectionError extends VowlineError {
  /** Result code reported by the ledger. */
  readonly remoteCode: number;
  /** Human-readable log text reported by the ledger. */
  readonly log: string;

  protected constructor(code: VowlineErrorCode, message: string, remoteCode: number, log: string) {
    super(code, message, { context: { remoteCode, log } });
    this.remoteCode = remoteCode;
    this.log = log;
  }
}

/** Rejected by the ledger's pre-validation (`check_tx`). Never entered processing. */
export class ValidationRejected extends RejectionError {
  constructor(remoteCode: number, log: string) {
    super(VowlineErrorCode.VALIDATION_REJECTED, `CheckTx failed: ${log}`, remoteCode, log);
    this.name = 'ValidationRejected';
  }
}

/** Accepted by pre-validation but rejected during execution (`deliver_tx`). */
export class ExecutionRejected extends RejectionError {
  constructor(remoteCode: number, log: string) {
    super(VowlineErrorCode.EXECUTION_REJECTED, `DeliverTx failed: ${log}`, remoteCode, log);
    this.name = 'ExecutionRejected';
  }
}

/** A query response value could not be base64-decoded. */
export class DecodeError extends VowlineError {
  /** The undecodable value, verbatim. */
  readonly value: string;

  constructor(message: string, value: string, options?: VowlineErrorOptions) {
    super(VowlineErrorCode.DECODE_FAILED, message, options);
    this.name = 'DecodeError';
    this.value = value;
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/**
 * Format an error for terminal output.
 *
 * @example
 * ```typescript
 * formatError(new ValidationRejected(5, 'unknown beneficiary'));
 * // [VOWLINE_E500] CheckTx failed: unknown beneficiary
 * ```
 */
export function formatError(error: VowlineError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}

/** Narrow an unknown thrown value to a {@link VowlineError}. */
export function isVowlineError(value: unknown): value is VowlineError {
  return value instanceof VowlineError;
}
