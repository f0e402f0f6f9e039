import { base64Encode, generatePrefixedId, KEY_LENGTH } from '@vowline/crypto';
import type { PublicKey } from '@vowline/crypto';
import { deriveCommiterId } from '@vowline/keystore';
import {
  ValidationError,
  VowlineErrorCode,
  freezeDeep,
  isPlainObject,
  isSafeInteger,
  validateNonEmpty,
} from '@vowline/types';

import { BODY_FIELDS, COMPOSITE_FIELDS, ID_PREFIX, isTxType } from './types';
import type {
  BeneficiaryBody,
  CommiterBody,
  CommitmentBody,
  CompositeBody,
  FieldSpec,
  PromiseBody,
  TxBody,
} from './types';

// ─── Builder inputs ────────────────────────────────────────────────────────────

export interface CommiterInput {
  name: string;
  publicKey: PublicKey;
}

export interface BeneficiaryInput {
  name: string;
  /** Defaults to a fresh `beneficiary:<uuid>`. */
  id?: string;
}

export interface PromiseInput {
  text: string;
  /** Unix seconds, UTC. See {@link parseDue}. */
  due: number;
  beneficiaryId: string;
  /** An empty string is treated as absent. */
  parentPromiseId?: string;
  /** Defaults to a fresh `promise:<uuid>`. */
  id?: string;
}

export interface CommitmentInput {
  promiseId: string;
  commiterId: string;
  due: number;
  /** Defaults to a fresh `commitment:<uuid>`. */
  id?: string;
}

// ─── Builders ──────────────────────────────────────────────────────────────────

/**
 * Build the identity registration body for a public key.
 *
 * The id and the `commiter_pubkey` field are both derived from the key, so
 * registering the same key twice always produces the same identity.
 */
export function buildCommiterBody(input: CommiterInput): CommiterBody {
  validateNonEmpty(input.name, 'name');
  if (!(input.publicKey instanceof Uint8Array) || input.publicKey.length !== KEY_LENGTH) {
    throw new ValidationError(`publicKey must be ${KEY_LENGTH} bytes`, 'publicKey');
  }
  const body: CommiterBody = {
    type: 'commiter',
    id: deriveCommiterId(input.publicKey),
    name: input.name,
    commiter_pubkey: base64Encode(input.publicKey),
  };
  return freezeDeep(body);
}

export function buildBeneficiaryBody(input: BeneficiaryInput): BeneficiaryBody {
  validateNonEmpty(input.name, 'name');
  const body: BeneficiaryBody = {
    type: 'beneficiary',
    id: optionalId(input.id, ID_PREFIX.beneficiary),
    name: input.name,
  };
  return freezeDeep(body);
}

export function buildPromiseBody(input: PromiseInput): PromiseBody {
  validateNonEmpty(input.text, 'text');
  validateNonEmpty(input.beneficiaryId, 'beneficiary_id');
  validateDue(input.due, 'due');
  const body: PromiseBody = {
    type: 'promise',
    id: optionalId(input.id, ID_PREFIX.promise),
    text: input.text,
    due: input.due,
    beneficiary_id: input.beneficiaryId,
    parent_promise_id: input.parentPromiseId ? input.parentPromiseId : null,
  };
  return freezeDeep(body);
}

export function buildCommitmentBody(input: CommitmentInput): CommitmentBody {
  validateNonEmpty(input.promiseId, 'promise_id');
  validateNonEmpty(input.commiterId, 'commiter_id');
  validateDue(input.due, 'due');
  const body: CommitmentBody = {
    type: 'commitment',
    id: optionalId(input.id, ID_PREFIX.commitment),
    promise_id: input.promiseId,
    commiter_id: input.commiterId,
    due: input.due,
  };
  return freezeDeep(body);
}

function optionalId(id: string | undefined, prefix: string): string {
  if (id === undefined) {
    return generatePrefixedId(prefix);
  }
  validateNonEmpty(id, 'id');
  return id;
}

function validateDue(due: number, field: string): void {
  if (!isSafeInteger(due)) {
    throw new ValidationError(
      `${field} must be an integer number of seconds, got ${String(due)}`,
      field,
      VowlineErrorCode.INVALID_TIMESTAMP,
    );
  }
}

// ─── Dates ─────────────────────────────────────────────────────────────────────

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const RFC3339 = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Parse a due date into Unix seconds.
 *
 * Accepts RFC 3339 (`2030-01-01T09:30:00+02:00`, `2030-01-01T07:30:00.5Z`)
 * or a bare `YYYY-MM-DD`, which means midnight UTC. Fractional seconds are
 * dropped.
 *
 * @example
 * ```typescript
 * parseDue('2030-01-01'); // 1893456000
 * ```
 *
 * @throws {ValidationError} `INVALID_TIMESTAMP` for empty input, any other
 *   format, or a date that does not exist on the calendar.
 */
export function parseDue(input: string, field = 'due'): number {
  if (input === '') {
    throw new ValidationError(`${field}: missing datetime`, field, VowlineErrorCode.INVALID_TIMESTAMP);
  }

  const dateOnly = DATE_ONLY.exec(input);
  if (dateOnly) {
    const seconds = toUnixSeconds(numbers(dateOnly, 1, 3), [0, 0, 0]);
    if (seconds !== undefined) {
      return seconds;
    }
  }

  const full = RFC3339.exec(input);
  if (full) {
    const seconds = toUnixSeconds(numbers(full, 1, 3), numbers(full, 4, 6));
    const offset = parseOffset(full[7] ?? '');
    if (seconds !== undefined && offset !== undefined) {
      return seconds - offset;
    }
  }

  throw new ValidationError(
    `${field}: cannot parse time: ${JSON.stringify(input)} (use YYYY-MM-DD or RFC 3339)`,
    field,
    VowlineErrorCode.INVALID_TIMESTAMP,
  );
}

function numbers(match: RegExpExecArray, from: number, to: number): number[] {
  const out: number[] = [];
  for (let i = from; i <= to; i++) {
    out.push(Number(match[i]));
  }
  return out;
}

/** Seconds since epoch for a UTC wall-clock time, or `undefined` if it is not a real instant. */
function toUnixSeconds(date: number[], time: number[]): number | undefined {
  const [year = 0, month = 0, day = 0] = date;
  const [hour = 0, minute = 0, second = 0] = time;
  if (hour > 23 || minute > 59 || second > 59) {
    return undefined;
  }
  // setUTCFullYear, unlike Date.UTC, does not remap years below 100.
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return undefined;
  }
  d.setUTCHours(hour, minute, second, 0);
  return Math.floor(d.getTime() / 1000);
}

function parseOffset(zone: string): number | undefined {
  if (zone === 'Z') {
    return 0;
  }
  const hours = Number(zone.slice(1, 3));
  const minutes = Number(zone.slice(4, 6));
  if (hours > 23 || minutes > 59) {
    return undefined;
  }
  const sign = zone.startsWith('-') ? -1 : 1;
  return sign * (hours * 3600 + minutes * 60);
}

// ─── Runtime guards ────────────────────────────────────────────────────────────

/**
 * Describe why `value` is not a well-formed transaction body, or return
 * `undefined` when it is. Checks the type tag, that every declared field is
 * present with the declared kind, and that no undeclared field is present.
 */
export function bodyProblem(value: unknown): string | undefined {
  if (!isPlainObject(value)) {
    return 'body must be a JSON object';
  }
  const type = value['type'];
  if (!isTxType(type)) {
    return `unknown body type ${JSON.stringify(type) ?? 'undefined'}`;
  }

  const fields: readonly FieldSpec[] = BODY_FIELDS[type];
  for (const key of Object.keys(value)) {
    if (!fields.some((f) => f.name === key)) {
      return `${type} body has undeclared field "${key}"`;
    }
  }
  for (const field of fields) {
    if (!(field.name in value)) {
      return `${type} body is missing "${field.name}"`;
    }
    const v = value[field.name];
    const okKind =
      field.kind === 'string' ? typeof v === 'string'
      : field.kind === 'integer' ? isSafeInteger(v)
      : v === null || typeof v === 'string';
    if (!okKind) {
      return `${type}.${field.name} must be ${field.kind === 'integer' ? 'a safe integer' : field.kind === 'string' ? 'a string' : 'a string or null'}`;
    }
  }
  return undefined;
}

/** `true` if `value` is a well-formed single transaction body. */
export function isTxBody(value: unknown): value is TxBody {
  return bodyProblem(value) === undefined;
}

/**
 * Assert that `value` is a well-formed transaction body.
 *
 * @throws {ValidationError} With the first problem found.
 */
export function assertTxBody(value: unknown): asserts value is TxBody {
  const problem = bodyProblem(value);
  if (problem !== undefined) {
    throw new ValidationError(problem, 'body');
  }
}

/** `true` if `value` has exactly the two composite keys, whatever they hold. */
export function hasCompositeShape(value: unknown): value is Record<(typeof COMPOSITE_FIELDS)[number], unknown> {
  if (!isPlainObject(value)) {
    return false;
  }
  const keys = Object.keys(value);
  return keys.length === COMPOSITE_FIELDS.length && COMPOSITE_FIELDS.every((k) => keys.includes(k));
}

/**
 * `true` if `value` is a well-formed composite body: one promise and one
 * commitment. Does not check that the commitment references the promise.
 */
export function isCompositeBody(value: unknown): value is CompositeBody {
  if (!hasCompositeShape(value)) {
    return false;
  }
  const { promise, commitment } = value;
  return (
    isTxBody(promise) && promise.type === 'promise' &&
    isTxBody(commitment) && commitment.type === 'commitment'
  );
}
