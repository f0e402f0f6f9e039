/**
 * Signed transaction envelopes.
 *
 * An envelope is `{"body":<canonical body>,"signature":"<base64>"}` where
 * the signature covers the exact UTF-8 bytes of the body text. The body
 * text is spliced into the envelope verbatim, never re-encoded, so the
 * bytes the ledger verifies are the bytes that were signed.
 *
 * @packageDocumentation
 */

import {
  base64Decode,
  base64Encode,
  sign,
  utf8DecodeStrict,
  utf8Encode,
  verify,
} from '@vowline/crypto';
import type { PrivateKey, PublicKey } from '@vowline/crypto';
import {
  EncodingError,
  ValidationError,
  VowlineErrorCode,
  isBase64,
  isPlainObject,
  sanitizeJsonInput,
} from '@vowline/types';

import { bodyProblem, hasCompositeShape, isCompositeBody, isTxBody } from './body';
import { canonicalEncode, quoteJsonString } from './canonical';
import type { CompositeBody, EnvelopeBody, TxBody } from './types';

/** `simple` carries one body; `composite` carries a promise and its commitment. */
export type EnvelopeKind = 'simple' | 'composite';

/** A body together with its signature, ready to submit. */
export interface SealedEnvelope<B extends EnvelopeBody = EnvelopeBody> {
  readonly kind: EnvelopeKind;
  readonly body: B;
  /** Standard base64 of the 64-byte Ed25519 signature. */
  readonly signature: string;
  /** The canonical body text that was signed. */
  readonly bodyJson: string;
  readonly bodyBytes: Uint8Array;
  /** The full envelope text. */
  readonly json: string;
  /** UTF-8 of {@link SealedEnvelope.json}; what the RPC client transmits. */
  readonly bytes: Uint8Array;
  /** Standard base64 of {@link SealedEnvelope.bytes}. */
  toBase64(): string;
}

/** The result of parsing a received envelope. */
export interface OpenedEnvelope {
  readonly kind: EnvelopeKind;
  readonly body: EnvelopeBody;
  readonly signature: string;
  /** The body text exactly as it appeared inside the envelope. */
  readonly bodyJson: string;
  readonly bodyBytes: Uint8Array;
}

// ─── Sealing ───────────────────────────────────────────────────────────────────

async function seal<B extends EnvelopeBody>(kind: EnvelopeKind, body: B, privateKey: PrivateKey): Promise<SealedEnvelope<B>> {
  const bodyJson = canonicalEncode(body);
  const bodyBytes = utf8Encode(bodyJson);
  const signature = base64Encode(await sign(bodyBytes, privateKey));
  const json = '{"body":' + bodyJson + ',"signature":' + quoteJsonString(signature) + '}';
  const bytes = utf8Encode(json);

  return Object.freeze({
    kind,
    body,
    signature,
    bodyJson,
    bodyBytes,
    json,
    bytes,
    toBase64: () => base64Encode(bytes),
  });
}

/**
 * Sign a single transaction body.
 *
 * @throws {EncodingError} If `body` is not a well-formed single body.
 */
export async function sealEnvelope<B extends TxBody>(body: B, privateKey: PrivateKey): Promise<SealedEnvelope<B>> {
  const problem = bodyProblem(body);
  if (problem !== undefined) {
    throw new EncodingError(problem);
  }
  return seal('simple', body, privateKey);
}

/**
 * Sign a promise and its commitment as one atomic envelope.
 *
 * ```ts
 * const envelope = await sealComposite({ promise, commitment }, keyPair.privateKey);
 * await submitter.submit(envelope.bytes);
 * ```
 *
 * @throws {ValidationError} When the commitment does not reference the promise.
 * @throws {EncodingError} When either part is not the expected body type.
 */
export async function sealComposite(body: CompositeBody, privateKey: PrivateKey): Promise<SealedEnvelope<CompositeBody>> {
  if (!isCompositeBody(body)) {
    throw new EncodingError('composite body must hold exactly one promise and one commitment');
  }
  if (body.commitment.promise_id !== body.promise.id) {
    throw new ValidationError(
      `commitment references ${body.commitment.promise_id}, not ${body.promise.id}`,
      'commitment.promise_id',
    );
  }
  // Key order of the envelope body is fixed regardless of how the caller built it.
  return seal('composite', { promise: body.promise, commitment: body.commitment }, privateKey);
}

// ─── Opening ───────────────────────────────────────────────────────────────────

function malformed(message: string, cause?: unknown): EncodingError {
  return new EncodingError(message, { code: VowlineErrorCode.ENVELOPE_MALFORMED, cause });
}

/**
 * Parse envelope bytes back into a body and signature.
 *
 * The body text is taken verbatim from the envelope, so
 * {@link OpenedEnvelope.bodyBytes} are the bytes the signature covers.
 *
 * @throws {EncodingError} `ENVELOPE_MALFORMED` when the input is not UTF-8,
 *   not JSON, has keys other than `body` and `signature`, carries a body
 *   that is neither a single body nor a composite, or a composite whose
 *   commitment does not reference its promise.
 */
export function openEnvelope(input: Uint8Array | string): OpenedEnvelope {
  const text = typeof input === 'string' ? input : utf8DecodeStrict(input);
  if (text === undefined) {
    throw malformed('envelope is not valid UTF-8');
  }

  let parsed: unknown;
  try {
    parsed = sanitizeJsonInput(text);
  } catch (e) {
    throw malformed(`envelope is not valid JSON: ${e instanceof Error ? e.message : String(e)}`, e);
  }
  if (!isPlainObject(parsed)) {
    throw malformed('envelope must be a JSON object');
  }
  const keys = Object.keys(parsed).sort();
  if (keys.length !== 2 || keys[0] !== 'body' || keys[1] !== 'signature') {
    throw malformed(`envelope must have exactly "body" and "signature", got ${JSON.stringify(keys)}`);
  }

  const signature = parsed['signature'];
  if (!isBase64(signature) || signature === '') {
    throw malformed('signature must be non-empty standard base64');
  }

  const body = parsed['body'];
  let kind: EnvelopeKind;
  if (isTxBody(body)) {
    kind = 'simple';
  } else if (isCompositeBody(body)) {
    if (body.commitment.promise_id !== body.promise.id) {
      throw malformed(`commitment references ${body.commitment.promise_id}, not ${body.promise.id}`);
    }
    kind = 'composite';
  } else {
    const problem = hasCompositeShape(body)
      ? 'composite body must hold exactly one promise and one commitment'
      : bodyProblem(body);
    throw malformed(`envelope body is invalid: ${problem ?? 'unknown shape'}`);
  }

  const bodyJson = topLevelMember(text, 'body');
  return { kind, body, signature, bodyJson, bodyBytes: utf8Encode(bodyJson) };
}

/**
 * Check an envelope's signature against a public key.
 *
 * True only when the signature verifies over the body bytes as they
 * appear in the envelope and those bytes are the canonical encoding of
 * the body they parse to. Malformed envelopes verify as false.
 */
export async function verifyEnvelope(input: Uint8Array | string, publicKey: PublicKey): Promise<boolean> {
  let opened: OpenedEnvelope;
  try {
    opened = openEnvelope(input);
  } catch (e) {
    if (e instanceof EncodingError) {
      return false;
    }
    throw e;
  }
  if (canonicalEncode(opened.body) !== opened.bodyJson) {
    return false;
  }
  return verify(opened.bodyBytes, base64Decode(opened.signature), publicKey);
}

// ─── Raw member extraction ─────────────────────────────────────────────────────

/**
 * Return the exact source text of a member of the top-level object.
 * The text has already been validated by `JSON.parse`, which keeps the
 * last of repeated keys, so a repeated key is rejected here.
 */
function topLevelMember(text: string, name: string): string {
  let i = skipWhitespace(text, 0);
  if (text.charAt(i) !== '{') {
    throw malformed('envelope must be a JSON object');
  }
  i = skipWhitespace(text, i + 1);

  const seen = new Set<string>();
  let member: string | undefined;
  while (i < text.length && text.charAt(i) !== '}') {
    const keyEnd = scanString(text, i);
    const key: unknown = JSON.parse(text.slice(i, keyEnd));
    if (typeof key !== 'string') {
      break;
    }
    if (seen.has(key)) {
      throw malformed(`envelope repeats the "${key}" member`);
    }
    seen.add(key);
    i = skipWhitespace(text, keyEnd);
    if (text.charAt(i) !== ':') {
      break;
    }
    const valueStart = skipWhitespace(text, i + 1);
    const valueEnd = scanValue(text, valueStart);
    if (key === name) {
      member = text.slice(valueStart, valueEnd);
    }
    i = skipWhitespace(text, valueEnd);
    if (text.charAt(i) === ',') {
      i = skipWhitespace(text, i + 1);
    }
  }
  if (member === undefined) {
    throw malformed(`envelope has no "${name}" member`);
  }
  return member;
}

function skipWhitespace(text: string, i: number): number {
  while (i < text.length && ' \t\n\r'.includes(text.charAt(i))) {
    i++;
  }
  return i;
}

/** `i` is at an opening quote; returns the index after the closing quote. */
function scanString(text: string, i: number): number {
  for (let j = i + 1; j < text.length; j++) {
    const c = text.charAt(j);
    if (c === '\\') {
      j++;
    } else if (c === '"') {
      return j + 1;
    }
  }
  throw malformed('unterminated string in envelope');
}

function scanValue(text: string, i: number): number {
  const first = text.charAt(i);
  if (first === '"') {
    return scanString(text, i);
  }
  if (first === '{' || first === '[') {
    let depth = 0;
    for (let j = i; j < text.length; j++) {
      const c = text.charAt(j);
      if (c === '"') {
        j = scanString(text, j) - 1;
      } else if (c === '{' || c === '[') {
        depth++;
      } else if (c === '}' || c === ']') {
        depth--;
        if (depth === 0) {
          return j + 1;
        }
      }
    }
    throw malformed('unbalanced brackets in envelope');
  }
  let j = i;
  while (j < text.length && !',}] \t\n\r'.includes(text.charAt(j))) {
    j++;
  }
  return j;
}
