import * as ed from '@noble/ed25519';
import { randomBytes } from '@noble/hashes/utils';
import { v4 as uuidv4 } from 'uuid';
import { DecodeError, VowlineError, VowlineErrorCode, isBase64 } from '@vowline/types';

export type {
  KeyPair,
  PrivateKey,
  PublicKey,
  Signature,
  Base64,
} from './types';

import type { KeyPair, PrivateKey, PublicKey, Signature, Base64 } from './types';

/** Length in bytes of an Ed25519 seed or public key. */
export const KEY_LENGTH = 32;

/**
 * Generate a new Ed25519 key pair from cryptographically secure randomness.
 *
 * The private key is 32 bytes of entropy from the platform CSPRNG; the
 * public key is derived from it.
 *
 * @example
 * ```typescript
 * const kp = await generateKeyPair();
 * console.log(kp.publicKeyBase64); // 44-char base64 string
 * ```
 */
export async function generateKeyPair(): Promise<KeyPair> {
  const privateKey = randomBytes(KEY_LENGTH);
  if (privateKey.length !== KEY_LENGTH) {
    throw new VowlineError(
      VowlineErrorCode.CRYPTO_INVALID_KEY,
      `Expected ${KEY_LENGTH}-byte private key from CSPRNG, got ${privateKey.length} bytes`,
      { hint: 'This indicates a platform CSPRNG issue. Ensure your environment supports crypto.getRandomValues().' }
    );
  }
  return keyPairFromPrivateKey(privateKey);
}

/**
 * Reconstruct a KeyPair from an existing 32-byte private key seed.
 *
 * The input is copied so the caller's array is not retained.
 */
export async function keyPairFromPrivateKey(privateKey: Uint8Array): Promise<KeyPair> {
  if (!(privateKey instanceof Uint8Array) || privateKey.length !== KEY_LENGTH) {
    throw new VowlineError(
      VowlineErrorCode.CRYPTO_INVALID_KEY,
      `Private key must be a ${KEY_LENGTH}-byte Uint8Array, got ${privateKey instanceof Uint8Array ? `${privateKey.length} bytes` : typeof privateKey}`,
      { hint: 'Provide the 32-byte Ed25519 seed.' }
    );
  }
  const publicKey = await ed.getPublicKeyAsync(privateKey);
  return {
    privateKey: new Uint8Array(privateKey),
    publicKey,
    publicKeyBase64: base64Encode(publicKey),
  };
}

/**
 * Sign arbitrary bytes with an Ed25519 private key.
 *
 * @returns A 64-byte Ed25519 signature.
 */
export async function sign(message: Uint8Array, privateKey: PrivateKey): Promise<Signature> {
  if (!(privateKey instanceof Uint8Array) || privateKey.length !== KEY_LENGTH) {
    throw new VowlineError(
      VowlineErrorCode.CRYPTO_INVALID_KEY,
      `sign() expects privateKey to be a ${KEY_LENGTH}-byte Uint8Array, got ${privateKey instanceof Uint8Array ? `${privateKey.length} bytes` : typeof privateKey}`,
    );
  }
  try {
    return await ed.signAsync(message, privateKey);
  } catch (err) {
    throw new VowlineError(
      VowlineErrorCode.CRYPTO_SIGNATURE_FAILED,
      `Ed25519 signing operation failed: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
}

/**
 * Verify an Ed25519 signature against a message and public key.
 *
 * Safe to call with untrusted inputs: any internal error (malformed key,
 * truncated signature) returns `false`.
 */
export async function verify(
  message: Uint8Array,
  signature: Signature,
  publicKey: PublicKey
): Promise<boolean> {
  try {
    return await ed.verifyAsync(signature, message, publicKey);
  } catch {
    return false;
  }
}

// ─── Encodings ────────────────────────────────────────────────────────────────

/**
 * Standard base64 encode (RFC 4648 section 4, with padding).
 *
 * @example
 * ```typescript
 * base64Encode(new Uint8Array([104, 105])); // 'aGk='
 * ```
 */
export function base64Encode(data: Uint8Array): Base64 {
  let binary = '';
  for (const byte of data) {
    binary += String.fromCharCode(byte);
  }
  return btoa(binary);
}

/**
 * Decode a standard, padded base64 string.
 *
 * @throws {DecodeError} When the input is not valid standard base64.
 */
export function base64Decode(encoded: Base64): Uint8Array {
  if (!isBase64(encoded)) {
    throw new DecodeError(
      'illegal base64 data',
      encoded,
      { hint: 'Expected standard base64 (A-Z, a-z, 0-9, +, /) with = padding.' }
    );
  }
  const binary = atob(encoded);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

/** UTF-8 encode a string. */
export function utf8Encode(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/**
 * Strict UTF-8 decode.
 *
 * @returns The decoded text, or `undefined` when the bytes are not valid UTF-8.
 */
export function utf8DecodeStrict(bytes: Uint8Array): string | undefined {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

// ─── Identifiers ──────────────────────────────────────────────────────────────

/**
 * Generate a random, globally unique identifier of the form
 * `<prefix>:<uuid-v4>`.
 *
 * @example
 * ```typescript
 * generatePrefixedId('beneficiary'); // 'beneficiary:3b241101-e2bb-4255-8caf-4136c566a962'
 * ```
 */
export function generatePrefixedId(prefix: string): string {
  return `${prefix}:${uuidv4()}`;
}

/** Generate a bare UUID v4, used for JSON-RPC request ids. */
export function generateRequestId(): string {
  return uuidv4();
}

/**
 * Constant-time comparison of two byte arrays.
 *
 * Always examines every byte even if a mismatch is found early.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= (a[i] ?? 0) ^ (b[i] ?? 0);
  }
  return diff === 0;
}
