import { describe, it, expect } from 'vitest';
import { DecodeError, VowlineError } from '@vowline/types';
import {
  generateKeyPair,
  keyPairFromPrivateKey,
  sign,
  verify,
  base64Encode,
  base64Decode,
  utf8Encode,
  utf8DecodeStrict,
  generatePrefixedId,
  generateRequestId,
  constantTimeEqual,
  KEY_LENGTH,
} from './index';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

// ---------------------------------------------------------------------------
// Key generation
// ---------------------------------------------------------------------------
describe('generateKeyPair', () => {
  it('produces a 32-byte private key and a 32-byte public key', async () => {
    const kp = await generateKeyPair();
    expect(kp.privateKey).toBeInstanceOf(Uint8Array);
    expect(kp.privateKey.length).toBe(KEY_LENGTH);
    expect(kp.publicKey.length).toBe(KEY_LENGTH);
  });

  it('includes the base64 public key', async () => {
    const kp = await generateKeyPair();
    expect(kp.publicKeyBase64).toBe(base64Encode(kp.publicKey));
    expect(kp.publicKeyBase64).toHaveLength(44);
  });

  it('produces different key pairs on each call', async () => {
    const kp1 = await generateKeyPair();
    const kp2 = await generateKeyPair();
    expect(base64Encode(kp1.privateKey)).not.toBe(base64Encode(kp2.privateKey));
  });
});

describe('keyPairFromPrivateKey', () => {
  it('derives the same public key from an existing seed', async () => {
    const original = await generateKeyPair();
    const restored = await keyPairFromPrivateKey(original.privateKey);
    expect(restored.publicKeyBase64).toBe(original.publicKeyBase64);
  });

  it('copies the private key bytes', async () => {
    const original = await generateKeyPair();
    const restored = await keyPairFromPrivateKey(original.privateKey);
    restored.privateKey[0] = ((restored.privateKey[0] ?? 0) + 1) % 256;
    expect(original.privateKey[0]).not.toBe(restored.privateKey[0]);
  });

  it('rejects seeds of the wrong length', async () => {
    await expect(keyPairFromPrivateKey(new Uint8Array(64))).rejects.toThrow(
      'Private key must be a 32-byte Uint8Array, got 64 bytes',
    );
  });
});

// ---------------------------------------------------------------------------
// Signing and verification
// ---------------------------------------------------------------------------
describe('sign and verify', () => {
  it('sign -> verify succeeds', async () => {
    const kp = await generateKeyPair();
    const message = utf8Encode('{"type":"beneficiary","id":"b","name":"Bob"}');
    const signature = await sign(message, kp.privateKey);
    expect(signature.length).toBe(64);
    expect(await verify(message, signature, kp.publicKey)).toBe(true);
  });

  it('signatures are deterministic for the same key and message', async () => {
    const kp = await generateKeyPair();
    const message = utf8Encode('same');
    const a = await sign(message, kp.privateKey);
    const b = await sign(message, kp.privateKey);
    expect(base64Encode(a)).toBe(base64Encode(b));
  });

  it('verify fails with a different public key', async () => {
    const kp1 = await generateKeyPair();
    const kp2 = await generateKeyPair();
    const message = utf8Encode('hello');
    const signature = await sign(message, kp1.privateKey);
    expect(await verify(message, signature, kp2.publicKey)).toBe(false);
  });

  it('verify fails when one byte of the message changes', async () => {
    const kp = await generateKeyPair();
    const signature = await sign(utf8Encode('{"due":1}'), kp.privateKey);
    expect(await verify(utf8Encode('{"due":2}'), signature, kp.publicKey)).toBe(false);
  });

  it('verify returns false instead of throwing on garbage input', async () => {
    const result = await verify(utf8Encode('x'), new Uint8Array(3), new Uint8Array(5));
    expect(result).toBe(false);
  });

  it('sign rejects a malformed key with a VowlineError', async () => {
    await expect(sign(utf8Encode('x'), new Uint8Array(10))).rejects.toBeInstanceOf(VowlineError);
  });
});

// ---------------------------------------------------------------------------
// Encodings
// ---------------------------------------------------------------------------
describe('base64', () => {
  it('encodes with standard alphabet and padding', () => {
    expect(base64Encode(new Uint8Array([104, 105]))).toBe('aGk=');
    expect(base64Encode(new Uint8Array([0xfb, 0xff]))).toBe('+/8=');
    expect(base64Encode(new Uint8Array([]))).toBe('');
  });

  it('decodes what it encodes', () => {
    const bytes = new Uint8Array([0, 1, 2, 250, 251, 252, 253, 254, 255]);
    expect(Array.from(base64Decode(base64Encode(bytes)))).toEqual(Array.from(bytes));
  });

  it('decodes the empty string to zero bytes', () => {
    expect(base64Decode('').length).toBe(0);
  });

  it('throws DecodeError on invalid input', () => {
    expect(() => base64Decode('%%%%')).toThrow(DecodeError);
    expect(() => base64Decode('aGk')).toThrow('illegal base64 data');
  });
});

describe('utf8', () => {
  it('strict decode returns text for valid UTF-8', () => {
    expect(utf8DecodeStrict(utf8Encode('обещание'))).toBe('обещание');
  });

  it('strict decode returns undefined for invalid UTF-8', () => {
    expect(utf8DecodeStrict(new Uint8Array([0xff, 0xfe, 0x41]))).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// Identifiers
// ---------------------------------------------------------------------------
describe('identifiers', () => {
  it('generatePrefixedId yields prefix:uuid-v4', () => {
    const id = generatePrefixedId('promise');
    expect(id.startsWith('promise:')).toBe(true);
    expect(id.slice('promise:'.length)).toMatch(UUID_V4);
  });

  it('generatePrefixedId never repeats', () => {
    const ids = new Set(Array.from({ length: 200 }, () => generatePrefixedId('beneficiary')));
    expect(ids.size).toBe(200);
  });

  it('generateRequestId is a bare uuid v4', () => {
    expect(generateRequestId()).toMatch(UUID_V4);
  });
});

describe('constantTimeEqual', () => {
  it('compares content and length', () => {
    expect(constantTimeEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
    expect(constantTimeEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
    expect(constantTimeEqual(new Uint8Array([1]), new Uint8Array([1, 2]))).toBe(false);
  });
});
