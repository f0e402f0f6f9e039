/** Raw 32-byte Ed25519 private key (the seed). */
export type PrivateKey = Uint8Array;

/** Raw 32-byte Ed25519 public key. */
export type PublicKey = Uint8Array;

/** 64-byte Ed25519 signature. */
export type Signature = Uint8Array;

/** Standard (RFC 4648 section 4), padded base64 string. */
export type Base64 = string;

/** A key pair for signing and verification. */
export interface KeyPair {
  /** 32-byte private key seed */
  privateKey: PrivateKey;
  publicKey: PublicKey;
  /** Standard base64 of the public key, the form the ledger stores. */
  publicKeyBase64: Base64;
}
