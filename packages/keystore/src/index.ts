/**
 * File-system-backed Ed25519 key storage.
 *
 * Owns the load-or-generate lifecycle of the single signing keypair the
 * client uses, and the deterministic derivation of the committer identity
 * from its public half.
 *
 * On-disk layout inside the configured directory:
 *   - `ed25519.key`: 64 raw bytes, the 32-byte seed followed by the
 *     32-byte public key (mode 0600). A bare 32-byte seed is also read.
 *   - `ed25519.pub`: the 32-byte public key (mode 0644).
 *
 * The private-key file is the existence marker: it is written last, so a
 * crash between the two writes never leaves a private key without its
 * public counterpart.
 *
 * @packageDocumentation
 */

import * as fs from 'fs/promises';
import * as path from 'path';

import {
  KEY_LENGTH,
  base64Encode,
  constantTimeEqual,
  generateKeyPair,
  keyPairFromPrivateKey,
} from '@vowline/crypto';
import type { KeyPair, PublicKey } from '@vowline/crypto';
import { KeyIOError, Logger, VowlineErrorCode, silentLogger } from '@vowline/types';

export { deriveCommiterId } from './identity';

/** File name of the private key inside the key directory. */
export const PRIVATE_KEY_FILE = 'ed25519.key';

/** File name of the public key inside the key directory. */
export const PUBLIC_KEY_FILE = 'ed25519.pub';

/** Default key directory, relative to the working directory. */
export const DEFAULT_KEY_DIR = './config';

/** Options for {@link FileKeyStore}. */
export interface KeyStoreOptions {
  /** Directory holding the key files. Created (mode 0700) on first generation. */
  dir: string;
  logger?: Logger;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Loads the client's signing keypair from disk, generating and persisting
 * one on first use.
 *
 * ```ts
 * const store = new FileKeyStore({ dir: './config' });
 * const { publicKey, privateKey } = await store.ensureKeypair();
 * ```
 */
export class FileKeyStore {
  readonly dir: string;
  readonly privateKeyPath: string;
  readonly publicKeyPath: string;
  private readonly log: Logger;

  constructor(options: KeyStoreOptions) {
    this.dir = path.resolve(options.dir);
    this.privateKeyPath = path.join(this.dir, PRIVATE_KEY_FILE);
    this.publicKeyPath = path.join(this.dir, PUBLIC_KEY_FILE);
    this.log = (options.logger ?? silentLogger).child('keystore');
  }

  /** Whether a private-key file is present. */
  async exists(): Promise<boolean> {
    try {
      await fs.stat(this.privateKeyPath);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return false;
      }
      throw new KeyIOError(`cannot stat ${this.privateKeyPath}: ${errorMessage(err)}`, this.privateKeyPath, { cause: err });
    }
  }

  /**
   * Return the persisted keypair, generating and persisting a fresh one if
   * none exists yet.
   *
   * @throws {KeyIOError} On any filesystem failure, or when the persisted
   *   files are inconsistent. A freshly generated key is never returned
   *   unless both files were written.
   */
  async ensureKeypair(): Promise<KeyPair> {
    const existing = await this.load();
    if (existing) {
      return existing;
    }

    this.log.info('generating new ed25519 keypair', { dir: this.dir });
    const keyPair = await generateKeyPair();
    await this.persist(keyPair);
    return keyPair;
  }

  /**
   * Load the persisted keypair without generating one.
   *
   * @returns The keypair, or `undefined` when no private-key file exists.
   */
  async load(): Promise<KeyPair | undefined> {
    const privateBytes = await this.readOptional(this.privateKeyPath);
    if (privateBytes === undefined) {
      return undefined;
    }
    const publicBytes = await this.readOptional(this.publicKeyPath);
    if (publicBytes === undefined) {
      throw new KeyIOError(
        `private key present but ${this.publicKeyPath} is missing`,
        this.publicKeyPath,
        { code: VowlineErrorCode.KEY_CORRUPT, hint: 'Restore the public key file or remove the key directory to start over.' },
      );
    }

    const keyPair = await this.decode(privateBytes, publicBytes);
    this.log.debug('loaded keypair', { publicKey: keyPair.publicKeyBase64 });
    return keyPair;
  }

  // ── Private helpers ──────────────────────────────────────────────────────

  private async decode(privateBytes: Uint8Array, publicBytes: Uint8Array): Promise<KeyPair> {
    if (privateBytes.length !== KEY_LENGTH && privateBytes.length !== 2 * KEY_LENGTH) {
      throw new KeyIOError(
        `${this.privateKeyPath} has ${privateBytes.length} bytes, expected ${KEY_LENGTH} or ${2 * KEY_LENGTH}`,
        this.privateKeyPath,
        { code: VowlineErrorCode.KEY_CORRUPT },
      );
    }
    if (publicBytes.length !== KEY_LENGTH) {
      throw new KeyIOError(
        `${this.publicKeyPath} has ${publicBytes.length} bytes, expected ${KEY_LENGTH}`,
        this.publicKeyPath,
        { code: VowlineErrorCode.KEY_CORRUPT },
      );
    }

    const keyPair = await keyPairFromPrivateKey(privateBytes.subarray(0, KEY_LENGTH));
    const embedded = privateBytes.length === 2 * KEY_LENGTH ? privateBytes.subarray(KEY_LENGTH) : keyPair.publicKey;

    if (!constantTimeEqual(embedded, keyPair.publicKey) || !constantTimeEqual(publicBytes, keyPair.publicKey)) {
      throw new KeyIOError(
        `key files in ${this.dir} do not belong to the same keypair`,
        this.dir,
        { code: VowlineErrorCode.KEY_CORRUPT },
      );
    }
    return keyPair;
  }

  private async persist(keyPair: KeyPair): Promise<void> {
    try {
      await fs.mkdir(this.dir, { recursive: true, mode: 0o700 });
    } catch (err) {
      throw new KeyIOError(`cannot create key directory ${this.dir}: ${errorMessage(err)}`, this.dir, { cause: err });
    }

    await this.atomicWrite(this.publicKeyPath, keyPair.publicKey, 0o644);
    await this.atomicWrite(this.privateKeyPath, concatKey(keyPair), 0o600);
    this.log.debug('persisted keypair', { dir: this.dir, publicKey: base64Encode(keyPair.publicKey) });
  }

  /** Read a file, returning `undefined` on ENOENT. */
  private async readOptional(filePath: string): Promise<Uint8Array | undefined> {
    try {
      return new Uint8Array(await fs.readFile(filePath));
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return undefined;
      }
      throw new KeyIOError(`cannot read ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
    }
  }

  /**
   * Write to a temporary file in the same directory, then rename over the
   * target. The temporary file is created with the final mode.
   */
  private async atomicWrite(filePath: string, data: Uint8Array, mode: number): Promise<void> {
    const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.writeFile(tmpPath, data, { mode });
      await fs.rename(tmpPath, filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        this.log.warn('cannot remove temporary key file', { path: tmpPath, error: errorMessage(cleanupErr) });
      });
      throw new KeyIOError(`cannot write ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
    }
  }
}

/** The 64-byte private-key file layout: seed followed by public key. */
function concatKey(keyPair: KeyPair): Uint8Array {
  const out = new Uint8Array(2 * KEY_LENGTH);
  out.set(keyPair.privateKey, 0);
  out.set(keyPair.publicKey, KEY_LENGTH);
  return out;
}

export type { KeyPair, PublicKey };
