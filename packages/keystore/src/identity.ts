import { base64Encode } from '@vowline/crypto';
import type { PublicKey } from '@vowline/crypto';

/** Prefix of every committer identity id. */
const COMMITER_ID_PREFIX = 'commiter:';

/**
 * Derive the committer identity id from a public key.
 *
 * A pure function of the key bytes: every process holding the same
 * keypair computes the same id.
 *
 * @example
 * ```typescript
 * deriveCommiterId(kp.publicKey); // 'commiter:Ht1c...='
 * ```
 */
export function deriveCommiterId(publicKey: PublicKey): string {
  return COMMITER_ID_PREFIX + base64Encode(publicKey);
}
