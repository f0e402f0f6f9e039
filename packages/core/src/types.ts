// ─── Transaction types ─────────────────────────────────────────────────────────

/** Discriminator carried in the `type` field of every transaction body. */
export type TxType = 'commiter' | 'beneficiary' | 'promise' | 'commitment';

/** Registers the signing key's identity under a display name. */
export interface CommiterBody {
  readonly type: 'commiter';
  /** `commiter:` followed by the base64 public key. */
  readonly id: string;
  readonly name: string;
  /** Standard base64 of the 32-byte Ed25519 public key. */
  readonly commiter_pubkey: string;
}

/** A party on whose behalf promises are made. */
export interface BeneficiaryBody {
  readonly type: 'beneficiary';
  readonly id: string;
  readonly name: string;
}

/** A statement of intent owed to a beneficiary. */
export interface PromiseBody {
  readonly type: 'promise';
  readonly id: string;
  readonly text: string;
  /** Unix seconds, UTC. */
  readonly due: number;
  readonly beneficiary_id: string;
  /** Encoded as an explicit `null` when absent. */
  readonly parent_promise_id: string | null;
}

/** The signer's binding to a specific promise. */
export interface CommitmentBody {
  readonly type: 'commitment';
  readonly id: string;
  readonly promise_id: string;
  readonly commiter_id: string;
  /** Unix seconds, UTC. */
  readonly due: number;
}

/** Any single transaction body. */
export type TxBody = CommiterBody | BeneficiaryBody | PromiseBody | CommitmentBody;

/** The one composite shape the ledger accepts: a promise and its commitment, applied atomically. */
export interface CompositeBody {
  readonly promise: PromiseBody;
  readonly commitment: CommitmentBody;
}

/** Anything that can be signed into an envelope. */
export type EnvelopeBody = TxBody | CompositeBody;

// ─── Field-order table ─────────────────────────────────────────────────────────

/** Value kind of a declared body field. */
export type FieldKind = 'string' | 'integer' | 'nullable-string';

/** One declared wire field. */
export interface FieldSpec<K extends string = string> {
  readonly name: K;
  readonly kind: FieldKind;
}

type FieldsOf<T extends TxType> = readonly FieldSpec<Extract<keyof Extract<TxBody, { type: T }>, string>>[];

/**
 * Wire field names, kinds and order for every body type.
 *
 * The ledger verifies signatures over the exact bytes it receives, so the
 * order here is part of the protocol. Every encoder and decoder in this
 * package reads it; nothing else restates it.
 */
export const BODY_FIELDS: { readonly [T in TxType]: FieldsOf<T> } = {
  commiter: [
    { name: 'type', kind: 'string' },
    { name: 'id', kind: 'string' },
    { name: 'name', kind: 'string' },
    { name: 'commiter_pubkey', kind: 'string' },
  ],
  beneficiary: [
    { name: 'type', kind: 'string' },
    { name: 'id', kind: 'string' },
    { name: 'name', kind: 'string' },
  ],
  promise: [
    { name: 'type', kind: 'string' },
    { name: 'id', kind: 'string' },
    { name: 'text', kind: 'string' },
    { name: 'due', kind: 'integer' },
    { name: 'beneficiary_id', kind: 'string' },
    { name: 'parent_promise_id', kind: 'nullable-string' },
  ],
  commitment: [
    { name: 'type', kind: 'string' },
    { name: 'id', kind: 'string' },
    { name: 'promise_id', kind: 'string' },
    { name: 'commiter_id', kind: 'string' },
    { name: 'due', kind: 'integer' },
  ],
};

/** Key order of the composite body. */
export const COMPOSITE_FIELDS = ['promise', 'commitment'] as const;

/** All known transaction types. */
const TX_TYPES: readonly TxType[] = ['commiter', 'beneficiary', 'promise', 'commitment'];

/** `true` if `value` names a known transaction type. */
export function isTxType(value: unknown): value is TxType {
  return typeof value === 'string' && TX_TYPES.some((t) => t === value);
}

/** Id prefixes for randomly generated entities. */
export const ID_PREFIX = {
  beneficiary: 'beneficiary',
  promise: 'promise',
  commitment: 'commitment',
} as const;
