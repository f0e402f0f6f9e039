/**
 * @vowline/core — transaction bodies, canonical encoding and signed
 * envelopes for the promise ledger.
 *
 * Nothing here performs I/O: bodies are built and validated, encoded to
 * the exact bytes the ledger verifies, and sealed with an Ed25519 key.
 *
 * @packageDocumentation
 */

export type {
  TxType,
  CommiterBody,
  BeneficiaryBody,
  PromiseBody,
  CommitmentBody,
  TxBody,
  CompositeBody,
  EnvelopeBody,
  FieldKind,
  FieldSpec,
} from './types';

export { BODY_FIELDS, COMPOSITE_FIELDS, ID_PREFIX, isTxType } from './types';

// ─── Bodies ─────────────────────────────────────────────────────────────────────

export {
  buildCommiterBody,
  buildBeneficiaryBody,
  buildPromiseBody,
  buildCommitmentBody,
  parseDue,
  bodyProblem,
  isTxBody,
  assertTxBody,
  isCompositeBody,
} from './body';

export type { CommiterInput, BeneficiaryInput, PromiseInput, CommitmentInput } from './body';

// ─── Canonical encoding ─────────────────────────────────────────────────────────

export { canonicalEncode, quoteJsonString } from './canonical';

// ─── Envelopes ──────────────────────────────────────────────────────────────────

export { sealEnvelope, sealComposite, openEnvelope, verifyEnvelope } from './envelope';
export type { EnvelopeKind, SealedEnvelope, OpenedEnvelope } from './envelope';
