/**
 * @vowline/sdk type definitions.
 *
 * Option and result shapes for {@link VowlineClient}.
 */

import type { TxType } from '@vowline/core';
import type { FileKeyStore } from '@vowline/keystore';
import type { BroadcastReceipt, FetchFn } from '@vowline/rpc';
import type { Logger } from '@vowline/types';

// ─── Client options ─────────────────────────────────────────────────────────

/** Options for constructing a VowlineClient instance. */
export interface VowlineClientOptions {
  /** JSON-RPC endpoint. Defaults to `http://localhost:26657`. */
  endpoint?: string;
  /** Directory of the signing key. Defaults to `./config`. Ignored when `keyStore` is set. */
  keyDir?: string;
  /** A pre-built key store, e.g. one shared with other components. */
  keyStore?: FileKeyStore;
  /** Upper bound for one RPC call, retries included. */
  timeoutMs?: number;
  /** Extra attempts after a network failure. */
  retries?: number;
  retryDelayMs?: number;
  fetchFn?: FetchFn;
  logger?: Logger;
  /** Produces JSON-RPC request ids. */
  idFactory?: () => string;
}

// ─── Operation inputs and results ───────────────────────────────────────────

/**
 * A due date: Unix seconds, or a string accepted by `parseDue`
 * (`YYYY-MM-DD` or RFC 3339).
 */
export type DueInput = number | string;

export interface CreatePromiseOptions {
  text: string;
  due: DueInput;
  beneficiaryId: string;
  /** An empty string is treated as absent. */
  parentPromiseId?: string;
  /** Due date of the caller's commitment to the new promise. */
  commitmentDue: DueInput;
}

/** Result of a single-body submission. */
export interface SubmittedEntity {
  readonly id: string;
  readonly receipt: BroadcastReceipt;
}

/** Result of a promise + commitment submission. */
export interface SubmittedPromise {
  readonly promiseId: string;
  readonly commitmentId: string;
  readonly receipt: BroadcastReceipt;
}

/** What was submitted: one body type, or the promise + commitment pair. */
export type SubmissionKind = TxType | 'composite';
