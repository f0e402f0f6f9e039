import type {
  DecodeError,
  EmptyResultError,
  ExecutionRejected,
  Logger,
  TimeoutError,
  TransportError,
  ValidationError,
  ValidationRejected,
} from '@vowline/types';

// ─── Options ───────────────────────────────────────────────────────────────────

/** A `fetch`-compatible function. Injected in tests and non-standard runtimes. */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/** Options shared by the submission and query clients. */
export interface RpcClientOptions {
  /** Base URL of the node's JSON-RPC endpoint, e.g. `http://localhost:26657`. */
  endpoint: string;
  /** Upper bound for one call, retries included. Defaults to 30 000. */
  timeoutMs?: number;
  /** Extra attempts after a network failure. Defaults to 1. */
  retries?: number;
  /** Delay before the first retry. Defaults to 100. */
  retryDelayMs?: number;
  fetchFn?: FetchFn;
  logger?: Logger;
  /** Produces JSON-RPC request ids. Defaults to a UUID v4. */
  idFactory?: () => string;
}

export const DEFAULT_RPC_ENDPOINT = 'http://localhost:26657';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_RETRIES = 1;

// ─── Broadcast ─────────────────────────────────────────────────────────────────

/** Outcome of one processing stage as reported by the ledger. */
export interface TxResult {
  /** 0 means accepted. */
  readonly code: number;
  readonly log: string;
  readonly codespace?: string;
  readonly info?: string;
}

/** A transaction the ledger accepted at both stages. */
export interface BroadcastReceipt {
  readonly requestId: string;
  readonly hash?: string;
  readonly height?: string;
  readonly checkTx: TxResult;
  readonly deliverTx: TxResult;
}

/** Every way a submission can fail. */
export type SubmissionError =
  | TransportError
  | TimeoutError
  | EmptyResultError
  | ValidationRejected
  | ExecutionRejected;

// ─── Query ─────────────────────────────────────────────────────────────────────

/** Entity names accepted as shorthand for `/list/<name>`. */
export type QueryAlias = 'promise' | 'commitment' | 'commiter' | 'beneficiary';

export interface QueryRequest {
  /** Explicit ABCI path. Wins over `alias`. */
  path?: string;
  alias?: string;
  /** Query argument; sent as standard base64 of its bytes (UTF-8 for strings). */
  data?: string | Uint8Array;
  height?: string | number;
}

/** A query response value after decoding. */
export type DecodedValue =
  | { readonly kind: 'empty' }
  | { readonly kind: 'json'; readonly data: unknown }
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'base64'; readonly base64: string };

/** The `result.response` object of an `abci_query` reply, with the value decoded. */
export interface QueryView {
  readonly path: string;
  readonly code: number;
  readonly log: string;
  readonly info: string;
  readonly index: string;
  readonly key: string;
  readonly height: string;
  readonly codespace: string;
  readonly proofOps: unknown;
  readonly value: DecodedValue;
  /** The whole parsed JSON-RPC reply. */
  readonly raw: unknown;
}

/** Every way a query can fail. */
export type QueryError =
  | ValidationError
  | TransportError
  | TimeoutError
  | EmptyResultError
  | DecodeError;
