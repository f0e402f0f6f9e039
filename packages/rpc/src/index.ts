/**
 * @vowline/rpc — JSON-RPC clients for the ledger node.
 *
 * {@link SubmissionClient} broadcasts signed envelopes, {@link QueryClient}
 * reads the key/value store, and the classifier turns raw replies into
 * typed outcomes.
 *
 * @packageDocumentation
 */

export type {
  FetchFn,
  RpcClientOptions,
  TxResult,
  BroadcastReceipt,
  SubmissionError,
  QueryAlias,
  QueryRequest,
  DecodedValue,
  QueryView,
  QueryError,
} from './types';

export { DEFAULT_RPC_ENDPOINT, DEFAULT_TIMEOUT_MS, DEFAULT_RETRIES } from './types';

export { RpcTransport, normalizeEndpoint } from './transport';
export type { RpcReply } from './transport';

export { classifyBroadcast, classifyQuery, rpcError } from './classify';
export type { RawQueryResponse } from './classify';

export { SubmissionClient, BROADCAST_METHOD } from './submission';

export {
  QueryClient,
  QUERY_ALIASES,
  resolveQueryPath,
  buildQueryUrl,
  quoteQueryPath,
  decodeQueryValue,
} from './query';
