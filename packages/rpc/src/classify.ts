/**
 * Classification of JSON-RPC replies.
 *
 * A broadcast reply is checked in a fixed order, first match wins:
 *   1. an `error` object                 → TransportError
 *   2. no `result`                       → EmptyResultError
 *   3. `check_tx.code` ≠ 0               → ValidationRejected
 *   4. `deliver_tx.code` ≠ 0             → ExecutionRejected
 *   5. otherwise                         → BroadcastReceipt
 *
 * A missing `check_tx` or `deliver_tx` reads as code 0 with an empty log.
 * Nodes that report the execution stage as `tx_result` are read the same
 * way as `deliver_tx`.
 */

import {
  EmptyResultError,
  ExecutionRejected,
  TransportError,
  ValidationRejected,
  err,
  isPlainObject,
  ok,
} from '@vowline/types';
import type { Result } from '@vowline/types';

import type { BroadcastReceipt, SubmissionError, TxResult } from './types';

/** The `result.response` object of an `abci_query` reply, before decoding. */
export type RawQueryResponse = Record<string, unknown>;

/** Step 1: a JSON-RPC `error` object, if the reply carries one. */
export function rpcError(raw: unknown): TransportError | undefined {
  if (!isPlainObject(raw)) {
    return undefined;
  }
  const error = raw['error'];
  if (error === undefined || error === null) {
    return undefined;
  }
  const fields: Record<string, unknown> = isPlainObject(error) ? error : {};
  const code = toCode(fields['code']);
  const message = typeof fields['message'] === 'string' ? fields['message'] : '';
  const data = fields['data'];
  const dataText = typeof data === 'string' ? data : data === undefined ? '' : JSON.stringify(data);
  return new TransportError(`RPC error: ${code} ${message} (${dataText})`, {
    rpcCode: code,
    rpcMessage: message,
    rpcData: data,
  });
}

/**
 * Classify a `broadcast_tx_commit` reply.
 *
 * @param requestId - Copied into the receipt.
 */
export function classifyBroadcast(raw: unknown, requestId = ''): Result<BroadcastReceipt, SubmissionError> {
  const transport = rpcError(raw);
  if (transport) {
    return err(transport);
  }
  const result = isPlainObject(raw) ? raw['result'] : undefined;
  if (!isPlainObject(result)) {
    return err(new EmptyResultError());
  }

  const checkTx = txResult(result['check_tx']);
  if (checkTx.code !== 0) {
    return err(new ValidationRejected(checkTx.code, checkTx.log));
  }
  const deliverTx = txResult(result['deliver_tx'] ?? result['tx_result']);
  if (deliverTx.code !== 0) {
    return err(new ExecutionRejected(deliverTx.code, deliverTx.log));
  }

  const hash = readString(result['hash']);
  const height = readString(result['height']);
  const receipt: BroadcastReceipt = {
    requestId,
    ...(hash !== undefined ? { hash } : {}),
    ...(height !== undefined ? { height } : {}),
    checkTx,
    deliverTx,
  };
  return ok(receipt);
}

/**
 * Classify an `abci_query` reply: steps 1 and 2, then require
 * `result.response`. The response's own `code` is not treated as a failure.
 */
export function classifyQuery(raw: unknown): Result<RawQueryResponse, TransportError | EmptyResultError> {
  const transport = rpcError(raw);
  if (transport) {
    return err(transport);
  }
  const result = isPlainObject(raw) ? raw['result'] : undefined;
  if (!isPlainObject(result)) {
    return err(new EmptyResultError());
  }
  const response = result['response'];
  if (!isPlainObject(response)) {
    return err(new EmptyResultError('empty result: reply has no response object'));
  }
  return ok(response);
}

// ─── Field readers ─────────────────────────────────────────────────────────────

/** Read a result code; absent reads as 0, numeric strings are accepted. */
function toCode(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value)) {
    return Number(value);
  }
  return 0;
}

function txResult(value: unknown): TxResult {
  const fields: Record<string, unknown> = isPlainObject(value) ? value : {};
  const codespace = readString(fields['codespace']);
  const info = readString(fields['info']);
  return {
    code: toCode(fields['code']),
    log: readString(fields['log']) ?? '',
    ...(codespace !== undefined ? { codespace } : {}),
    ...(info !== undefined ? { info } : {}),
  };
}

/** A non-empty string, or a number rendered as one (heights arrive either way). */
export function readString(value: unknown): string | undefined {
  if (typeof value === 'string' && value !== '') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}
