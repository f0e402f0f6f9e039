import { canonicalEncode } from '@vowline/core';
import { base64Encode } from '@vowline/crypto';
import {
  EmptyResultError,
  ExecutionRejected,
  TimeoutError,
  TransportError,
  ValidationRejected,
  err,
} from '@vowline/types';
import type { Result } from '@vowline/types';

import { classifyBroadcast } from './classify';
import { RpcTransport } from './transport';
import type { BroadcastReceipt, RpcClientOptions, SubmissionError } from './types';

/** The JSON-RPC method every transaction is submitted with. */
export const BROADCAST_METHOD = 'broadcast_tx_commit';

function isSubmissionError(e: unknown): e is SubmissionError {
  return (
    e instanceof TransportError ||
    e instanceof TimeoutError ||
    e instanceof EmptyResultError ||
    e instanceof ValidationRejected ||
    e instanceof ExecutionRejected
  );
}

/**
 * Submits signed envelopes with `broadcast_tx_commit` and classifies the
 * reply.
 *
 * ```ts
 * const client = new SubmissionClient({ endpoint: 'http://localhost:26657' });
 * const result = await client.submit(envelope.bytes);
 * if (!result.ok) console.error(formatError(result.error));
 * ```
 */
export class SubmissionClient {
  private readonly transport: RpcTransport;

  constructor(options: RpcClientOptions) {
    this.transport = new RpcTransport(options, 'rpc.submit');
  }

  get endpoint(): string {
    return this.transport.endpoint;
  }

  /**
   * Broadcast envelope bytes and wait for both processing stages.
   *
   * Every failure comes back as the `error` of the Result; nothing is thrown
   * for a classified outcome.
   */
  async submit(envelopeBytes: Uint8Array): Promise<Result<BroadcastReceipt, SubmissionError>> {
    const requestId = this.transport.nextId();
    const frame = {
      jsonrpc: '2.0',
      id: requestId,
      method: BROADCAST_METHOD,
      params: { tx: base64Encode(envelopeBytes) },
    };

    try {
      const reply = await this.transport.post(canonicalEncode(frame), requestId);
      return classifyBroadcast(reply.body, requestId);
    } catch (e) {
      if (isSubmissionError(e)) {
        return err(e);
      }
      throw e;
    }
  }
}
