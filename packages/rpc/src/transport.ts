import { generateRequestId } from '@vowline/crypto';
import {
  EmptyResultError,
  TimeoutError,
  TransportError,
  ValidationError,
  silentLogger,
  withRetry,
} from '@vowline/types';
import type { Logger } from '@vowline/types';

import { DEFAULT_RETRIES, DEFAULT_TIMEOUT_MS } from './types';
import type { FetchFn, RpcClientOptions } from './types';

/** A parsed reply together with the HTTP status it arrived with. */
export interface RpcReply {
  readonly status: number;
  readonly body: unknown;
}

/**
 * HTTP plumbing shared by the submission and query clients.
 *
 * Each call is bounded by `timeoutMs` across all attempts. Only failures
 * that produced no response at all are retried; a reply of any kind,
 * including a JSON-RPC error, is returned to the caller as-is.
 */
export class RpcTransport {
  readonly endpoint: string;
  readonly timeoutMs: number;
  readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: FetchFn;
  private readonly idFactory: () => string;
  private readonly log: Logger;

  constructor(options: RpcClientOptions, component: string) {
    this.endpoint = normalizeEndpoint(options.endpoint);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retries = options.retries ?? DEFAULT_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? 100;
    if (!Number.isSafeInteger(this.timeoutMs) || this.timeoutMs <= 0) {
      throw new ValidationError(`timeoutMs must be a positive integer, got ${String(this.timeoutMs)}`, 'timeoutMs');
    }
    if (!Number.isSafeInteger(this.retries) || this.retries < 0) {
      throw new ValidationError(`retries must be a non-negative integer, got ${String(this.retries)}`, 'retries');
    }

    this.fetchFn = options.fetchFn ?? (
      typeof globalThis.fetch === 'function'
        ? globalThis.fetch.bind(globalThis)
        : async () => { throw new Error('No fetch implementation available. Provide a fetchFn in options.'); }
    );
    this.idFactory = options.idFactory ?? generateRequestId;
    this.log = (options.logger ?? silentLogger).child(component);
  }

  /** A fresh JSON-RPC request id. */
  nextId(): string {
    return this.idFactory();
  }

  /** POST a JSON body to the endpoint root. */
  post(body: string, requestId: string): Promise<RpcReply> {
    return this.send(this.endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    }, requestId);
  }

  /** GET a fully built URL. */
  get(url: string, requestId: string): Promise<RpcReply> {
    return this.send(url, { method: 'GET' }, requestId);
  }

  private async send(url: string, init: RequestInit, requestId: string): Promise<RpcReply> {
    const signal = AbortSignal.timeout(this.timeoutMs);

    const response = await withRetry(
      async () => {
        try {
          return await this.fetchFn(url, { ...init, signal });
        } catch (e) {
          if (signal.aborted) {
            throw new TimeoutError(`no response from ${url} within ${this.timeoutMs} ms`, this.timeoutMs, { cause: e });
          }
          throw new TransportError(
            `cannot reach ${url}: ${e instanceof Error ? e.message : String(e)}`,
            { url },
            { network: true, cause: e },
          );
        }
      },
      {
        maxRetries: this.retries,
        baseDelayMs: this.retryDelayMs,
        retryOn: (e) => e instanceof TransportError && e.network && !signal.aborted,
        onRetry: (attempt, e) => {
          this.log.warn('network failure, retrying', { requestId, attempt, error: e.message });
        },
      },
    );

    let text: string;
    try {
      text = await response.text();
    } catch (e) {
      if (signal.aborted) {
        throw new TimeoutError(`response from ${url} did not complete within ${this.timeoutMs} ms`, this.timeoutMs, { cause: e });
      }
      throw new TransportError(`cannot read response from ${url}`, { url, status: response.status }, { cause: e });
    }
    this.log.debug('received reply', { requestId, status: response.status, bytes: text.length });

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (e) {
      if (!response.ok) {
        throw new TransportError(
          `HTTP ${response.status} ${response.statusText} from ${url}`,
          { url, status: response.status },
          { cause: e },
        );
      }
      throw new EmptyResultError(`empty result: response is not JSON (HTTP ${response.status})`, { cause: e });
    }
    return { status: response.status, body };
  }
}

/**
 * Validate an endpoint URL and strip trailing slashes.
 *
 * @throws {ValidationError} If the value is empty or not an http(s) URL.
 */
export function normalizeEndpoint(endpoint: string): string {
  let parsed: URL;
  try {
    parsed = new URL(endpoint);
  } catch (e) {
    throw new ValidationError(`invalid RPC endpoint ${JSON.stringify(endpoint)}`, 'endpoint', undefined, { cause: e });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`RPC endpoint must use http or https, got ${parsed.protocol}`, 'endpoint');
  }
  return endpoint.replace(/\/+$/, '');
}
