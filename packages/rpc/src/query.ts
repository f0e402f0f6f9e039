import { base64Decode, base64Encode, utf8DecodeStrict, utf8Encode } from '@vowline/crypto';
import {
  DecodeError,
  EmptyResultError,
  TimeoutError,
  TransportError,
  ValidationError,
  VowlineErrorCode,
  err,
  isBase64,
  ok,
} from '@vowline/types';
import type { Result } from '@vowline/types';

import { classifyQuery, readString } from './classify';
import type { RawQueryResponse } from './classify';
import { RpcTransport } from './transport';
import type {
  DecodedValue,
  QueryAlias,
  QueryError,
  QueryRequest,
  QueryView,
  RpcClientOptions,
} from './types';

/** Aliases accepted by {@link resolveQueryPath}. */
export const QUERY_ALIASES: readonly QueryAlias[] = ['promise', 'commitment', 'commiter', 'beneficiary'];

function isQueryAlias(value: string): value is QueryAlias {
  return QUERY_ALIASES.some((a) => a === value);
}

// ─── Path and URL ──────────────────────────────────────────────────────────────

/**
 * Turn a path or alias into the ABCI path to query.
 *
 * @example
 * ```typescript
 * resolveQueryPath({ alias: 'promise' });                 // '/list/promise'
 * resolveQueryPath({ path: '/custom', alias: 'promise' }); // '/custom'
 * ```
 *
 * @throws {ValidationError} `UNKNOWN_ALIAS` for an alias outside
 *   {@link QUERY_ALIASES}, `INVALID_ARGUMENT` when neither is given.
 */
export function resolveQueryPath(request: { path?: string; alias?: string }): string {
  if (request.path !== undefined && request.path !== '') {
    return request.path;
  }
  if (request.alias !== undefined && request.alias !== '') {
    if (!isQueryAlias(request.alias)) {
      throw new ValidationError(
        `unknown alias for --list: ${JSON.stringify(request.alias)}`,
        'alias',
        VowlineErrorCode.UNKNOWN_ALIAS,
        { hint: `Use one of: ${QUERY_ALIASES.join(', ')}` },
      );
    }
    return `/list/${request.alias}`;
  }
  throw new ValidationError('either a path or an alias is required', 'path');
}

const NON_PRINTABLE = /^[\p{C}\p{Z}]$/u;

const SHORT_ESCAPES: Readonly<Record<string, string>> = {
  '\x07': '\\a',
  '\b': '\\b',
  '\f': '\\f',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\v': '\\v',
  '"': '\\"',
  '\\': '\\\\',
};

/**
 * Quote a path as a double-quoted string literal. The node expects the
 * `path` parameter in this form.
 *
 * Control characters use the short escapes `\a \b \f \n \r \t \v` where
 * one exists and `\xNN` otherwise. Other non-printable characters (format,
 * separator, private-use and unassigned code points; the ASCII space is
 * printable) become `\uNNNN`, or `\UNNNNNNNN` above the BMP.
 */
export function quoteQueryPath(path: string): string {
  let out = '"';
  for (const ch of path) {
    const c = ch.codePointAt(0) ?? 0;
    const short = SHORT_ESCAPES[ch];
    if (short !== undefined) {
      out += short;
    } else if (c < 0x20 || c === 0x7f) {
      out += '\\x' + hex(c, 2);
    } else if (ch !== ' ' && NON_PRINTABLE.test(ch)) {
      out += c > 0xffff ? '\\U' + hex(c, 8) : '\\u' + hex(c, 4);
    } else {
      out += ch;
    }
  }
  return out + '"';
}

function hex(c: number, width: number): string {
  return c.toString(16).padStart(width, '0');
}

/**
 * Form-encode one query component: `+` for space, percent-escapes for
 * everything outside `A-Z a-z 0-9 - _ . ~`.
 */
function queryEscape(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (c) => '%' + c.charCodeAt(0).toString(16).toUpperCase())
    .replace(/%20/g, '+');
}

/**
 * Build the `abci_query` GET URL.
 *
 * Parameters appear sorted by name (`data`, `height`, `path`); absent ones
 * are left out. `data` is the standard base64 of the argument bytes.
 *
 * @example
 * ```typescript
 * buildQueryUrl('http://localhost:26657/', { path: '/list/promise' });
 * // 'http://localhost:26657/abci_query?path=%22%2Flist%2Fpromise%22'
 * ```
 */
export function buildQueryUrl(
  endpoint: string,
  query: { path: string; data?: string | Uint8Array; height?: string | number },
): string {
  const params: Array<[string, string]> = [];
  if (query.data !== undefined && query.data.length > 0) {
    const bytes = typeof query.data === 'string' ? utf8Encode(query.data) : query.data;
    params.push(['data', base64Encode(bytes)]);
  }
  if (query.height !== undefined && query.height !== '') {
    params.push(['height', String(query.height)]);
  }
  params.push(['path', quoteQueryPath(query.path)]);

  const search = params.map(([k, v]) => `${k}=${queryEscape(v)}`).join('&');
  return `${endpoint.replace(/\/+$/, '')}/abci_query?${search}`;
}

// ─── Value decoding ────────────────────────────────────────────────────────────

/**
 * Decode a base64 `response.value`.
 *
 * Tried in order: empty, JSON, binary (a NUL byte or invalid UTF-8,
 * re-encoded as base64), text.
 *
 * @throws {DecodeError} When the value is not standard base64.
 */
export function decodeQueryValue(value: string): DecodedValue {
  if (value === '') {
    return { kind: 'empty' };
  }
  if (!isBase64(value)) {
    throw new DecodeError('cannot base64-decode value: illegal base64 data', value);
  }
  const bytes = base64Decode(value);
  const text = utf8DecodeStrict(bytes);
  if (text !== undefined) {
    const json = parseJson(text);
    if (json.ok) {
      return { kind: 'json', data: json.value };
    }
  }
  if (text === undefined || bytes.includes(0)) {
    return { kind: 'base64', base64: base64Encode(bytes) };
  }
  return { kind: 'text', text };
}

function parseJson(text: string): Result<unknown, SyntaxError> {
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch (e) {
    return err(e instanceof SyntaxError ? e : new SyntaxError(String(e)));
  }
}

// ─── Client ────────────────────────────────────────────────────────────────────

function isQueryError(e: unknown): e is QueryError {
  return (
    e instanceof ValidationError ||
    e instanceof TransportError ||
    e instanceof TimeoutError ||
    e instanceof EmptyResultError ||
    e instanceof DecodeError
  );
}

/**
 * Reads the ledger's key/value store through `abci_query`.
 *
 * ```ts
 * const client = new QueryClient({ endpoint: 'http://localhost:26657' });
 * const result = await client.query({ alias: 'promise' });
 * if (result.ok && result.value.value.kind === 'json') console.log(result.value.value.data);
 * ```
 */
export class QueryClient {
  private readonly transport: RpcTransport;

  constructor(options: RpcClientOptions) {
    this.transport = new RpcTransport(options, 'rpc.query');
  }

  get endpoint(): string {
    return this.transport.endpoint;
  }

  async query(request: QueryRequest): Promise<Result<QueryView, QueryError>> {
    try {
      const { path, response, body } = await this.fetchResponse(request);
      const rawValue = response['value'];
      const code = response['code'];

      return ok({
        path,
        code: typeof code === 'number' ? code : 0,
        log: readString(response['log']) ?? '',
        info: readString(response['info']) ?? '',
        index: readString(response['index']) ?? '0',
        key: readString(response['key']) ?? '',
        height: readString(response['height']) ?? '0',
        codespace: readString(response['codespace']) ?? '',
        proofOps: response['proofOps'] ?? null,
        value: decodeQueryValue(typeof rawValue === 'string' ? rawValue : ''),
        raw: body,
      });
    } catch (e) {
      if (isQueryError(e)) {
        return err(e);
      }
      throw e;
    }
  }

  /**
   * Like {@link QueryClient.query}, but return the whole parsed reply and
   * leave `response.value` undecoded, so an undecodable value is no error.
   */
  async queryRaw(request: QueryRequest): Promise<Result<unknown, QueryError>> {
    try {
      const { body } = await this.fetchResponse(request);
      return ok(body);
    } catch (e) {
      if (isQueryError(e)) {
        return err(e);
      }
      throw e;
    }
  }

  private async fetchResponse(request: QueryRequest): Promise<{ path: string; response: RawQueryResponse; body: unknown }> {
    const path = resolveQueryPath(request);
    const url = buildQueryUrl(this.transport.endpoint, { path, data: request.data, height: request.height });
    const reply = await this.transport.get(url, this.transport.nextId());

    const classified = classifyQuery(reply.body);
    if (!classified.ok) {
      throw classified.error;
    }
    return { path, response: classified.value, body: reply.body };
  }
}
