import { describe, it, expect } from 'vitest';
import { EncodingError } from '@vowline/types';

import {
  canonicalEncode,
  quoteJsonString,
  buildPromiseBody,
  buildCommitmentBody,
} from './index';

const PROMISE_JSON =
  '{"type":"promise","id":"promise:p1","text":"Ship \\u003cv1\\u003e \\u0026 docs","due":1893456000,' +
  '"beneficiary_id":"beneficiary:b1","parent_promise_id":null}';

const COMMITMENT_JSON =
  '{"type":"commitment","id":"commitment:c1","promise_id":"promise:p1","commiter_id":"commiter:k","due":1893456000}';

function promise() {
  return buildPromiseBody({
    id: 'promise:p1',
    text: 'Ship <v1> & docs',
    due: 1893456000,
    beneficiaryId: 'beneficiary:b1',
  });
}

function commitment() {
  return buildCommitmentBody({
    id: 'commitment:c1',
    promiseId: 'promise:p1',
    commiterId: 'commiter:k',
    due: 1893456000,
  });
}

// ---------------------------------------------------------------------------
// String quoting
// ---------------------------------------------------------------------------
describe('quoteJsonString', () => {
  it('matches JSON.stringify for ordinary text', () => {
    for (const s of ['', 'plain', 'обещание', 'emoji 😀', 'tab-free / slash']) {
      expect(quoteJsonString(s)).toBe(JSON.stringify(s));
    }
  });

  it('escapes quote and backslash', () => {
    expect(quoteJsonString('say "hi" \\ bye')).toBe('"say \\"hi\\" \\\\ bye"');
  });

  it('uses short escapes for common control characters', () => {
    expect(quoteJsonString('\b\f\n\r\t')).toBe('"\\b\\f\\n\\r\\t"');
  });

  it('uses \\u00XX for other control characters', () => {
    expect(quoteJsonString('\u0000\u0001\u001f')).toBe('"\\u0000\\u0001\\u001f"');
  });

  it('escapes HTML-significant characters', () => {
    expect(quoteJsonString('a<b>&c')).toBe('"a\\u003cb\\u003e\\u0026c"');
  });

  it('escapes the line and paragraph separators', () => {
    expect(quoteJsonString('x\u2028y\u2029z')).toBe('"x\\u2028y\\u2029z"');
  });

  it('replaces unpaired surrogates', () => {
    expect(quoteJsonString('a\ud800b')).toBe('"a\\ufffdb"');
    expect(quoteJsonString('\udc00')).toBe('"\\ufffd"');
  });

  it('leaves DEL and non-ASCII letters alone', () => {
    expect(quoteJsonString('\u007fé')).toBe('"\u007fé"');
  });
});

// ---------------------------------------------------------------------------
// Bodies
// ---------------------------------------------------------------------------
describe('canonicalEncode - bodies', () => {
  it('writes promise fields in declared order with an explicit null', () => {
    expect(canonicalEncode(promise())).toBe(PROMISE_JSON);
  });

  it('ignores the order the fields were inserted in', () => {
    const shuffled = {
      due: 1893456000,
      commiter_id: 'commiter:k',
      promise_id: 'promise:p1',
      id: 'commitment:c1',
      type: 'commitment',
    };
    expect(canonicalEncode(shuffled)).toBe(COMMITMENT_JSON);
  });

  it('writes the composite promise first', () => {
    const expected = `{"promise":${PROMISE_JSON},"commitment":${COMMITMENT_JSON}}`;
    expect(canonicalEncode({ promise: promise(), commitment: commitment() })).toBe(expected);
    expect(canonicalEncode({ commitment: commitment(), promise: promise() })).toBe(expected);
  });

  it('is stable across a parse and re-encode', () => {
    const parsed: unknown = JSON.parse(PROMISE_JSON);
    expect(canonicalEncode(parsed)).toBe(PROMISE_JSON);
  });

  it('encodes negative and zero due values as plain integers', () => {
    const body = buildCommitmentBody({ id: 'commitment:c1', promiseId: 'p', commiterId: 'c', due: -86400 });
    expect(canonicalEncode(body)).toBe(
      '{"type":"commitment","id":"commitment:c1","promise_id":"p","commiter_id":"c","due":-86400}',
    );
  });
});

describe('canonicalEncode - failures', () => {
  it('rejects an unknown body type', () => {
    expect(() => canonicalEncode({ type: 'wager', id: 'x' })).toThrow(EncodingError);
    expect(() => canonicalEncode({ type: 'wager', id: 'x' })).toThrow('unknown body type "wager" at $');
  });

  it('rejects missing and undeclared body fields', () => {
    expect(() => canonicalEncode({ type: 'beneficiary', id: 'b' })).toThrow(
      'beneficiary body is missing "name" at $',
    );
    expect(() => canonicalEncode({ type: 'beneficiary', id: 'b', name: 'n', note: 'x' })).toThrow(
      'beneficiary body has undeclared field "note" at $',
    );
  });

  it('rejects a fractional due', () => {
    expect(() => canonicalEncode({ ...commitment(), due: 1.5 })).toThrow(
      'commitment.due must be a safe integer at $',
    );
  });

  it('rejects a composite whose parts are swapped', () => {
    expect(() => canonicalEncode({ promise: commitment(), commitment: promise() })).toThrow(
      'expected a promise body at $.promise, got commitment',
    );
  });

  it('rejects undefined, non-finite numbers and non-plain objects', () => {
    expect(() => canonicalEncode(undefined)).toThrow('cannot encode undefined at $');
    expect(() => canonicalEncode({ a: undefined })).toThrow('cannot encode undefined at $.a');
    expect(() => canonicalEncode([1, Number.NaN])).toThrow('cannot encode NaN at $[1]');
    expect(() => canonicalEncode(new Map())).toThrow('cannot encode a non-plain object at $');
  });
});

describe('canonicalEncode - other values', () => {
  it('keeps insertion order for plain objects', () => {
    const frame = { jsonrpc: '2.0', id: 'req-1', method: 'broadcast_tx_commit', params: { tx: 'AA==' } };
    expect(canonicalEncode(frame)).toBe(
      '{"jsonrpc":"2.0","id":"req-1","method":"broadcast_tx_commit","params":{"tx":"AA=="}}',
    );
  });

  it('encodes scalars and arrays', () => {
    expect(canonicalEncode([true, false, null, 2.5, 'x'])).toBe('[true,false,null,2.5,"x"]');
  });
});
