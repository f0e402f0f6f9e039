import { EncodingError, isPlainObject } from '@vowline/types';

import { bodyProblem, hasCompositeShape } from './body';
import { BODY_FIELDS, COMPOSITE_FIELDS, isTxType } from './types';
import type { FieldSpec, TxType } from './types';

/**
 * Quote a string as a JSON string literal, escaping the way the ledger's
 * reference encoder does.
 *
 * Besides `"`, `\` and control characters this escapes `<`, `>`, `&`,
 * U+2028 and U+2029 as `\uXXXX`. An unpaired surrogate becomes `\ufffd`.
 *
 * @example
 * ```typescript
 * quoteJsonString('a<b'); // '"a\\u003cb"'
 * ```
 */
export function quoteJsonString(value: string): string {
  let out = '"';
  for (let i = 0; i < value.length; i++) {
    const c = value.charCodeAt(i);
    if (c === 0x22) {
      out += '\\"';
    } else if (c === 0x5c) {
      out += '\\\\';
    } else if (c < 0x20) {
      out += shortEscape(c) ?? unicodeEscape(c);
    } else if (c === 0x3c || c === 0x3e || c === 0x26 || c === 0x2028 || c === 0x2029) {
      out += unicodeEscape(c);
    } else if (c >= 0xd800 && c <= 0xdbff) {
      const next = value.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        out += value.charAt(i) + value.charAt(i + 1);
        i++;
      } else {
        out += '\\ufffd';
      }
    } else if (c >= 0xdc00 && c <= 0xdfff) {
      out += '\\ufffd';
    } else {
      out += value.charAt(i);
    }
  }
  return out + '"';
}

function shortEscape(c: number): string | undefined {
  switch (c) {
    case 0x08: return '\\b';
    case 0x09: return '\\t';
    case 0x0a: return '\\n';
    case 0x0c: return '\\f';
    case 0x0d: return '\\r';
    default: return undefined;
  }
}

function unicodeEscape(c: number): string {
  return '\\u' + c.toString(16).padStart(4, '0');
}

/**
 * The single canonical JSON encoder.
 *
 * - Transaction bodies (objects with a `type` field) are written in the
 *   order of {@link BODY_FIELDS}, every field present, `null` for an
 *   absent parent id.
 * - Composite bodies (exactly `promise` and `commitment`) are written
 *   promise first.
 * - Any other plain object keeps its insertion order.
 *
 * No whitespace is emitted. Two encodings of equal bodies are
 * byte-identical.
 *
 * @throws {EncodingError} For an unknown body type, a missing, extra or
 *   mistyped body field, `undefined`, a non-finite number, or a value that
 *   is not plain JSON data.
 */
export function canonicalEncode(value: unknown): string {
  return encodeValue(value, '$');
}

function encodeValue(value: unknown, at: string): string {
  if (value === null) {
    return 'null';
  }
  switch (typeof value) {
    case 'string':
      return quoteJsonString(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      if (!Number.isFinite(value)) {
        throw new EncodingError(`cannot encode ${String(value)} at ${at}`, { context: { at } });
      }
      return JSON.stringify(value);
    case 'object':
      break;
    default:
      throw new EncodingError(`cannot encode ${typeof value} at ${at}`, { context: { at } });
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return '[' + items.map((item, i) => encodeValue(item, `${at}[${i}]`)).join(',') + ']';
  }
  if (!isPlainObject(value)) {
    throw new EncodingError(`cannot encode a non-plain object at ${at}`, { context: { at } });
  }
  if ('type' in value) {
    return encodeBody(value, at);
  }
  if (hasCompositeShape(value)) {
    const composite = value;
    return (
      '{' +
      COMPOSITE_FIELDS.map((key) => quoteJsonString(key) + ':' + encodeBody(composite[key], `${at}.${key}`, key)).join(',') +
      '}'
    );
  }

  const members: string[] = [];
  for (const [key, member] of Object.entries(value)) {
    members.push(quoteJsonString(key) + ':' + encodeValue(member, `${at}.${key}`));
  }
  return '{' + members.join(',') + '}';
}

function encodeBody(value: unknown, at: string, expected?: TxType): string {
  const problem = bodyProblem(value);
  if (problem !== undefined || !isPlainObject(value)) {
    throw new EncodingError(`${problem ?? 'invalid body'} at ${at}`, { context: { at } });
  }
  const type = value['type'];
  if (!isTxType(type) || (expected !== undefined && type !== expected)) {
    throw new EncodingError(`expected a ${expected ?? 'known'} body at ${at}, got ${String(type)}`, { context: { at } });
  }

  const body: Record<string, unknown> = value;
  const fields: readonly FieldSpec[] = BODY_FIELDS[type];
  const members = fields.map((field) => quoteJsonString(field.name) + ':' + encodeValue(body[field.name], `${at}.${field.name}`));
  return '{' + members.join(',') + '}';
}
