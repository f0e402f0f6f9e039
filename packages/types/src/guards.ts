/**
 * Runtime type guards and input sanitization utilities.
 * Use these at system boundaries (CLI arguments, RPC responses, persisted files).
 */

// ─── Type Guards ────────────────────────────────────────────────────────────────

/**
 * Check whether `value` is a plain object (not an array, `null`, or a class
 * instance).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** `true` if `value` is an integer within the IEEE-754 safe range. */
export function isSafeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value);
}

const BASE64_STD = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Check whether `value` is padded standard base64 (RFC 4648 section 4).
 * The empty string is valid base64 for zero bytes.
 */
export function isBase64(value: unknown): value is string {
  return typeof value === 'string' && BASE64_STD.test(value);
}

// ─── Sanitization ───────────────────────────────────────────────────────────────

/** Keys that are dangerous if present in parsed JSON (prototype pollution vectors). */
const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Recursively check a parsed value for keys that could lead to prototype
 * pollution.
 *
 * @throws Error if a dangerous key is found.
 */
export function assertNoDangerousKeys(obj: unknown): void {
  if (typeof obj !== 'object' || obj === null) return;

  if (Array.isArray(obj)) {
    for (const item of obj) {
      assertNoDangerousKeys(item);
    }
    return;
  }

  for (const [key, nested] of Object.entries(obj)) {
    if (DANGEROUS_KEYS.has(key)) {
      throw new Error(
        `Potentially dangerous key "${key}" detected in JSON input`,
      );
    }
    assertNoDangerousKeys(nested);
  }
}

/**
 * Parse a JSON string with prototype pollution protection.
 *
 * @throws SyntaxError if parsing fails, Error if a dangerous key is detected.
 */
export function sanitizeJsonInput(value: string): unknown {
  const parsed: unknown = JSON.parse(value);
  assertNoDangerousKeys(parsed);
  return parsed;
}

// ─── Deep Freeze ────────────────────────────────────────────────────────────────

/**
 * Deeply freeze an object and all of its nested properties.
 * Primitive values and already-frozen objects are returned as-is.
 */
export function freezeDeep<T>(obj: T): Readonly<T> {
  if (obj === null || typeof obj !== 'object' || Object.isFrozen(obj)) {
    return obj;
  }

  Object.freeze(obj);
  for (const value of Object.values(obj)) {
    freezeDeep(value);
  }
  return obj;
}
