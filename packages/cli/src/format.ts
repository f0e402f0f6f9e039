/**
 * @vowline/cli formatting utilities.
 *
 * ANSI colors with a global off switch, plus renderers for receipts and
 * query values.
 *
 * @packageDocumentation
 */

import type { BroadcastReceipt, DecodedValue } from '@vowline/rpc';

// ─── ANSI color codes ─────────────────────────────────────────────────────────

export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  underline: '\x1b[4m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  gray: '\x1b[90m',
} as const;

// ─── Global color toggle ──────────────────────────────────────────────────────

let colorsEnabled = true;

/** Enable or disable ANSI color output globally. */
export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

export function getColorsEnabled(): boolean {
  return colorsEnabled;
}

// ─── Low-level colorizers ─────────────────────────────────────────────────────

function c(code: string, text: string): string {
  if (!colorsEnabled) return text;
  return `${code}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return c(colors.bold, text);
}

export function red(text: string): string {
  return c(colors.red, text);
}

// ─── Semantic formatters ──────────────────────────────────────────────────────

/** Green checkmark + message. */
export function success(msg: string): string {
  if (!colorsEnabled) return `[OK] ${msg}`;
  return `${colors.green}✔${colors.reset} ${msg}`;
}

/** Yellow exclamation + message. */
export function warning(msg: string): string {
  if (!colorsEnabled) return `[WARN] ${msg}`;
  return `${colors.yellow}!${colors.reset} ${msg}`;
}

/** Bold + underlined header text. */
export function header(msg: string): string {
  if (!colorsEnabled) return msg;
  return `${colors.bold}${colors.underline}${msg}${colors.reset}`;
}

export function dim(msg: string): string {
  return c(colors.gray, msg);
}

// ─── Strip ANSI codes ─────────────────────────────────────────────────────────

export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

// ─── Key-value display ────────────────────────────────────────────────────────

/**
 * Render key-value pairs with aligned values.
 * Keys are displayed in bold, values are plain.
 */
export function keyValue(pairs: [string, string][]): string {
  if (pairs.length === 0) return '';

  const maxKeyLen = Math.max(...pairs.map(([k]) => k.length));
  const lines: string[] = [];

  for (const [key, value] of pairs) {
    const paddedKey = key.padEnd(maxKeyLen);
    lines.push(`${bold(paddedKey)}  ${value}`);
  }

  return lines.join('\n');
}

// ─── Ledger output ────────────────────────────────────────────────────────────

/** Two-space indented JSON, the layout of every JSON document the CLI prints. */
export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Render the `--value` view of a query: JSON pretty-printed, text as-is,
 * binary as base64, and an empty value as an empty line.
 */
export function formatDecodedValue(value: DecodedValue): string {
  switch (value.kind) {
    case 'empty':
      return '';
    case 'json':
      return formatJson(value.data);
    case 'text':
      return value.text;
    case 'base64':
      return value.base64;
  }
}

/** Created ids followed by the block height and hash, when the node reported them. */
export function formatReceipt(receipt: BroadcastReceipt, ids: [string, string][] = []): string {
  const pairs: [string, string][] = [...ids];
  if (receipt.height !== undefined) pairs.push(['height', receipt.height]);
  if (receipt.hash !== undefined) pairs.push(['hash', receipt.hash]);
  return keyValue(pairs);
}
