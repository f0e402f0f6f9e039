/**
 * @vowline/cli configuration file support.
 *
 * Reads `vowline.config.json` from the working directory or the nearest
 * parent that has one, and merges it with environment variables and
 * command-line flags.
 *
 * Precedence, highest first: flags, environment, file, built-in defaults.
 *
 * @packageDocumentation
 */

import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';

import { DEFAULT_KEY_DIR } from '@vowline/keystore';
import { DEFAULT_RPC_ENDPOINT, DEFAULT_TIMEOUT_MS } from '@vowline/rpc';
import { ValidationError, isPlainObject, sanitizeJsonInput } from '@vowline/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Shape of a `vowline.config.json` configuration file. */
export interface VowlineConfig {
  /** JSON-RPC endpoint of the ledger node. */
  rpc?: string;
  /** Key directory, relative to the config file's directory. */
  keyDir?: string;
  /** Upper bound for one RPC call in milliseconds. */
  timeoutMs?: number;
}

/** Name of the configuration file. */
export const CONFIG_FILE_NAME = 'vowline.config.json';

/** Environment variables read by {@link resolveSettings}. */
export const ENV_RPC = 'VOWLINE_RPC';
export const ENV_KEY_DIR = 'VOWLINE_KEY_DIR';
export const ENV_TIMEOUT_MS = 'VOWLINE_TIMEOUT_MS';

/** Effective settings of one CLI run. */
export interface Settings {
  rpc: string;
  /** Absolute key directory. */
  keyDir: string;
  timeoutMs: number;
  /** The config file that contributed, if any. */
  configPath?: string;
}

/** Values given on the command line; absent ones fall through. */
export interface SettingOverrides {
  rpc?: string;
  keyDir?: string;
  timeout?: string;
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Search for a `vowline.config.json` starting from `cwd` and walking up to
 * the filesystem root. Returns the absolute path if found, or `undefined`.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');

  // eslint-disable-next-line no-constant-condition
  while (true) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = resolve(dir, '..');
    if (parent === dir) break; // reached filesystem root
    dir = parent;
  }

  return undefined;
}

/**
 * Parse the text of a config file.
 *
 * @throws {ValidationError} When the text is not a JSON object, a field has
 *   the wrong type, or an unknown field is present.
 */
export function parseConfig(text: string, source = CONFIG_FILE_NAME): VowlineConfig {
  let parsed: unknown;
  try {
    parsed = sanitizeJsonInput(text);
  } catch (e) {
    throw new ValidationError(
      `${source}: ${e instanceof Error ? e.message : String(e)}`,
      'config',
      undefined,
      { cause: e },
    );
  }
  if (!isPlainObject(parsed)) {
    throw new ValidationError(`${source}: expected a JSON object`, 'config');
  }

  const config: VowlineConfig = {};
  for (const [key, value] of Object.entries(parsed)) {
    switch (key) {
      case 'rpc':
      case 'keyDir':
        if (typeof value !== 'string' || value === '') {
          throw new ValidationError(`${source}: "${key}" must be a non-empty string`, key);
        }
        config[key] = value;
        break;
      case 'timeoutMs':
        if (typeof value !== 'number' || !Number.isSafeInteger(value) || value <= 0) {
          throw new ValidationError(`${source}: "timeoutMs" must be a positive integer`, key);
        }
        config.timeoutMs = value;
        break;
      default:
        throw new ValidationError(`${source}: unknown field "${key}"`, key, undefined, {
          hint: 'Known fields: rpc, keyDir, timeoutMs',
        });
    }
  }
  return config;
}

/**
 * Load the nearest `vowline.config.json` above `cwd`.
 * Returns `undefined` if no config file is found.
 */
export function loadConfig(cwd?: string): { path: string; config: VowlineConfig } | undefined {
  const filePath = findConfigFile(cwd);
  if (!filePath) return undefined;
  return { path: filePath, config: parseConfig(readFileSync(filePath, 'utf-8'), filePath) };
}

/**
 * Merge flags, environment, config file and defaults into the settings of
 * one run. Relative key directories resolve against `cwd`, except the
 * file's own `keyDir`, which resolves against the file's directory.
 *
 * @throws {ValidationError} For a malformed config file or a timeout that
 *   is not a positive integer.
 */
export function resolveSettings(
  overrides: SettingOverrides,
  env: Readonly<Record<string, string | undefined>>,
  cwd: string,
): Settings {
  const file = loadConfig(cwd);
  const fileConfig = file?.config ?? {};
  const fileDir = file ? resolve(file.path, '..') : cwd;

  const rpc = nonEmpty(overrides.rpc) ?? nonEmpty(env[ENV_RPC]) ?? fileConfig.rpc ?? DEFAULT_RPC_ENDPOINT;

  const keyDirFlag = nonEmpty(overrides.keyDir) ?? nonEmpty(env[ENV_KEY_DIR]);
  const keyDir = keyDirFlag !== undefined
    ? resolve(cwd, keyDirFlag)
    : fileConfig.keyDir !== undefined
      ? resolve(fileDir, fileConfig.keyDir)
      : resolve(cwd, DEFAULT_KEY_DIR);

  const timeoutFlag = nonEmpty(overrides.timeout);
  const timeoutEnv = nonEmpty(env[ENV_TIMEOUT_MS]);
  const timeoutMs = timeoutFlag !== undefined
    ? parseTimeout(timeoutFlag, '--timeout')
    : timeoutEnv !== undefined
      ? parseTimeout(timeoutEnv, ENV_TIMEOUT_MS)
      : fileConfig.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return { rpc, keyDir, timeoutMs, ...(file ? { configPath: file.path } : {}) };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

function parseTimeout(value: string, source: string): number {
  if (!/^\d+$/.test(value) || Number(value) <= 0 || !Number.isSafeInteger(Number(value))) {
    throw new ValidationError(`${source} must be a positive number of milliseconds, got ${JSON.stringify(value)}`, source);
  }
  return Number(value);
}
