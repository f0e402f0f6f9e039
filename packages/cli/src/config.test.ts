import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { ValidationError } from '@vowline/types';

import { CONFIG_FILE_NAME, findConfigFile, loadConfig, parseConfig, resolveSettings } from './config';

let tmp: string;

beforeEach(() => {
  tmp = mkdtempSync(join(tmpdir(), 'vowline-config-test-'));
});

afterEach(() => {
  rmSync(tmp, { recursive: true, force: true });
});

function writeConfig(dir: string, config: unknown): string {
  const file = join(dir, CONFIG_FILE_NAME);
  writeFileSync(file, JSON.stringify(config));
  return file;
}

describe('findConfigFile', () => {
  it('finds the file in the starting directory', () => {
    const file = writeConfig(tmp, {});
    expect(findConfigFile(tmp)).toBe(file);
  });

  it('walks up to a parent directory', () => {
    const file = writeConfig(tmp, {});
    const nested = join(tmp, 'x', 'y');
    mkdirSync(nested, { recursive: true });
    expect(findConfigFile(nested)).toBe(file);
  });

  it('prefers the nearest file', () => {
    writeConfig(tmp, {});
    const nested = join(tmp, 'x');
    mkdirSync(nested);
    const nearest = writeConfig(nested, {});
    expect(findConfigFile(nested)).toBe(nearest);
  });
});

describe('parseConfig', () => {
  it('reads every known field', () => {
    expect(parseConfig('{"rpc":"http://n:1","keyDir":"keys","timeoutMs":500}')).toEqual({
      rpc: 'http://n:1',
      keyDir: 'keys',
      timeoutMs: 500,
    });
  });

  it.each([
    ['not JSON', 'nope'],
    ['an array', '[]'],
    ['an empty rpc', '{"rpc":""}'],
    ['a string timeout', '{"timeoutMs":"500"}'],
    ['a zero timeout', '{"timeoutMs":0}'],
    ['an unknown field', '{"endpoint":"http://n"}'],
    ['a prototype key', '{"__proto__":{}}'],
  ])('rejects %s', (_label, text) => {
    expect(() => parseConfig(text)).toThrow(ValidationError);
  });

  it('names the source in the message', () => {
    expect(() => parseConfig('{"port":1}', '/etc/vowline.config.json')).toThrow(
      '/etc/vowline.config.json: unknown field "port"',
    );
  });
});

describe('loadConfig', () => {
  it('returns undefined when no file exists', () => {
    // Start from a directory that cannot contain a config file of ours.
    const isolated = join(tmp, 'empty');
    mkdirSync(isolated);
    const found = loadConfig(isolated);
    expect(found === undefined || !found.path.startsWith(tmp)).toBe(true);
  });

  it('returns the path and the parsed content', () => {
    const file = writeConfig(tmp, { rpc: 'http://n:1' });
    expect(loadConfig(tmp)).toEqual({ path: file, config: { rpc: 'http://n:1' } });
  });
});

describe('resolveSettings', () => {
  it('applies built-in defaults', () => {
    const settings = resolveSettings({}, {}, tmp);
    expect(settings.rpc).toBe('http://localhost:26657');
    expect(settings.keyDir).toBe(join(tmp, 'config'));
    expect(settings.timeoutMs).toBe(30_000);
  });

  it('takes values from the file', () => {
    const file = writeConfig(tmp, { rpc: 'http://file:1', keyDir: 'file-keys', timeoutMs: 100 });
    const nested = join(tmp, 'sub');
    mkdirSync(nested);

    expect(resolveSettings({}, {}, nested)).toEqual({
      rpc: 'http://file:1',
      keyDir: join(tmp, 'file-keys'),
      timeoutMs: 100,
      configPath: file,
    });
  });

  it('lets the environment override the file', () => {
    writeConfig(tmp, { rpc: 'http://file:1', keyDir: 'file-keys', timeoutMs: 100 });
    const settings = resolveSettings(
      {},
      { VOWLINE_RPC: 'http://env:2', VOWLINE_KEY_DIR: 'env-keys', VOWLINE_TIMEOUT_MS: '200' },
      tmp,
    );
    expect(settings.rpc).toBe('http://env:2');
    expect(settings.keyDir).toBe(join(tmp, 'env-keys'));
    expect(settings.timeoutMs).toBe(200);
  });

  it('lets flags override the environment', () => {
    const settings = resolveSettings(
      { rpc: 'http://flag:3', keyDir: '/abs/keys', timeout: '300' },
      { VOWLINE_RPC: 'http://env:2', VOWLINE_KEY_DIR: 'env-keys', VOWLINE_TIMEOUT_MS: '200' },
      tmp,
    );
    expect(settings.rpc).toBe('http://flag:3');
    expect(settings.keyDir).toBe('/abs/keys');
    expect(settings.timeoutMs).toBe(300);
  });

  it('ignores empty values', () => {
    expect(resolveSettings({ rpc: '' }, { VOWLINE_RPC: '' }, tmp).rpc).toBe('http://localhost:26657');
  });

  it('rejects a bad timeout from the environment', () => {
    expect(() => resolveSettings({}, { VOWLINE_TIMEOUT_MS: '-5' }, tmp)).toThrow(
      'VOWLINE_TIMEOUT_MS must be a positive number of milliseconds, got "-5"',
    );
  });
});
