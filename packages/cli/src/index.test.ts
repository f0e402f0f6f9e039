import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, existsSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { openEnvelope } from '@vowline/core';
import { base64Decode } from '@vowline/crypto';
import type { FetchFn } from '@vowline/rpc';
import { isPlainObject } from '@vowline/types';

import { run } from './index';
import { setColorsEnabled } from './format';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function hasAnsi(s: string): boolean {
  // eslint-disable-next-line no-control-regex
  return /\x1b\[/.test(s);
}

/** A node stand-in that answers every request with `reply` and records what it was sent. */
function fakeNode(reply: unknown, status = 200) {
  const urls: string[] = [];
  const bodies: string[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    urls.push(url);
    if (typeof init?.body === 'string') bodies.push(init.body);
    return new Response(JSON.stringify(reply), { status });
  };
  return { fetchFn, urls, bodies };
}

function committed(checkTx = { code: 0, log: '' }) {
  return { jsonrpc: '2.0', id: '1', result: { check_tx: checkTx, deliver_tx: { code: 0, log: '' }, hash: 'AB12', height: '3' } };
}

function queryReply(value: string) {
  return { jsonrpc: '2.0', id: '1', result: { response: { code: 0, log: '', value, height: '5' } } };
}

function postedBody(frameText: string | undefined): unknown {
  const frame: unknown = JSON.parse(frameText ?? '');
  const params = isPlainObject(frame) ? frame['params'] : undefined;
  const tx = isPlainObject(params) ? params['tx'] : undefined;
  if (typeof tx !== 'string') throw new Error('frame carries no tx');
  return openEnvelope(base64Decode(tx)).body;
}

let tmp: string;

beforeEach(() => {
  tmp = mkdtempSync(join(tmpdir(), 'vowline-cli-test-'));
});

afterEach(() => {
  rmSync(tmp, { recursive: true, force: true });
  setColorsEnabled(true);
});

/** Run with colors off, inside the temp directory, with an empty environment. */
function cli(args: string[], fetchFn?: FetchFn, env: Record<string, string> = {}) {
  return run([...args, '--no-color'], { cwd: tmp, env, fetchFn });
}

// ===========================================================================
// help / version / usage errors
// ===========================================================================

describe('vowline help', () => {
  it('prints usage with "help"', async () => {
    const r = await cli(['help']);
    expect(r.exitCode).toBe(0);
    expect(r.stdout).toContain('Vowline CLI');
    expect(r.stdout).toContain('  send ');
    expect(r.stdout).toContain('  get ');
    expect(r.stdout).toContain('--commitment-due <date>');
    expect(r.stderr).toBe('');
  });

  it('prints usage with --help after a command', async () => {
    const r = await cli(['send', '--help']);
    expect(r.exitCode).toBe(0);
    expect(r.stdout).toContain('Usage: vowline <command> [options]');
  });

  it('prints usage to stderr and fails without a command', async () => {
    const r = await cli([]);
    expect(r.exitCode).toBe(1);
    expect(r.stdout).toBe('');
    expect(r.stderr).toContain('Usage: vowline <command> [options]');
  });

  it('uses ANSI codes unless --no-color is set', async () => {
    expect(hasAnsi((await run(['help'])).stdout)).toBe(true);
    expect(hasAnsi((await run(['help', '--no-color'])).stdout)).toBe(false);
  });

  it('restores the color setting after a run', async () => {
    await run(['help', '--no-color']);
    expect(hasAnsi((await run(['help'])).stdout)).toBe(true);
  });
});

describe('vowline version', () => {
  it('prints the version', async () => {
    const r = await cli(['version']);
    expect(r).toEqual({ exitCode: 0, stdout: '0.1.0\n', stderr: '' });
  });
});

describe('usage errors', () => {
  it('rejects an unknown command', async () => {
    const r = await cli(['frobnicate']);
    expect(r.exitCode).toBe(1);
    expect(r.stderr).toBe('Error: [VOWLINE_E300] unknown command: "frobnicate"\nHint: Run \'vowline help\' for usage.\n');
  });

  it('rejects a flag that belongs to another command', async () => {
    const r = await cli(['get', '--name', 'Alice']);
    expect(r.exitCode).toBe(1);
    expect(r.stderr).toContain('Error: [VOWLINE_E300] unknown flag: --name\n');
  });

  it('rejects a flag without its value', async () => {
    const r = await cli(['send', '--name']);
    expect(r.exitCode).toBe(1);
    expect(r.stderr).toBe('Error: [VOWLINE_E300] flag needs an argument: --name\n');
  });

  it('rejects stray positional arguments', async () => {
    const r = await cli(['get', 'promise']);
    expect(r.stderr).toBe('Error: [VOWLINE_E300] unexpected argument: "promise"\n');
  });
});

// ===========================================================================
// send
// ===========================================================================

describe('vowline send', () => {
  it('registers a commiter and creates the key on first use', async () => {
    const node = fakeNode(committed());
    const r = await cli(['send', '--name', 'Alice'], node.fetchFn);

    expect(r.exitCode).toBe(0);
    expect(r.stdout).toMatch(/^\[OK\] Commiter registered\nid {6}commiter:[A-Za-z0-9+/]{43}=\nheight {2}3\nhash {4}AB12\n$/);
    expect(r.stderr).toBe('');
    expect(existsSync(join(tmp, 'config', 'ed25519.key'))).toBe(true);
    expect(node.urls).toEqual(['http://localhost:26657']);
  });

  it('signs the commiter body with the registered name', async () => {
    const node = fakeNode(committed());
    await cli(['send', '--name', 'Alice'], node.fetchFn);
    expect(postedBody(node.bodies[0])).toMatchObject({ type: 'commiter', name: 'Alice' });
  });

  it('creates a beneficiary', async () => {
    const node = fakeNode(committed());
    const r = await cli(['send', '--beneficiary-name=Bob'], node.fetchFn);
    expect(r.exitCode).toBe(0);
    expect(r.stdout).toMatch(/^\[OK\] Beneficiary created: beneficiary:[0-9a-f-]{36}\n/);
    expect(postedBody(node.bodies[0])).toMatchObject({ type: 'beneficiary', name: 'Bob' });
  });

  it('prefers --name over every other mode', async () => {
    const node = fakeNode(committed());
    const r = await cli(['send', '--beneficiary-name', 'Bob', '--name', 'Alice'], node.fetchFn);
    expect(r.stdout).toContain('[OK] Commiter registered');
  });

  it('creates a promise and commitment in one transaction', async () => {
    const node = fakeNode(committed());
    const r = await cli(
      [
        'send',
        '--text', 'Ship the release',
        '--due', '2030-01-01',
        '--beneficiary-id', 'beneficiary:b1',
        '--parent-id', 'promise:root',
        '--commitment-due', '2030-01-01',
      ],
      node.fetchFn,
    );

    expect(r.exitCode).toBe(0);
    expect(r.stdout).toMatch(/^\[OK\] Promise\+Commitment created atomically\npromise {5}promise:/);
    expect(node.bodies).toHaveLength(1);
    expect(postedBody(node.bodies[0])).toMatchObject({
      promise: { text: 'Ship the release', due: 1893456000, beneficiary_id: 'beneficiary:b1', parent_promise_id: 'promise:root' },
      commitment: { due: 1893456000 },
    });
  });

  it('names the missing promise arguments and sends nothing', async () => {
    const node = fakeNode(committed());
    const r = await cli(['send', '--text', 'Ship'], node.fetchFn);
    expect(r.exitCode).toBe(1);
    expect(r.stderr).toContain('missing --due, --beneficiary-id, --commitment-due\n');
    expect(node.urls).toHaveLength(0);
  });

  it('reports a bad date without creating a key', async () => {
    const node = fakeNode(committed());
    const r = await cli(
      ['send', '--text', 'T', '--due', 'tomorrow', '--beneficiary-id', 'b', '--commitment-due', '2030-01-01'],
      node.fetchFn,
    );
    expect(r.exitCode).toBe(1);
    expect(r.stderr).toBe('Error: [VOWLINE_E301] due: cannot parse time: "tomorrow" (use YYYY-MM-DD or RFC 3339)\n');
    expect(existsSync(join(tmp, 'config'))).toBe(false);
  });

  it('reports a pre-validation rejection', async () => {
    const node = fakeNode(committed({ code: 5, log: 'bad signature' }));
    const r = await cli(['send', '--name', 'Alice'], node.fetchFn);
    expect(r).toEqual({ exitCode: 1, stdout: '', stderr: 'Error: [VOWLINE_E500] CheckTx failed: bad signature\n' });
  });

  it('reports an unreachable node', async () => {
    const fetchFn: FetchFn = async () => {
      throw new TypeError('fetch failed');
    };
    const r = await cli(['send', '--name', 'Alice'], fetchFn);
    expect(r.exitCode).toBe(1);
    const lines = r.stderr.trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ level: 'WARN', message: 'network failure, retrying', attempt: 1 });
    expect(lines[1]).toBe('Error: [VOWLINE_E400] cannot reach http://localhost:26657: fetch failed');
  });

  it('writes the key into --key-dir', async () => {
    const node = fakeNode(committed());
    await cli(['send', '--name', 'Alice', '--key-dir', 'keys'], node.fetchFn);
    expect(existsSync(join(tmp, 'keys', 'ed25519.pub'))).toBe(true);
  });
});

// ===========================================================================
// get
// ===========================================================================

describe('vowline get', () => {
  it('prints a JSON value pretty-printed', async () => {
    const node = fakeNode(queryReply('W3siaWQiOiJwcm9taXNlOnAxIiwidGV4dCI6IlNoaXAifV0='));
    const r = await cli(['get', '--list', 'promise'], node.fetchFn);

    expect(r.exitCode).toBe(0);
    expect(r.stdout).toBe('[\n  {\n    "id": "promise:p1",\n    "text": "Ship"\n  }\n]\n');
    expect(node.urls).toEqual(['http://localhost:26657/abci_query?path=%22%2Flist%2Fpromise%22']);
  });

  it('prints text as it is', async () => {
    const r = await cli(['get', '--path', '/note', '--value'], fakeNode(queryReply('cGxhaW4gdGV4dCB2YWx1ZQ==')).fetchFn);
    expect(r.stdout).toBe('plain text value\n');
  });

  it('prints binary values as base64', async () => {
    const r = await cli(['get', '--path', '/blob'], fakeNode(queryReply('aABp')).fetchFn);
    expect(r.stdout).toBe('aABp\n');
  });

  it('prints an empty line for an empty value', async () => {
    const r = await cli(['get', '--path', '/none'], fakeNode(queryReply('')).fetchFn);
    expect(r).toEqual({ exitCode: 0, stdout: '\n', stderr: '' });
  });

  it('prints the whole reply with --raw-json', async () => {
    const reply = queryReply('%%%');
    const r = await cli(['get', '--path', '/p', '--raw-json'], fakeNode(reply).fetchFn);
    expect(r.exitCode).toBe(0);
    expect(r.stdout).toBe(JSON.stringify(reply, null, 2) + '\n');
  });

  it('warns and prints the raw value when it is not base64', async () => {
    const r = await cli(['get', '--path', '/p'], fakeNode(queryReply('%%%')).fetchFn);
    expect(r).toEqual({
      exitCode: 1,
      stdout: '%%%\n',
      stderr: '[WARN] cannot base64-decode value: illegal base64 data\n',
    });
  });

  it('sends --data and --height', async () => {
    const node = fakeNode(queryReply(''));
    await cli(['get', '--path', '/store', '--data', 'key 1', '--height', '5'], node.fetchFn);
    expect(node.urls[0]).toBe('http://localhost:26657/abci_query?data=a2V5IDE%3D&height=5&path=%22%2Fstore%22');
  });

  it('rejects an unknown alias without a request', async () => {
    const node = fakeNode(queryReply(''));
    const r = await cli(['get', '--list', 'widgets'], node.fetchFn);
    expect(r.exitCode).toBe(1);
    expect(r.stderr).toBe(
      'Error: [VOWLINE_E302] unknown alias for --list: "widgets"\nHint: Use one of: promise, commitment, commiter, beneficiary\n',
    );
    expect(node.urls).toHaveLength(0);
  });

  it('requires --path or --list', async () => {
    const r = await cli(['get'], fakeNode(queryReply('')).fetchFn);
    expect(r.stderr).toBe('Error: [VOWLINE_E300] either a path or an alias is required\n');
  });
});

// ===========================================================================
// settings
// ===========================================================================

describe('settings', () => {
  it('reads the endpoint from a config file in a parent directory', async () => {
    writeFileSync(join(tmp, 'vowline.config.json'), JSON.stringify({ rpc: 'http://file.test:1' }));
    const nested = join(tmp, 'a', 'b');
    mkdirSync(nested, { recursive: true });
    const node = fakeNode(queryReply(''));

    await run(['get', '--path', '/p', '--no-color'], { cwd: nested, env: {}, fetchFn: node.fetchFn });
    expect(node.urls[0]).toMatch(/^http:\/\/file\.test:1\/abci_query/);
  });

  it('lets the environment override the file and --rpc override both', async () => {
    writeFileSync(join(tmp, 'vowline.config.json'), JSON.stringify({ rpc: 'http://file.test:1' }));
    const node = fakeNode(queryReply(''));

    await cli(['get', '--path', '/p'], node.fetchFn, { VOWLINE_RPC: 'http://env.test:2' });
    await cli(['get', '--path', '/p', '--rpc', 'http://flag.test:3'], node.fetchFn, { VOWLINE_RPC: 'http://env.test:2' });

    expect(node.urls[0]).toMatch(/^http:\/\/env\.test:2\//);
    expect(node.urls[1]).toMatch(/^http:\/\/flag\.test:3\//);
  });

  it('rejects a timeout that is not a number', async () => {
    const r = await cli(['get', '--path', '/p', '--timeout', 'soon']);
    expect(r.stderr).toBe('Error: [VOWLINE_E300] --timeout must be a positive number of milliseconds, got "soon"\n');
  });

  it('reports a malformed config file', async () => {
    writeFileSync(join(tmp, 'vowline.config.json'), JSON.stringify({ endpoint: 'x' }));
    const r = await cli(['get', '--path', '/p']);
    expect(r.exitCode).toBe(1);
    expect(r.stderr).toContain('unknown field "endpoint"');
  });

  it('logs debug entries to stderr with --verbose', async () => {
    const r = await cli(['get', '--path', '/p', '--verbose'], fakeNode(queryReply('')).fetchFn);
    const entries: unknown[] = r.stderr.trim().split('\n').map((line) => JSON.parse(line));
    expect(entries).toContainEqual(expect.objectContaining({ level: 'DEBUG', component: 'cli', message: 'settings resolved' }));
    expect(entries).toContainEqual(expect.objectContaining({ component: 'cli.rpc.query', message: 'received reply' }));
  });
});
