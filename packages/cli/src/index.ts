/**
 * @vowline/cli -- command-line client for the promise ledger.
 *
 * `run()` executes one invocation against in-memory output buffers and
 * returns the exit code, so the whole command surface is testable without
 * spawning a process. `bin.ts` connects it to the real streams.
 *
 * @packageDocumentation
 */

import { VowlineClient } from '@vowline/sdk';
import type { FetchFn } from '@vowline/rpc';
import {
  DecodeError,
  LogLevel,
  Logger,
  VOWLINE_VERSION,
  ValidationError,
  formatError,
  isVowlineError,
} from '@vowline/types';

import { resolveSettings } from './config';
import type { Settings } from './config';
import {
  bold,
  dim,
  formatDecodedValue,
  formatJson,
  formatReceipt,
  getColorsEnabled,
  header,
  red,
  setColorsEnabled,
  success,
  warning,
} from './format';

export { CONFIG_FILE_NAME, findConfigFile, loadConfig, parseConfig, resolveSettings } from './config';
export type { VowlineConfig, Settings, SettingOverrides } from './config';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Outcome of one CLI invocation. Streams hold exactly what would be written. */
export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Working directory for config lookup and relative key directories. */
  cwd?: string;
  /** Environment to read `VOWLINE_*` settings from. Defaults to `process.env`. */
  env?: Readonly<Record<string, string | undefined>>;
  /** Replaces `fetch` for every RPC call. */
  fetchFn?: FetchFn;
}

// ─── Argument parser ──────────────────────────────────────────────────────────

interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string | boolean>;
}

const BOOLEAN_FLAGS = new Set(['verbose', 'no-color', 'help', 'raw-json', 'value']);
const GLOBAL_FLAGS = ['rpc', 'key-dir', 'timeout', 'verbose', 'no-color', 'help'];

const COMMAND_FLAGS: Record<string, readonly string[]> = {
  send: ['name', 'beneficiary-name', 'text', 'due', 'beneficiary-id', 'parent-id', 'commitment-due'],
  get: ['path', 'list', 'data', 'height', 'raw-json', 'value'],
};

/**
 * Split arguments into a command, positionals and `--flag value` /
 * `--flag=value` pairs. Boolean flags never take a value.
 *
 * @throws {ValidationError} For an unknown flag or a missing flag value.
 */
function parseArgs(args: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (!arg.startsWith('--') || arg === '--') {
      if (command === '') {
        command = arg;
      } else {
        positional.push(arg);
      }
      continue;
    }

    const eq = arg.indexOf('=');
    const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const allowed = [...GLOBAL_FLAGS, ...(COMMAND_FLAGS[command] ?? [])];
    if (!allowed.includes(key)) {
      throw new ValidationError(`unknown flag: --${key}`, `--${key}`, undefined, {
        hint: "Run 'vowline help' for usage.",
      });
    }

    if (BOOLEAN_FLAGS.has(key)) {
      flags[key] = eq === -1 ? true : arg.slice(eq + 1) !== 'false';
    } else if (eq !== -1) {
      flags[key] = arg.slice(eq + 1);
    } else {
      const next = args[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ValidationError(`flag needs an argument: --${key}`, `--${key}`);
      }
      flags[key] = next;
      i += 1;
    }
  }

  return { command, positional, flags };
}

function getFlag(flags: Record<string, string | boolean>, key: string): string | undefined {
  const val = flags[key];
  if (val === undefined || typeof val === 'boolean') return undefined;
  return val;
}

// ─── Output ───────────────────────────────────────────────────────────────────

class Output {
  private readonly out: string[] = [];
  private readonly err: string[] = [];

  /** Write one line to stdout. */
  print(text: string): void {
    this.out.push(text + '\n');
  }

  /** Write one line to stderr. */
  printErr(text: string): void {
    this.err.push(text + '\n');
  }

  result(exitCode: number): RunResult {
    return { exitCode, stdout: this.out.join(''), stderr: this.err.join('') };
  }
}

interface Context {
  out: Output;
  settings: Settings;
  logger: Logger;
  fetchFn?: FetchFn;
}

function makeClient(ctx: Context): VowlineClient {
  return new VowlineClient({
    endpoint: ctx.settings.rpc,
    keyDir: ctx.settings.keyDir,
    timeoutMs: ctx.settings.timeoutMs,
    fetchFn: ctx.fetchFn,
    logger: ctx.logger,
  });
}

// ─── Command: send ────────────────────────────────────────────────────────────

/**
 * Submit one transaction. The mode is picked by the first non-empty of
 * `--name`, `--beneficiary-name`, else promise + commitment.
 */
async function cmdSend(parsed: ParsedArgs, ctx: Context): Promise<void> {
  const { flags } = parsed;
  const client = makeClient(ctx);

  const name = getFlag(flags, 'name');
  if (name) {
    const { id, receipt } = await client.registerCommiter(name);
    ctx.out.print(success('Commiter registered'));
    ctx.out.print(formatReceipt(receipt, [['id', id]]));
    return;
  }

  const beneficiaryName = getFlag(flags, 'beneficiary-name');
  if (beneficiaryName) {
    const { id, receipt } = await client.createBeneficiary(beneficiaryName);
    ctx.out.print(success(`Beneficiary created: ${id}`));
    ctx.out.print(formatReceipt(receipt, [['id', id]]));
    return;
  }

  const required = ['text', 'due', 'beneficiary-id', 'commitment-due'];
  const missing = required.filter((key) => !getFlag(flags, key)).map((key) => `--${key}`);
  if (missing.length > 0) {
    throw new ValidationError(
      `promise+commitment requires --text, --due, --beneficiary-id and --commitment-due; missing ${missing.join(', ')}`,
      missing[0] ?? '--text',
      undefined,
      { hint: 'Use --name to register an identity or --beneficiary-name to create a beneficiary.' },
    );
  }

  const result = await client.createPromiseWithCommitment({
    text: getFlag(flags, 'text') ?? '',
    due: getFlag(flags, 'due') ?? '',
    beneficiaryId: getFlag(flags, 'beneficiary-id') ?? '',
    parentPromiseId: getFlag(flags, 'parent-id'),
    commitmentDue: getFlag(flags, 'commitment-due') ?? '',
  });
  ctx.out.print(success('Promise+Commitment created atomically'));
  ctx.out.print(formatReceipt(result.receipt, [['promise', result.promiseId], ['commitment', result.commitmentId]]));
}

// ─── Command: get ─────────────────────────────────────────────────────────────

/**
 * Query the ledger. `--value` (the default) prints the decoded value,
 * `--raw-json` the whole reply.
 *
 * @returns The exit code.
 */
async function cmdGet(parsed: ParsedArgs, ctx: Context): Promise<number> {
  const { flags } = parsed;
  const client = makeClient(ctx);
  const request = {
    path: getFlag(flags, 'path'),
    alias: getFlag(flags, 'list'),
    data: getFlag(flags, 'data'),
    height: getFlag(flags, 'height'),
  };

  if (flags['raw-json'] === true) {
    ctx.out.print(formatJson(await client.getRaw(request)));
    return 0;
  }

  try {
    const view = await client.get(request);
    ctx.out.print(formatDecodedValue(view.value));
    return 0;
  } catch (e) {
    if (e instanceof DecodeError) {
      ctx.out.printErr(warning(e.message));
      ctx.out.print(e.value);
      return 1;
    }
    throw e;
  }
}

// ─── Command: help / version ──────────────────────────────────────────────────

function helpText(): string {
  const lines = [
    header('Vowline CLI - promise ledger client'),
    '',
    `${bold('Usage:')} vowline <command> [options]`,
    '',
    bold('Commands:'),
    '',
    '  send                          Sign and submit one transaction',
    '    --name <name>                 Register the local key as a commiter',
    '    --beneficiary-name <name>     Create a beneficiary',
    '    --text <text>                 Promise text',
    '    --due <date>                  Promise due date (YYYY-MM-DD or RFC 3339)',
    '    --beneficiary-id <id>         Beneficiary of the promise',
    '    --parent-id <id>              Optional parent promise',
    '    --commitment-due <date>       Due date of your commitment to the promise',
    '',
    '  get                           Query the ledger store',
    '    --path <path>                 ABCI path, e.g. /list/promise',
    '    --list <alias>                promise | commitment | commiter | beneficiary',
    '    --data <string>               Query argument (sent as base64)',
    '    --height <h>                  Block height',
    '    --value                       Print the decoded value (default)',
    '    --raw-json                    Print the whole reply',
    '',
    '  help                          Show this help message',
    '  version                       Show version information',
    '',
    bold('Global options:'),
    '',
    `  --rpc <url>                   JSON-RPC endpoint ${dim('(VOWLINE_RPC, default http://localhost:26657)')}`,
    `  --key-dir <dir>               Key directory ${dim('(VOWLINE_KEY_DIR, default ./config)')}`,
    `  --timeout <ms>                RPC timeout ${dim('(VOWLINE_TIMEOUT_MS, default 30000)')}`,
    '  --verbose                     Log debug details to stderr',
    '  --no-color                    Disable ANSI colors',
  ];
  return lines.join('\n');
}

// ─── Main entry point ─────────────────────────────────────────────────────────

/**
 * Execute one CLI invocation.
 *
 * ```ts
 * const r = await run(['get', '--list', 'promise', '--no-color']);
 * process.stdout.write(r.stdout);
 * ```
 */
export async function run(args: readonly string[], options: RunOptions = {}): Promise<RunResult> {
  const out = new Output();
  const previousColors = getColorsEnabled();
  setColorsEnabled(previousColors && !args.includes('--no-color'));

  try {
    const parsed = parseArgs(args);

    if (parsed.command === 'help' || parsed.flags['help'] === true) {
      out.print(helpText());
      return out.result(0);
    }
    if (parsed.command === 'version') {
      out.print(VOWLINE_VERSION);
      return out.result(0);
    }
    if (parsed.command === '') {
      out.printErr(helpText());
      return out.result(1);
    }
    if (parsed.command !== 'send' && parsed.command !== 'get') {
      throw new ValidationError(`unknown command: ${JSON.stringify(parsed.command)}`, 'command', undefined, {
        hint: "Run 'vowline help' for usage.",
      });
    }
    if (parsed.positional.length > 0) {
      throw new ValidationError(`unexpected argument: ${JSON.stringify(parsed.positional[0])}`, 'command');
    }

    const cwd = options.cwd ?? process.cwd();
    const settings = resolveSettings(
      { rpc: getFlag(parsed.flags, 'rpc'), keyDir: getFlag(parsed.flags, 'key-dir'), timeout: getFlag(parsed.flags, 'timeout') },
      options.env ?? process.env,
      cwd,
    );
    const logger = new Logger({
      level: parsed.flags['verbose'] === true ? LogLevel.DEBUG : LogLevel.WARN,
      component: 'cli',
      output: (entry) => out.printErr(JSON.stringify(entry)),
    });
    logger.debug('settings resolved', { ...settings });

    const ctx: Context = { out, settings, logger, fetchFn: options.fetchFn };
    if (parsed.command === 'send') {
      await cmdSend(parsed, ctx);
      return out.result(0);
    }
    return out.result(await cmdGet(parsed, ctx));
  } catch (err) {
    if (isVowlineError(err)) {
      out.printErr(`${red('Error:')} ${formatError(err)}`);
    } else {
      out.printErr(`${red('Error:')} ${err instanceof Error ? err.message : String(err)}`);
    }
    return out.result(1);
  } finally {
    setColorsEnabled(previousColors);
  }
}
