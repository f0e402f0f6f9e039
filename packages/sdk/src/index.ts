/**
 * @vowline/sdk -- high-level client for the promise ledger.
 *
 * {@link VowlineClient} ties the key store, envelope sealing and the RPC
 * clients together behind one operation per ledger action. Failures are
 * thrown as the classified `VowlineError` subclass of the layer that
 * produced them.
 *
 * @packageDocumentation
 */

import {
  buildBeneficiaryBody,
  buildCommiterBody,
  buildCommitmentBody,
  buildPromiseBody,
  parseDue,
  sealComposite,
  sealEnvelope,
} from '@vowline/core';
import type { SealedEnvelope } from '@vowline/core';
import { DEFAULT_KEY_DIR, FileKeyStore, deriveCommiterId } from '@vowline/keystore';
import { DEFAULT_RPC_ENDPOINT, QueryClient, SubmissionClient } from '@vowline/rpc';
import type { BroadcastReceipt, QueryRequest, QueryView, RpcClientOptions } from '@vowline/rpc';
import { silentLogger, validateNonEmpty } from '@vowline/types';
import type { Logger } from '@vowline/types';

import type {
  CreatePromiseOptions,
  DueInput,
  SubmissionKind,
  SubmittedEntity,
  SubmittedPromise,
  VowlineClientOptions,
} from './types';

// ─── Re-exports ─────────────────────────────────────────────────────────────

export type {
  VowlineClientOptions,
  DueInput,
  CreatePromiseOptions,
  SubmittedEntity,
  SubmittedPromise,
  SubmissionKind,
} from './types';

export type { BroadcastReceipt, QueryRequest, QueryView, DecodedValue } from '@vowline/rpc';

// ─── VowlineClient ──────────────────────────────────────────────────────────

/**
 * The main entry point for applications talking to the ledger.
 *
 * ```ts
 * const client = new VowlineClient({ endpoint: 'http://localhost:26657', keyDir: './config' });
 * const { id } = await client.registerCommiter('Alice');
 * const promises = await client.get({ alias: 'promise' });
 * ```
 */
export class VowlineClient {
  readonly keyStore: FileKeyStore;
  private readonly submission: SubmissionClient;
  private readonly queries: QueryClient;
  private readonly log: Logger;

  constructor(options: VowlineClientOptions = {}) {
    const logger = options.logger ?? silentLogger;
    const rpc: RpcClientOptions = {
      endpoint: options.endpoint ?? DEFAULT_RPC_ENDPOINT,
      timeoutMs: options.timeoutMs,
      retries: options.retries,
      retryDelayMs: options.retryDelayMs,
      fetchFn: options.fetchFn,
      logger,
      idFactory: options.idFactory,
    };
    this.keyStore = options.keyStore ?? new FileKeyStore({ dir: options.keyDir ?? DEFAULT_KEY_DIR, logger });
    this.submission = new SubmissionClient(rpc);
    this.queries = new QueryClient(rpc);
    this.log = logger.child('sdk');
  }

  /** The normalized RPC endpoint. */
  get endpoint(): string {
    return this.submission.endpoint;
  }

  // ── Transactions ──────────────────────────────────────────────────────

  /**
   * Register the local signing key as a committer identity.
   *
   * The key is generated and persisted on first use. The returned id is
   * `commiter:` followed by the base64 public key, so repeated calls
   * report the same identity.
   */
  async registerCommiter(name: string): Promise<SubmittedEntity> {
    validateNonEmpty(name, 'name');
    const keys = await this.keyStore.ensureKeypair();
    const body = buildCommiterBody({ name, publicKey: keys.publicKey });
    const receipt = await this.submit('commiter', [body.id], await sealEnvelope(body, keys.privateKey));
    return { id: body.id, receipt };
  }

  /** Record a new beneficiary under a fresh `beneficiary:<uuid>` id. */
  async createBeneficiary(name: string): Promise<SubmittedEntity> {
    const body = buildBeneficiaryBody({ name });
    const keys = await this.keyStore.ensureKeypair();
    const receipt = await this.submit('beneficiary', [body.id], await sealEnvelope(body, keys.privateKey));
    return { id: body.id, receipt };
  }

  /**
   * Create a promise and the caller's commitment to it in one composite
   * transaction.
   *
   * Every argument is checked before the key is touched, so a bad date
   * never generates a key on a fresh machine.
   */
  async createPromiseWithCommitment(options: CreatePromiseOptions): Promise<SubmittedPromise> {
    const promise = buildPromiseBody({
      text: options.text,
      due: resolveDue(options.due, 'due'),
      beneficiaryId: options.beneficiaryId,
      parentPromiseId: options.parentPromiseId,
    });
    const commitmentDue = resolveDue(options.commitmentDue, 'commitment_due');

    const keys = await this.keyStore.ensureKeypair();
    const commitment = buildCommitmentBody({
      promiseId: promise.id,
      commiterId: deriveCommiterId(keys.publicKey),
      due: commitmentDue,
    });
    const envelope = await sealComposite({ promise, commitment }, keys.privateKey);
    const receipt = await this.submit('composite', [promise.id, commitment.id], envelope);
    return { promiseId: promise.id, commitmentId: commitment.id, receipt };
  }

  // ── Queries ───────────────────────────────────────────────────────────

  /** Read one path of the ledger's key/value store. */
  async get(request: QueryRequest): Promise<QueryView> {
    const result = await this.queries.query(request);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  /** The whole parsed `abci_query` reply, with `response.value` left encoded. */
  async getRaw(request: QueryRequest): Promise<unknown> {
    const result = await this.queries.queryRaw(request);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private async submit(kind: SubmissionKind, ids: readonly string[], envelope: SealedEnvelope): Promise<BroadcastReceipt> {
    this.log.debug('submitting transaction', { kind, ids, bytes: envelope.bytes.length });
    const result = await this.submission.submit(envelope.bytes);
    if (!result.ok) {
      this.log.debug('submission failed', { kind, ids, code: result.error.code });
      throw result.error;
    }
    this.log.debug('transaction committed', { kind, ids, requestId: result.value.requestId, height: result.value.height });
    return result.value;
  }
}

/** Accept Unix seconds as-is and parse anything else as a date string. */
function resolveDue(input: DueInput, field: string): number {
  return typeof input === 'number' ? input : parseDue(input, field);
}
