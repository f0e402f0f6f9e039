/**
 * Bounded retry for transport calls.
 *
 * The ledger client retries only when a request never produced a
 * response; classification of whatever response eventually arrives is
 * unaffected by how many attempts it took.
 *
 * @packageDocumentation
 */

/** Configuration for the {@link withRetry} helper. */
export interface RetryOptions {
  /** Maximum number of retry attempts after the first call (default: 1). */
  maxRetries?: number;
  /** Delay in milliseconds before the first retry (default: 100). */
  baseDelayMs?: number;
  /** Upper bound on delay in milliseconds (default: 2000). */
  maxDelayMs?: number;
  /** Multiplier applied to the delay after each retry (default: 2). */
  backoffMultiplier?: number;
  /** Only retry when this predicate returns true. Retries everything when omitted. */
  retryOn?: (error: Error) => boolean;
  /** Called before each retry with the failed attempt number (1-based) and its error. */
  onRetry?: (attempt: number, error: Error) => void;
}

/**
 * Execute an async function with exponential-backoff retries.
 *
 * ```ts
 * const response = await withRetry(() => fetchFn(url, init), {
 *   maxRetries: 1,
 *   retryOn: (e) => e instanceof TransportError && e.network,
 * });
 * ```
 *
 * @throws The last error encountered, or the first one `retryOn` rejects.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const maxRetries = options?.maxRetries ?? 1;
  const baseDelayMs = options?.baseDelayMs ?? 100;
  const maxDelayMs = options?.maxDelayMs ?? 2000;
  const backoffMultiplier = options?.backoffMultiplier ?? 2;
  const retryOn = options?.retryOn;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));

      if (retryOn && !retryOn(failure)) {
        throw failure;
      }
      if (attempt >= maxRetries) {
        throw failure;
      }

      options?.onRetry?.(attempt + 1, failure);
      const delay = Math.min(
        baseDelayMs * Math.pow(backoffMultiplier, attempt),
        maxDelayMs,
      );
      await sleep(delay);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
