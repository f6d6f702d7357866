/**
 * Retry with exponential backoff + jitter.
 *
 * Used by the poll loop to get a chat session back after a transport
 * failure without hammering the service.
 */

export interface RetryOptions {
  /** Max number of attempts (default: 3) */
  attempts?: number;
  /** Initial delay in ms (default: 500) */
  minDelayMs?: number;
  /** Max delay cap in ms (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor 0–1 (default: 0.1 = ±10%) */
  jitter?: number;
  /** Return true to retry this error, false to bail immediately (default: not an auth error) */
  shouldRetry?: (error: Error) => boolean;
  /** Called before each retry sleep */
  onRetry?: (info: RetryInfo) => void;
  /** Sleep implementation (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
  /** Source of randomness in [0, 1) for jitter (default: Math.random) */
  random?: () => number;
}

export interface RetryInfo {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: Error;
}

const DEFAULTS = {
  attempts: 3,
  minDelayMs: 500,
  maxDelayMs: 30_000,
  jitter: 0.1,
} as const;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Compute the delay before retry number `attempt` (1-based).
 *
 *   base   = minDelayMs * 2^(attempt-1)
 *   capped = min(base, maxDelayMs)
 *   final  = capped + capped * jitter * (random ∈ [-1,1])
 */
export function backoffDelay(
  attempt: number,
  options: { minDelayMs: number; maxDelayMs: number; jitter: number; random?: () => number },
): number {
  const random = options.random ?? Math.random;
  let delayMs = Math.min(options.minDelayMs * Math.pow(2, attempt - 1), options.maxDelayMs);

  if (options.jitter > 0) {
    const offset = delayMs * options.jitter * (random() * 2 - 1);
    delayMs = Math.max(0, Math.round(delayMs + offset));
  }

  return delayMs;
}

/**
 * Execute `fn`, retrying failures with exponential backoff + jitter.
 * Rethrows the last error once attempts run out or `shouldRetry` says no.
 */
export async function retryAsync<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    attempts = DEFAULTS.attempts,
    minDelayMs = DEFAULTS.minDelayMs,
    maxDelayMs = DEFAULTS.maxDelayMs,
    jitter = DEFAULTS.jitter,
    shouldRetry = (error: Error) => !isAuthError(error),
    onRetry,
    sleep: wait = sleep,
    random,
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= attempts) break;
      if (!shouldRetry(lastError)) break;

      const delayMs = backoffDelay(attempt, { minDelayMs, maxDelayMs, jitter, random });

      onRetry?.({ attempt, maxAttempts: attempts, delayMs, error: lastError });

      await wait(delayMs);
    }
  }

  throw lastError ?? new Error("retryAsync: unknown failure");
}

// ── Helpers ─────────────────────────────────────────────────────────

/**
 * Auth failures will fail the same way on every attempt.
 */
export function isAuthError(error: Error): boolean {
  const msg = error.message.toLowerCase();
  return (
    msg.includes("invalid token") ||
    msg.includes("token_invalid") ||
    msg.includes("disallowed intents") ||
    msg.includes("unauthorized") ||
    msg.includes("401") ||
    msg.includes("403")
  );
}
