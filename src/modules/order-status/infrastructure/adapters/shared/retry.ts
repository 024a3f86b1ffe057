export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxAttempts: number;
  /** Wait after failed attempt `i` (0-based) is `2^i * backoffUnitMs`. */
  backoffUnitMs: number;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; reason: 'exhausted' | 'aborted'; attempts: number; lastError?: unknown };

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ExecuteWithRetryOptions {
  policy: RetryPolicy;
  /** Errors for which this returns false are rethrown immediately. */
  isRetryable: (error: unknown) => boolean;
  signal?: AbortSignal;
  sleep?: Sleep;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/** Whole attempts, at least one; a non-finite bound means a single attempt. */
export function resolveMaxAttempts(maxAttempts: number): number {
  return Number.isFinite(maxAttempts) ? Math.max(1, Math.floor(maxAttempts)) : 1;
}

export function computeBackoffMs(unitMs: number, attempt: number): number {
  return Math.max(0, unitMs * 2 ** Math.max(0, attempt));
}

/**
 * Resolves after `ms`, or early once `signal` aborts. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `operation` until it resolves, the policy's attempts run out, or
 * `signal` aborts. Pure exponential backoff without jitter between attempts.
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: ExecuteWithRetryOptions,
): Promise<RetryOutcome<T>> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = resolveMaxAttempts(options.policy.maxAttempts);
  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    if (options.signal?.aborted) {
      return { ok: false, reason: 'aborted', attempts: attempt, lastError };
    }

    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt + 1 };
    } catch (error: unknown) {
      if (!options.isRetryable(error)) {
        throw error;
      }
      lastError = error;
    }

    if (attempt === maxAttempts - 1) {
      break;
    }

    const delayMs = computeBackoffMs(options.policy.backoffUnitMs, attempt);
    options.onRetry?.({ attempt: attempt + 1, delayMs, error: lastError });
    await wait(delayMs, options.signal);
  }

  if (options.signal?.aborted) {
    return { ok: false, reason: 'aborted', attempts: maxAttempts, lastError };
  }

  return { ok: false, reason: 'exhausted', attempts: maxAttempts, lastError };
}
