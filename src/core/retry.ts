import { err, ok, type Result } from './result.js';

export class TimeoutError extends Error {
  readonly kind = 'timeout' as const;

  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/**
 * Run `fn` with an AbortSignal that fires after `timeoutMs`. The returned promise
 * rejects with TimeoutError at the deadline even if `fn` ignores the signal.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, Math.max(0, timeoutMs));
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export type RetryBackoffOptions = {
  retries: number; // retries after the initial attempt
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs?: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; retriesLeft: number; delayMs: number; error: unknown }) => void;
  sleepFn?: (ms: number) => Promise<void>;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function clamp(n: number, min: number, max: number): number {
  if (!Number.isFinite(n)) return min;
  return Math.min(max, Math.max(min, n));
}

export type RetryOutcome<T> = Result<T, unknown> & { attempts: number };

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  opts: RetryBackoffOptions
): Promise<RetryOutcome<T>> {
  const retries = Math.max(0, Math.floor(opts.retries));
  const baseDelayMs = Math.max(0, Math.floor(opts.baseDelayMs));
  const maxDelayMs = Math.max(baseDelayMs, Math.floor(opts.maxDelayMs));
  const jitterMs = Math.max(0, Math.floor(opts.jitterMs ?? 0));
  const isRetryable = opts.isRetryable ?? (() => true);
  const sleepFn = opts.sleepFn ?? sleep;

  let lastError: unknown = new Error('retryWithBackoff: no attempts made');
  for (let attempt = 1; attempt <= retries + 1; attempt += 1) {
    try {
      const value = await fn();
      return { ...ok(value), attempts: attempt };
    } catch (error) {
      lastError = error;
      const retriesLeft = retries + 1 - attempt;
      if (retriesLeft <= 0 || !isRetryable(error)) {
        return { ...err(error), attempts: attempt };
      }

      const rawDelay = baseDelayMs * Math.pow(2, attempt - 1);
      const jitter = jitterMs > 0 ? Math.floor(Math.random() * jitterMs) : 0;
      const delayMs = clamp(rawDelay, baseDelayMs, maxDelayMs) + jitter;
      opts.onRetry?.({ attempt, retriesLeft, delayMs, error });
      if (delayMs > 0) await sleepFn(delayMs);
    }
  }

  return { ...err(lastError), attempts: retries + 1 };
}
