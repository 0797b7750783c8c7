export type BackoffOptions = {
  baseMs?: number;
  factor?: number;
  maxMs?: number;
  jitterRatio?: number;
  random?: () => number;
};

const DEFAULT_BACKOFF: Required<Omit<BackoffOptions, 'random'>> = {
  baseMs: 500,
  factor: 2,
  maxMs: 10_000,
  jitterRatio: 0.2
};

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

export function computeExponentialBackoff(attempt: number, options: BackoffOptions = {}): number {
  const normalizedAttempt = Math.max(1, Math.floor(attempt));
  const {
    baseMs = DEFAULT_BACKOFF.baseMs,
    factor = DEFAULT_BACKOFF.factor,
    maxMs = DEFAULT_BACKOFF.maxMs,
    jitterRatio = DEFAULT_BACKOFF.jitterRatio,
    random = Math.random
  } = options;

  const cappedDelay = clamp(baseMs * Math.pow(factor, normalizedAttempt - 1), baseMs, maxMs);
  if (jitterRatio <= 0) {
    return Math.round(cappedDelay);
  }

  const jitterSpan = cappedDelay * jitterRatio;
  const jitter = (random() * 2 - 1) * jitterSpan;
  return Math.round(clamp(cappedDelay + jitter, baseMs, maxMs));
}

export type RetryOptions = BackoffOptions & {
  attempts: number;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

export async function delay(ms: number): Promise<void> {
  if (ms <= 0) {
    return;
  }
  // kept referenced: a CLI waiting to reconnect has nothing else holding the event loop open
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` up to `attempts` times, sleeping with exponential backoff between
 * tries. The last error is rethrown once attempts are exhausted or
 * `shouldRetry` declines.
 */
export async function withRetries<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const sleep = options.sleep ?? delay;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      const retryable = options.shouldRetry ? options.shouldRetry(err) : true;
      if (!retryable || attempt === attempts) {
        break;
      }
      const delayMs = computeExponentialBackoff(attempt, options);
      options.onRetry?.(err, attempt, delayMs);
      await sleep(delayMs);
    }
  }

  throw lastError;
}
