import { SentinelError, isTransient } from '../errors.js';

export type BackoffOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor?: number;
  random?: () => number;
};

export type BackoffDelay = {
  delayMs: number;
  baseDelayMs: number;
  appliedJitterMs: number;
};

export type RetryAttemptInfo = {
  attempt: number;
  delayMs: number;
  error: unknown;
};

export type RetryOptions = BackoffOptions & {
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
};

export function computeBackoffDelay(attempt: number, options: BackoffOptions): BackoffDelay {
  const minDelayMs = Math.max(0, options.baseDelayMs);
  const maxDelayMs = Math.max(minDelayMs, options.maxDelayMs);

  let baseDelayMs = minDelayMs;
  if (attempt > 1) {
    const exponential = minDelayMs * 2 ** (attempt - 1);
    baseDelayMs = Math.min(maxDelayMs, Math.round(exponential));
  }

  const factor = Math.max(0, options.jitterFactor ?? 0);
  const random = options.random?.() ?? Math.random();
  const jitterRange = Math.round(baseDelayMs * factor);
  let appliedJitterMs = 0;
  if (jitterRange > 0) {
    appliedJitterMs = Math.round((random * 2 - 1) * jitterRange);
  }

  const delayMs = Math.min(maxDelayMs, Math.max(minDelayMs, baseDelayMs + appliedJitterMs));
  return { delayMs, baseDelayMs, appliedJitterMs: delayMs - baseDelayMs };
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new SentinelError('Cancelled'));
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new SentinelError('Cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isTransient;
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));

  for (let attempt = 1; ; attempt += 1) {
    if (options.signal?.aborted) {
      throw new SentinelError('Cancelled');
    }
    try {
      return await operation(attempt);
    } catch (error) {
      if (options.signal?.aborted) {
        throw new SentinelError('Cancelled', undefined, { cause: error });
      }
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      const { delayMs } = computeBackoffDelay(attempt, options);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, options.signal);
    }
  }
}
