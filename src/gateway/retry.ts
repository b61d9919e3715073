import { AnalysisError } from '../types/index.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000
};

export const DEFAULT_TIMEOUT_MS = 15000;

// Full jitter: uniform in [0, min(maxDelay, base * 2^(attempt-1)))
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  return Math.floor(random() * ceiling);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AnalysisError('Cancelled', 'Request was cancelled by the caller'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AnalysisError('Cancelled', 'Request was cancelled by the caller'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
