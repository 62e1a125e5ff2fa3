export interface BackoffPolicy {
  initialMs: number;
  maxMs: number;
  maxAttempts: number;
  budgetMs: number;
}

/**
 * Exponential delay for the n-th retry (1-based) with equal jitter: the result lies in
 * [base / 2, base], base = min(maxMs, initialMs * 2^(n-1)).
 */
export function computeBackoffDelay(policy: BackoffPolicy, attempt: number, random: () => number = Math.random): number {
  const exp = Math.max(0, attempt - 1);
  const base = Math.min(policy.maxMs, policy.initialMs * 2 ** Math.min(exp, 30));
  const half = base / 2;
  return Math.round(half + random() * half);
}

export class AbortedError extends Error {
  constructor() {
    super('aborted');
    this.name = 'AbortedError';
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
