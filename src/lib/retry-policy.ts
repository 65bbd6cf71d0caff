/**
 * Retry with exponential backoff, and per-call timeouts
 */

import { isRetryable, TransientIOError } from './errors';

export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  isRetryable: (error: unknown) => boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  isRetryable,
};

export interface RetryHooks {
  label?: string;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown; label?: string }) => void;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before the retry that follows zero-based attempt `attempt`
 */
export function computeBackoff(policy: RetryPolicy, attempt: number): number {
  const base = policy.baseDelayMs * Math.pow(2, attempt);
  return Math.min(base, policy.maxDelayMs);
}

export async function executeWithRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      const isLast = attempt === policy.maxAttempts - 1;
      if (isLast || !policy.isRetryable(error)) {
        throw error;
      }

      const delayMs = computeBackoff(policy, attempt);
      hooks.onRetry?.({ attempt: attempt + 1, delayMs, error, label: hooks.label });
      await wait(delayMs);
    }
  }

  // Only reachable when maxAttempts < 1
  throw lastError ?? new Error(`${hooks.label ?? 'operation'}: retry policy allows no attempts`);
}

/**
 * Race a call against its own timeout budget; `controller` is aborted on timeout
 * so the underlying request is torn down rather than left running
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
  controller?: AbortController
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TransientIOError(`${label}: timed out after ${ms}ms`);
      controller?.abort(error);
      reject(error);
    }, ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
