/**
 * Bounded retries with exponential backoff.
 */

import type { RetryPolicy } from './types.js'

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number }

export interface RetryOptions {
  /** Stops retrying once aborted; the abort reason becomes the error */
  signal?: AbortSignal
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1), policy.maxDelayMs)
}

function sleep(ms: number): Promise<void> {
  return ms > 0 ? new Promise((resolve) => setTimeout(resolve, ms)) : Promise.resolve()
}

/**
 * Call `fn` until it resolves, at most `1 + policy.maxRetries` times.
 * Never rejects: exhaustion is reported as an `ok: false` outcome.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<RetryOutcome<T>> {
  const maxAttempts = 1 + Math.max(0, policy.maxRetries)
  let lastError: unknown = new Error('No attempt made')
  let attempts = 0

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      return { ok: false, error: options.signal.reason, attempts }
    }

    attempts = attempt
    try {
      return { ok: true, value: await fn(attempt), attempts }
    } catch (error) {
      lastError = error
    }

    if (attempt < maxAttempts) {
      const delay = backoffDelay(policy, attempt)
      options.onRetry?.(attempt, lastError, delay)
      await sleep(delay)
    }
  }

  return { ok: false, error: lastError, attempts }
}
