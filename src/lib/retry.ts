/**
 * Retry & timeout utilities for controller calls
 *
 * Exponential backoff with a ceiling, Retry-After support for rate-limited
 * responses, and per-call timeouts that abort the underlying request.
 */

import { ControllerError, RateLimitedError, RetryExhaustedError, TimeoutError, isTransientError } from './errors.js'

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  backoffMultiplier?: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 10000,
  backoffMultiplier: 2
}

export interface RetryOptions extends Partial<RetryPolicy> {
  /** Name used in RetryExhaustedError messages */
  operation?: string
  /** Defaults to transient ControllerErrors */
  shouldRetry?: (error: unknown) => boolean
  /** Called before sleeping; attempt is the one that just failed */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void
  sleep?: (ms: number) => Promise<void>
}

/**
 * Delay before the attempt following `attempt`.
 * A Retry-After hint from the controller replaces the computed backoff;
 * both are capped at maxDelayMs.
 */
export function computeBackoff(attempt: number, policy: RetryPolicy, error?: unknown): number {
  if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
    return Math.min(Math.max(0, error.retryAfterMs), policy.maxDelayMs)
  }
  const multiplier = policy.backoffMultiplier ?? 2
  const delay = policy.baseDelayMs * Math.pow(multiplier, attempt - 1)
  return Math.min(delay, policy.maxDelayMs)
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Retry an async operation with exponential backoff
 *
 * Non-retryable errors propagate immediately. When a retryable
 * ControllerError survives every attempt, a RetryExhaustedError wrapping it
 * is thrown instead.
 *
 * @example
 * ```ts
 * const segments = await withRetry(
 *   () => controller.fetchSegments(),
 *   { maxAttempts: 3, baseDelayMs: 500, operation: 'fetchSegments' }
 * )
 * ```
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const policy: RetryPolicy = {
    maxAttempts: Math.max(1, options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts),
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    backoffMultiplier: options.backoffMultiplier ?? DEFAULT_RETRY_POLICY.backoffMultiplier
  }
  const shouldRetry = options.shouldRetry ?? isTransientError
  const wait = options.sleep ?? sleep

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt)
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error
      }

      if (attempt >= policy.maxAttempts) {
        if (error instanceof ControllerError) {
          throw new RetryExhaustedError(options.operation ?? 'controller call', attempt, error)
        }
        throw error
      }

      const delay = computeBackoff(attempt, policy, error)
      options.onRetry?.(attempt, error, delay)
      await wait(delay)
    }
  }
}

/**
 * Run an abortable operation with a deadline
 *
 * The signal handed to `run` is aborted when the deadline passes, and the
 * returned promise rejects with a TimeoutError.
 *
 * @example
 * ```ts
 * const response = await withTimeout(
 *   signal => fetch(url, { signal }),
 *   30000,
 *   'GET rest/networkconf'
 * )
 * ```
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  const controller = new AbortController()
  let timeoutHandle: NodeJS.Timeout | undefined

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      // Settle first so the race reports the timeout, not the abort
      reject(new TimeoutError(operation, timeoutMs))
      controller.abort()
    }, timeoutMs)
  })

  try {
    return await Promise.race([run(controller.signal), timeoutPromise])
  } finally {
    clearTimeout(timeoutHandle)
  }
}
