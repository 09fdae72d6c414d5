/**
 * Named, bounded retry policies used at every external call site
 */
export interface RetryPolicy {
  maxAttempts: number
  initialDelayMs: number
  backoffFactor: number
  maxDelayMs?: number
}

export const UPSTREAM_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffFactor: 2,
  maxDelayMs: 8000,
}

export const TOKEN_POLL_POLICY: RetryPolicy = {
  maxAttempts: 10,
  initialDelayMs: 2000,
  backoffFactor: 1,
}

export interface RetryOptions {
  shouldRetry?: (error: unknown, attempt: number) => boolean
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void
  signal?: AbortSignal
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

export function computeDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * policy.backoffFactor ** (attempt - 1)
  return policy.maxDelayMs !== undefined ? Math.min(delay, policy.maxDelayMs) : delay
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason)
      return
    }

    const onAbort = (): void => {
      clearTimeout(timer)
      reject(signal?.reason)
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)

    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Run `operation` until it succeeds, `shouldRetry` refuses, or the policy is exhausted.
 * The last error is rethrown as is.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const wait = options.sleep ?? sleep
  let attempt = 1

  while (true) {
    try {
      return await operation(attempt)
    }
    catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error, attempt) : true
      if (!retryable || attempt >= policy.maxAttempts || options.signal?.aborted) {
        throw error
      }

      const delayMs = computeDelay(policy, attempt)
      options.onRetry?.(error, attempt, delayMs)
      await wait(delayMs, options.signal)
      attempt++
    }
  }
}

/**
 * Call `probe` until it yields a value, waiting between attempts.
 * Resolves `undefined` when the policy runs out.
 */
export async function poll<T>(
  probe: (attempt: number) => Promise<T | undefined>,
  policy: RetryPolicy,
  options: Pick<RetryOptions, 'signal' | 'sleep'> = {},
): Promise<T | undefined> {
  const wait = options.sleep ?? sleep

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    const value = await probe(attempt)
    if (value !== undefined) {
      return value
    }
    if (attempt < policy.maxAttempts) {
      await wait(computeDelay(policy, attempt), options.signal)
    }
  }

  return undefined
}
