export interface RetryOptions {
  /** Total number of tries, including the first. */
  attempts: number
  /** Delay before the n-th retry is `backoffMs * n`. */
  backoffMs: number
  onRetry?: (error: unknown, attempt: number) => void
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms))

/**
 * Runs `task` until it resolves or the attempts are used up, rethrowing the
 * last failure.
 */
export async function retry<T>(task: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts))
  let lastError: unknown

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await task()
    } catch (error) {
      lastError = error
      if (attempt === attempts) break
      options.onRetry?.(error, attempt)
      if (options.backoffMs > 0) await sleep(options.backoffMs * attempt)
    }
  }

  throw lastError
}
