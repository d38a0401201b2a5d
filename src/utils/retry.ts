export interface RetryOptions {
  maxAttempts?: number
  baseDelayMs?: number
  maxDelayMs?: number
  shouldRetry?: (err: unknown) => boolean
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void
}

const DEFAULT_MAX_ATTEMPTS = 3
const DEFAULT_BASE_DELAY_MS = 25
const DEFAULT_MAX_DELAY_MS = 1_000

function jitteredDelay(baseMs: number, attempt: number, maxMs: number): number {
  const capped = Math.min(baseMs * 2 ** attempt, maxMs)
  return capped * (0.5 + Math.random() * 0.5)
}

export async function retry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS)
  const baseDelayMs = opts.baseDelayMs ?? DEFAULT_BASE_DELAY_MS
  const maxDelayMs = opts.maxDelayMs ?? DEFAULT_MAX_DELAY_MS
  const shouldRetry = opts.shouldRetry ?? (() => true)

  let lastError: unknown
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn(attempt)
    } catch (err) {
      lastError = err
      if (attempt === maxAttempts - 1 || !shouldRetry(err)) {
        break
      }
      const delay = jitteredDelay(baseDelayMs, attempt, maxDelayMs)
      opts.onRetry?.(err, attempt + 1, delay)
      await new Promise<void>(resolve => setTimeout(resolve, delay))
    }
  }

  throw lastError
}
