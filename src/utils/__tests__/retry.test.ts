import { describe, it, expect, vi } from 'vitest'
import { retry } from '../retry.js'

describe('retry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 2) throw new Error(`fail ${attempt}`)
      return 'ok'
    })

    expect(await retry(fn, { baseDelayMs: 1 })).toBe('ok')
    expect(fn).toHaveBeenCalledTimes(3)
  })

  it('throws the last error once attempts run out', async () => {
    const fn = vi.fn(async (attempt: number) => {
      throw new Error(`fail ${attempt}`)
    })

    await expect(retry(fn, { maxAttempts: 2, baseDelayMs: 1 })).rejects.toThrow('fail 1')
    expect(fn).toHaveBeenCalledTimes(2)
  })

  it('stops at an error shouldRetry rejects', async () => {
    const fn = vi.fn(async () => {
      throw new TypeError('fatal')
    })

    await expect(retry(fn, { shouldRetry: err => !(err instanceof TypeError) })).rejects.toThrow('fatal')
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('reports each retry with a delay capped by maxDelayMs', async () => {
    const delays: number[] = []
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error('again')
      return attempt
    })

    await retry(fn, {
      maxAttempts: 4,
      baseDelayMs: 4,
      maxDelayMs: 10,
      onRetry: (_err, attempt, delayMs) => {
        delays.push(delayMs)
        expect(attempt).toBe(delays.length)
      }
    })

    expect(delays).toHaveLength(3)
    for (const delay of delays) {
      expect(delay).toBeGreaterThanOrEqual(2)
      expect(delay).toBeLessThanOrEqual(10)
    }
  })
})
