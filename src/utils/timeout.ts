/**
 * Runs `fn` with an AbortSignal that fires after `ms`. The returned promise
 * settles at the deadline even if `fn` ignores the signal; the error it
 * rejects with comes from `onTimeout`.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController()
  let rejectDeadline: (err: Error) => void = () => {}
  const deadline = new Promise<never>((_, reject) => {
    rejectDeadline = reject
  })

  const timer = setTimeout(() => {
    const err = onTimeout()
    controller.abort(err)
    rejectDeadline(err)
  }, ms)

  try {
    return await Promise.race([fn(controller.signal), deadline])
  } finally {
    clearTimeout(timer)
  }
}
