/**
 * Concurrency Utilities
 *
 * Timeout wrapping, bounded parallel mapping and per-key serialization.
 */

/**
 * Run `task` with an abort signal that fires after `timeoutMs`.
 * On expiry the returned promise rejects with `onTimeout()`, whether or not
 * the task honours the signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  const abortController = new AbortController()
  let timeoutId: ReturnType<typeof setTimeout> | undefined

  const expired = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      abortController.abort()
      reject(onTimeout())
    }, timeoutMs)
  })

  try {
    return await Promise.race([task(abortController.signal), expired])
  } finally {
    clearTimeout(timeoutId)
  }
}

/**
 * Map `items` through `fn` with at most `limit` calls in flight.
 * Results keep input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length)
  let next = 0

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++
      results[index] = await fn(items[index], index)
    }
  }

  const workerCount = Math.max(1, Math.min(limit, items.length))
  await Promise.all(Array.from({ length: workerCount }, () => worker()))
  return results
}

/**
 * Serializes async sections that share a key. Different keys run freely.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map()

  async run<T>(key: string, section: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()

    let release: () => void = () => {}
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous
    try {
      return await section()
    } finally {
      release()
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  /** Number of keys with a holder or waiters */
  get size(): number {
    return this.tails.size
  }
}
