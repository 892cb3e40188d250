export interface KeyedQueue {
  run<T>(key: string, task: () => Promise<T>): Promise<T>
  pending(): number
}

/**
 * Runs tasks that share a key one after another, in arrival order.
 * Tasks under different keys run concurrently.
 */
export function createKeyedQueue(): KeyedQueue {
  const tails = new Map<string, Promise<void>>()

  function run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)
    const tail = result.then(
      () => undefined,
      () => undefined
    )
    tails.set(key, tail)

    void tail.then(() => {
      if (tails.get(key) === tail) {
        tails.delete(key)
      }
    })

    return result
  }

  function pending(): number {
    return tails.size
  }

  return { run, pending }
}
