import { principalKey, type Principal, type StateChange, type StateKey, type StateStore } from './types.js'

export interface TurnState {
  get<T>(principal: Principal, key: StateKey<T>): Promise<T>
  set<T>(principal: Principal, key: StateKey<T>, value: T): void
  pendingChanges(): number
  saveChanges(): Promise<void>
}

interface CachedEntry {
  principal: Principal
  key: string
  value: unknown
  dirty: boolean
}

/**
 * Per-turn view over a StateStore. The store is read once per key and later
 * reads in the turn see earlier `set` calls. Values handed out are copies,
 * so a change only sticks through `set`. Nothing reaches the store until
 * `saveChanges` commits the dirty values as one batch.
 */
export function createTurnState(store: StateStore): TurnState {
  const entries = new Map<string, CachedEntry>()

  function cacheId(principal: Principal, key: string): string {
    return `${principalKey(principal)}#${key}`
  }

  async function get<T>(principal: Principal, key: StateKey<T>): Promise<T> {
    const id = cacheId(principal, key.name)
    const cached = entries.get(id)
    if (cached) {
      const parsed = key.schema.safeParse(cached.value)
      if (parsed.success) {
        return structuredClone(parsed.data)
      }
    }

    const value = await store.get(principal, key)
    entries.set(id, { principal, key: key.name, value, dirty: false })
    return structuredClone(value)
  }

  function set<T>(principal: Principal, key: StateKey<T>, value: T): void {
    entries.set(cacheId(principal, key.name), { principal, key: key.name, value: structuredClone(value), dirty: true })
  }

  function pendingChanges(): number {
    let count = 0
    for (const entry of entries.values()) {
      if (entry.dirty) count++
    }
    return count
  }

  async function saveChanges(): Promise<void> {
    const changes: StateChange[] = []
    for (const entry of entries.values()) {
      if (entry.dirty) {
        changes.push({ principal: entry.principal, key: entry.key, value: entry.value })
      }
    }
    if (changes.length === 0) {
      return
    }

    await store.commit(changes)
    for (const entry of entries.values()) {
      entry.dirty = false
    }
  }

  return { get, set, pendingChanges, saveChanges }
}
