import { createNoopLogger, type Logger } from '../logger.js'
import { principalKey, type Principal, type StateChange, type StateKey, type StateStore } from './types.js'

interface StoredRecord {
  values: Record<string, unknown>
  createdAt: number
  updatedAt: number
  expiresAt: number
}

export interface InMemoryStateStoreOptions {
  timeoutMs: number
  logger?: Logger
}

export function createInMemoryStateStore(options: InMemoryStateStoreOptions): StateStore {
  const { timeoutMs } = options
  const logger = options.logger ?? createNoopLogger()
  const records = new Map<string, StoredRecord>()

  function isExpired(record: StoredRecord): boolean {
    return Date.now() > record.expiresAt
  }

  function loadRecord(principal: Principal): StoredRecord {
    const id = principalKey(principal)
    const existing = records.get(id)
    if (existing && !isExpired(existing)) {
      return existing
    }

    if (existing) {
      logger.info({ event: 'state_record_expired', principal: id })
    }

    const now = Date.now()
    const record: StoredRecord = { values: {}, createdAt: now, updatedAt: now, expiresAt: now + timeoutMs }
    records.set(id, record)
    return record
  }

  function write(record: StoredRecord, key: string, value: unknown): void {
    const now = Date.now()
    record.values[key] = structuredClone(value)
    record.updatedAt = now
    record.expiresAt = now + timeoutMs
  }

  // No await between load and write: concurrent first reads see one default.
  async function get<T>(principal: Principal, key: StateKey<T>): Promise<T> {
    const record = loadRecord(principal)

    if (!Object.hasOwn(record.values, key.name)) {
      const value = key.createDefault()
      write(record, key.name, value)
      logger.info({ event: 'state_default_materialized', principal: principalKey(principal), key: key.name })
      return structuredClone(value)
    }

    const parsed = key.schema.safeParse(record.values[key.name])
    if (!parsed.success) {
      logger.warn({
        event: 'state_value_invalid',
        principal: principalKey(principal),
        key: key.name,
        error: parsed.error.message
      })
      const value = key.createDefault()
      write(record, key.name, value)
      return structuredClone(value)
    }

    return structuredClone(parsed.data)
  }

  async function set<T>(principal: Principal, key: StateKey<T>, value: T): Promise<void> {
    write(loadRecord(principal), key.name, value)
  }

  async function commit(changes: StateChange[]): Promise<void> {
    const cloned = changes.map(change => ({ ...change, value: structuredClone(change.value) }))
    for (const change of cloned) {
      write(loadRecord(change.principal), change.key, change.value)
    }
  }

  async function deletePrincipal(principal: Principal): Promise<void> {
    records.delete(principalKey(principal))
  }

  function cleanup(): void {
    const now = Date.now()
    for (const [id, record] of records) {
      if (now > record.expiresAt) {
        records.delete(id)
      }
    }
  }

  return {
    get,
    set,
    commit,
    delete: deletePrincipal,
    cleanup
  }
}
