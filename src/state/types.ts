import type { z } from 'zod'

export type PrincipalScope = 'user' | 'conversation'

export interface Principal {
  scope: PrincipalScope
  id: string
}

/**
 * A typed state slot. `schema` checks persisted values on read and
 * `createDefault` supplies the value a principal sees before any write.
 */
export interface StateKey<T> {
  name: string
  schema: z.ZodType<T>
  createDefault(): T
}

export interface StateChange {
  principal: Principal
  key: string
  value: unknown
}

export interface StateStore {
  get<T>(principal: Principal, key: StateKey<T>): Promise<T>
  set<T>(principal: Principal, key: StateKey<T>, value: T): Promise<void>
  commit(changes: StateChange[]): Promise<void>
  delete(principal: Principal): Promise<void>
  cleanup(): void
}

export function defineStateKey<T>(name: string, schema: z.ZodType<T>, createDefault: () => T): StateKey<T> {
  return { name, schema, createDefault }
}

export function principalKey(principal: Principal): string {
  return `${principal.scope}/${principal.id}`
}
