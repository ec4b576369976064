import { randomUUID } from 'node:crypto'
import { Effect, Ref } from 'effect'

import { sha256Hex } from '../common/stable-json'
import { describeError } from '../errors'
import type { Logger } from '../observability/logger'
import { makeSilentLogger } from '../observability/logger'

export interface Closable {
  close(): Promise<void>
}

export interface CachedConnection<T> {
  /** Hex SHA-256 of the credential bytes the client was dialed with. */
  readonly key: string
  readonly id: string
  readonly client: T
}

export interface CacheEntrySummary {
  readonly key: string
  readonly id: string
  readonly usage: number
}

interface CacheEntry<T> extends CachedConnection<T> {
  readonly usage: number
}

type CacheState<T> = ReadonlyMap<string, CacheEntry<T>>

export interface AcquireOptions {
  readonly signal?: AbortSignal
  /** Bounds dialing when no cached client exists. */
  readonly timeoutMs?: number
}

export interface ConnectionCacheConfig<T> {
  readonly dial: (credentials: Uint8Array, options: AcquireOptions) => Promise<T>
  readonly logger?: Logger
  readonly makeId?: () => string
}

export interface ConnectionCache<T> {
  readonly acquire: (credentials: Uint8Array, options?: AcquireOptions) => Effect.Effect<CachedConnection<T>, unknown, never>
  /** Drops one usage from every entry and closes the entries left unused. */
  readonly releaseAll: Effect.Effect<void, never, never>
  readonly size: Effect.Effect<number, never, never>
  readonly entries: Effect.Effect<ReadonlyArray<CacheEntrySummary>, never, never>
}

export const credentialDigest = (credentials: Uint8Array) => sha256Hex(credentials)

const withUsage = <T>(entries: CacheState<T>, entry: CacheEntry<T>, usage: number): [CacheEntry<T>, CacheState<T>] => {
  const updated = { ...entry, usage }
  const next = new Map(entries)
  next.set(entry.key, updated)
  return [updated, next]
}

export const makeConnectionCache = <T extends Closable>(
  config: ConnectionCacheConfig<T>,
): Effect.Effect<ConnectionCache<T>, never, never> =>
  Effect.gen(function* () {
    const state = yield* Ref.make<CacheState<T>>(new Map())
    const logger = config.logger ?? makeSilentLogger()
    const makeId = config.makeId ?? randomUUID

    const retain = (key: string) =>
      Ref.modify(state, (entries): [CacheEntry<T> | undefined, CacheState<T>] => {
        const existing = entries.get(key)
        if (!existing) {
          return [undefined, entries]
        }
        return withUsage(entries, existing, existing.usage + 1)
      })

    const insertOrJoin = (key: string, client: T) =>
      Ref.modify(state, (entries): [{ entry: CacheEntry<T>; inserted: boolean }, CacheState<T>] => {
        const existing = entries.get(key)
        if (existing) {
          const [entry, next] = withUsage(entries, existing, existing.usage + 1)
          return [{ entry, inserted: false }, next]
        }
        const entry: CacheEntry<T> = { key, id: makeId(), client, usage: 1 }
        const next = new Map(entries)
        next.set(key, entry)
        return [{ entry, inserted: true }, next]
      })

    const closeClient = (client: T, fields: { key: string; id?: string }) =>
      Effect.tryPromise({ try: () => client.close(), catch: (error) => error }).pipe(
        Effect.catchAll((error) =>
          logger.log('warn', 'failed to close temporal connection', { ...fields, error: describeError(error) }),
        ),
      )

    const toHandle = (entry: CacheEntry<T>): CachedConnection<T> => ({
      key: entry.key,
      id: entry.id,
      client: entry.client,
    })

    const acquire: ConnectionCache<T>['acquire'] = (credentials, options = {}) =>
      Effect.gen(function* () {
        const key = credentialDigest(credentials)
        const cached = yield* retain(key)
        if (cached) {
          yield* logger.log('debug', 'reusing cached temporal connection', { serviceId: cached.id, usage: cached.usage })
          return toHandle(cached)
        }

        const client = yield* Effect.tryPromise({
          try: () => config.dial(credentials, options),
          catch: (error) => error,
        })
        const { entry, inserted } = yield* insertOrJoin(key, client)
        if (inserted) {
          yield* logger.log('debug', 'cached new temporal connection', { serviceId: entry.id })
        } else {
          yield* logger.log('debug', 'discarding duplicate temporal connection', { serviceId: entry.id })
          yield* closeClient(client, { key })
        }
        return toHandle(entry)
      })

    const releaseAll: ConnectionCache<T>['releaseAll'] = Effect.gen(function* () {
      const evicted = yield* Ref.modify(state, (entries): [CacheEntry<T>[], CacheState<T>] => {
        const next = new Map<string, CacheEntry<T>>()
        const idle: CacheEntry<T>[] = []
        for (const [key, entry] of entries) {
          const usage = Math.max(0, entry.usage - 1)
          if (usage === 0) {
            idle.push(entry)
          } else {
            next.set(key, { ...entry, usage })
          }
        }
        return [idle, next]
      })
      for (const entry of evicted) {
        yield* closeClient(entry.client, { key: entry.key, id: entry.id })
        yield* logger.log('debug', 'closed idle temporal connection', { serviceId: entry.id })
      }
    })

    const size = Ref.get(state).pipe(Effect.map((entries) => entries.size))

    const entries = Ref.get(state).pipe(
      Effect.map((current) => Array.from(current.values(), ({ key, id, usage }) => ({ key, id, usage }))),
    )

    return {
      acquire,
      releaseAll,
      size,
      entries,
    }
  })
