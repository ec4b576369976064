import { Effect } from 'effect'

import { type TemporalService, connectTemporalService } from '../client'
import type { DialTemporal } from '../client/transport'
import { type ReadFile, type ProviderSettings, loadProviderSettings } from '../config'
import { type AcquireOptions, makeConnectionCache } from '../connection/cache'
import { type CredentialSource, ManagedConnector } from '../controller/managed'
import { namespaceHandler } from '../controller/namespace'
import type { NamespaceLookup } from '../controller/resolve'
import { createSearchAttributeHandler } from '../controller/search-attribute'
import { type Logger, makeLogger } from '../observability/logger'
import type { SearchAttribute, SearchAttributeObservation, TemporalNamespace, TemporalNamespaceObservation } from '../types'

export interface CreateProviderOptions {
  readonly credentials: CredentialSource
  readonly settings?: ProviderSettings
  readonly logger?: Logger
  readonly namespaceLookup?: NamespaceLookup
  readonly dial?: DialTemporal
  readonly fs?: {
    readonly readFile?: ReadFile
  }
}

export interface TemporalProvider {
  readonly settings: ProviderSettings
  readonly logger: Logger
  readonly namespaces: ManagedConnector<TemporalNamespace, TemporalNamespaceObservation>
  readonly searchAttributes: ManagedConnector<SearchAttribute, SearchAttributeObservation>
}

/** Wires settings, logging and one connection cache per resource kind. */
export const createProvider = (options: CreateProviderOptions): TemporalProvider => {
  const settings = options.settings ?? loadProviderSettings()
  const logger = options.logger ?? makeLogger({ level: settings.logLevel, format: settings.logFormat })

  const dial = (credentials: Uint8Array, call: AcquireOptions): Promise<TemporalService> =>
    connectTemporalService(credentials, {
      dial: options.dial,
      fs: options.fs,
      logger,
      rpcTimeoutMs: settings.rpcTimeoutMs,
      listPageSize: settings.listPageSize,
      signal: call.signal,
      timeoutMs: call.timeoutMs ?? settings.rpcTimeoutMs,
    })

  const makeCache = (kind: string) =>
    Effect.runSync(makeConnectionCache<TemporalService>({ dial, logger: logger.child({ cache: kind }) }))

  const searchAttributeHandler = createSearchAttributeHandler({ lookup: options.namespaceLookup })

  return {
    settings,
    logger,
    namespaces: new ManagedConnector({
      handler: namespaceHandler,
      cache: makeCache(namespaceHandler.kind),
      credentials: options.credentials,
      logger,
    }),
    searchAttributes: new ManagedConnector({
      handler: searchAttributeHandler,
      cache: makeCache(searchAttributeHandler.kind),
      credentials: options.credentials,
      logger,
    }),
  }
}
