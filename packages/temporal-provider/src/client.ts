import { randomUUID } from 'node:crypto'
import { Effect } from 'effect'

import { NamespaceDeletion } from './client/deletion'
import {
  SYSTEM_NAMESPACE,
  buildRegisterNamespaceRequest,
  buildUpdateNamespaceRequest,
  toNamespaceObservation,
} from './client/namespaces'
import { buildAddSearchAttributesRequest, toSearchAttributeObservations } from './client/search-attributes'
import { toTemporalRpcError } from './client/status'
import type { DialTemporal, TemporalConnection } from './client/transport'
import { dialTemporal, dialWithin } from './client/transport'
import { runOrThrow } from './common/effect'
import { type ReadFile, parseProviderConfig } from './config'
import { PreconditionError, describeError, isRemoteErrorKind } from './errors'
import type { LogFields, LogLevel, Logger } from './observability/logger'
import { makeSilentLogger, writeLog } from './observability/logger'
import type {
  ResolvedSearchAttribute,
  SearchAttributeObservation,
  TemporalNamespaceObservation,
  TemporalNamespaceParameters,
} from './types'

export { NamespaceDeletion } from './client/deletion'

const DEFAULT_LIST_PAGE_SIZE = 100

export interface CallOptions {
  readonly signal?: AbortSignal
  /** Overrides the service-wide RPC timeout for this call. */
  readonly timeoutMs?: number
}

export interface NamespaceService {
  describeNamespaceByName(name: string, options?: CallOptions): Promise<TemporalNamespaceObservation | undefined>
  describeNamespaceById(id: string, options?: CallOptions): Promise<TemporalNamespaceObservation | undefined>
  createNamespace(params: TemporalNamespaceParameters, options?: CallOptions): Promise<void>
  updateNamespaceByName(params: TemporalNamespaceParameters, options?: CallOptions): Promise<void>
  deleteNamespace(name: string, options?: CallOptions): Promise<NamespaceDeletion>
  deleteNamespaceByName(name: string, options?: CallOptions): Promise<string | undefined>
  listAllNamespaces(options?: CallOptions): Promise<TemporalNamespaceObservation[]>
  deleteAllNamespaces(options?: CallOptions): Promise<string[]>
}

export interface SearchAttributeService {
  createSearchAttribute(attribute: ResolvedSearchAttribute, options?: CallOptions): Promise<void>
  describeSearchAttributeByName(
    namespace: string,
    name: string,
    options?: CallOptions,
  ): Promise<SearchAttributeObservation | undefined>
  deleteSearchAttributeByName(namespace: string, name: string, options?: CallOptions): Promise<void>
  listSearchAttributesByNamespace(namespace: string, options?: CallOptions): Promise<SearchAttributeObservation[]>
}

export interface TemporalService extends NamespaceService, SearchAttributeService {
  readonly id: string
  close(): Promise<void>
}

export interface CreateTemporalServiceOptions {
  connection: TemporalConnection
  logger?: Logger
  rpcTimeoutMs?: number
  listPageSize?: number
  id?: string
}

export const createTemporalService = (options: CreateTemporalServiceOptions): TemporalService =>
  new TemporalServiceImpl(options)

export interface ConnectTemporalServiceOptions extends Omit<CreateTemporalServiceOptions, 'connection'> {
  dial?: DialTemporal
  fs?: {
    readFile?: ReadFile
  }
  signal?: AbortSignal
  /** Bounds the dial; defaults to `rpcTimeoutMs`. */
  timeoutMs?: number
}

/** Decodes a provider credential blob and dials a service for it. */
export const connectTemporalService = async (
  credentials: Uint8Array | string,
  options: ConnectTemporalServiceOptions = {},
): Promise<TemporalService> => {
  const { dial = dialTemporal, fs, signal, timeoutMs = options.rpcTimeoutMs, ...serviceOptions } = options
  const config = await parseProviderConfig(credentials, { fs })
  const logger = serviceOptions.logger ?? makeSilentLogger()
  const connection = await dialWithin(() => dial(config, { signal, timeoutMs }), { signal, timeoutMs }, (late) => {
    writeLog(logger, 'debug', 'closing temporal connection that outlived its dial', { hostPort: config.hostPort })
    late.close().catch((error: unknown) => {
      writeLog(logger, 'warn', 'failed to close temporal connection', {
        hostPort: config.hostPort,
        error: describeError(error),
      })
    })
  })
  return createTemporalService({ ...serviceOptions, connection })
}

class TemporalServiceImpl implements TemporalService {
  readonly id: string
  readonly #connection: TemporalConnection
  readonly #logger: Logger
  readonly #rpcTimeoutMs?: number
  readonly #listPageSize: number
  #closed = false

  constructor(options: CreateTemporalServiceOptions) {
    this.id = options.id ?? randomUUID()
    this.#connection = options.connection
    this.#logger = (options.logger ?? makeSilentLogger()).child({ serviceId: this.id })
    this.#rpcTimeoutMs = options.rpcTimeoutMs
    this.#listPageSize = options.listPageSize ?? DEFAULT_LIST_PAGE_SIZE
  }

  async describeNamespaceByName(name: string, options?: CallOptions) {
    return this.#instrumentOperation('describeNamespaceByName', { namespace: name }, () =>
      this.#describeNamespace({ namespace: name }, options),
    )
  }

  async describeNamespaceById(id: string, options?: CallOptions) {
    return this.#instrumentOperation('describeNamespaceById', { namespaceId: id }, () =>
      this.#describeNamespace({ id }, options),
    )
  }

  async createNamespace(params: TemporalNamespaceParameters, options?: CallOptions): Promise<void> {
    return this.#instrumentOperation('createNamespace', { namespace: params.name }, async () => {
      const request = buildRegisterNamespaceRequest(params)
      try {
        await this.#executeRpc(
          'registerNamespace',
          () => this.#connection.workflowService.registerNamespace(request),
          options,
        )
      } catch (error) {
        if (!isRemoteErrorKind(error, 'already-exists')) {
          throw error
        }
        this.#log('debug', 'namespace already exists', { namespace: params.name })
      }
    })
  }

  async updateNamespaceByName(params: TemporalNamespaceParameters, options?: CallOptions): Promise<void> {
    return this.#instrumentOperation('updateNamespaceByName', { namespace: params.name }, async () => {
      const request = buildUpdateNamespaceRequest(params)
      await this.#executeRpc('updateNamespace', () => this.#connection.workflowService.updateNamespace(request), options)
    })
  }

  async deleteNamespace(name: string, options?: CallOptions): Promise<NamespaceDeletion> {
    return this.#instrumentOperation('deleteNamespace', { namespace: name }, async () => {
      const existing = await this.#describeNamespace({ namespace: name }, options)
      if (!existing) {
        return NamespaceDeletion.absent(name)
      }
      try {
        const response = await this.#executeRpc(
          'deleteNamespace',
          () => this.#connection.operatorService.deleteNamespace({ namespace: name }),
          options,
        )
        const deletedNamespace = response.deletedNamespace ?? ''
        this.#log('info', 'namespace deleted', { namespace: name, deletedNamespace })
        return NamespaceDeletion.deleted(name, deletedNamespace)
      } catch (error) {
        if (isRemoteErrorKind(error, 'invalid-state')) {
          this.#log('debug', 'namespace is not in a deletable state', { namespace: name })
          return NamespaceDeletion.invalidState(name)
        }
        if (isRemoteErrorKind(error, 'not-found')) {
          return NamespaceDeletion.notFound(name)
        }
        throw error
      }
    })
  }

  async deleteNamespaceByName(name: string, options?: CallOptions): Promise<string | undefined> {
    const deletion = await this.deleteNamespace(name, options)
    return deletion.kind === 'deleted' ? deletion.name : undefined
  }

  async listAllNamespaces(options?: CallOptions): Promise<TemporalNamespaceObservation[]> {
    return this.#instrumentOperation('listAllNamespaces', {}, async () => {
      const namespaces: TemporalNamespaceObservation[] = []
      let nextPageToken: Uint8Array | undefined
      do {
        const pageToken = nextPageToken
        const response = await this.#executeRpc(
          'listNamespaces',
          () =>
            this.#connection.workflowService.listNamespaces({ pageSize: this.#listPageSize, nextPageToken: pageToken }),
          options,
        )
        for (const entry of response.namespaces ?? []) {
          const namespace = toNamespaceObservation(entry, this.#warnRetentionResidual)
          if (namespace && namespace.name !== SYSTEM_NAMESPACE && namespace.state !== 'Deleted') {
            namespaces.push(namespace)
          }
        }
        nextPageToken =
          response.nextPageToken && response.nextPageToken.length > 0 ? response.nextPageToken : undefined
      } while (nextPageToken)
      return namespaces
    })
  }

  async deleteAllNamespaces(options?: CallOptions): Promise<string[]> {
    const namespaces = await this.listAllNamespaces(options)
    const deleted: string[] = []
    for (const namespace of namespaces) {
      const name = await this.deleteNamespaceByName(namespace.name, options)
      if (name !== undefined) {
        deleted.push(name)
      }
    }
    return deleted
  }

  async createSearchAttribute(attribute: ResolvedSearchAttribute, options?: CallOptions): Promise<void> {
    const fields = { namespace: attribute.temporalNamespaceName, searchAttribute: attribute.name }
    return this.#instrumentOperation('createSearchAttribute', fields, async () => {
      if (!attribute.temporalNamespaceName) {
        throw new PreconditionError('temporalNamespaceName not set')
      }
      const request = buildAddSearchAttributesRequest(attribute)
      try {
        await this.#executeRpc(
          'addSearchAttributes',
          () => this.#connection.operatorService.addSearchAttributes(request),
          options,
        )
      } catch (error) {
        if (!isRemoteErrorKind(error, 'already-exists')) {
          throw error
        }
        this.#log('debug', 'search attribute already exists', fields)
      }
    })
  }

  async describeSearchAttributeByName(namespace: string, name: string, options?: CallOptions) {
    const attributes = await this.listSearchAttributesByNamespace(namespace, options)
    return attributes.find((attribute) => attribute.name === name)
  }

  async deleteSearchAttributeByName(namespace: string, name: string, options?: CallOptions): Promise<void> {
    const fields = { namespace, searchAttribute: name }
    return this.#instrumentOperation('deleteSearchAttributeByName', fields, async () => {
      try {
        await this.#executeRpc(
          'removeSearchAttributes',
          () => this.#connection.operatorService.removeSearchAttributes({ namespace, searchAttributes: [name] }),
          options,
        )
      } catch (error) {
        if (!isRemoteErrorKind(error, 'not-found')) {
          throw error
        }
        this.#log('debug', 'search attribute already removed', fields)
      }
    })
  }

  async listSearchAttributesByNamespace(namespace: string, options?: CallOptions) {
    return this.#instrumentOperation('listSearchAttributesByNamespace', { namespace }, async () => {
      const response = await this.#executeRpc(
        'listSearchAttributes',
        () => this.#connection.operatorService.listSearchAttributes({ namespace }),
        options,
      )
      return toSearchAttributeObservations(namespace, response)
    })
  }

  async close(): Promise<void> {
    if (this.#closed) return
    this.#closed = true
    await this.#connection.close()
    this.#log('debug', 'temporal connection closed')
  }

  async #describeNamespace(
    request: { namespace?: string; id?: string },
    options: CallOptions | undefined,
  ): Promise<TemporalNamespaceObservation | undefined> {
    try {
      const response = await this.#executeRpc(
        'describeNamespace',
        () => this.#connection.workflowService.describeNamespace(request),
        options,
      )
      return toNamespaceObservation(response, this.#warnRetentionResidual)
    } catch (error) {
      if (isRemoteErrorKind(error, 'not-found')) {
        return undefined
      }
      throw error
    }
  }

  readonly #warnRetentionResidual = (namespace: string, residualSeconds: number) => {
    this.#log('warn', 'namespace retention is not a whole number of days; truncating', { namespace, residualSeconds })
  }

  async #executeRpc<T>(operation: string, rpc: () => Promise<T>, options: CallOptions | undefined): Promise<T> {
    this.#ensureOpen()
    const effect = Effect.tryPromise({
      try: () => this.#withCallContext(rpc, options),
      catch: (error) => toTemporalRpcError(operation, error),
    }).pipe(
      Effect.tapError((error) =>
        this.#logger.log('debug', `temporal rpc ${operation} failed`, {
          operation,
          kind: error.kind,
          code: error.code,
          error: error.message,
        }),
      ),
    )
    return runOrThrow(effect)
  }

  #withCallContext<T>(rpc: () => Promise<T>, options: CallOptions | undefined): Promise<T> {
    const timeoutMs = options?.timeoutMs ?? this.#rpcTimeoutMs
    const signal = options?.signal
    const withDeadline =
      timeoutMs === undefined ? rpc : () => this.#connection.withDeadline(Date.now() + timeoutMs, rpc)
    return signal ? this.#connection.withAbortSignal(signal, withDeadline) : withDeadline()
  }

  async #instrumentOperation<T>(operation: string, fields: LogFields, action: () => Promise<T>): Promise<T> {
    const start = Date.now()
    try {
      const result = await action()
      this.#log('debug', `temporal service ${operation} succeeded`, {
        operation,
        ...fields,
        durationMs: Date.now() - start,
      })
      return result
    } catch (error) {
      this.#log('error', `temporal service ${operation} failed`, {
        operation,
        ...fields,
        error: describeError(error),
      })
      throw error
    }
  }

  #log(level: LogLevel, message: string, fields?: LogFields): void {
    writeLog(this.#logger, level, message, fields)
  }

  #ensureOpen(): void {
    if (this.#closed) {
      throw new Error('Temporal service has been closed')
    }
  }
}
