import { Effect } from 'effect'

import type { CallOptions, TemporalService } from '../client'
import { runOrThrow } from '../common/effect'
import type { ConnectionCache } from '../connection/cache'
import { ImmutableResourceError, PreconditionError, type ReconcileHook, ReconcileError } from '../errors'
import type { LogFields, LogLevel, Logger } from '../observability/logger'
import { makeSilentLogger, writeLog } from '../observability/logger'
import type { ManagedResource } from '../types'
import { type Projection, compareProjections } from './compare'
import { type ConditionUpdate, creating, deleting, upsertCondition } from './conditions'
import { setExternalName } from './external-name'

export interface ReconcileOptions extends CallOptions {
  /** Clock for condition transition times. */
  readonly nowIso?: () => string
}

export interface ExternalObservation {
  readonly resourceExists: boolean
  readonly resourceUpToDate: boolean
  readonly diff: string
}

export type AnyManagedResource = ManagedResource<unknown, unknown>

/** What a resource kind supplies to plug into the generic reconciler. */
export interface ResourceHandler<TResource extends ManagedResource<unknown, TObservation>, TObservation> {
  readonly kind: string
  /** Fills in references on the resource before any remote call. */
  readonly resolve?: (resource: TResource, options: ReconcileOptions) => Promise<void>
  readonly describe: (
    service: TemporalService,
    resource: TResource,
    options: ReconcileOptions,
  ) => Promise<TObservation | undefined>
  /** Creates the remote object and returns its external name. */
  readonly create: (service: TemporalService, resource: TResource, options: ReconcileOptions) => Promise<string>
  readonly update: (service: TemporalService, resource: TResource, options: ReconcileOptions) => Promise<void>
  /** Deletes the remote object and returns a short outcome label for logs. */
  readonly delete: (service: TemporalService, resource: TResource, options: ReconcileOptions) => Promise<string>
  readonly desired: (resource: TResource) => Projection
  readonly observed: (observation: TObservation) => Projection
  readonly readiness: (observation: TObservation) => ConditionUpdate
}

export interface CredentialSource {
  /** Returns the provider credential blob referenced by the resource's provider config. */
  readonly resolve: (resource: AnyManagedResource, signal?: AbortSignal) => Promise<Uint8Array>
}

const passThrough = (error: unknown) => error instanceof PreconditionError || error instanceof ImmutableResourceError

const setCondition = (resource: AnyManagedResource, update: ConditionUpdate, options: ReconcileOptions) => {
  resource.status = {
    ...resource.status,
    conditions: upsertCondition(resource.status?.conditions ?? [], update, options.nowIso),
  }
}

export class ManagedExternal<TResource extends ManagedResource<unknown, TObservation>, TObservation> {
  readonly serviceId: string
  readonly #service: TemporalService
  readonly #handler: ResourceHandler<TResource, TObservation>
  readonly #logger: Logger

  constructor(service: TemporalService, handler: ResourceHandler<TResource, TObservation>, logger: Logger) {
    this.serviceId = service.id
    this.#service = service
    this.#handler = handler
    this.#logger = logger.child({ serviceId: service.id })
  }

  async observe(resource: TResource, options: ReconcileOptions = {}): Promise<ExternalObservation> {
    const name = resource.metadata.name
    this.#log('debug', 'observing resource', { resource: name })
    await this.#resolve(resource, options)

    const observation = await this.#call('describe', resource, () =>
      this.#handler.describe(this.#service, resource, options),
    )
    if (observation === undefined) {
      this.#log('debug', 'resource does not exist', { resource: name })
      return { resourceExists: false, resourceUpToDate: false, diff: '' }
    }

    resource.status = { ...resource.status, atProvider: observation }
    setCondition(resource, this.#handler.readiness(observation), options)

    const comparison = compareProjections(this.#handler.desired(resource), this.#handler.observed(observation))
    if (!comparison.upToDate) {
      this.#log('debug', 'resource drifted from desired state', { resource: name, diff: comparison.diff })
    }
    return { resourceExists: true, resourceUpToDate: comparison.upToDate, diff: comparison.diff }
  }

  async create(resource: TResource, options: ReconcileOptions = {}): Promise<void> {
    this.#log('debug', 'creating resource', { resource: resource.metadata.name })
    await this.#resolve(resource, options)
    setCondition(resource, creating(), options)
    const externalName = await this.#call('create', resource, () =>
      this.#handler.create(this.#service, resource, options),
    )
    setExternalName(resource, externalName)
    this.#log('info', 'resource created', { resource: resource.metadata.name, externalName })
  }

  async update(resource: TResource, options: ReconcileOptions = {}): Promise<void> {
    this.#log('debug', 'updating resource', { resource: resource.metadata.name })
    await this.#resolve(resource, options)
    await this.#call('update', resource, () => this.#handler.update(this.#service, resource, options))
    this.#log('info', 'resource updated', { resource: resource.metadata.name })
  }

  async delete(resource: TResource, options: ReconcileOptions = {}): Promise<void> {
    this.#log('debug', 'deleting resource', { resource: resource.metadata.name })
    setCondition(resource, deleting(), options)
    await this.#resolve(resource, options)
    const outcome = await this.#call('delete', resource, () => this.#handler.delete(this.#service, resource, options))
    this.#log('info', 'resource deleted', { resource: resource.metadata.name, outcome })
  }

  async #resolve(resource: TResource, options: ReconcileOptions): Promise<void> {
    if (this.#handler.resolve) {
      await this.#handler.resolve(resource, options)
    }
  }

  async #call<T>(hook: ReconcileHook, resource: TResource, action: () => Promise<T>): Promise<T> {
    try {
      return await action()
    } catch (error) {
      if (passThrough(error)) {
        throw error
      }
      throw new ReconcileError(hook, resource.metadata.name, `failed to ${hook} ${this.#handler.kind} resource`, {
        cause: error,
      })
    }
  }

  #log(level: LogLevel, message: string, fields?: LogFields): void {
    writeLog(this.#logger, level, message, fields)
  }
}

export interface ManagedConnectorOptions<TResource extends ManagedResource<unknown, TObservation>, TObservation> {
  readonly handler: ResourceHandler<TResource, TObservation>
  readonly cache: ConnectionCache<TemporalService>
  readonly credentials: CredentialSource
  readonly logger?: Logger
}

/** Hands out externals bound to a cached service for one resource kind. */
export class ManagedConnector<TResource extends ManagedResource<unknown, TObservation>, TObservation> {
  readonly #handler: ResourceHandler<TResource, TObservation>
  readonly #cache: ConnectionCache<TemporalService>
  readonly #credentials: CredentialSource
  readonly #logger: Logger

  constructor(options: ManagedConnectorOptions<TResource, TObservation>) {
    this.#handler = options.handler
    this.#cache = options.cache
    this.#credentials = options.credentials
    this.#logger = (options.logger ?? makeSilentLogger()).child({ controller: options.handler.kind })
  }

  get kind(): string {
    return this.#handler.kind
  }

  async connect(resource: TResource, options: ReconcileOptions = {}): Promise<ManagedExternal<TResource, TObservation>> {
    const name = resource.metadata.name
    if (resource.kind !== undefined && resource.kind !== this.#handler.kind) {
      throw new PreconditionError(`managed resource ${name} is not a ${this.#handler.kind} custom resource`)
    }

    let credentials: Uint8Array
    try {
      credentials = await this.#credentials.resolve(resource, options.signal)
    } catch (error) {
      throw new ReconcileError('connect', name, 'cannot get credentials', { cause: error })
    }

    try {
      const cached = await runOrThrow(
        this.#cache.acquire(credentials, { signal: options.signal, timeoutMs: options.timeoutMs }),
      )
      return new ManagedExternal(cached.client, this.#handler, this.#logger)
    } catch (error) {
      throw new ReconcileError('connect', name, 'cannot create new Service', { cause: error })
    }
  }

  async disconnect(): Promise<void> {
    await Effect.runPromise(this.#cache.releaseAll)
  }
}
