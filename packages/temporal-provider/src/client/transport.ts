import { Connection, type ConnectionOptions } from '@temporalio/client'
import type { temporal } from '@temporalio/proto'

import type { TemporalConnectionConfig } from '../config'
import { TemporalTlsHandshakeError } from '../errors'
import { toTemporalRpcError } from './status'

export interface WorkflowServiceRpc {
  registerNamespace(
    request: temporal.api.workflowservice.v1.IRegisterNamespaceRequest,
  ): Promise<temporal.api.workflowservice.v1.IRegisterNamespaceResponse>
  describeNamespace(
    request: temporal.api.workflowservice.v1.IDescribeNamespaceRequest,
  ): Promise<temporal.api.workflowservice.v1.IDescribeNamespaceResponse>
  updateNamespace(
    request: temporal.api.workflowservice.v1.IUpdateNamespaceRequest,
  ): Promise<temporal.api.workflowservice.v1.IUpdateNamespaceResponse>
  listNamespaces(
    request: temporal.api.workflowservice.v1.IListNamespacesRequest,
  ): Promise<temporal.api.workflowservice.v1.IListNamespacesResponse>
}

export interface OperatorServiceRpc {
  addSearchAttributes(
    request: temporal.api.operatorservice.v1.IAddSearchAttributesRequest,
  ): Promise<temporal.api.operatorservice.v1.IAddSearchAttributesResponse>
  removeSearchAttributes(
    request: temporal.api.operatorservice.v1.IRemoveSearchAttributesRequest,
  ): Promise<temporal.api.operatorservice.v1.IRemoveSearchAttributesResponse>
  listSearchAttributes(
    request: temporal.api.operatorservice.v1.IListSearchAttributesRequest,
  ): Promise<temporal.api.operatorservice.v1.IListSearchAttributesResponse>
  deleteNamespace(
    request: temporal.api.operatorservice.v1.IDeleteNamespaceRequest,
  ): Promise<temporal.api.operatorservice.v1.IDeleteNamespaceResponse>
}

/** The slice of `@temporalio/client`'s `Connection` the provider calls. */
export interface TemporalConnection {
  readonly workflowService: WorkflowServiceRpc
  readonly operatorService: OperatorServiceRpc
  withAbortSignal<R>(signal: AbortSignal, fn: () => Promise<R>): Promise<R>
  withDeadline<R>(deadline: number | Date, fn: () => Promise<R>): Promise<R>
  close(): Promise<void>
}

export interface DialOptions {
  readonly signal?: AbortSignal
  /** Upper bound on establishing the connection. */
  readonly timeoutMs?: number
}

export type DialTemporal = (config: TemporalConnectionConfig, options?: DialOptions) => Promise<TemporalConnection>

const TLS_ERROR_CODE_PREFIXES = ['ERR_TLS_', 'ERR_SSL_']
const TLS_ERROR_MESSAGE_HINTS = [/handshake/i, /certificate/i, /secure tls/i, /ssl/i]

const errnoCode = (error: Error): string | undefined =>
  'code' in error && typeof error.code === 'string' ? error.code : undefined

export const wrapDialError = (error: unknown, config: TemporalConnectionConfig): Error => {
  if (config.tls && error instanceof Error) {
    const cause = error.cause instanceof Error ? error.cause : error
    const code = errnoCode(cause)
    if (code && TLS_ERROR_CODE_PREFIXES.some((prefix) => code.startsWith(prefix))) {
      return new TemporalTlsHandshakeError(`Temporal TLS handshake with ${config.hostPort} failed (${code})`, {
        cause,
      })
    }
    if (TLS_ERROR_MESSAGE_HINTS.some((pattern) => pattern.test(cause.message))) {
      return new TemporalTlsHandshakeError(`Temporal TLS handshake with ${config.hostPort} failed`, { cause })
    }
  }
  return toTemporalRpcError('connect', error)
}

export const buildConnectionOptions = (
  config: TemporalConnectionConfig,
  options: DialOptions = {},
): ConnectionOptions => {
  const base: ConnectionOptions =
    options.timeoutMs === undefined
      ? { address: config.hostPort }
      : { address: config.hostPort, connectTimeout: options.timeoutMs }
  if (!config.tls) {
    return base
  }
  return {
    ...base,
    tls: {
      serverRootCACertificate: config.tls.serverRootCACertificate,
      serverNameOverride: config.tls.serverNameOverride,
      clientCertPair: config.tls.clientCertPair,
    },
  }
}

export const dialTemporal: DialTemporal = async (config, options) => {
  try {
    return await Connection.connect(buildConnectionOptions(config, options))
  } catch (error) {
    throw wrapDialError(error, config)
  }
}

const dialAborted = (message: string) => {
  const error = new Error(message)
  error.name = 'AbortError'
  return toTemporalRpcError('connect', error)
}

/**
 * Runs `dial` until it settles, the signal aborts or the deadline passes. Aborts and
 * deadlines reject with a `cancelled` rpc error; a connection that arrives after that
 * is handed to `onLateConnection`.
 */
export const dialWithin = (
  dial: () => Promise<TemporalConnection>,
  options: DialOptions,
  onLateConnection: (connection: TemporalConnection) => void,
): Promise<TemporalConnection> => {
  const { signal, timeoutMs } = options
  if (signal?.aborted) {
    return Promise.reject(dialAborted('dial cancelled'))
  }
  if (!signal && timeoutMs === undefined) {
    return dial()
  }

  return new Promise<TemporalConnection>((resolve, reject) => {
    let settled = false
    let timer: ReturnType<typeof setTimeout> | undefined
    const settle = () => {
      settled = true
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }
    const fail = (error: unknown) => {
      if (settled) return
      settle()
      reject(error)
    }
    const onAbort = () => fail(dialAborted('dial cancelled'))

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => fail(dialAborted(`dial exceeded its ${timeoutMs}ms deadline`)), timeoutMs)
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    dial().then((connection) => {
      if (settled) {
        onLateConnection(connection)
        return
      }
      settle()
      resolve(connection)
    }, fail)
  })
}
