export type RemoteErrorKind = 'not-found' | 'already-exists' | 'invalid-state' | 'cancelled' | 'unavailable' | 'unexpected'

const RETRYABLE_KINDS: ReadonlySet<RemoteErrorKind> = new Set(['cancelled', 'unavailable'])

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

export class ProviderConfigError extends Error {
  override readonly cause?: unknown
  readonly issues: readonly string[]

  constructor(message: string, options: { cause?: unknown; issues?: readonly string[] } = {}) {
    super(message)
    this.name = 'ProviderConfigError'
    this.cause = options.cause
    this.issues = options.issues ?? []
  }
}

export class PreconditionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PreconditionError'
  }
}

export class ImmutableResourceError extends Error {
  readonly externalName: string

  constructor(externalName: string, message: string) {
    super(message)
    this.name = 'ImmutableResourceError'
    this.externalName = externalName
  }
}

export interface TemporalRpcErrorInit {
  readonly operation: string
  readonly kind: RemoteErrorKind
  readonly code?: number
  readonly cause?: unknown
}

export class TemporalRpcError extends Error {
  override readonly cause?: unknown
  readonly operation: string
  readonly kind: RemoteErrorKind
  readonly code?: number
  readonly retryable: boolean

  constructor(message: string, init: TemporalRpcErrorInit) {
    super(message)
    this.name = 'TemporalRpcError'
    this.cause = init.cause
    this.operation = init.operation
    this.kind = init.kind
    this.code = init.code
    this.retryable = RETRYABLE_KINDS.has(init.kind)
  }
}

export const isRemoteErrorKind = (error: unknown, kind: RemoteErrorKind): error is TemporalRpcError =>
  error instanceof TemporalRpcError && error.kind === kind

const DEFAULT_TLS_SUGGESTIONS = [
  'Verify caCert, certFile and keyFile in the provider config contain valid PEM material',
  'Set serverName to a Subject Alternative Name of the server certificate',
  'Set useTLS to false only for trusted development clusters',
] as const

export class TemporalTlsHandshakeError extends Error {
  override readonly cause?: unknown
  readonly suggestions: readonly string[]

  constructor(message: string, options: { cause?: unknown; suggestions?: readonly string[] } = {}) {
    super(message)
    this.name = 'TemporalTlsHandshakeError'
    this.cause = options.cause
    this.suggestions = options.suggestions ?? DEFAULT_TLS_SUGGESTIONS
  }
}

export type ReconcileHook = 'connect' | 'describe' | 'create' | 'update' | 'delete'

/** A reconcile hook failure. `retryable` follows the remote error it wraps. */
export class ReconcileError extends Error {
  override readonly cause?: unknown
  readonly hook: ReconcileHook
  readonly resourceName: string

  constructor(hook: ReconcileHook, resourceName: string, message: string, options: { cause?: unknown } = {}) {
    super(options.cause === undefined ? message : `${message}: ${describeError(options.cause)}`)
    this.name = 'ReconcileError'
    this.hook = hook
    this.resourceName = resourceName
    this.cause = options.cause
  }

  get retryable(): boolean {
    return this.cause instanceof TemporalRpcError && this.cause.retryable
  }
}
