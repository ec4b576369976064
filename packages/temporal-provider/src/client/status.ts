import { status as GrpcStatus } from '@grpc/grpc-js'

import { type RemoteErrorKind, TemporalRpcError, describeError } from '../errors'

export const grpcStatusOf = (error: unknown): number | undefined => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
    return error.code
  }
  return undefined
}

const isAbortError = (error: unknown) => error instanceof Error && error.name === 'AbortError'

export const classifyRemoteError = (error: unknown): RemoteErrorKind => {
  if (isAbortError(error)) {
    return 'cancelled'
  }
  switch (grpcStatusOf(error)) {
    case GrpcStatus.NOT_FOUND:
      return 'not-found'
    case GrpcStatus.ALREADY_EXISTS:
      return 'already-exists'
    case GrpcStatus.FAILED_PRECONDITION:
      return 'invalid-state'
    case GrpcStatus.CANCELLED:
    case GrpcStatus.DEADLINE_EXCEEDED:
      return 'cancelled'
    case GrpcStatus.UNAVAILABLE:
    case GrpcStatus.RESOURCE_EXHAUSTED:
      return 'unavailable'
    default:
      return 'unexpected'
  }
}

export const toTemporalRpcError = (operation: string, error: unknown): TemporalRpcError => {
  if (error instanceof TemporalRpcError) {
    return error
  }
  const code = grpcStatusOf(error)
  return new TemporalRpcError(`temporal rpc ${operation} failed: ${describeError(error)}`, {
    operation,
    kind: classifyRemoteError(error),
    code,
    cause: error,
  })
}
