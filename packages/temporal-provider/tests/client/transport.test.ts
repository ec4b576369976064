import { status as GrpcStatus } from '@grpc/grpc-js'
import { describe, expect, it } from 'vitest'

import { buildConnectionOptions, wrapDialError } from '../../src/client/transport'
import type { TemporalConnectionConfig } from '../../src/config'
import { TemporalRpcError, TemporalTlsHandshakeError } from '../../src/errors'
import { createGrpcError } from '../helpers/fake-temporal'

const plain: TemporalConnectionConfig = { hostPort: 'temporal.test:7233' }
const secured: TemporalConnectionConfig = {
  hostPort: 'temporal.test:7233',
  tls: {
    serverRootCACertificate: Buffer.from('ca'),
    serverNameOverride: 'temporal.internal',
    clientCertPair: { crt: Buffer.from('crt'), key: Buffer.from('key') },
  },
}

describe('buildConnectionOptions', () => {
  it('dials plaintext without tls options', () => {
    expect(buildConnectionOptions(plain)).toEqual({ address: 'temporal.test:7233' })
  })

  it('bounds the connect with the dial timeout', () => {
    expect(buildConnectionOptions(plain, { timeoutMs: 2_500 })).toEqual({
      address: 'temporal.test:7233',
      connectTimeout: 2_500,
    })
  })

  it('passes mutual tls material through', () => {
    expect(buildConnectionOptions(secured)).toEqual({
      address: 'temporal.test:7233',
      tls: {
        serverRootCACertificate: Buffer.from('ca'),
        serverNameOverride: 'temporal.internal',
        clientCertPair: { crt: Buffer.from('crt'), key: Buffer.from('key') },
      },
    })
  })
})

describe('wrapDialError', () => {
  it('reports tls error codes as handshake failures', () => {
    const cause = Object.assign(new Error('Hostname/IP does not match'), { code: 'ERR_TLS_CERT_ALTNAME_INVALID' })

    const error = wrapDialError(cause, secured)

    expect(error).toBeInstanceOf(TemporalTlsHandshakeError)
    expect(error.message).toBe('Temporal TLS handshake with temporal.test:7233 failed (ERR_TLS_CERT_ALTNAME_INVALID)')
    expect(error.cause).toBe(cause)
  })

  it('recognises handshake failures by message', () => {
    const error = wrapDialError(new Error('unable to verify the first certificate'), secured)

    expect(error).toBeInstanceOf(TemporalTlsHandshakeError)
    expect(error.message).toBe('Temporal TLS handshake with temporal.test:7233 failed')
  })

  it('classifies other failures as rpc errors', () => {
    const error = wrapDialError(createGrpcError(GrpcStatus.UNAVAILABLE, 'No connection established'), plain)

    expect(error).toBeInstanceOf(TemporalRpcError)
    expect(error).toMatchObject({
      operation: 'connect',
      kind: 'unavailable',
      message: 'temporal rpc connect failed: 14 UNAVAILABLE: No connection established',
    })
  })

  it('ignores certificate wording when tls is off', () => {
    expect(wrapDialError(new Error('certificate expired'), plain)).toBeInstanceOf(TemporalRpcError)
  })
})
