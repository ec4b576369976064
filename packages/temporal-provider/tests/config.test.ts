import { describe, expect, it, vi } from 'vitest'

import { loadProviderSettings, parseProviderConfig } from '../src/config'
import { ProviderConfigError } from '../src/errors'

const pem = (label: string) => `-----BEGIN ${label}-----\nMIIBplaceholder\n-----END ${label}-----\n`

const CA_PEM = pem('CERTIFICATE')
const CERT_PEM = pem('CERTIFICATE')
const KEY_PEM = pem('PRIVATE KEY')

const fakeReadFile = (files: Record<string, string>) =>
  vi.fn(async (path: string) => {
    const content = files[path]
    if (content === undefined) {
      throw new Error(`ENOENT: no such file, open '${path}'`)
    }
    return Buffer.from(content, 'utf8')
  })

describe('parseProviderConfig', () => {
  it('parses a plain-text connection', async () => {
    await expect(parseProviderConfig('{"hostPort":"localhost:7233"}')).resolves.toEqual({ hostPort: 'localhost:7233' })
  })

  it('accepts byte blobs and legacy key casing', async () => {
    const blob = new TextEncoder().encode('{"HostPort":" temporal.internal:7233 ","UseTLS":false}')
    await expect(parseProviderConfig(blob)).resolves.toEqual({ hostPort: 'temporal.internal:7233' })
  })

  it('rejects a missing hostPort', async () => {
    const error = await parseProviderConfig('{"useTLS":false}').catch((caught: unknown) => caught)
    expect(error).toBeInstanceOf(ProviderConfigError)
    expect(error).toMatchObject({
      message: 'Invalid provider config: hostPort: hostPort is required',
      issues: ['hostPort: hostPort is required'],
    })
  })

  it('rejects malformed JSON', async () => {
    await expect(parseProviderConfig('{hostPort:')).rejects.toThrow(/^Provider config is not valid JSON: /)
  })

  it('ignores TLS material unless useTLS is set', async () => {
    const readFile = fakeReadFile({})
    await expect(
      parseProviderConfig('{"hostPort":"localhost:7233","caCert":"/etc/temporal/ca.pem"}', { fs: { readFile } }),
    ).resolves.toEqual({ hostPort: 'localhost:7233' })
    expect(readFile).not.toHaveBeenCalled()
  })

  it('builds TLS options from inline PEM values', async () => {
    const config = await parseProviderConfig(
      JSON.stringify({
        hostPort: 'temporal.internal:7233',
        useTLS: true,
        caCertPem: CA_PEM,
        certPem: CERT_PEM,
        keyPem: KEY_PEM,
        serverName: 'temporal.internal',
      }),
    )

    expect(config.hostPort).toBe('temporal.internal:7233')
    expect(config.tls?.serverRootCACertificate?.toString('utf8')).toBe(CA_PEM)
    expect(config.tls?.clientCertPair?.crt.toString('utf8')).toBe(CERT_PEM)
    expect(config.tls?.clientCertPair?.key.toString('utf8')).toBe(KEY_PEM)
    expect(config.tls?.serverNameOverride).toBe('temporal.internal')
  })

  it('reads file paths and uses PEM text given in path fields directly', async () => {
    const readFile = fakeReadFile({ '/etc/temporal/tls.crt': CERT_PEM, '/etc/temporal/tls.key': KEY_PEM })
    const config = await parseProviderConfig(
      JSON.stringify({
        hostPort: 'temporal.internal:7233',
        useTLS: true,
        caCert: CA_PEM,
        certFile: '/etc/temporal/tls.crt',
        keyFile: '/etc/temporal/tls.key',
      }),
      { fs: { readFile } },
    )

    expect(readFile.mock.calls.map(([path]) => path)).toEqual(['/etc/temporal/tls.crt', '/etc/temporal/tls.key'])
    expect(config.tls?.clientCertPair?.key.toString('utf8')).toBe(KEY_PEM)
    expect(config.tls?.serverRootCACertificate?.toString('utf8')).toBe(CA_PEM)
    expect(config.tls?.serverNameOverride).toBeUndefined()
  })

  it('requires every TLS material when useTLS is set', async () => {
    const error = await parseProviderConfig(
      JSON.stringify({ hostPort: 'temporal.internal:7233', useTLS: true, caCertPem: CA_PEM, certPem: CERT_PEM }),
    ).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(ProviderConfigError)
    expect(error).toMatchObject({
      message: 'useTLS requires caCert, certFile and keyFile; missing: keyFile',
      issues: ['keyFile'],
    })
  })

  it('rejects material that is not PEM encoded', async () => {
    const readFile = fakeReadFile({ '/etc/temporal/tls.crt': 'not a certificate' })
    await expect(
      parseProviderConfig(
        JSON.stringify({
          hostPort: 'temporal.internal:7233',
          useTLS: true,
          caCertPem: CA_PEM,
          certFile: '/etc/temporal/tls.crt',
          keyPem: KEY_PEM,
        }),
        { fs: { readFile } },
      ),
    ).rejects.toThrow('TLS material is not PEM encoded: certFile')
  })

  it('reports unreadable files', async () => {
    await expect(
      parseProviderConfig(
        JSON.stringify({
          hostPort: 'temporal.internal:7233',
          useTLS: true,
          caCert: '/missing/ca.pem',
          certPem: CERT_PEM,
          keyPem: KEY_PEM,
        }),
        { fs: { readFile: fakeReadFile({}) } },
      ),
    ).rejects.toThrow("Unable to read caCert from /missing/ca.pem: ENOENT: no such file, open '/missing/ca.pem'")
  })
})

describe('loadProviderSettings', () => {
  it('falls back to defaults', () => {
    expect(loadProviderSettings({ env: {} })).toEqual({ logLevel: 'info', logFormat: 'pretty', listPageSize: 100 })
  })

  it('reads the environment', () => {
    const settings = loadProviderSettings({
      env: {
        TEMPORAL_PROVIDER_LOG_LEVEL: 'DEBUG',
        TEMPORAL_PROVIDER_LOG_FORMAT: 'json',
        TEMPORAL_PROVIDER_RPC_TIMEOUT_MS: '2500',
        TEMPORAL_PROVIDER_LIST_PAGE_SIZE: ' 25 ',
      },
    })
    expect(settings).toEqual({ logLevel: 'debug', logFormat: 'json', rpcTimeoutMs: 2500, listPageSize: 25 })
  })

  it('prefers the environment over explicit defaults', () => {
    const settings = loadProviderSettings({
      env: { TEMPORAL_PROVIDER_LIST_PAGE_SIZE: '10' },
      defaults: { listPageSize: 50, rpcTimeoutMs: 1000 },
    })
    expect(settings).toEqual({ logLevel: 'info', logFormat: 'pretty', rpcTimeoutMs: 1000, listPageSize: 10 })
  })

  it.each([
    { key: 'TEMPORAL_PROVIDER_LOG_LEVEL', value: 'verbose' },
    { key: 'TEMPORAL_PROVIDER_LOG_FORMAT', value: 'xml' },
    { key: 'TEMPORAL_PROVIDER_RPC_TIMEOUT_MS', value: '2.5' },
    { key: 'TEMPORAL_PROVIDER_LIST_PAGE_SIZE', value: '0' },
  ])('rejects $key=$value', ({ key, value }) => {
    expect(() => loadProviderSettings({ env: { [key]: value } })).toThrow(`Invalid ${key}: ${value}`)
  })
})
