import { readFile } from 'node:fs/promises'
import { z } from 'zod'

import { ProviderConfigError, describeError } from './errors'
import type { LogFormat, LogLevel } from './observability/logger'
import { isLogLevel } from './observability/logger'

const DEFAULT_LOG_LEVEL: LogLevel = 'info'
const DEFAULT_LOG_FORMAT: LogFormat = 'pretty'
const DEFAULT_LIST_PAGE_SIZE = 100
const PEM_HEADER = '-----BEGIN '
const PEM_BLOCK = /-----BEGIN [A-Z0-9 ]+-----[\s\S]+?-----END [A-Z0-9 ]+-----/

export type ReadFile = (path: string) => Promise<Buffer>

export interface TLSCertPair {
  crt: Buffer
  key: Buffer
}

export interface TLSConfig {
  serverRootCACertificate?: Buffer
  serverNameOverride?: string
  clientCertPair?: TLSCertPair
}

/** Where to reach Temporal, decoded from a provider credential blob. */
export interface TemporalConnectionConfig {
  hostPort: string
  tls?: TLSConfig
}

const providerCredentialsSchema = z.object({
  hostPort: z.string({ required_error: 'hostPort is required' }).trim().min(1, 'hostPort must not be empty'),
  useTLS: z.boolean().default(false),
  caCert: z.string().optional(),
  caCertPem: z.string().optional(),
  certFile: z.string().optional(),
  certPem: z.string().optional(),
  keyFile: z.string().optional(),
  keyPem: z.string().optional(),
  serverName: z.string().optional(),
})

export type ProviderCredentials = z.infer<typeof providerCredentialsSchema>

const canonicalKeys = new Map(
  Object.keys(providerCredentialsSchema.shape).map((key) => [key.toLowerCase(), key] as const),
)

// Credential blobs written for older releases use `HostPort`, `UseTLS` and so on.
const normalizeKeys = (value: unknown): unknown => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return value
  }
  const output: Record<string, unknown> = {}
  for (const [key, entry] of Object.entries(value)) {
    output[canonicalKeys.get(key.toLowerCase()) ?? key] = entry
  }
  return output
}

const nonBlank = (value: string | undefined): string | undefined =>
  value !== undefined && value.trim().length > 0 ? value : undefined

const decodeBlob = (blob: Uint8Array | string): unknown => {
  const text = typeof blob === 'string' ? blob : new TextDecoder().decode(blob)
  try {
    return JSON.parse(text)
  } catch (error) {
    throw new ProviderConfigError(`Provider config is not valid JSON: ${describeError(error)}`, { cause: error })
  }
}

export const parseProviderCredentials = (blob: Uint8Array | string): ProviderCredentials => {
  const result = providerCredentialsSchema.safeParse(normalizeKeys(decodeBlob(blob)))
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    throw new ProviderConfigError(`Invalid provider config: ${issues.join('; ')}`, { issues })
  }
  return result.data
}

interface MaterialSource {
  readonly label: 'caCert' | 'certFile' | 'keyFile'
  readonly pem?: string
  readonly pemOrPath?: string
}

const loadMaterial = async (source: MaterialSource, reader: ReadFile): Promise<Buffer | undefined> => {
  const pemOrPath = nonBlank(source.pemOrPath)
  const inline = nonBlank(source.pem) ?? (pemOrPath?.includes(PEM_HEADER) ? pemOrPath : undefined)
  if (inline !== undefined) {
    return Buffer.from(inline, 'utf8')
  }
  if (pemOrPath === undefined) {
    return undefined
  }
  try {
    return await reader(pemOrPath)
  } catch (error) {
    throw new ProviderConfigError(`Unable to read ${source.label} from ${pemOrPath}: ${describeError(error)}`, {
      cause: error,
    })
  }
}

export const looksLikePem = (material: Buffer) => PEM_BLOCK.test(material.toString('utf8'))

export interface ParseProviderConfigOptions {
  fs?: {
    readFile?: ReadFile
  }
}

const buildTlsConfig = async (
  credentials: ProviderCredentials,
  options: ParseProviderConfigOptions,
): Promise<TLSConfig | undefined> => {
  if (!credentials.useTLS) {
    return undefined
  }
  const reader = options.fs?.readFile ?? readFile
  const sources: MaterialSource[] = [
    { label: 'caCert', pem: credentials.caCertPem, pemOrPath: credentials.caCert },
    { label: 'certFile', pem: credentials.certPem, pemOrPath: credentials.certFile },
    { label: 'keyFile', pem: credentials.keyPem, pemOrPath: credentials.keyFile },
  ]
  const loaded = await Promise.all(sources.map((source) => loadMaterial(source, reader)))
  const [ca, crt, key] = loaded

  if (!ca || !crt || !key) {
    const missing = sources.filter((_, index) => loaded[index] === undefined).map((source) => source.label)
    throw new ProviderConfigError(`useTLS requires caCert, certFile and keyFile; missing: ${missing.join(', ')}`, {
      issues: missing,
    })
  }

  const malformed = sources.filter((_, index) => {
    const material = loaded[index]
    return material !== undefined && !looksLikePem(material)
  })
  if (malformed.length > 0) {
    const labels = malformed.map((source) => source.label)
    throw new ProviderConfigError(`TLS material is not PEM encoded: ${labels.join(', ')}`, { issues: labels })
  }

  const tls: TLSConfig = {
    serverRootCACertificate: ca,
    clientCertPair: { crt, key },
  }
  const serverName = nonBlank(credentials.serverName)
  if (serverName) {
    tls.serverNameOverride = serverName.trim()
  }
  return tls
}

export const parseProviderConfig = async (
  blob: Uint8Array | string,
  options: ParseProviderConfigOptions = {},
): Promise<TemporalConnectionConfig> => {
  const credentials = parseProviderCredentials(blob)
  const tls = await buildTlsConfig(credentials, options)
  return tls ? { hostPort: credentials.hostPort, tls } : { hostPort: credentials.hostPort }
}

interface ProviderEnvironment {
  TEMPORAL_PROVIDER_LOG_LEVEL?: string
  TEMPORAL_PROVIDER_LOG_FORMAT?: string
  TEMPORAL_PROVIDER_RPC_TIMEOUT_MS?: string
  TEMPORAL_PROVIDER_LIST_PAGE_SIZE?: string
}

export interface ProviderSettings {
  logLevel: LogLevel
  logFormat: LogFormat
  /** Deadline applied to every remote call when the caller gives none. */
  rpcTimeoutMs?: number
  listPageSize: number
}

export interface LoadProviderSettingsOptions {
  env?: NodeJS.ProcessEnv
  defaults?: Partial<ProviderSettings>
}

const sanitizeEnvironment = (env: NodeJS.ProcessEnv): ProviderEnvironment => {
  const read = (key: keyof ProviderEnvironment) => {
    const value = env[key]
    if (typeof value !== 'string') {
      return undefined
    }
    const trimmed = value.trim()
    return trimmed.length === 0 ? undefined : trimmed
  }

  return {
    TEMPORAL_PROVIDER_LOG_LEVEL: read('TEMPORAL_PROVIDER_LOG_LEVEL'),
    TEMPORAL_PROVIDER_LOG_FORMAT: read('TEMPORAL_PROVIDER_LOG_FORMAT'),
    TEMPORAL_PROVIDER_RPC_TIMEOUT_MS: read('TEMPORAL_PROVIDER_RPC_TIMEOUT_MS'),
    TEMPORAL_PROVIDER_LIST_PAGE_SIZE: read('TEMPORAL_PROVIDER_LIST_PAGE_SIZE'),
  }
}

const parseLogLevel = (value: string | undefined): LogLevel | undefined => {
  if (!value) {
    return undefined
  }
  const normalized = value.toLowerCase()
  if (isLogLevel(normalized)) {
    return normalized
  }
  throw new ProviderConfigError(`Invalid TEMPORAL_PROVIDER_LOG_LEVEL: ${value}`)
}

const parseLogFormat = (value: string | undefined): LogFormat | undefined => {
  if (!value) {
    return undefined
  }
  const normalized = value.toLowerCase()
  if (normalized === 'json' || normalized === 'pretty') {
    return normalized
  }
  throw new ProviderConfigError(`Invalid TEMPORAL_PROVIDER_LOG_FORMAT: ${value}`)
}

const parsePositiveInt = (raw: string | undefined, context: string): number | undefined => {
  if (raw === undefined) {
    return undefined
  }
  const parsed = Number(raw)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ProviderConfigError(`Invalid ${context}: ${raw}`)
  }
  return parsed
}

export const loadProviderSettings = (options: LoadProviderSettingsOptions = {}): ProviderSettings => {
  const env = sanitizeEnvironment(options.env ?? process.env)
  const rpcTimeoutMs =
    parsePositiveInt(env.TEMPORAL_PROVIDER_RPC_TIMEOUT_MS, 'TEMPORAL_PROVIDER_RPC_TIMEOUT_MS') ??
    options.defaults?.rpcTimeoutMs

  return {
    logLevel: parseLogLevel(env.TEMPORAL_PROVIDER_LOG_LEVEL) ?? options.defaults?.logLevel ?? DEFAULT_LOG_LEVEL,
    logFormat: parseLogFormat(env.TEMPORAL_PROVIDER_LOG_FORMAT) ?? options.defaults?.logFormat ?? DEFAULT_LOG_FORMAT,
    ...(rpcTimeoutMs === undefined ? {} : { rpcTimeoutMs }),
    listPageSize:
      parsePositiveInt(env.TEMPORAL_PROVIDER_LIST_PAGE_SIZE, 'TEMPORAL_PROVIDER_LIST_PAGE_SIZE') ??
      options.defaults?.listPageSize ??
      DEFAULT_LIST_PAGE_SIZE,
  }
}
