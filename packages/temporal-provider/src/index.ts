export type {
  CallOptions,
  ConnectTemporalServiceOptions,
  CreateTemporalServiceOptions,
  NamespaceService,
  SearchAttributeService,
  TemporalService,
} from './client'
export { NamespaceDeletion, connectTemporalService, createTemporalService } from './client'
export { classifyRemoteError } from './client/status'
export type { DialOptions, DialTemporal, OperatorServiceRpc, TemporalConnection, WorkflowServiceRpc } from './client/transport'
export { buildConnectionOptions, dialTemporal } from './client/transport'
export type {
  LoadProviderSettingsOptions,
  ParseProviderConfigOptions,
  ProviderCredentials,
  ProviderSettings,
  TLSConfig,
  TemporalConnectionConfig,
} from './config'
export { loadProviderSettings, parseProviderConfig, parseProviderCredentials } from './config'
export type { AcquireOptions, CacheEntrySummary, CachedConnection, Closable, ConnectionCache } from './connection/cache'
export { credentialDigest, makeConnectionCache } from './connection/cache'
export type { Comparison, NamespaceProjection, SearchAttributeProjection } from './controller/compare'
export { compareProjections, toNamespaceProjection, toSearchAttributeProjection } from './controller/compare'
export type { Condition } from './controller/conditions'
export { EXTERNAL_NAME_ANNOTATION, getExternalName } from './controller/external-name'
export type {
  CredentialSource,
  ExternalObservation,
  ReconcileOptions,
  ResourceHandler,
} from './controller/managed'
export { ManagedConnector, ManagedExternal } from './controller/managed'
export { TEMPORAL_NAMESPACE_KIND, namespaceHandler } from './controller/namespace'
export type { ReconcileAction, ReconcileResult } from './controller/reconcile'
export { reconcileOnce } from './controller/reconcile'
export type { NamespaceLookup } from './controller/resolve'
export { inMemoryNamespaceLookup, resolveNamespaceName } from './controller/resolve'
export { SEARCH_ATTRIBUTE_KIND, createSearchAttributeHandler } from './controller/search-attribute'
export {
  ImmutableResourceError,
  PreconditionError,
  ProviderConfigError,
  ReconcileError,
  TemporalRpcError,
  TemporalTlsHandshakeError,
} from './errors'
export type { RemoteErrorKind } from './errors'
export type { LogEntry, LogFields, LogFormat, LogLevel, LogSink, Logger } from './observability/logger'
export { makeLogger } from './observability/logger'
export { staticCredentialSource } from './runtime/credentials'
export type { CreateProviderOptions, TemporalProvider } from './runtime/provider'
export { createProvider } from './runtime/provider'
export * from './types'
