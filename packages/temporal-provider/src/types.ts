import type { Condition } from './controller/conditions'

export const ARCHIVAL_STATES = ['Disabled', 'Enabled'] as const
export type ArchivalState = (typeof ARCHIVAL_STATES)[number]
export type ObservedArchivalState = ArchivalState | 'Unspecified'

export type NamespaceState = 'Registered' | 'Deprecated' | 'Deleted' | 'Unspecified'

export const SEARCH_ATTRIBUTE_TYPES = ['Text', 'Keyword', 'Int', 'Double', 'Bool', 'Datetime', 'KeywordList'] as const
export type SearchAttributeType = (typeof SEARCH_ATTRIBUTE_TYPES)[number]
export type ObservedSearchAttributeType = SearchAttributeType | 'Unspecified'

export const DEFAULT_RETENTION_DAYS = 30

export interface TemporalNamespaceParameters {
  name: string
  description?: string
  ownerEmail?: string
  workflowExecutionRetentionDays?: number
  data?: Record<string, string>
  historyArchivalState?: ArchivalState
  historyArchivalUri?: string
  visibilityArchivalState?: ArchivalState
  visibilityArchivalUri?: string
}

export interface TemporalNamespaceObservation {
  id: string
  name: string
  description?: string
  ownerEmail?: string
  workflowExecutionRetentionDays: number
  data?: Record<string, string>
  historyArchivalState: ObservedArchivalState
  historyArchivalUri?: string
  visibilityArchivalState: ObservedArchivalState
  visibilityArchivalUri?: string
  state: NamespaceState
}

export interface ResourceReference {
  name: string
}

export interface ResourceSelector {
  matchLabels?: Record<string, string>
}

export interface SearchAttributeParameters {
  name: string
  type: SearchAttributeType
  temporalNamespaceName?: string
  temporalNamespaceNameRef?: ResourceReference
  temporalNamespaceNameSelector?: ResourceSelector
}

/** A search attribute whose owning namespace is known. */
export interface ResolvedSearchAttribute {
  name: string
  type: SearchAttributeType
  temporalNamespaceName: string
}

export interface SearchAttributeObservation {
  name: string
  type: ObservedSearchAttributeType
  temporalNamespaceName: string
}

export interface ResourceMetadata {
  name: string
  annotations?: Record<string, string>
  labels?: Record<string, string>
  deletionTimestamp?: string
  generation?: number
}

export interface ManagedResource<TParameters, TObservation> {
  kind?: string
  metadata: ResourceMetadata
  spec: {
    forProvider: TParameters
    providerConfigRef?: ResourceReference
  }
  status?: {
    atProvider?: TObservation
    conditions?: Condition[]
  }
}

export type TemporalNamespace = ManagedResource<TemporalNamespaceParameters, TemporalNamespaceObservation>
export type SearchAttribute = ManagedResource<SearchAttributeParameters, SearchAttributeObservation>
