import { stableJsonEqual, stableJsonStringify } from '../common/stable-json'
import {
  DEFAULT_RETENTION_DAYS,
  type ObservedArchivalState,
  type ObservedSearchAttributeType,
  type SearchAttributeObservation,
  type SearchAttributeParameters,
  type TemporalNamespaceObservation,
  type TemporalNamespaceParameters,
} from '../types'

export type Projection = Record<string, unknown>

export type NamespaceProjection = {
  name: string
  description?: string
  ownerEmail?: string
  workflowExecutionRetentionDays: number
  data?: Record<string, string>
  historyArchivalState: ObservedArchivalState
  historyArchivalUri?: string
  visibilityArchivalState: ObservedArchivalState
  visibilityArchivalUri?: string
}

export type SearchAttributeProjection = {
  name: string
  type: ObservedSearchAttributeType
  temporalNamespaceName?: string
}

export interface Comparison {
  readonly upToDate: boolean
  /** `field: desired → observed` for each differing field, joined with `; `. */
  readonly diff: string
}

const nonEmpty = (value: string | undefined) => (value ? value : undefined)

const nonEmptyData = (data: Record<string, string> | undefined) =>
  data && Object.keys(data).length > 0 ? data : undefined

export const toNamespaceProjection = (
  source: TemporalNamespaceParameters | TemporalNamespaceObservation,
): NamespaceProjection => ({
  name: source.name,
  description: nonEmpty(source.description),
  ownerEmail: nonEmpty(source.ownerEmail),
  workflowExecutionRetentionDays: source.workflowExecutionRetentionDays ?? DEFAULT_RETENTION_DAYS,
  data: nonEmptyData(source.data),
  historyArchivalState: source.historyArchivalState ?? 'Disabled',
  historyArchivalUri: nonEmpty(source.historyArchivalUri),
  visibilityArchivalState: source.visibilityArchivalState ?? 'Disabled',
  visibilityArchivalUri: nonEmpty(source.visibilityArchivalUri),
})

export const toSearchAttributeProjection = (
  source: SearchAttributeParameters | SearchAttributeObservation,
): SearchAttributeProjection => ({
  name: source.name,
  type: source.type,
  temporalNamespaceName: nonEmpty(source.temporalNamespaceName),
})

const formatValue = (value: unknown) => (value === undefined ? '<unset>' : stableJsonStringify(value))

export const diffProjections = (desired: Projection, observed: Projection): string[] => {
  const keys = Array.from(new Set([...Object.keys(desired), ...Object.keys(observed)])).sort()
  return keys
    .filter((key) => !stableJsonEqual(desired[key], observed[key]))
    .map((key) => `${key}: ${formatValue(desired[key])} → ${formatValue(observed[key])}`)
}

export const compareProjections = (desired: Projection, observed: Projection): Comparison => {
  const differences = diffProjections(desired, observed)
  return { upToDate: differences.length === 0, diff: differences.join('; ') }
}
