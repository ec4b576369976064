import { temporal } from '@temporalio/proto'

import { type DurationLike, daysToDuration, durationToDays } from '../common/duration'
import {
  type ArchivalState,
  DEFAULT_RETENTION_DAYS,
  type NamespaceState,
  type ObservedArchivalState,
  type TemporalNamespaceObservation,
  type TemporalNamespaceParameters,
} from '../types'

const { ArchivalState: ArchivalStateValue, NamespaceState: NamespaceStateValue } = temporal.api.enums.v1

export const SYSTEM_NAMESPACE = 'temporal-system'

export const toArchivalStateValue = (state: ArchivalState | undefined): temporal.api.enums.v1.ArchivalState =>
  state === 'Enabled' ? ArchivalStateValue.ARCHIVAL_STATE_ENABLED : ArchivalStateValue.ARCHIVAL_STATE_DISABLED

export const toArchivalStateName = (
  value: temporal.api.enums.v1.ArchivalState | null | undefined,
): ObservedArchivalState => {
  switch (value) {
    case ArchivalStateValue.ARCHIVAL_STATE_DISABLED:
      return 'Disabled'
    case ArchivalStateValue.ARCHIVAL_STATE_ENABLED:
      return 'Enabled'
    default:
      return 'Unspecified'
  }
}

export const toNamespaceStateName = (value: temporal.api.enums.v1.NamespaceState | null | undefined): NamespaceState => {
  switch (value) {
    case NamespaceStateValue.NAMESPACE_STATE_REGISTERED:
      return 'Registered'
    case NamespaceStateValue.NAMESPACE_STATE_DEPRECATED:
      return 'Deprecated'
    case NamespaceStateValue.NAMESPACE_STATE_DELETED:
      return 'Deleted'
    default:
      return 'Unspecified'
  }
}

const optional = (value: string | null | undefined): string | undefined =>
  value === null || value === undefined || value.length === 0 ? undefined : value

const optionalData = (data: { [key: string]: string } | null | undefined): Record<string, string> | undefined => {
  if (!data) return undefined
  const entries = Object.entries(data)
  return entries.length === 0 ? undefined : Object.fromEntries(entries)
}

const retentionOf = (params: TemporalNamespaceParameters) =>
  daysToDuration(params.workflowExecutionRetentionDays ?? DEFAULT_RETENTION_DAYS)

export const buildRegisterNamespaceRequest = (
  params: TemporalNamespaceParameters,
): temporal.api.workflowservice.v1.IRegisterNamespaceRequest => ({
  namespace: params.name,
  description: params.description ?? '',
  ownerEmail: params.ownerEmail ?? '',
  workflowExecutionRetentionPeriod: retentionOf(params),
  data: { ...params.data },
  historyArchivalState: toArchivalStateValue(params.historyArchivalState),
  historyArchivalUri: params.historyArchivalUri ?? '',
  visibilityArchivalState: toArchivalStateValue(params.visibilityArchivalState),
  visibilityArchivalUri: params.visibilityArchivalUri ?? '',
})

export const buildUpdateNamespaceRequest = (
  params: TemporalNamespaceParameters,
): temporal.api.workflowservice.v1.IUpdateNamespaceRequest => ({
  namespace: params.name,
  updateInfo: {
    description: params.description ?? '',
    ownerEmail: params.ownerEmail ?? '',
    data: { ...params.data },
  },
  config: {
    workflowExecutionRetentionTtl: retentionOf(params),
    historyArchivalState: toArchivalStateValue(params.historyArchivalState),
    historyArchivalUri: params.historyArchivalUri ?? '',
    visibilityArchivalState: toArchivalStateValue(params.visibilityArchivalState),
    visibilityArchivalUri: params.visibilityArchivalUri ?? '',
  },
})

/** Called when a remote retention period is not a whole number of days. */
export type RetentionResidualHandler = (namespace: string, residualSeconds: number) => void

export interface NamespaceDescription {
  readonly namespaceInfo?: temporal.api.namespace.v1.INamespaceInfo | null
  readonly config?: {
    readonly workflowExecutionRetentionTtl?: DurationLike | null
    readonly historyArchivalState?: temporal.api.enums.v1.ArchivalState | null
    readonly historyArchivalUri?: string | null
    readonly visibilityArchivalState?: temporal.api.enums.v1.ArchivalState | null
    readonly visibilityArchivalUri?: string | null
  } | null
}

export const toNamespaceObservation = (
  response: NamespaceDescription,
  onResidual?: RetentionResidualHandler,
): TemporalNamespaceObservation | undefined => {
  const info = response.namespaceInfo
  if (!info?.name) {
    return undefined
  }
  const config = response.config
  const retention = durationToDays(config?.workflowExecutionRetentionTtl)
  if (retention.residualSeconds !== 0) {
    onResidual?.(info.name, retention.residualSeconds)
  }

  return {
    id: info.id ?? '',
    name: info.name,
    description: optional(info.description),
    ownerEmail: optional(info.ownerEmail),
    workflowExecutionRetentionDays: retention.days,
    data: optionalData(info.data),
    historyArchivalState: toArchivalStateName(config?.historyArchivalState),
    historyArchivalUri: optional(config?.historyArchivalUri),
    visibilityArchivalState: toArchivalStateName(config?.visibilityArchivalState),
    visibilityArchivalUri: optional(config?.visibilityArchivalUri),
    state: toNamespaceStateName(info.state),
  }
}
