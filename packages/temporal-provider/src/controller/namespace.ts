import type { NamespaceState, TemporalNamespace, TemporalNamespaceObservation } from '../types'
import { toNamespaceProjection } from './compare'
import { type ConditionUpdate, available, deleting, unavailable } from './conditions'
import type { ResourceHandler } from './managed'

export const TEMPORAL_NAMESPACE_KIND = 'TemporalNamespace'

export const namespaceReadiness = (state: NamespaceState): ConditionUpdate => {
  switch (state) {
    case 'Registered':
      return available()
    case 'Deleted':
      return deleting()
    default:
      return unavailable()
  }
}

export const namespaceHandler: ResourceHandler<TemporalNamespace, TemporalNamespaceObservation> = {
  kind: TEMPORAL_NAMESPACE_KIND,
  describe: (service, resource, options) => service.describeNamespaceByName(resource.spec.forProvider.name, options),
  create: async (service, resource, options) => {
    await service.createNamespace(resource.spec.forProvider, options)
    return resource.spec.forProvider.name
  },
  update: (service, resource, options) => service.updateNamespaceByName(resource.spec.forProvider, options),
  delete: async (service, resource, options) => {
    const deletion = await service.deleteNamespace(resource.spec.forProvider.name, options)
    return deletion.kind
  },
  desired: (resource) => toNamespaceProjection(resource.spec.forProvider),
  observed: (observation) => toNamespaceProjection(observation),
  readiness: (observation) => namespaceReadiness(observation.state),
}
