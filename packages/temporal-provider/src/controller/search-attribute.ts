import { ImmutableResourceError, PreconditionError } from '../errors'
import type { SearchAttribute, SearchAttributeObservation } from '../types'
import { toSearchAttributeProjection } from './compare'
import { available } from './conditions'
import { getExternalName } from './external-name'
import type { ResourceHandler } from './managed'
import { type NamespaceLookup, resolveNamespaceName } from './resolve'

export const SEARCH_ATTRIBUTE_KIND = 'SearchAttribute'

const owningNamespace = (resource: SearchAttribute): string => {
  const namespace = resource.spec.forProvider.temporalNamespaceName
  if (!namespace) {
    throw new PreconditionError('temporalNamespaceName not set')
  }
  return namespace
}

export const searchAttributeExternalName = (namespace: string, name: string) => `${namespace}.${name}`

export interface SearchAttributeHandlerOptions {
  readonly lookup?: NamespaceLookup
}

export const createSearchAttributeHandler = (
  options: SearchAttributeHandlerOptions = {},
): ResourceHandler<SearchAttribute, SearchAttributeObservation> => ({
  kind: SEARCH_ATTRIBUTE_KIND,
  resolve: async (resource) => {
    resource.spec.forProvider.temporalNamespaceName = await resolveNamespaceName(
      resource.spec.forProvider,
      options.lookup,
    )
  },
  describe: async (service, resource, callOptions) =>
    service.describeSearchAttributeByName(owningNamespace(resource), resource.spec.forProvider.name, callOptions),
  create: async (service, resource, callOptions) => {
    const namespace = owningNamespace(resource)
    const { name, type } = resource.spec.forProvider
    await service.createSearchAttribute({ name, type, temporalNamespaceName: namespace }, callOptions)
    return searchAttributeExternalName(namespace, name)
  },
  update: async (_service, resource) => {
    const externalName =
      getExternalName(resource) ?? searchAttributeExternalName(owningNamespace(resource), resource.spec.forProvider.name)
    throw new ImmutableResourceError(
      externalName,
      `Search Attribute '${externalName}' can not be updated! All properties are immutable!`,
    )
  },
  delete: async (service, resource, callOptions) => {
    await service.deleteSearchAttributeByName(owningNamespace(resource), resource.spec.forProvider.name, callOptions)
    return 'deleted'
  },
  desired: (resource) => toSearchAttributeProjection(resource.spec.forProvider),
  observed: (observation) => toSearchAttributeProjection(observation),
  readiness: () => available(),
})
