import { PreconditionError } from '../errors'
import type { SearchAttributeParameters, TemporalNamespace } from '../types'

/** Read access to the namespace resources a search attribute may reference. */
export interface NamespaceLookup {
  readonly get: (resourceName: string) => Promise<TemporalNamespace | undefined>
  readonly list: () => Promise<ReadonlyArray<TemporalNamespace>>
}

export const inMemoryNamespaceLookup = (resources: () => Iterable<TemporalNamespace>): NamespaceLookup => ({
  get: async (resourceName) => Array.from(resources()).find((resource) => resource.metadata.name === resourceName),
  list: async () => Array.from(resources()),
})

const matchesLabels = (resource: TemporalNamespace, matchLabels: Record<string, string>) =>
  Object.entries(matchLabels).every(([key, value]) => resource.metadata.labels?.[key] === value)

const byResourceName = (left: TemporalNamespace, right: TemporalNamespace) =>
  left.metadata.name < right.metadata.name ? -1 : left.metadata.name > right.metadata.name ? 1 : 0

export const resolveNamespaceName = async (
  params: SearchAttributeParameters,
  lookup?: NamespaceLookup,
): Promise<string> => {
  const direct = params.temporalNamespaceName?.trim()
  if (direct) {
    return direct
  }

  const reference = params.temporalNamespaceNameRef?.name
  if (reference && lookup) {
    const referenced = await lookup.get(reference)
    if (!referenced) {
      throw new PreconditionError(`referenced TemporalNamespace ${reference} does not exist`)
    }
    return referenced.spec.forProvider.name
  }

  const selector = params.temporalNamespaceNameSelector
  if (selector && lookup) {
    const matchLabels = selector.matchLabels ?? {}
    const [selected] = (await lookup.list())
      .filter((resource) => matchesLabels(resource, matchLabels))
      .sort(byResourceName)
    if (!selected) {
      throw new PreconditionError('no TemporalNamespace matches temporalNamespaceNameSelector')
    }
    return selected.spec.forProvider.name
  }

  throw new PreconditionError('temporalNamespaceName not set')
}
