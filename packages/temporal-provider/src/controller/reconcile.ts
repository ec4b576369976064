import type { ManagedResource } from '../types'
import type { ExternalObservation, ManagedConnector, ReconcileOptions } from './managed'

export type ReconcileAction = 'none' | 'created' | 'updated' | 'deleted'

export interface ReconcileResult {
  readonly action: ReconcileAction
  readonly observation: ExternalObservation
}

/**
 * Runs one connect, observe, act, disconnect pass for a resource. The connector is
 * always disconnected, including when a step throws; errors are rethrown unchanged.
 */
export const reconcileOnce = async <TResource extends ManagedResource<unknown, TObservation>, TObservation>(
  connector: ManagedConnector<TResource, TObservation>,
  resource: TResource,
  options: ReconcileOptions = {},
): Promise<ReconcileResult> => {
  const external = await connector.connect(resource, options)
  try {
    const observation = await external.observe(resource, options)

    if (resource.metadata.deletionTimestamp) {
      if (!observation.resourceExists) {
        return { action: 'none', observation }
      }
      await external.delete(resource, options)
      return { action: 'deleted', observation }
    }

    if (!observation.resourceExists) {
      await external.create(resource, options)
      return { action: 'created', observation }
    }
    if (!observation.resourceUpToDate) {
      await external.update(resource, options)
      return { action: 'updated', observation }
    }
    return { action: 'none', observation }
  } finally {
    await connector.disconnect()
  }
}
