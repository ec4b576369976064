import type { ManagedResource } from '../types'

export const EXTERNAL_NAME_ANNOTATION = 'crossplane.io/external-name'

export const getExternalName = (resource: ManagedResource<unknown, unknown>): string | undefined => {
  const value = resource.metadata.annotations?.[EXTERNAL_NAME_ANNOTATION]
  return value && value.length > 0 ? value : undefined
}

export const setExternalName = (resource: ManagedResource<unknown, unknown>, name: string): void => {
  resource.metadata.annotations = { ...resource.metadata.annotations, [EXTERNAL_NAME_ANNOTATION]: name }
}
