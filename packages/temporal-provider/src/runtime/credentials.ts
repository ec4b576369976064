import { ProviderConfigError } from '../errors'
import type { CredentialSource } from '../controller/managed'

export const DEFAULT_PROVIDER_CONFIG = 'default'

/**
 * Serves credential blobs keyed by provider config name. Resources without a
 * `providerConfigRef` use the `default` entry.
 */
export const staticCredentialSource = (blobs: Record<string, Uint8Array | string>): CredentialSource => ({
  resolve: async (resource) => {
    const configName = resource.spec.providerConfigRef?.name ?? DEFAULT_PROVIDER_CONFIG
    const blob = blobs[configName]
    if (blob === undefined) {
      throw new ProviderConfigError(`provider config ${configName} has no credentials`)
    }
    return typeof blob === 'string' ? new TextEncoder().encode(blob) : blob
  },
})
