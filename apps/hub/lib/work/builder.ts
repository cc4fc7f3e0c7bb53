import type { Manifest, WorkBundle, WorkLocation, WorkName, WorkOwner } from '@workbridge/core'
import { InvalidTargetError } from '../errors'
import { OWNER_NAMESPACE_ANNOTATION, OWNER_NAME_ANNOTATION } from './naming'

export interface BuildWorkBundleOptions {
  name: WorkName
  location: WorkLocation
  labels?: Record<string, string>
  manifests: Manifest[]

  /**
   * Recorded in the provenance annotations.
   */
  owner: WorkOwner
}

/**
 * True when `location` can address a managed cluster.
 */
export function isValidLocation(location: WorkLocation): boolean {
  return location.trim() !== ''
}

/**
 * Assemble a work bundle addressed to `location`.
 * @throws InvalidTargetError when the location is empty
 */
export function buildWorkBundle(options: BuildWorkBundleOptions): WorkBundle {
  if (!isValidLocation(options.location)) {
    throw new InvalidTargetError(options.name)
  }

  return {
    name: options.name,
    location: options.location,
    labels: { ...options.labels },
    annotations: {
      [OWNER_NAME_ANNOTATION]: options.owner.name,
      [OWNER_NAMESPACE_ANNOTATION]: options.owner.namespace,
    },
    manifests: [...options.manifests],
  }
}
