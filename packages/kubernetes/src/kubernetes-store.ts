/**
 * Kubernetes Work Store
 *
 * Implements WorkStore on ManifestWork custom resources in the hub cluster,
 * using the CustomObjects API from @kubernetes/client-node.
 */

import {
  MANIFEST_WORK_GROUP,
  MANIFEST_WORK_PLURAL,
  MANIFEST_WORK_VERSION,
  type ManifestWorkResource,
  type StoredWorkBundle,
  type WorkBundle,
  WorkAlreadyExistsError,
  WorkConflictError,
  type WorkLocation,
  type WorkName,
  WorkNotFoundError,
  type WorkStore,
  type WorkStoreOptions,
  raceAbort,
  safeParseManifestWork,
  toManifest,
} from '@workbridge/core'
import { CustomObjectsApi, type KubeConfig } from '@kubernetes/client-node'

interface CustomObjectRef {
  group: string
  version: string
  namespace: string
  plural: string
}

/**
 * The subset of CustomObjectsApi the store uses.
 */
export interface CustomObjectsClient {
  getNamespacedCustomObject(param: CustomObjectRef & { name: string }): Promise<unknown>
  createNamespacedCustomObject(param: CustomObjectRef & { body: object }): Promise<unknown>
  replaceNamespacedCustomObject(
    param: CustomObjectRef & { name: string; body: object },
  ): Promise<unknown>
  deleteNamespacedCustomObject(param: CustomObjectRef & { name: string }): Promise<unknown>
}

/**
 * A ManifestWork returned by the API server did not match the expected shape.
 */
export class InvalidManifestWorkError extends Error {
  constructor(name: string, location: string, detail: string) {
    super(`ManifestWork ${location}/${name} is malformed: ${detail}`)
    this.name = 'InvalidManifestWorkError'
  }
}

export class KubernetesWorkStore implements WorkStore {
  readonly name = 'kubernetes'
  private client: CustomObjectsClient

  constructor(client: CustomObjectsClient) {
    this.client = client
  }

  static fromKubeConfig(kubeConfig: KubeConfig): KubernetesWorkStore {
    return new KubernetesWorkStore(kubeConfig.makeApiClient(CustomObjectsApi))
  }

  async get(
    name: WorkName,
    location: WorkLocation,
    options?: WorkStoreOptions,
  ): Promise<StoredWorkBundle> {
    try {
      const body = await raceAbort(options?.signal, () =>
        this.client.getNamespacedCustomObject({ ...this.ref(location), name }),
      )
      return this.toStoredBundle(body, name, location)
    } catch (err) {
      if (statusCodeOf(err) === 404) {
        throw new WorkNotFoundError(name, location)
      }
      throw err
    }
  }

  async create(bundle: WorkBundle, options?: WorkStoreOptions): Promise<StoredWorkBundle> {
    try {
      const body = await raceAbort(options?.signal, () =>
        this.client.createNamespacedCustomObject({
          ...this.ref(bundle.location),
          body: toResource(bundle),
        }),
      )
      return this.toStoredBundle(body, bundle.name, bundle.location)
    } catch (err) {
      if (statusCodeOf(err) === 409) {
        throw new WorkAlreadyExistsError(bundle.name, bundle.location)
      }
      throw err
    }
  }

  async update(bundle: StoredWorkBundle, options?: WorkStoreOptions): Promise<StoredWorkBundle> {
    try {
      const body = await raceAbort(options?.signal, () =>
        this.client.replaceNamespacedCustomObject({
          ...this.ref(bundle.location),
          name: bundle.name,
          body: toUpdatedResource(bundle),
        }),
      )
      return this.toStoredBundle(body, bundle.name, bundle.location)
    } catch (err) {
      const status = statusCodeOf(err)
      if (status === 409) {
        throw new WorkConflictError(bundle.name, bundle.location, bundle.resourceVersion)
      }
      if (status === 404) {
        throw new WorkNotFoundError(bundle.name, bundle.location)
      }
      throw err
    }
  }

  async delete(name: WorkName, location: WorkLocation, options?: WorkStoreOptions): Promise<void> {
    try {
      await raceAbort(options?.signal, () =>
        this.client.deleteNamespacedCustomObject({ ...this.ref(location), name }),
      )
    } catch (err) {
      if (statusCodeOf(err) === 404) {
        throw new WorkNotFoundError(name, location)
      }
      throw err
    }
  }

  private ref(location: WorkLocation): CustomObjectRef {
    return {
      group: MANIFEST_WORK_GROUP,
      version: MANIFEST_WORK_VERSION,
      namespace: location,
      plural: MANIFEST_WORK_PLURAL,
    }
  }

  private toStoredBundle(body: unknown, name: WorkName, location: WorkLocation): StoredWorkBundle {
    const result = safeParseManifestWork(body)
    if (!result.success) {
      const detail = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ')
      throw new InvalidManifestWorkError(name, location, detail)
    }
    return fromResource(result.data, isRecord(body) ? body : undefined)
  }
}

/**
 * Convert a bundle to a ManifestWork. `resourceVersion` makes the write conditional.
 */
export function toResource(bundle: WorkBundle, resourceVersion?: string): object {
  return {
    apiVersion: `${MANIFEST_WORK_GROUP}/${MANIFEST_WORK_VERSION}`,
    kind: 'ManifestWork',
    metadata: {
      name: bundle.name,
      namespace: bundle.location,
      labels: bundle.labels,
      annotations: bundle.annotations,
      ...(resourceVersion ? { resourceVersion } : {}),
    },
    spec: {
      workload: {
        manifests: bundle.manifests.map((m): unknown => JSON.parse(m.raw)),
      },
    },
  }
}

/**
 * Convert a stored bundle back to the ManifestWork it was read from, with
 * labels, annotations and manifests taken from the bundle. Everything else
 * the server returned (finalizers, ownerReferences, uid) is kept.
 */
export function toUpdatedResource(bundle: StoredWorkBundle): object {
  if (!bundle.source) {
    return toResource(bundle, bundle.resourceVersion)
  }
  const resource = structuredClone(bundle.source)
  const metadata = isRecord(resource.metadata) ? resource.metadata : {}
  const spec = isRecord(resource.spec) ? resource.spec : {}
  const workload = isRecord(spec.workload) ? spec.workload : {}

  delete metadata.resourceVersion
  return {
    ...resource,
    metadata: {
      ...metadata,
      name: bundle.name,
      namespace: bundle.location,
      labels: bundle.labels,
      annotations: bundle.annotations,
      ...(bundle.resourceVersion ? { resourceVersion: bundle.resourceVersion } : {}),
    },
    spec: {
      ...spec,
      workload: {
        ...workload,
        manifests: bundle.manifests.map((m): unknown => JSON.parse(m.raw)),
      },
    },
  }
}

/**
 * Convert a ManifestWork to a stored bundle. Manifests are re-encoded
 * canonically so they compare equal to locally encoded ones. `source` is the
 * raw object as returned by the server.
 */
export function fromResource(
  resource: ManifestWorkResource,
  source?: Record<string, unknown>,
): StoredWorkBundle {
  return {
    ...(source ? { source } : {}),
    name: resource.metadata.name,
    location: resource.metadata.namespace,
    labels: resource.metadata.labels ?? {},
    annotations: resource.metadata.annotations ?? {},
    manifests: resource.spec.workload.manifests.map((object) => toManifest(object)),
    resourceVersion: resource.metadata.resourceVersion,
    conditions: resource.status?.conditions ?? [],
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * HTTP status of an API error. The client reports it as `code`; older
 * clients used `statusCode`.
 */
function statusCodeOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined
  if ('code' in err && typeof err.code === 'number') return err.code
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode
  return undefined
}
