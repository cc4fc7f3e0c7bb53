import {
  WorkAlreadyExistsError,
  WorkConflictError,
  WorkNotFoundError,
  type WorkBundle,
  toManifest,
} from '@workbridge/core'
import { describe, expect, test, vi } from 'vitest'
import { type CustomObjectsClient, InvalidManifestWorkError, KubernetesWorkStore } from './kubernetes-store'

const NAMESPACE_OBJECT = { apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'app-ns' } }

function manifestWork(overrides?: { resourceVersion?: string; conditions?: unknown[] }) {
  return {
    apiVersion: 'work.open-cluster-management.io/v1',
    kind: 'ManifestWork',
    metadata: {
      name: 'app1-ns1-ns-mw',
      namespace: 'cluster-a',
      resourceVersion: overrides?.resourceVersion ?? '7',
      labels: { tier: 'test' },
      annotations: { owner: 'app1' },
      uid: 'b1946ac9',
    },
    spec: {
      workload: {
        // Key order differs from the canonical encoding on purpose
        manifests: [{ metadata: { name: 'app-ns' }, kind: 'Namespace', apiVersion: 'v1' }],
      },
    },
    status: { conditions: overrides?.conditions ?? [] },
  }
}

function apiError(code: number): Error {
  return Object.assign(new Error(`HTTP-Code: ${code}`), { code })
}

function createStoreWithMockClient() {
  const client = {
    getNamespacedCustomObject: vi.fn(async (): Promise<unknown> => manifestWork()),
    createNamespacedCustomObject: vi.fn(async (): Promise<unknown> => manifestWork({ resourceVersion: '1' })),
    replaceNamespacedCustomObject: vi.fn(async (): Promise<unknown> => manifestWork({ resourceVersion: '8' })),
    deleteNamespacedCustomObject: vi.fn(async (): Promise<unknown> => ({})),
  } satisfies CustomObjectsClient

  return { store: new KubernetesWorkStore(client), client }
}

function bundle(): WorkBundle {
  return {
    name: 'app1-ns1-ns-mw',
    location: 'cluster-a',
    labels: { tier: 'test' },
    annotations: { owner: 'app1' },
    manifests: [toManifest(NAMESPACE_OBJECT)],
  }
}

const MANIFEST_WORK_REF = {
  group: 'work.open-cluster-management.io',
  version: 'v1',
  namespace: 'cluster-a',
  plural: 'manifestworks',
}

describe('KubernetesWorkStore', () => {
  describe('get', () => {
    test('reads the ManifestWork from the cluster namespace', async () => {
      const { store, client } = createStoreWithMockClient()

      const found = await store.get('app1-ns1-ns-mw', 'cluster-a')

      expect(client.getNamespacedCustomObject).toHaveBeenCalledWith({
        ...MANIFEST_WORK_REF,
        name: 'app1-ns1-ns-mw',
      })
      expect(found.name).toBe('app1-ns1-ns-mw')
      expect(found.location).toBe('cluster-a')
      expect(found.resourceVersion).toBe('7')
      expect(found.labels).toEqual({ tier: 'test' })
      expect(found.annotations).toEqual({ owner: 'app1' })
    })

    test('re-encodes manifests canonically', async () => {
      const { store } = createStoreWithMockClient()

      const found = await store.get('app1-ns1-ns-mw', 'cluster-a')

      expect(found.manifests).toEqual([
        {
          apiVersion: 'v1',
          kind: 'Namespace',
          raw: '{"apiVersion":"v1","kind":"Namespace","metadata":{"name":"app-ns"}}',
        },
      ])
      expect(found.manifests).toEqual(bundle().manifests)
    })

    test('returns status conditions', async () => {
      const { store, client } = createStoreWithMockClient()
      client.getNamespacedCustomObject.mockResolvedValueOnce(
        manifestWork({ conditions: [{ type: 'Applied', status: 'True', reason: 'AppliedManifestWorkComplete' }] }),
      )

      const found = await store.get('app1-ns1-ns-mw', 'cluster-a')

      expect(found.conditions).toEqual([
        { type: 'Applied', status: 'True', reason: 'AppliedManifestWorkComplete' },
      ])
    })

    test('maps 404 to WorkNotFoundError', async () => {
      const { store, client } = createStoreWithMockClient()
      client.getNamespacedCustomObject.mockRejectedValueOnce(apiError(404))

      await expect(store.get('app1-ns1-ns-mw', 'cluster-a')).rejects.toBeInstanceOf(WorkNotFoundError)
    })

    test('rethrows other API errors', async () => {
      const { store, client } = createStoreWithMockClient()
      client.getNamespacedCustomObject.mockRejectedValueOnce(apiError(500))

      await expect(store.get('app1-ns1-ns-mw', 'cluster-a')).rejects.toThrow('HTTP-Code: 500')
    })

    test('rejects malformed ManifestWork objects', async () => {
      const { store, client } = createStoreWithMockClient()
      client.getNamespacedCustomObject.mockResolvedValueOnce({ kind: 'ConfigMap' })

      await expect(store.get('app1-ns1-ns-mw', 'cluster-a')).rejects.toBeInstanceOf(
        InvalidManifestWorkError,
      )
    })
  })

  describe('create', () => {
    test('posts a ManifestWork without resourceVersion', async () => {
      const { store, client } = createStoreWithMockClient()

      const created = await store.create(bundle())

      expect(client.createNamespacedCustomObject).toHaveBeenCalledWith({
        ...MANIFEST_WORK_REF,
        body: {
          apiVersion: 'work.open-cluster-management.io/v1',
          kind: 'ManifestWork',
          metadata: {
            name: 'app1-ns1-ns-mw',
            namespace: 'cluster-a',
            labels: { tier: 'test' },
            annotations: { owner: 'app1' },
          },
          spec: { workload: { manifests: [NAMESPACE_OBJECT] } },
        },
      })
      expect(created.resourceVersion).toBe('1')
    })

    test('maps 409 to WorkAlreadyExistsError', async () => {
      const { store, client } = createStoreWithMockClient()
      client.createNamespacedCustomObject.mockRejectedValueOnce(apiError(409))

      await expect(store.create(bundle())).rejects.toBeInstanceOf(WorkAlreadyExistsError)
    })
  })

  describe('update', () => {
    test('replaces the ManifestWork conditioned on resourceVersion', async () => {
      const { store, client } = createStoreWithMockClient()

      const updated = await store.update({ ...bundle(), resourceVersion: '7', conditions: [] })

      expect(client.replaceNamespacedCustomObject).toHaveBeenCalledWith(
        expect.objectContaining({
          name: 'app1-ns1-ns-mw',
          body: expect.objectContaining({
            metadata: expect.objectContaining({ resourceVersion: '7' }),
          }),
        }),
      )
      expect(updated.resourceVersion).toBe('8')
    })

    test('keeps server-owned metadata of the fetched ManifestWork', async () => {
      const { store, client } = createStoreWithMockClient()
      const fetched = manifestWork()
      const ownerReferences = [
        { apiVersion: 'v1', kind: 'ConfigMap', name: 'owner', uid: 'c4ca4238' },
      ]
      client.getNamespacedCustomObject.mockResolvedValueOnce({
        ...fetched,
        metadata: {
          ...fetched.metadata,
          finalizers: ['cluster.open-cluster-management.io/manifest-work-cleanup'],
          ownerReferences,
        },
      })
      const configMap = { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'cm' } }

      const found = await store.get('app1-ns1-ns-mw', 'cluster-a')
      await store.update({ ...found, manifests: [toManifest(configMap)] })

      expect(client.replaceNamespacedCustomObject).toHaveBeenCalledWith({
        ...MANIFEST_WORK_REF,
        name: 'app1-ns1-ns-mw',
        body: {
          apiVersion: 'work.open-cluster-management.io/v1',
          kind: 'ManifestWork',
          metadata: {
            name: 'app1-ns1-ns-mw',
            namespace: 'cluster-a',
            resourceVersion: '7',
            labels: { tier: 'test' },
            annotations: { owner: 'app1' },
            uid: 'b1946ac9',
            finalizers: ['cluster.open-cluster-management.io/manifest-work-cleanup'],
            ownerReferences,
          },
          spec: { workload: { manifests: [configMap] } },
          status: { conditions: [] },
        },
      })
    })

    test('maps 409 to WorkConflictError', async () => {
      const { store, client } = createStoreWithMockClient()
      client.replaceNamespacedCustomObject.mockRejectedValueOnce(apiError(409))

      await expect(
        store.update({ ...bundle(), resourceVersion: '6', conditions: [] }),
      ).rejects.toBeInstanceOf(WorkConflictError)
    })
  })

  describe('delete', () => {
    test('deletes by name in the cluster namespace', async () => {
      const { store, client } = createStoreWithMockClient()

      await store.delete('app1-ns1-ns-mw', 'cluster-a')

      expect(client.deleteNamespacedCustomObject).toHaveBeenCalledWith({
        ...MANIFEST_WORK_REF,
        name: 'app1-ns1-ns-mw',
      })
    })

    test('maps 404 to WorkNotFoundError', async () => {
      const { store, client } = createStoreWithMockClient()
      client.deleteNamespacedCustomObject.mockRejectedValueOnce(apiError(404))

      await expect(store.delete('app1-ns1-ns-mw', 'cluster-a')).rejects.toBeInstanceOf(
        WorkNotFoundError,
      )
    })
  })

  test('rejects with the abort reason once the signal fires', async () => {
    const { store, client } = createStoreWithMockClient()
    client.getNamespacedCustomObject.mockImplementationOnce(() => new Promise<unknown>(() => {}))
    const controller = new AbortController()

    const pending = store.get('app1-ns1-ns-mw', 'cluster-a', { signal: controller.signal })
    controller.abort(new Error('stop'))

    await expect(pending).rejects.toThrow('stop')
  })
})
