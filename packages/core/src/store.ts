/**
 * Work Store Interface
 *
 * Abstracts the hub-side API that holds work bundles for managed clusters:
 * - Kubernetes (via @kubernetes/client-node, ManifestWork custom resources)
 * - In-memory (tests)
 *
 * The work engine only talks to this interface, so the backing store can be
 * swapped without touching convergence logic.
 */

import type { StoredWorkBundle, WorkBundle, WorkLocation, WorkName } from './types'

/**
 * Per-call options accepted by every store operation.
 */
export interface WorkStoreOptions {
  /**
   * Aborts the call. Stores reject with `signal.reason` once it fires.
   */
  signal?: AbortSignal
}

/**
 * Work Store Interface.
 *
 * Implementations:
 * - KubernetesWorkStore: ManifestWork objects through the CustomObjects API
 * - InMemoryWorkStore: test stand-in with resourceVersion checks
 *
 * Absence, duplicate creation and stale writes are reported with the typed
 * errors from `./errors`; anything else is thrown as-is.
 */
export interface WorkStore {
  /**
   * Store name for logging/debugging.
   * @example 'kubernetes'
   */
  readonly name: string

  /**
   * Read a bundle.
   * @throws WorkNotFoundError when no bundle has that name at that location
   */
  get(name: WorkName, location: WorkLocation, options?: WorkStoreOptions): Promise<StoredWorkBundle>

  /**
   * Create a bundle.
   * @throws WorkAlreadyExistsError when a bundle with that name exists
   */
  create(bundle: WorkBundle, options?: WorkStoreOptions): Promise<StoredWorkBundle>

  /**
   * Replace a bundle previously read from this store. The write is
   * conditioned on `bundle.resourceVersion`.
   * @throws WorkConflictError when the bundle changed since it was read
   */
  update(bundle: StoredWorkBundle, options?: WorkStoreOptions): Promise<StoredWorkBundle>

  /**
   * Delete a bundle.
   * @throws WorkNotFoundError when no bundle has that name at that location
   */
  delete(name: WorkName, location: WorkLocation, options?: WorkStoreOptions): Promise<void>
}
