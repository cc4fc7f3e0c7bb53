/**
 * Work Manager
 *
 * Binds the work engine to one owner. Every bundle the manager writes carries
 * the owner's provenance annotations, and bundle names are derived from the
 * owner's identity.
 */

import {
  type OperatorConfig,
  type StoredWorkBundle,
  type VolumeReplicationGroupObject,
  type WorkKind,
  type WorkLocation,
  type WorkName,
  WorkNotFoundError,
  type WorkOwner,
  type WorkStore,
} from '@workbridge/core'
import { InvalidTargetError, WorkFetchError } from '../errors'
import type { Logger } from '../logger'
import { buildWorkBundle, isValidLocation } from './builder'
import { type WorkCallOptions, callStore, isAbortError } from './call'
import { type DeleteResult, WorkDeleter } from './deleter'
import { buildDrClusterWork } from './dr-cluster'
import { encodeManifest } from './manifest'
import { WORK_KIND_NAMESPACE, WORK_KIND_VRG, workName, workNameFor } from './naming'
import { namespaceObject } from './objects'
import { isWorkApplied } from './status'
import { type ConvergeResult, WorkSynchronizer } from './synchronizer'

export class WorkManager {
  readonly owner: WorkOwner
  private store: WorkStore
  private synchronizer: WorkSynchronizer
  private deleter: WorkDeleter
  private _log: Logger

  constructor(store: WorkStore, owner: WorkOwner, logger: Logger) {
    this.owner = owner
    this.store = store
    this._log = logger.child({
      component: 'WorkManager',
      owner: `${owner.namespace}/${owner.name}`,
    })
    this.synchronizer = new WorkSynchronizer(store, this._log)
    this.deleter = new WorkDeleter(store, this._log)
  }

  buildWorkName(kind: WorkKind): WorkName {
    return workNameFor(this.owner, kind)
  }

  /**
   * Read a bundle, or null when it does not exist.
   * @throws InvalidTargetError when the location is empty
   * @throws WorkFetchError when the store read fails
   */
  async findWork(
    name: WorkName,
    location: WorkLocation,
    options: WorkCallOptions = {},
  ): Promise<StoredWorkBundle | null> {
    if (!isValidLocation(location)) {
      throw new InvalidTargetError(name)
    }

    try {
      return await callStore('get', name, options.signal, (opts) =>
        this.store.get(name, location, opts),
      )
    } catch (err) {
      if (err instanceof WorkNotFoundError) {
        return null
      }
      if (isAbortError(err)) {
        throw err
      }
      throw new WorkFetchError(name, location, err)
    }
  }

  /**
   * Deliver protection state for the owner's workload to `location`.
   */
  async createOrUpdateVrgWork(
    location: WorkLocation,
    vrg: VolumeReplicationGroupObject,
    options: WorkCallOptions = {},
  ): Promise<ConvergeResult> {
    this._log.info({ location, vrg: vrg.metadata.name }, 'Create or update VRG work')

    const bundle = buildWorkBundle({
      name: this.buildWorkName(WORK_KIND_VRG),
      location,
      labels: { app: 'VRG' },
      manifests: [encodeManifest(vrg)],
      owner: this.owner,
    })
    return this.synchronizer.converge(bundle, options)
  }

  /**
   * Create `namespaceName` on the managed cluster behind `location`.
   * The bundle is never removed by `deleteWorksForCluster`.
   */
  async createOrUpdateNamespaceWork(
    namespaceName: string,
    location: WorkLocation,
    options: WorkCallOptions = {},
  ): Promise<ConvergeResult> {
    const bundle = buildWorkBundle({
      name: workName(this.owner.name, namespaceName, WORK_KIND_NAMESPACE),
      location,
      labels: {},
      manifests: [encodeManifest(namespaceObject(namespaceName))],
      owner: this.owner,
    })
    return this.synchronizer.converge(bundle, options)
  }

  /**
   * Deliver the bootstrap bundle (RBAC and, when enabled, the DR cluster operator).
   */
  async createOrUpdateDrClusterWork(
    clusterName: string,
    operatorConfig: OperatorConfig,
    options: WorkCallOptions = {},
  ): Promise<ConvergeResult> {
    const bundle = buildDrClusterWork(clusterName, operatorConfig, this.owner)
    return this.synchronizer.converge(bundle, options)
  }

  async deleteWork(
    name: WorkName,
    location: WorkLocation,
    options: WorkCallOptions = {},
  ): Promise<DeleteResult> {
    return this.deleter.delete(name, location, options)
  }

  /**
   * Remove the owner's VRG work from `location`. The namespace work stays.
   */
  async deleteWorksForCluster(
    location: WorkLocation,
    options: WorkCallOptions = {},
  ): Promise<DeleteResult> {
    return this.deleter.deleteWorksForCluster(this.owner, location, options)
  }

  isWorkApplied(bundle: StoredWorkBundle): boolean {
    return isWorkApplied(bundle.conditions)
  }
}
