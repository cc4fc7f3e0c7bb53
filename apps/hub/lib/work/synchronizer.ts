/**
 * Work Synchronizer
 *
 * Converges a remote work bundle onto the desired one: create when absent,
 * rewrite the manifests when they differ, otherwise leave it alone.
 *
 * Updates always write back the object that was read, so the store can reject
 * the write when someone else changed the bundle in between. Retrying after a
 * conflict is left to the caller's reconcile loop.
 */

import {
  type StoredWorkBundle,
  type WorkBundle,
  WorkAlreadyExistsError,
  WorkConflictError,
  WorkNotFoundError,
  type WorkStore,
} from '@workbridge/core'
import {
  InvalidTargetError,
  UnconditionalWriteError,
  WorkFetchError,
  WorkOperationError,
} from '../errors'
import type { Logger } from '../logger'
import {
  classifyWorkError,
  workErrorsTotal,
  workOperationDuration,
  workOperationsTotal,
} from '../metrics'
import { isValidLocation } from './builder'
import { type WorkCallOptions, callStore, isAbortError } from './call'
import { manifestsEqual } from './manifest'

/**
 * Outcome of a convergence.
 * - `created`: no bundle existed, one was created
 * - `updated`: the bundle's manifests were rewritten
 * - `unchanged`: the bundle already matched, nothing was written
 */
export type ConvergeResult = 'created' | 'updated' | 'unchanged'

export class WorkSynchronizer {
  private store: WorkStore
  private _log: Logger

  constructor(store: WorkStore, logger: Logger) {
    this.store = store
    this._log = logger.child({ component: 'WorkSynchronizer' })
  }

  /**
   * Create or update `bundle` in the store.
   *
   * @throws InvalidTargetError when the bundle has no location
   * @throws WorkFetchError when the current bundle cannot be read
   * @throws UnconditionalWriteError when the store gave no resourceVersion to write against
   * @throws WorkConflictError when the bundle changed between read and write
   * @throws WorkOperationError when the create or update fails otherwise
   * @throws WorkCancelledError / WorkDeadlineExceededError when the signal fires
   */
  async converge(bundle: WorkBundle, options: WorkCallOptions = {}): Promise<ConvergeResult> {
    const endTimer = workOperationDuration.startTimer({ operation: 'converge' })

    try {
      const result = await this.convergeBundle(bundle, options.signal)
      workOperationsTotal.inc({ operation: 'converge', result })
      return result
    } catch (err) {
      workOperationsTotal.inc({ operation: 'converge', result: 'error' })
      workErrorsTotal.inc({ operation: 'converge', error_type: classifyWorkError(err) })
      this._log.error(
        { err, work: bundle.name, location: bundle.location },
        'Work convergence failed',
      )
      throw err
    } finally {
      endTimer()
    }
  }

  private async convergeBundle(
    bundle: WorkBundle,
    signal: AbortSignal | undefined,
  ): Promise<ConvergeResult> {
    if (!isValidLocation(bundle.location)) {
      throw new InvalidTargetError(bundle.name)
    }

    const found = await this.fetch(bundle, signal)
    if (found) {
      return this.reconcile(found, bundle, signal)
    }

    if (await this.create(bundle, signal)) {
      return 'created'
    }

    // Another writer created it first; converge onto theirs
    const winner = await this.fetch(bundle, signal)
    if (!winner) {
      throw new WorkOperationError(
        'create',
        bundle.name,
        bundle.location,
        new WorkNotFoundError(bundle.name, bundle.location),
      )
    }
    return this.reconcile(winner, bundle, signal)
  }

  /**
   * Read the current bundle, or null when there is none.
   */
  private async fetch(
    bundle: WorkBundle,
    signal: AbortSignal | undefined,
  ): Promise<StoredWorkBundle | null> {
    try {
      return await callStore('get', bundle.name, signal, (opts) =>
        this.store.get(bundle.name, bundle.location, opts),
      )
    } catch (err) {
      if (err instanceof WorkNotFoundError) {
        return null
      }
      if (isAbortError(err)) {
        throw err
      }
      throw new WorkFetchError(bundle.name, bundle.location, err)
    }
  }

  /**
   * Create the bundle. Returns false when it already exists.
   */
  private async create(bundle: WorkBundle, signal: AbortSignal | undefined): Promise<boolean> {
    this._log.info(
      { work: bundle.name, location: bundle.location, manifests: bundle.manifests.length },
      'Creating work',
    )

    try {
      await callStore('create', bundle.name, signal, (opts) => this.store.create(bundle, opts))
      return true
    } catch (err) {
      if (err instanceof WorkAlreadyExistsError) {
        this._log.info(
          { work: bundle.name, location: bundle.location },
          'Work was created concurrently, converging onto it',
        )
        return false
      }
      if (isAbortError(err)) {
        throw err
      }
      throw new WorkOperationError('create', bundle.name, bundle.location, err)
    }
  }

  private async reconcile(
    found: StoredWorkBundle,
    desired: WorkBundle,
    signal: AbortSignal | undefined,
  ): Promise<ConvergeResult> {
    if (manifestsEqual(found.manifests, desired.manifests)) {
      this._log.debug({ work: desired.name, location: desired.location }, 'Work unchanged')
      return 'unchanged'
    }

    if (!found.resourceVersion) {
      throw new UnconditionalWriteError(desired.name, desired.location)
    }

    const next: StoredWorkBundle = { ...found, manifests: [...desired.manifests] }

    this._log.info(
      {
        work: desired.name,
        location: desired.location,
        resourceVersion: found.resourceVersion,
        manifests: next.manifests.length,
      },
      'Updating work',
    )

    try {
      await callStore('update', desired.name, signal, (opts) => this.store.update(next, opts))
    } catch (err) {
      if (err instanceof WorkConflictError || isAbortError(err)) {
        throw err
      }
      throw new WorkOperationError('update', desired.name, desired.location, err)
    }
    return 'updated'
  }
}
