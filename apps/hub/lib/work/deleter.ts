/**
 * Work Deleter
 *
 * Removes work bundles. Deleting something that is already gone succeeds,
 * including when it disappears between the read and the delete.
 */

import {
  WorkNotFoundError,
  type WorkLocation,
  type WorkName,
  type WorkOwner,
  type WorkStore,
} from '@workbridge/core'
import { InvalidTargetError, WorkFetchError, WorkOperationError } from '../errors'
import type { Logger } from '../logger'
import {
  classifyWorkError,
  workErrorsTotal,
  workOperationDuration,
  workOperationsTotal,
} from '../metrics'
import { isValidLocation } from './builder'
import { type WorkCallOptions, callStore, isAbortError } from './call'
import { WORK_KIND_VRG, workNameFor } from './naming'

/**
 * Outcome of a delete. Both are success.
 * - `deleted`: the bundle existed and was removed
 * - `absent`: there was nothing to remove
 */
export type DeleteResult = 'deleted' | 'absent'

export class WorkDeleter {
  private store: WorkStore
  private _log: Logger

  constructor(store: WorkStore, logger: Logger) {
    this.store = store
    this._log = logger.child({ component: 'WorkDeleter' })
  }

  /**
   * Delete the bundle `name` at `location`.
   *
   * @throws InvalidTargetError when the location is empty
   * @throws WorkFetchError when the bundle cannot be read
   * @throws WorkOperationError when the delete fails for any reason other than absence
   * @throws WorkCancelledError / WorkDeadlineExceededError when the signal fires
   */
  async delete(
    name: WorkName,
    location: WorkLocation,
    options: WorkCallOptions = {},
  ): Promise<DeleteResult> {
    const endTimer = workOperationDuration.startTimer({ operation: 'delete' })

    try {
      const result = await this.deleteBundle(name, location, options.signal)
      workOperationsTotal.inc({ operation: 'delete', result })
      return result
    } catch (err) {
      workOperationsTotal.inc({ operation: 'delete', result: 'error' })
      workErrorsTotal.inc({ operation: 'delete', error_type: classifyWorkError(err) })
      this._log.error({ err, work: name, location }, 'Work deletion failed')
      throw err
    } finally {
      endTimer()
    }
  }

  /**
   * Delete the owner's workload bundle from `location`.
   *
   * The namespace bundle for the same location is left in place: the
   * namespace it created may hold objects that the owner does not manage.
   */
  async deleteWorksForCluster(
    owner: WorkOwner,
    location: WorkLocation,
    options: WorkCallOptions = {},
  ): Promise<DeleteResult> {
    return this.delete(workNameFor(owner, WORK_KIND_VRG), location, options)
  }

  private async deleteBundle(
    name: WorkName,
    location: WorkLocation,
    signal: AbortSignal | undefined,
  ): Promise<DeleteResult> {
    if (!isValidLocation(location)) {
      throw new InvalidTargetError(name)
    }

    try {
      await callStore('get', name, signal, (opts) => this.store.get(name, location, opts))
    } catch (err) {
      if (err instanceof WorkNotFoundError) {
        this._log.debug({ work: name, location }, 'Work already absent')
        return 'absent'
      }
      if (isAbortError(err)) {
        throw err
      }
      throw new WorkFetchError(name, location, err)
    }

    this._log.info({ work: name, location }, 'Deleting work')

    try {
      await callStore('delete', name, signal, (opts) => this.store.delete(name, location, opts))
    } catch (err) {
      if (err instanceof WorkNotFoundError) {
        this._log.debug({ work: name, location }, 'Work removed concurrently')
        return 'absent'
      }
      if (isAbortError(err)) {
        throw err
      }
      throw new WorkOperationError('delete', name, location, err)
    }
    return 'deleted'
  }
}
