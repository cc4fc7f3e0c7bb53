/**
 * App: wires the work engine to a store.
 *
 * Callers own store creation. App owns the per-owner managers built on it and
 * the deadline applied to each operation. Used by both the production entrypoint
 * (index.ts) and the tests.
 */

import type { OperatorConfig, WorkLocation, WorkOwner, WorkStore } from '@workbridge/core'
import type { Logger } from '../lib/logger'
import { type ConvergeResult, type WorkCallOptions, WorkManager } from '../lib/work'

export interface AppConfig {
  store: WorkStore
  logger: Logger
  /** Operator config shipped to managed clusters in the bootstrap bundle */
  operatorConfig: OperatorConfig
  /** Deadline for each work operation in ms, 0 disables it (default: 30000) */
  operationTimeoutMs?: number
}

export class App {
  readonly store: WorkStore
  readonly operatorConfig: OperatorConfig

  private readonly logger: Logger
  private readonly operationTimeoutMs: number

  constructor(config: AppConfig) {
    this.store = config.store
    this.operatorConfig = config.operatorConfig
    this.logger = config.logger
    this.operationTimeoutMs = config.operationTimeoutMs ?? 30 * 1000
  }

  /**
   * Work manager acting on behalf of `owner`.
   */
  workManager(owner: WorkOwner): WorkManager {
    return new WorkManager(this.store, owner, this.logger)
  }

  /**
   * Options for one operation: the caller's signal, bounded by the configured deadline.
   */
  operationOptions(signal?: AbortSignal): WorkCallOptions {
    if (this.operationTimeoutMs <= 0) {
      return { signal }
    }
    const deadline = AbortSignal.timeout(this.operationTimeoutMs)
    return { signal: signal ? AbortSignal.any([signal, deadline]) : deadline }
  }

  /**
   * Deliver the bootstrap bundle for `clusterName`, recorded as owned by `owner`.
   */
  async bootstrapCluster(
    owner: WorkOwner,
    clusterName: WorkLocation,
    signal?: AbortSignal,
  ): Promise<ConvergeResult> {
    return this.workManager(owner).createOrUpdateDrClusterWork(
      clusterName,
      this.operatorConfig,
      this.operationOptions(signal),
    )
  }
}
