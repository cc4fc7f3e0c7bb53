/**
 * Work lifecycle E2E tests
 *
 * Drives the App against the in-memory store through a protected workload's
 * whole life: bootstrap, namespace, protection state, status, teardown.
 */

import { parseOperatorConfig } from '@workbridge/core'
import { beforeEach, describe, expect, test } from 'vitest'
import { App } from '../src/app'
import { WorkDeadlineExceededError } from '../lib/errors'
import { decodeManifest } from '../lib/work'
import { createConditions, createTestLogger, createVrg } from './fixtures'
import { InMemoryWorkStore } from './memory-store'

const OWNER = { name: 'app1', namespace: 'ns1' }

describe('work lifecycle', () => {
  let store: InMemoryWorkStore
  let app: App

  beforeEach(() => {
    store = new InMemoryWorkStore()
    app = new App({
      store,
      logger: createTestLogger(),
      operatorConfig: parseOperatorConfig({
        drClusterOperator: { deploymentAutomationEnabled: true },
      }),
    })
  })

  test('protects a workload on a managed cluster and tears it down', async () => {
    const manager = app.workManager(OWNER)
    const vrg = createVrg()

    expect(await app.bootstrapCluster(OWNER, 'cluster-a')).toBe('created')
    expect(await manager.createOrUpdateNamespaceWork('ns1', 'cluster-a', app.operationOptions())).toBe(
      'created',
    )
    expect(await manager.createOrUpdateVrgWork('cluster-a', vrg, app.operationOptions())).toBe(
      'created',
    )
    expect(await manager.createOrUpdateVrgWork('cluster-a', vrg, app.operationOptions())).toBe(
      'unchanged',
    )

    const secondary = { ...vrg, spec: { ...vrg.spec, replicationState: 'secondary' } }
    expect(await manager.createOrUpdateVrgWork('cluster-a', secondary)).toBe('updated')

    const stored = await manager.findWork('app1-ns1-vrg-mw', 'cluster-a')
    expect(stored?.manifests.map(decodeManifest)).toEqual([secondary])

    store.report('app1-ns1-vrg-mw', 'cluster-a', createConditions({ Applied: 'True', Available: 'True' }))
    const reported = await manager.findWork('app1-ns1-vrg-mw', 'cluster-a')
    expect(reported && manager.isWorkApplied(reported)).toBe(true)

    expect(await manager.deleteWorksForCluster('cluster-a')).toBe('deleted')
    expect(await manager.deleteWorksForCluster('cluster-a')).toBe('absent')

    expect(store.peek('app1-ns1-vrg-mw', 'cluster-a')).toBeUndefined()
    expect(store.peek('app1-ns1-ns-mw', 'cluster-a')).toBeDefined()
    expect(store.peek('ramen-dr-cluster', 'cluster-a')).toBeDefined()
  })

  test('bounds each operation by the configured deadline', async () => {
    const fast = new App({
      store,
      logger: createTestLogger(),
      operatorConfig: parseOperatorConfig({}),
      operationTimeoutMs: 5,
    })
    store.hang('get')

    await expect(fast.bootstrapCluster(OWNER, 'cluster-a')).rejects.toBeInstanceOf(
      WorkDeadlineExceededError,
    )
  })

  test('passes the caller signal through when the deadline is disabled', () => {
    const unbounded = new App({
      store,
      logger: createTestLogger(),
      operatorConfig: parseOperatorConfig({}),
      operationTimeoutMs: 0,
    })
    const controller = new AbortController()

    expect(unbounded.operationOptions(controller.signal).signal).toBe(controller.signal)
    expect(unbounded.operationOptions().signal).toBeUndefined()
  })
})
