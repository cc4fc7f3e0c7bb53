/**
 * Work Naming
 *
 * A work bundle is only ever located by its name, so the name must be a pure
 * function of the owner and the bundle kind.
 */

import type { WorkKind, WorkName, WorkOwner } from '@workbridge/core'

/** Workload protection bundle. */
export const WORK_KIND_VRG: WorkKind = 'vrg'

/** Namespace-creating bundle. Never removed by teardown. */
export const WORK_KIND_NAMESPACE: WorkKind = 'ns'

/** Cluster-scoped bootstrap bundle, one per managed cluster. */
export const DR_CLUSTER_WORK_NAME: WorkName = 'ramen-dr-cluster'

/** Provenance annotations placed on every bundle. */
export const OWNER_NAME_ANNOTATION = 'drplacementcontrol.ramendr.openshift.io/drpc-name'
export const OWNER_NAMESPACE_ANNOTATION = 'drplacementcontrol.ramendr.openshift.io/drpc-namespace'

/**
 * Build a work name in the `{name}-{namespace}-{kind}-mw` format.
 * @example workName('app1', 'ns1', 'vrg') // 'app1-ns1-vrg-mw'
 */
export function workName(ownerName: string, ownerNamespace: string, kind: WorkKind): WorkName {
  return `${ownerName}-${ownerNamespace}-${kind}-mw`
}

/**
 * Work name for a bundle of `kind` owned by `owner`.
 */
export function workNameFor(owner: WorkOwner, kind: WorkKind): WorkName {
  return workName(owner.name, owner.namespace, kind)
}
