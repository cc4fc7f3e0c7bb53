/**
 * Core types for the workbridge remote work distributor
 */

// =============================================================================
// Identifiers
// =============================================================================

/**
 * Name of a work bundle on the hub.
 * @example 'app1-ns1-vrg-mw'
 * @example 'ramen-dr-cluster'
 */
export type WorkName = string

/**
 * Remote location a work bundle is delivered to. For Open Cluster Management
 * this is the managed cluster's namespace on the hub.
 * @example 'cluster-a'
 */
export type WorkLocation = string

/**
 * Kind segment of a work bundle name. `vrg` and `ns` are reserved, callers
 * may define more.
 * @example 'vrg'
 */
export type WorkKind = string

/**
 * Identity of the object that requested a work bundle.
 */
export interface WorkOwner {
  /**
   * @example 'app1'
   */
  name: string

  /**
   * @example 'ns1'
   */
  namespace: string
}

// =============================================================================
// Manifests and bundles
// =============================================================================

/**
 * One serialized object inside a work bundle.
 */
export interface Manifest {
  /**
   * @example 'ramendr.openshift.io/v1alpha1'
   */
  apiVersion: string

  /**
   * @example 'VolumeReplicationGroup'
   */
  kind: string

  /**
   * Canonical JSON of the full object (keys sorted, no whitespace).
   */
  raw: string
}

/**
 * A named, addressed collection of manifests.
 */
export interface WorkBundle {
  name: WorkName
  location: WorkLocation

  /**
   * Free-form classification.
   * @example { app: 'VRG' }
   */
  labels: Record<string, string>

  /**
   * Provenance of the bundle. Always carries the owner name and namespace.
   */
  annotations: Record<string, string>

  /**
   * Applied in order on the remote side.
   */
  manifests: Manifest[]
}

/**
 * Status of a single condition.
 */
export type ConditionStatus = 'True' | 'False' | 'Unknown'

/**
 * Condition types reported for a work bundle by the remote agent.
 * - `Applied`: every manifest was applied on the remote cluster
 * - `Available`: every applied resource exists on the remote cluster
 * - `Degraded`: the remote side reports the work as degraded
 */
export type WorkConditionType = 'Applied' | 'Available' | 'Degraded'

export interface Condition {
  /**
   * Other condition types may be reported; they are carried but never interpreted.
   * @example 'Applied'
   */
  type: WorkConditionType | (string & {})
  status: ConditionStatus
  reason?: string
  message?: string
}

/**
 * A work bundle as read back from a store.
 */
export interface StoredWorkBundle extends WorkBundle {
  /**
   * Optimistic concurrency token returned by the store. Writing back a bundle
   * with a stale token fails with a conflict.
   * @example '48213'
   */
  resourceVersion?: string

  /**
   * Last status snapshot reported by the remote side.
   */
  conditions: Condition[]

  /**
   * The store's own representation as it was read. Stores write it back on
   * update so that fields the bundle does not model survive.
   */
  source?: Record<string, unknown>
}

// =============================================================================
// Work objects
// =============================================================================

export interface ObjectMeta {
  name: string
  namespace?: string
  labels?: Record<string, string>
  annotations?: Record<string, string>
}

export interface PolicyRule {
  apiGroups: string[]
  resources: string[]
  verbs: string[]
}

export interface Subject {
  kind: string
  name: string
  namespace?: string
}

export interface RoleRef {
  apiGroup: string
  kind: string
  name: string
}

export interface ClusterRoleObject {
  apiVersion: 'rbac.authorization.k8s.io/v1'
  kind: 'ClusterRole'
  metadata: ObjectMeta
  rules: PolicyRule[]
}

export interface ClusterRoleBindingObject {
  apiVersion: 'rbac.authorization.k8s.io/v1'
  kind: 'ClusterRoleBinding'
  metadata: ObjectMeta
  subjects: Subject[]
  roleRef: RoleRef
}

export interface RoleBindingObject {
  apiVersion: 'rbac.authorization.k8s.io/v1'
  kind: 'RoleBinding'
  metadata: ObjectMeta
  subjects: Subject[]
  roleRef: RoleRef
}

export interface NamespaceObject {
  apiVersion: 'v1'
  kind: 'Namespace'
  metadata: ObjectMeta
}

export interface OperatorGroupObject {
  apiVersion: 'operators.coreos.com/v1'
  kind: 'OperatorGroup'
  metadata: ObjectMeta
  spec?: { targetNamespaces?: string[] }
}

export interface SubscriptionSpec {
  channel: string
  name: string
  source: string
  sourceNamespace: string
  startingCSV: string
  installPlanApproval: 'Automatic' | 'Manual'
}

export interface SubscriptionObject {
  apiVersion: 'operators.coreos.com/v1alpha1'
  kind: 'Subscription'
  metadata: ObjectMeta
  spec: SubscriptionSpec
}

export interface ConfigMapObject {
  apiVersion: 'v1'
  kind: 'ConfigMap'
  metadata: ObjectMeta
  data: Record<string, string>
}

/**
 * Workload protection state delivered to a managed cluster. The spec is owned
 * by the protection controller and carried through untouched.
 */
export interface VolumeReplicationGroupObject {
  apiVersion: 'ramendr.openshift.io/v1alpha1'
  kind: 'VolumeReplicationGroup'
  metadata: ObjectMeta
  spec: Record<string, unknown>
}

/**
 * Every object kind that can be folded into a work bundle.
 */
export type WorkObject =
  | ClusterRoleObject
  | ClusterRoleBindingObject
  | RoleBindingObject
  | NamespaceObject
  | OperatorGroupObject
  | SubscriptionObject
  | ConfigMapObject
  | VolumeReplicationGroupObject

export type WorkObjectKind = WorkObject['kind']
