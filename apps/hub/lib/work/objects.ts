/**
 * Work Objects
 *
 * Producers for the objects delivered to managed clusters: RBAC that lets the
 * work agent manage protection state, the OLM objects that install the DR
 * cluster operator, and the operator's config.
 */

import type {
  ClusterRoleBindingObject,
  ClusterRoleObject,
  ConfigMapObject,
  DrClusterOperatorSettings,
  NamespaceObject,
  OperatorConfig,
  OperatorGroupObject,
  RoleBindingObject,
  SubscriptionObject,
  Subject,
  VolumeReplicationGroupObject,
} from '@workbridge/core'
import { stringify as stringifyYaml } from 'yaml'

const WORK_AGENT_ROLE_PREFIX = 'open-cluster-management:klusterlet-work-sa:agent'
const VRG_EDIT_ROLE = `${WORK_AGENT_ROLE_PREFIX}:volrepgroup-edit`
const OLM_EDIT_ROLE = `${WORK_AGENT_ROLE_PREFIX}:olm-edit`

/** Service account the work agent on each managed cluster runs as. */
const WORK_AGENT_SUBJECT: Subject = {
  kind: 'ServiceAccount',
  name: 'klusterlet-work-sa',
  namespace: 'open-cluster-management-agent',
}

const EDIT_VERBS = ['create', 'get', 'list', 'update', 'delete']

export const OPERATOR_GROUP_NAME = 'ramen-operator-group'
export const SUBSCRIPTION_NAME = 'ramen-dr-cluster-subscription'
export const OPERATOR_CONFIG_MAP_NAME = 'ramen-dr-cluster-operator-config'
export const OPERATOR_CONFIG_KEY = 'ramen_manager_config.yaml'
export const DR_CLUSTER_LEADER_ELECTION_RESOURCE = 'dr-cluster.ramendr.openshift.io'

export function namespaceObject(name: string): NamespaceObject {
  return {
    apiVersion: 'v1',
    kind: 'Namespace',
    metadata: { name },
  }
}

export const VRG_CLUSTER_ROLE: ClusterRoleObject = {
  apiVersion: 'rbac.authorization.k8s.io/v1',
  kind: 'ClusterRole',
  metadata: { name: VRG_EDIT_ROLE },
  rules: [
    {
      apiGroups: ['ramendr.openshift.io'],
      resources: ['volumereplicationgroups'],
      verbs: EDIT_VERBS,
    },
  ],
}

export const VRG_CLUSTER_ROLE_BINDING: ClusterRoleBindingObject = {
  apiVersion: 'rbac.authorization.k8s.io/v1',
  kind: 'ClusterRoleBinding',
  metadata: { name: VRG_EDIT_ROLE },
  subjects: [WORK_AGENT_SUBJECT],
  roleRef: {
    apiGroup: 'rbac.authorization.k8s.io',
    kind: 'ClusterRole',
    name: VRG_EDIT_ROLE,
  },
}

export const OLM_CLUSTER_ROLE: ClusterRoleObject = {
  apiVersion: 'rbac.authorization.k8s.io/v1',
  kind: 'ClusterRole',
  metadata: { name: OLM_EDIT_ROLE },
  rules: [
    {
      apiGroups: ['operators.coreos.com'],
      resources: ['operatorgroups'],
      verbs: EDIT_VERBS,
    },
  ],
}

export function olmRoleBinding(namespace: string): RoleBindingObject {
  return {
    apiVersion: 'rbac.authorization.k8s.io/v1',
    kind: 'RoleBinding',
    metadata: { name: OLM_EDIT_ROLE, namespace },
    subjects: [WORK_AGENT_SUBJECT],
    roleRef: {
      apiGroup: 'rbac.authorization.k8s.io',
      kind: 'ClusterRole',
      name: OLM_EDIT_ROLE,
    },
  }
}

export function operatorGroup(namespace: string): OperatorGroupObject {
  return {
    apiVersion: 'operators.coreos.com/v1',
    kind: 'OperatorGroup',
    metadata: { name: OPERATOR_GROUP_NAME, namespace },
  }
}

export function subscription(settings: DrClusterOperatorSettings): SubscriptionObject {
  return {
    apiVersion: 'operators.coreos.com/v1alpha1',
    kind: 'Subscription',
    metadata: { name: SUBSCRIPTION_NAME, namespace: settings.namespaceName },
    spec: {
      channel: settings.channelName,
      name: settings.packageName,
      source: settings.catalogSourceName,
      sourceNamespace: settings.catalogSourceNamespaceName,
      startingCSV: settings.clusterServiceVersionName,
      installPlanApproval: 'Automatic',
    },
  }
}

/**
 * Config map carrying the hub's operator config, rewritten for the DR cluster
 * operator: its own leader election lock and controller type.
 */
export function operatorConfigMap(namespace: string, hubConfig: OperatorConfig): ConfigMapObject {
  const drClusterConfig: OperatorConfig = {
    ...hubConfig,
    ramenControllerType: 'dr-cluster',
    leaderElection: {
      ...hubConfig.leaderElection,
      resourceName: DR_CLUSTER_LEADER_ELECTION_RESOURCE,
    },
  }

  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: { name: OPERATOR_CONFIG_MAP_NAME, namespace },
    data: {
      [OPERATOR_CONFIG_KEY]: stringifyYaml(drClusterConfig),
    },
  }
}

export function volumeReplicationGroup(
  name: string,
  namespace: string,
  spec: Record<string, unknown>,
): VolumeReplicationGroupObject {
  return {
    apiVersion: 'ramendr.openshift.io/v1alpha1',
    kind: 'VolumeReplicationGroup',
    metadata: { name, namespace },
    spec,
  }
}
