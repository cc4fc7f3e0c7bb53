import type { OperatorConfig, WorkBundle, WorkObject, WorkOwner } from '@workbridge/core'
import { buildWorkBundle } from './builder'
import { encodeManifest } from './manifest'
import { DR_CLUSTER_WORK_NAME } from './naming'
import {
  OLM_CLUSTER_ROLE,
  VRG_CLUSTER_ROLE,
  VRG_CLUSTER_ROLE_BINDING,
  namespaceObject,
  olmRoleBinding,
  operatorConfigMap,
  operatorGroup,
  subscription,
} from './objects'

/**
 * Objects that bootstrap a managed cluster, in apply order. The OLM install
 * of the DR cluster operator is only included when deployment automation is on.
 */
export function drClusterObjects(operatorConfig: OperatorConfig): WorkObject[] {
  const objects: WorkObject[] = [VRG_CLUSTER_ROLE, VRG_CLUSTER_ROLE_BINDING]

  const operator = operatorConfig.drClusterOperator
  if (operator.deploymentAutomationEnabled) {
    objects.push(
      namespaceObject(operator.namespaceName),
      OLM_CLUSTER_ROLE,
      olmRoleBinding(operator.namespaceName),
      operatorGroup(operator.namespaceName),
      subscription(operator),
      operatorConfigMap(operator.namespaceName, operatorConfig),
    )
  }

  return objects
}

/**
 * The cluster-scoped bootstrap bundle for `clusterName`.
 * @throws EncodeError when an object cannot be encoded
 * @throws InvalidTargetError when `clusterName` is empty
 */
export function buildDrClusterWork(
  clusterName: string,
  operatorConfig: OperatorConfig,
  owner: WorkOwner,
): WorkBundle {
  return buildWorkBundle({
    name: DR_CLUSTER_WORK_NAME,
    location: clusterName,
    labels: {},
    manifests: drClusterObjects(operatorConfig).map(encodeManifest),
    owner,
  })
}
