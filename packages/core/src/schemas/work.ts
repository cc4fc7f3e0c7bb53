import { z } from 'zod'
import type { WorkObject } from '../types'

// =============================================================================
// Shared metadata
// =============================================================================

const labelsSchema = z.record(z.string(), z.string())

/**
 * Object metadata schema. Unknown fields (uid, creationTimestamp, ...) are kept.
 */
export const objectMetaSchema = z
  .object({
    name: z.string().min(1).describe('Object name'),
    namespace: z.string().optional().describe('Namespace for namespaced objects'),
    labels: labelsSchema.optional(),
    annotations: labelsSchema.optional(),
  })
  .passthrough()

// =============================================================================
// Work objects
// =============================================================================

const policyRuleSchema = z.object({
  apiGroups: z.array(z.string()),
  resources: z.array(z.string()),
  verbs: z.array(z.string()),
})

const subjectSchema = z.object({
  kind: z.string(),
  name: z.string(),
  namespace: z.string().optional(),
})

const roleRefSchema = z.object({
  apiGroup: z.string(),
  kind: z.string(),
  name: z.string(),
})

const clusterRoleSchema = z
  .object({
    apiVersion: z.literal('rbac.authorization.k8s.io/v1'),
    kind: z.literal('ClusterRole'),
    metadata: objectMetaSchema,
    rules: z.array(policyRuleSchema),
  })
  .passthrough()

const clusterRoleBindingSchema = z
  .object({
    apiVersion: z.literal('rbac.authorization.k8s.io/v1'),
    kind: z.literal('ClusterRoleBinding'),
    metadata: objectMetaSchema,
    subjects: z.array(subjectSchema),
    roleRef: roleRefSchema,
  })
  .passthrough()

const roleBindingSchema = z
  .object({
    apiVersion: z.literal('rbac.authorization.k8s.io/v1'),
    kind: z.literal('RoleBinding'),
    metadata: objectMetaSchema,
    subjects: z.array(subjectSchema),
    roleRef: roleRefSchema,
  })
  .passthrough()

const namespaceSchema = z
  .object({
    apiVersion: z.literal('v1'),
    kind: z.literal('Namespace'),
    metadata: objectMetaSchema,
  })
  .passthrough()

const operatorGroupSchema = z
  .object({
    apiVersion: z.literal('operators.coreos.com/v1'),
    kind: z.literal('OperatorGroup'),
    metadata: objectMetaSchema,
    spec: z.object({ targetNamespaces: z.array(z.string()).optional() }).optional(),
  })
  .passthrough()

const subscriptionSchema = z
  .object({
    apiVersion: z.literal('operators.coreos.com/v1alpha1'),
    kind: z.literal('Subscription'),
    metadata: objectMetaSchema,
    spec: z.object({
      channel: z.string(),
      name: z.string(),
      source: z.string(),
      sourceNamespace: z.string(),
      startingCSV: z.string(),
      installPlanApproval: z.enum(['Automatic', 'Manual']),
    }),
  })
  .passthrough()

const configMapSchema = z
  .object({
    apiVersion: z.literal('v1'),
    kind: z.literal('ConfigMap'),
    metadata: objectMetaSchema,
    data: z.record(z.string(), z.string()),
  })
  .passthrough()

const volumeReplicationGroupSchema = z
  .object({
    apiVersion: z.literal('ramendr.openshift.io/v1alpha1'),
    kind: z.literal('VolumeReplicationGroup'),
    metadata: objectMetaSchema,
    spec: z.record(z.string(), z.unknown()),
  })
  .passthrough()

/**
 * Work object schema, discriminated on `kind`.
 */
export const workObjectSchema: z.ZodType<WorkObject> = z.discriminatedUnion('kind', [
  clusterRoleSchema,
  clusterRoleBindingSchema,
  roleBindingSchema,
  namespaceSchema,
  operatorGroupSchema,
  subscriptionSchema,
  configMapSchema,
  volumeReplicationGroupSchema,
])

// =============================================================================
// ManifestWork (work.open-cluster-management.io/v1)
// =============================================================================

export const MANIFEST_WORK_GROUP = 'work.open-cluster-management.io'
export const MANIFEST_WORK_VERSION = 'v1'
export const MANIFEST_WORK_PLURAL = 'manifestworks'

/**
 * Status condition schema
 */
export const conditionSchema = z.object({
  type: z.string().describe('Condition type (Applied, Available, Degraded, ...)'),
  status: z.enum(['True', 'False', 'Unknown']),
  reason: z.string().optional(),
  message: z.string().optional(),
})

/**
 * ManifestWork resource schema as returned by the hub API server.
 */
export const manifestWorkSchema = z.object({
  apiVersion: z.literal(`${MANIFEST_WORK_GROUP}/${MANIFEST_WORK_VERSION}`),
  kind: z.literal('ManifestWork'),
  metadata: objectMetaSchema.extend({
    namespace: z.string().min(1).describe('Managed cluster namespace'),
    resourceVersion: z.string().optional(),
  }),
  spec: z
    .object({
      workload: z
        .object({
          manifests: z
            .array(z.record(z.string(), z.unknown()))
            .default([])
            .describe('Raw objects applied on the managed cluster, in order'),
        })
        .default({}),
    })
    .default({}),
  status: z
    .object({
      conditions: z.array(conditionSchema).default([]),
    })
    .optional(),
})

export type ManifestWorkResource = z.output<typeof manifestWorkSchema>

// =============================================================================
// Validation utilities
// =============================================================================

/**
 * Validation error detail
 */
export interface ValidationError {
  path: string
  message: string
}

/**
 * Parse result type
 */
export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] }

/**
 * Flatten zod issues into path/message pairs.
 */
export function toValidationErrors(error: z.ZodError): ValidationError[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.') || '/',
    message: issue.message,
  }))
}

/**
 * Safely parse a work object payload
 */
export function safeParseWorkObject(data: unknown): ParseResult<WorkObject> {
  const result = workObjectSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, errors: toValidationErrors(result.error) }
}

/**
 * Safely parse a ManifestWork resource
 */
export function safeParseManifestWork(data: unknown): ParseResult<ManifestWorkResource> {
  const result = manifestWorkSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, errors: toValidationErrors(result.error) }
}
