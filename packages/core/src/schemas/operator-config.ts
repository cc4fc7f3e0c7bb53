import { z } from 'zod'
import { type ParseResult, toValidationErrors } from './work'

/**
 * Settings used to install the DR cluster operator on managed clusters
 * through OLM. Field names match the operator's config file.
 */
export const drClusterOperatorSchema = z.object({
  deploymentAutomationEnabled: z
    .boolean()
    .default(false)
    .describe('Install the DR cluster operator on managed clusters'),
  channelName: z.string().default('alpha').describe('OLM subscription channel'),
  packageName: z.string().default('ramen-dr-cluster-operator').describe('OLM package name'),
  namespaceName: z
    .string()
    .default('ramen-system')
    .describe('Namespace the operator is installed into'),
  catalogSourceName: z.string().default('ramen-catalog').describe('OLM catalog source'),
  catalogSourceNamespaceName: z
    .string()
    .default('ramen-system')
    .describe('Namespace of the OLM catalog source'),
  clusterServiceVersionName: z
    .string()
    .default('ramen-dr-cluster-operator.v0.0.1')
    .describe('Starting ClusterServiceVersion'),
})

/**
 * Operator config schema. Unknown sections are kept so that the copy shipped
 * to managed clusters carries everything the hub was configured with.
 */
export const operatorConfigSchema = z
  .object({
    ramenControllerType: z.enum(['dr-hub', 'dr-cluster']).default('dr-hub'),
    leaderElection: z
      .object({
        leaderElect: z.boolean().optional(),
        resourceName: z.string().optional(),
        resourceNamespace: z.string().optional(),
      })
      .passthrough()
      .default({}),
    drClusterOperator: drClusterOperatorSchema.default({}),
  })
  .passthrough()

export type OperatorConfig = z.output<typeof operatorConfigSchema>
export type DrClusterOperatorSettings = z.output<typeof drClusterOperatorSchema>

/**
 * Parse and validate operator config data
 */
export function parseOperatorConfig(data: unknown): OperatorConfig {
  return operatorConfigSchema.parse(data)
}

/**
 * Safely parse operator config data, returning result with errors
 */
export function safeParseOperatorConfig(data: unknown): ParseResult<OperatorConfig> {
  const result = operatorConfigSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, errors: toValidationErrors(result.error) }
}
