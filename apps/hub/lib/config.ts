import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import {
  type OperatorConfig,
  type ValidationError,
  parseOperatorConfig,
  safeParseOperatorConfig,
} from '@workbridge/core'
import { parse as parseYaml } from 'yaml'

export interface HubConfig {
  logLevel: string

  /**
   * Kubeconfig for the hub cluster. Unset means in-cluster or $KUBECONFIG.
   * @example '/etc/workbridge/hub.kubeconfig'
   */
  kubeconfigPath?: string

  /**
   * Deadline applied to each work operation, in milliseconds. 0 disables it.
   * @default 30000
   */
  operationTimeoutMs: number

  /**
   * Operator config YAML shipped to managed clusters. Unset uses defaults.
   * @example '/etc/workbridge/operator_config.yaml'
   */
  operatorConfigPath?: string
}

function getEnvNumber(env: NodeJS.ProcessEnv, key: string, defaultValue: number): number {
  const value = env[key]
  if (value === undefined) return defaultValue
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? defaultValue : parsed
}

function getEnvString(env: NodeJS.ProcessEnv, key: string, defaultValue: string): string {
  return env[key] ?? defaultValue
}

function getEnvPath(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]
  if (!value) return undefined
  // Resolve relative paths from current working directory
  return value.startsWith('/') ? value : resolve(process.cwd(), value)
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HubConfig {
  return {
    logLevel: getEnvString(env, 'WORKBRIDGE_LOG_LEVEL', 'info'),
    kubeconfigPath: getEnvPath(env, 'WORKBRIDGE_KUBECONFIG'),
    operationTimeoutMs: getEnvNumber(env, 'WORKBRIDGE_OPERATION_TIMEOUT_MS', 30 * 1000),
    operatorConfigPath: getEnvPath(env, 'WORKBRIDGE_OPERATOR_CONFIG'),
  }
}

/**
 * Operator config validation error
 */
export class OperatorConfigValidationError extends Error {
  constructor(
    public readonly file: string,
    public readonly errors: ValidationError[],
  ) {
    const errorList = errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n')
    super(`Invalid operator config in ${file}:\n${errorList}`)
    this.name = 'OperatorConfigValidationError'
  }
}

/**
 * Load the operator config from a YAML file, or the defaults when no file is given.
 */
export function loadOperatorConfig(filePath?: string): OperatorConfig {
  if (!filePath) {
    return parseOperatorConfig({})
  }

  const content = readFileSync(filePath, 'utf-8')
  const result = safeParseOperatorConfig(parseYaml(content) ?? {})
  if (!result.success) {
    throw new OperatorConfigValidationError(filePath, result.errors)
  }
  return result.data
}
