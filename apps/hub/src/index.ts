/**
 * Production entrypoint: builds an App against the hub cluster from the
 * environment, and exports the engine's public API.
 */

import { KubernetesWorkStore } from '@workbridge/kubernetes'
import { KubeConfig } from '@kubernetes/client-node'
import { type HubConfig, loadConfig, loadOperatorConfig } from '../lib/config'
import { createLogger } from '../lib/logger'
import { App } from './app'

/**
 * Load a kubeconfig from `path`, or from $KUBECONFIG / in-cluster defaults.
 */
export function loadKubeConfig(path?: string): KubeConfig {
  const kubeConfig = new KubeConfig()
  if (path) {
    kubeConfig.loadFromFile(path)
  } else {
    kubeConfig.loadFromDefault()
  }
  return kubeConfig
}

export function createHubApp(config: HubConfig = loadConfig()): App {
  const logger = createLogger(config.logLevel)
  const kubeConfig = loadKubeConfig(config.kubeconfigPath)
  const store = KubernetesWorkStore.fromKubeConfig(kubeConfig)
  const operatorConfig = loadOperatorConfig(config.operatorConfigPath)

  logger.info(
    {
      store: store.name,
      cluster: kubeConfig.getCurrentCluster()?.server,
      operationTimeoutMs: config.operationTimeoutMs,
      operatorConfig: config.operatorConfigPath ?? 'defaults',
      deploymentAutomation: operatorConfig.drClusterOperator.deploymentAutomationEnabled,
    },
    'Hub work engine configured',
  )

  return new App({
    store,
    logger,
    operatorConfig,
    operationTimeoutMs: config.operationTimeoutMs,
  })
}

export { App, type AppConfig } from './app'
export { type HubConfig, OperatorConfigValidationError, loadConfig, loadOperatorConfig } from '../lib/config'
export { type Logger, createLogger } from '../lib/logger'
export * from '../lib/errors'
export { type MetricKind, getMetricValueSingle, registry } from '../lib/metrics'
export * from '../lib/work'
