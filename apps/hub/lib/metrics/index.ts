/**
 * Prometheus Metrics Module
 *
 * Central registry and exports for all workbridge metrics.
 * Follows Prometheus naming conventions with workbridge_ prefix.
 */

// Registry and system metrics
export { registry } from './registry'

export * from './work'
export { getMetricValueSingle, type MetricKind } from './lookup'
