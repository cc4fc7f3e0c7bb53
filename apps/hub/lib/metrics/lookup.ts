/**
 * Metric Value Lookup
 *
 * Reads a single value out of a registry snapshot. Used by tests and health
 * checks that need to assert on one series without scraping text output.
 */

import type { MetricObjectWithValues, MetricValue, Registry } from 'prom-client'
import { MetricLookupError } from '../errors'

/**
 * Metric family kinds. Only counter, gauge and histogram can be read.
 */
export type MetricKind = 'counter' | 'gauge' | 'histogram' | 'summary' | 'untyped'

type MetricFamily = MetricObjectWithValues<MetricValue<string>>

/**
 * Get the value of a single-series metric.
 *
 * Counters and gauges return their value; histograms return their sample count.
 *
 * @throws MetricLookupError when the registry is empty, the name is unknown,
 *   the kind does not match, the family has more than one series, or the kind
 *   is not supported yet
 */
export async function getMetricValueSingle(
  registry: Registry,
  name: string,
  kind: MetricKind,
): Promise<number> {
  const family = await findMetricFamily(registry, name)
  return getValueByKind(family, kind)
}

async function findMetricFamily(registry: Registry, name: string): Promise<MetricFamily> {
  const families = await registry.getMetricsAsJSON()
  if (families.length === 0) {
    throw new MetricLookupError('No metric families in registry')
  }

  const family = families.find((f) => f.name === name)
  if (!family) {
    throw new MetricLookupError(`Metric family ${name} not found`)
  }
  return family
}

function getValueByKind(family: MetricFamily, kind: MetricKind): number {
  const familyKind = String(family.type)
  if (familyKind !== kind) {
    throw new MetricLookupError(`Metric ${family.name} is a ${familyKind}, not a ${kind}`)
  }

  switch (kind) {
    case 'counter':
    case 'gauge':
      return singleValue(family, family.values)
    case 'histogram':
      // Count is more useful than sum for assertions; read _sum separately if needed
      return singleValue(
        family,
        family.values.filter((v) => seriesName(v) === `${family.name}_count`),
      )
    default:
      throw new MetricLookupError(`Metric kind ${kind} is not supported yet`)
  }
}

function singleValue(family: MetricFamily, values: MetricValue<string>[]): number {
  if (values.length !== 1) {
    throw new MetricLookupError(
      `Metric ${family.name} has ${values.length} series, expected exactly 1`,
    )
  }
  return values[0].value
}

function seriesName(value: MetricValue<string>): string | undefined {
  if ('metricName' in value && typeof value.metricName === 'string') {
    return value.metricName
  }
  return undefined
}
