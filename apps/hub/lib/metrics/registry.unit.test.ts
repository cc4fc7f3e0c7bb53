import { describe, expect, test } from 'vitest'
import { getMetricValueSingle } from './lookup'
import { registry } from './registry'

describe('registry', () => {
  test('publishes the hub info gauge', async () => {
    expect(await getMetricValueSingle(registry, 'workbridge_info', 'gauge')).toBe(1)

    const [family] = (await registry.getMetricsAsJSON()).filter((f) => f.name === 'workbridge_info')
    expect(family?.values[0]?.labels).toEqual({ version: '0.1.0' })
  })

  test('collects default process metrics', async () => {
    const names = (await registry.getMetricsAsJSON()).map((f) => f.name)
    expect(names).toContain('process_cpu_user_seconds_total')
  })
})
