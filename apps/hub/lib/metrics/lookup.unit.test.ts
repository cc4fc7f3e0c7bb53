import { Counter, Gauge, Histogram, Registry, Summary } from 'prom-client'
import { beforeEach, describe, expect, test } from 'vitest'
import { MetricLookupError } from '../errors'
import { getMetricValueSingle } from './lookup'

describe('getMetricValueSingle', () => {
  let registry: Registry

  beforeEach(() => {
    registry = new Registry()
  })

  test('reads a counter', async () => {
    const counter = new Counter({ name: 'test_requests_total', help: 'h', registers: [registry] })
    counter.inc(3)

    expect(await getMetricValueSingle(registry, 'test_requests_total', 'counter')).toBe(3)
  })

  test('reads a gauge', async () => {
    const gauge = new Gauge({ name: 'test_queue_depth', help: 'h', registers: [registry] })
    gauge.set(7.5)

    expect(await getMetricValueSingle(registry, 'test_queue_depth', 'gauge')).toBe(7.5)
  })

  test('reads the sample count of a histogram', async () => {
    const histogram = new Histogram({
      name: 'test_latency_seconds',
      help: 'h',
      buckets: [0.1, 1],
      registers: [registry],
    })
    histogram.observe(0.05)
    histogram.observe(3)

    expect(await getMetricValueSingle(registry, 'test_latency_seconds', 'histogram')).toBe(2)
  })

  test('fails on an empty registry', async () => {
    await expect(getMetricValueSingle(registry, 'test_requests_total', 'counter')).rejects.toThrow(
      'No metric families in registry',
    )
  })

  test('fails on an unknown name', async () => {
    new Counter({ name: 'test_requests_total', help: 'h', registers: [registry] })

    await expect(getMetricValueSingle(registry, 'test_missing', 'counter')).rejects.toThrow(
      'Metric family test_missing not found',
    )
  })

  test('fails on a kind mismatch', async () => {
    new Counter({ name: 'test_requests_total', help: 'h', registers: [registry] })

    await expect(getMetricValueSingle(registry, 'test_requests_total', 'gauge')).rejects.toThrow(
      'Metric test_requests_total is a counter, not a gauge',
    )
  })

  test('fails when the family has more than one series', async () => {
    const counter = new Counter({
      name: 'test_requests_total',
      help: 'h',
      labelNames: ['route'],
      registers: [registry],
    })
    counter.inc({ route: '/a' })
    counter.inc({ route: '/b' })

    await expect(
      getMetricValueSingle(registry, 'test_requests_total', 'counter'),
    ).rejects.toBeInstanceOf(MetricLookupError)
    await expect(getMetricValueSingle(registry, 'test_requests_total', 'counter')).rejects.toThrow(
      'Metric test_requests_total has 2 series, expected exactly 1',
    )
  })

  test('does not read summaries yet', async () => {
    const summary = new Summary({ name: 'test_size_bytes', help: 'h', registers: [registry] })
    summary.observe(10)

    await expect(getMetricValueSingle(registry, 'test_size_bytes', 'summary')).rejects.toThrow(
      'Metric kind summary is not supported yet',
    )
  })
})
