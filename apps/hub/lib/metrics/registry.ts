/**
 * Prometheus Registry
 *
 * Central registry for all metrics. Separated to avoid circular imports.
 */

import { Gauge, Registry, collectDefaultMetrics } from 'prom-client'

// Create a custom registry (allows isolation in tests)
export const registry = new Registry()

// Add default Node.js metrics (process CPU, memory, event loop lag, etc.)
collectDefaultMetrics({ register: registry })

const systemInfo = new Gauge({
  name: 'workbridge_info',
  help: 'Static info about the workbridge hub',
  labelNames: ['version'],
  registers: [registry],
})
systemInfo.set({ version: '0.1.0' }, 1)
