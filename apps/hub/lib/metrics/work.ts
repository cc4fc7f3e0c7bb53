/**
 * Work Metrics
 *
 * Counters and timings for work bundle convergence and teardown.
 */

import { isWorkError } from '@workbridge/core'
import { Counter, Histogram } from 'prom-client'
import { registry } from './registry'

// Each operation is one or two round trips to the hub API server
const workBuckets = [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10]

export const workOperationsTotal = new Counter({
  name: 'workbridge_work_operations_total',
  help: 'Work operations by outcome',
  labelNames: ['operation', 'result'],
  registers: [registry],
})

export const workOperationDuration = new Histogram({
  name: 'workbridge_work_operation_duration_seconds',
  help: 'Work operation duration',
  labelNames: ['operation'],
  buckets: workBuckets,
  registers: [registry],
})

export const workErrorsTotal = new Counter({
  name: 'workbridge_work_errors_total',
  help: 'Work operation errors by type',
  labelNames: ['operation', 'error_type'],
  registers: [registry],
})

const ERROR_TYPES: Record<string, string> = {
  WORK_CONFLICT: 'conflict',
  WORK_CANCELLED: 'cancelled',
  WORK_DEADLINE_EXCEEDED: 'deadline_exceeded',
  INVALID_TARGET: 'invalid_target',
  UNCONDITIONAL_WRITE: 'unconditional_write',
  WORK_FETCH_FAILED: 'fetch_failed',
  WORK_OPERATION_FAILED: 'write_failed',
  ENCODE_FAILED: 'encode_failed',
}

/**
 * Classify an error for the error_type label.
 */
export function classifyWorkError(error: unknown): string {
  if (isWorkError(error)) {
    return ERROR_TYPES[error.code] ?? 'unknown'
  }
  return 'unknown'
}
