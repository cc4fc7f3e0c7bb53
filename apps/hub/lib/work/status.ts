import type { Condition } from '@workbridge/core'

/**
 * Completion verdict for a work bundle.
 * - `applied`: applied and available on the managed cluster, not degraded
 * - `degraded`: the managed cluster reports the work as degraded
 * - `progressing`: anything else, including no status at all
 */
export type WorkStatus = 'applied' | 'degraded' | 'progressing'

function hasTrueCondition(conditions: readonly Condition[], type: string): boolean {
  return conditions.some((c) => c.type === type && c.status === 'True')
}

/**
 * True when the work is Applied and Available and not Degraded.
 * Missing Applied or Available counts as not satisfied; missing Degraded does not block.
 */
export function isWorkApplied(conditions: readonly Condition[]): boolean {
  return (
    hasTrueCondition(conditions, 'Applied') &&
    hasTrueCondition(conditions, 'Available') &&
    !hasTrueCondition(conditions, 'Degraded')
  )
}

export function classifyWorkStatus(conditions: readonly Condition[]): WorkStatus {
  if (hasTrueCondition(conditions, 'Degraded')) return 'degraded'
  if (isWorkApplied(conditions)) return 'applied'
  return 'progressing'
}
