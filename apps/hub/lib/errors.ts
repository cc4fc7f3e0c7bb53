/**
 * Domain Error Types
 *
 * Errors raised by the work engine. Store and codec errors (not found, already
 * exists, conflict, encode) live in @workbridge/core; everything here adds the
 * operation context a caller needs to decide whether to requeue.
 */

/**
 * Which engine operation failed.
 */
export type WorkOperation = 'get' | 'create' | 'update' | 'delete'

export class InvalidTargetError extends Error {
  readonly code = 'INVALID_TARGET'

  constructor(name: string) {
    super(`Invalid target location for work ${name}`)
    this.name = 'InvalidTargetError'
  }
}

export class WorkFetchError extends Error {
  readonly code = 'WORK_FETCH_FAILED'

  constructor(
    readonly workName: string,
    readonly location: string,
    cause: unknown,
  ) {
    super(`Failed to fetch work ${location}/${workName}: ${describeCause(cause)}`, { cause })
    this.name = 'WorkFetchError'
  }
}

export class WorkOperationError extends Error {
  readonly code = 'WORK_OPERATION_FAILED'

  constructor(
    readonly operation: WorkOperation,
    readonly workName: string,
    readonly location: string,
    cause: unknown,
  ) {
    super(`Failed to ${operation} work ${location}/${workName}: ${describeCause(cause)}`, { cause })
    this.name = 'WorkOperationError'
  }
}

/**
 * The store returned a bundle without a resourceVersion, so an update could
 * not be conditioned on what was read.
 */
export class UnconditionalWriteError extends Error {
  readonly code = 'UNCONDITIONAL_WRITE'

  constructor(
    readonly workName: string,
    readonly location: string,
  ) {
    super(`Refusing to update work ${location}/${workName}: store returned no resourceVersion`)
    this.name = 'UnconditionalWriteError'
  }
}

export class WorkCancelledError extends Error {
  readonly code = 'WORK_CANCELLED'

  constructor(operation: WorkOperation, workName: string, cause?: unknown) {
    super(`Work ${workName}: ${operation} cancelled`, { cause })
    this.name = 'WorkCancelledError'
  }
}

export class WorkDeadlineExceededError extends Error {
  readonly code = 'WORK_DEADLINE_EXCEEDED'

  constructor(operation: WorkOperation, workName: string, cause?: unknown) {
    super(`Work ${workName}: deadline exceeded during ${operation}`, { cause })
    this.name = 'WorkDeadlineExceededError'
  }
}

export class MetricLookupError extends Error {
  readonly code = 'METRIC_LOOKUP_FAILED'

  constructor(message: string) {
    super(message)
    this.name = 'MetricLookupError'
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
