/**
 * Work Store Errors
 *
 * Thrown by WorkStore implementations and the manifest codec. Each carries a
 * stable `code` so callers can branch without string matching.
 */

export class WorkNotFoundError extends Error {
  readonly code = 'WORK_NOT_FOUND'

  constructor(name: string, location: string) {
    super(`Work ${location}/${name} not found`)
    this.name = 'WorkNotFoundError'
  }
}

export class WorkAlreadyExistsError extends Error {
  readonly code = 'WORK_ALREADY_EXISTS'

  constructor(name: string, location: string) {
    super(`Work ${location}/${name} already exists`)
    this.name = 'WorkAlreadyExistsError'
  }
}

export class WorkConflictError extends Error {
  readonly code = 'WORK_CONFLICT'

  constructor(name: string, location: string, resourceVersion?: string) {
    super(
      `Work ${location}/${name} was modified since it was read` +
        (resourceVersion ? ` (resourceVersion ${resourceVersion})` : ''),
    )
    this.name = 'WorkConflictError'
  }
}

/**
 * An object could not be serialized into, or parsed back from, a manifest.
 */
export class EncodeError extends Error {
  readonly code = 'ENCODE_FAILED'

  constructor(
    message: string,
    readonly path?: string,
  ) {
    super(path ? `${message} at ${path}` : message)
    this.name = 'EncodeError'
  }
}

/**
 * Type guard for errors carrying a string `code`.
 */
export function isWorkError(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string'
}
