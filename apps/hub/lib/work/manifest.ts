/**
 * Manifest encoding for work objects, and the equality used to decide
 * whether a remote bundle needs rewriting.
 */

import {
  EncodeError,
  type Manifest,
  type WorkObject,
  safeParseWorkObject,
  toManifest,
} from '@workbridge/core'

/**
 * Serialize a work object into a manifest.
 * @throws EncodeError when the object holds values JSON cannot carry
 */
export function encodeManifest(object: WorkObject): Manifest {
  return toManifest(object)
}

/**
 * Parse a manifest back into a typed work object.
 * @throws EncodeError when the payload is not JSON or not a known work object
 */
export function decodeManifest(manifest: Manifest): WorkObject {
  let data: unknown
  try {
    data = JSON.parse(manifest.raw)
  } catch (err) {
    throw new EncodeError(
      `Manifest ${manifest.kind} payload is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    )
  }

  const result = safeParseWorkObject(data)
  if (!result.success) {
    const detail = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ')
    throw new EncodeError(`Manifest ${manifest.kind} is not a valid work object (${detail})`)
  }
  if (result.data.kind !== manifest.kind) {
    throw new EncodeError(
      `Manifest declares kind ${manifest.kind} but payload is ${result.data.kind}`,
    )
  }
  return result.data
}

/**
 * Two manifests are equal when type and payload match byte for byte.
 */
export function manifestEqual(a: Manifest, b: Manifest): boolean {
  return a.apiVersion === b.apiVersion && a.kind === b.kind && a.raw === b.raw
}

/**
 * Ordered manifest sequence equality: same length, pairwise equal.
 */
export function manifestsEqual(a: readonly Manifest[], b: readonly Manifest[]): boolean {
  if (a.length !== b.length) return false
  return a.every((manifest, i) => manifestEqual(manifest, b[i]))
}
