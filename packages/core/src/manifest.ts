/**
 * Manifest Codec
 *
 * Objects are stored as canonical JSON: object keys sorted at every level and
 * no whitespace. Two manifests describe the same object exactly when their
 * `raw` strings are equal, whatever key order the store hands back.
 */

import { EncodeError } from './errors'
import type { Manifest } from './types'

/**
 * Serialize `value` as canonical JSON.
 *
 * Properties whose value is `undefined` are omitted. Anything JSON cannot
 * carry without loss is rejected: bigint, functions, symbols, non-finite
 * numbers, `undefined` array elements, non-plain objects and cycles.
 *
 * @throws EncodeError naming the offending path
 */
export function canonicalJson(value: unknown): string {
  return encodeValue(value, '$', new Set())
}

function encodeValue(value: unknown, path: string, ancestors: Set<object>): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value)
    case 'boolean':
      return value ? 'true' : 'false'
    case 'number':
      if (!Number.isFinite(value)) {
        throw new EncodeError(`Cannot encode non-finite number ${value}`, path)
      }
      return JSON.stringify(value)
    case 'object':
      if (value === null) return 'null'
      return encodeContainer(value, path, ancestors)
    default:
      throw new EncodeError(`Cannot encode value of type ${typeof value}`, path)
  }
}

function encodeContainer(value: object, path: string, ancestors: Set<object>): string {
  if (ancestors.has(value)) {
    throw new EncodeError('Cannot encode circular reference', path)
  }
  ancestors.add(value)

  try {
    if (Array.isArray(value)) {
      const items: string[] = []
      // Index loop so that holes in sparse arrays are seen as undefined
      for (let index = 0; index < value.length; index++) {
        const item: unknown = value[index]
        if (item === undefined) {
          throw new EncodeError('Cannot encode undefined array element', `${path}[${index}]`)
        }
        items.push(encodeValue(item, `${path}[${index}]`, ancestors))
      }
      return `[${items.join(',')}]`
    }

    const proto: unknown = Object.getPrototypeOf(value)
    if (proto !== Object.prototype && proto !== null) {
      throw new EncodeError(`Cannot encode instance of ${constructorName(value)}`, path)
    }

    const fields: string[] = []
    for (const key of Object.keys(value).sort()) {
      const field: unknown = Reflect.get(value, key)
      if (field === undefined) continue
      fields.push(`${JSON.stringify(key)}:${encodeValue(field, `${path}.${key}`, ancestors)}`)
    }
    return `{${fields.join(',')}}`
  } finally {
    ancestors.delete(value)
  }
}

function constructorName(value: object): string {
  const ctor: unknown = Reflect.get(value, 'constructor')
  if (typeof ctor === 'function' && ctor.name !== '') {
    return ctor.name
  }
  return 'anonymous prototype'
}

/**
 * Build a manifest from any object carrying `apiVersion` and `kind`.
 *
 * @throws EncodeError when the type fields are missing or the object cannot be encoded
 */
export function toManifest(object: unknown): Manifest {
  if (typeof object !== 'object' || object === null || Array.isArray(object)) {
    throw new EncodeError('Manifest object must be a plain object')
  }

  const apiVersion: unknown = Reflect.get(object, 'apiVersion')
  const kind: unknown = Reflect.get(object, 'kind')
  if (typeof apiVersion !== 'string' || apiVersion === '') {
    throw new EncodeError('Manifest object is missing apiVersion', '$.apiVersion')
  }
  if (typeof kind !== 'string' || kind === '') {
    throw new EncodeError('Manifest object is missing kind', '$.kind')
  }

  return { apiVersion, kind, raw: canonicalJson(object) }
}
