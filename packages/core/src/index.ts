// Core types - shared across all packages
export * from './types'

// Work store interface - implemented by @workbridge/kubernetes
export * from './store'
export * from './errors'
export { raceAbort } from './abort'

// Canonical manifest encoding
export { canonicalJson, toManifest } from './manifest'

// Schemas for validation
export * from './schemas/work'
export * from './schemas/operator-config'
