/**
 * Work Module
 *
 * Packages objects into work bundles, converges them onto the hub's work
 * store, tears them down and interprets the status reported back.
 */

// Naming and provenance
export {
  DR_CLUSTER_WORK_NAME,
  OWNER_NAMESPACE_ANNOTATION,
  OWNER_NAME_ANNOTATION,
  WORK_KIND_NAMESPACE,
  WORK_KIND_VRG,
  workName,
  workNameFor,
} from './naming'

// Encoding and assembly
export { decodeManifest, encodeManifest, manifestEqual, manifestsEqual } from './manifest'
export { type BuildWorkBundleOptions, buildWorkBundle, isValidLocation } from './builder'
export * from './objects'
export { buildDrClusterWork, drClusterObjects } from './dr-cluster'

// Convergence and teardown
export type { WorkCallOptions } from './call'
export { type ConvergeResult, WorkSynchronizer } from './synchronizer'
export { type DeleteResult, WorkDeleter } from './deleter'

// Status
export { type WorkStatus, classifyWorkStatus, isWorkApplied } from './status'

// Per-owner facade
export { WorkManager } from './manager'
