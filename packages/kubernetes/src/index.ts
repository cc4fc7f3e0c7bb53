export {
  type CustomObjectsClient,
  InvalidManifestWorkError,
  KubernetesWorkStore,
  fromResource,
  toResource,
  toUpdatedResource,
} from './kubernetes-store'
