export { buildForest } from './lib/buildForest'
export {
  formatTree,
  formatJson,
  formatYaml,
  renderTree,
  renderJson,
  renderYaml,
  renderForest
} from './lib/render'
export { toSerializable, toSerializableForest } from './lib/serialize'
export { createConfig, defaultParentAnnotation } from './lib/config'
export { fetchResources, toResource, createCoreApi } from './lib/namespaces'
export type { NamespaceLister } from './lib/namespaces'
export * from './lib/errors'
export * from './lib/types'
