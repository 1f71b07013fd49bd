export { loadStoreDefinitions, parseStoreDefinitions, QUERY_PLACEHOLDER } from './definitions'
export { TemplateStoreAdapter } from './template-adapter'
export type { TemplateStoreAdapterOptions } from './template-adapter'
export { StoreRegistry, createStoreRegistry } from './registry'
export type { StoreAdapter, StoreDefinition } from './types'
