/**
 * Store Registry
 *
 * Adapters are registered explicitly at startup; no auto-discovery.
 */

import type { ILogger } from '../config/logger'
import { TemplateStoreAdapter } from './template-adapter'
import type { StoreAdapter, StoreDefinition } from './types'

export class StoreRegistry {
  private readonly adapters = new Map<string, StoreAdapter>()

  /**
   * @throws Error if an adapter with the same id is already registered
   */
  register(adapter: StoreAdapter): void {
    if (this.adapters.has(adapter.id)) {
      throw new Error(`Store '${adapter.id}' is already registered`)
    }
    this.adapters.set(adapter.id, adapter)
  }

  get(storeId: string): StoreAdapter | undefined {
    return this.adapters.get(storeId)
  }

  list(): StoreAdapter[] {
    return Array.from(this.adapters.values())
  }

  ids(): string[] {
    return Array.from(this.adapters.keys())
  }

  get size(): number {
    return this.adapters.size
  }
}

/**
 * Registry holding a template adapter for every enabled definition.
 */
export function createStoreRegistry(
  definitions: readonly StoreDefinition[],
  options: { logger?: ILogger } = {}
): StoreRegistry {
  const registry = new StoreRegistry()
  for (const definition of definitions) {
    if (definition.enabled) {
      registry.register(new TemplateStoreAdapter(definition, options))
    }
  }
  return registry
}
