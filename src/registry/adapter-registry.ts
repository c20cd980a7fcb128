/**
 * Adapter Registry
 *
 * Maps each capability to the adapters that declared it, in registration
 * order. Append-only; the same instance is never listed twice under one
 * capability.
 */

import type { IAdapter } from '../adapters/adapter';

export class AdapterRegistry {
  private readonly byCapability = new Map<string, IAdapter[]>();
  private readonly adapters: IAdapter[] = [];

  /**
   * Register an adapter under each capability it declares.
   * @returns capabilities the adapter was newly added under
   */
  register(adapter: IAdapter): string[] {
    const added: string[] = [];
    for (const capability of new Set(adapter.capabilities())) {
      const list = this.byCapability.get(capability) ?? [];
      if (!list.includes(adapter)) {
        list.push(adapter);
        added.push(capability);
      }
      this.byCapability.set(capability, list);
    }
    if (!this.adapters.includes(adapter)) {
      this.adapters.push(adapter);
    }
    return added;
  }

  /**
   * Adapters registered for a capability, registration order
   */
  getAdapters(capability: string): readonly IAdapter[] {
    return [...(this.byCapability.get(capability) ?? [])];
  }

  hasCapability(capability: string): boolean {
    return (this.byCapability.get(capability)?.length ?? 0) > 0;
  }

  getCapabilities(): string[] {
    return [...this.byCapability.keys()];
  }

  getAllAdapters(): readonly IAdapter[] {
    return [...this.adapters];
  }

  size(): number {
    return this.adapters.length;
  }
}
