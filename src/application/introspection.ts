import type {
  BindingInfo,
  ContainerGraph,
  ContainerInterface,
  ServiceId,
  ServiceInfo,
} from '../domain/types.js';
import type { BindingStore } from '../infrastructure/binding-store.js';

/**
 * Builds introspection data for one container layer.
 * Provides `inspect()`, `describe()` and `toString()`.
 */
export class Introspection {
  constructor(
    private readonly store: BindingStore,
    private readonly parent: ContainerInterface,
    private readonly name?: string,
  ) {}

  /**
   * Local bindings as a serializable object. Inherited bindings are not listed.
   */
  inspect(): ContainerGraph {
    const bindings: Record<ServiceId, BindingInfo> = {};
    for (const [id, binding] of this.store.entries()) {
      bindings[id] = binding.kind === 'alias' ? { id, kind: 'alias', target: binding.target } : { id, kind: binding.kind };
    }
    return this.name ? { name: this.name, bindings } : { bindings };
  }

  /**
   * Where `id` comes from as seen by this layer.
   */
  describe(id: ServiceId): ServiceInfo {
    const binding = this.store.lookup(id);
    if (binding?.kind === 'alias') return { id, kind: 'alias', target: binding.target };
    if (binding) return { id, kind: binding.kind };
    return { id, kind: this.parent.has(id) ? 'inherited' : 'unbound' };
  }

  /**
   * Human-readable representation of the layer, e.g. `Container { db (deferred), database -> db (alias) }`.
   */
  toString(): string {
    const parts = this.store.entries().map(([id, binding]) =>
      binding.kind === 'alias' ? `${id} -> ${binding.target} (alias)` : `${id} (${binding.kind})`,
    );
    const label = this.name ? `Scope(${this.name})` : 'Container';
    return `${label} { ${parts.join(', ')} }`;
  }
}
