import { ServiceNotFoundError } from '../domain/errors.js';
import type { ListableContainer, ServiceId } from '../domain/types.js';

/**
 * Read-only container over a fixed set of values.
 * Handy as the parent of a cascade chain, e.g. to expose configuration or test doubles.
 *
 * @example
 * ```typescript
 * const root = new CascadeContainer({ parent: new MapContainer({ env: 'test' }) });
 * root.get('env'); // 'test'
 * ```
 */
export class MapContainer implements ListableContainer {
  private readonly values: Map<ServiceId, unknown>;

  constructor(values: Record<ServiceId, unknown> | Map<ServiceId, unknown> = {}) {
    this.values = values instanceof Map ? new Map(values) : new Map(Object.entries(values));
  }

  has(id: ServiceId): boolean {
    return this.values.has(id);
  }

  get(id: ServiceId): unknown {
    if (!this.values.has(id)) {
      throw new ServiceNotFoundError(id, this.ids());
    }
    return this.values.get(id);
  }

  ids(): ServiceId[] {
    return [...this.values.keys()];
  }
}
