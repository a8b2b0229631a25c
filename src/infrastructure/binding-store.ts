import { InvalidAliasError } from '../domain/errors.js';
import type { Binding, Callable, ServiceId } from '../domain/types.js';

/**
 * Local bindings of one container layer.
 *
 * Holds four maps (instances, deferred producers, factories, aliases) and keeps them
 * mutually exclusive: every write erases whatever else was bound under the same id.
 */
export class BindingStore {
  private readonly instances = new Map<ServiceId, unknown>();
  private readonly deferred = new Map<ServiceId, Callable>();
  private readonly factories = new Map<ServiceId, Callable>();
  private readonly aliases = new Map<ServiceId, ServiceId>();

  setInstance(id: ServiceId, value: unknown): void {
    this.forget(id);
    this.instances.set(id, value);
  }

  setDeferred(id: ServiceId, producer: Callable): void {
    this.forget(id);
    this.deferred.set(id, producer);
  }

  setFactory(id: ServiceId, producer: Callable): void {
    this.forget(id);
    this.factories.set(id, producer);
  }

  /**
   * Binds `alias` to `id`. Nothing is erased when the alias is rejected.
   */
  setAlias(id: ServiceId, alias: ServiceId): void {
    if (id === alias) {
      throw new InvalidAliasError(id);
    }
    this.forget(alias);
    this.aliases.set(alias, id);
  }

  /**
   * Caches a deferred producer's result as a plain instance and drops the producer.
   * Skipped when `id` was rebound while `producer` ran; returns whether it was promoted.
   */
  promote(id: ServiceId, producer: Callable, value: unknown): boolean {
    if (this.deferred.get(id) !== producer) return false;
    this.deferred.delete(id);
    this.instances.set(id, value);
    return true;
  }

  /** Alias target of `id`, if `id` is an alias on this layer. */
  aliasTarget(id: ServiceId): ServiceId | undefined {
    return this.aliases.get(id);
  }

  /**
   * Local binding for `id` in lookup precedence order: alias, instance, deferred, factory.
   */
  lookup(id: ServiceId): Binding | undefined {
    const target = this.aliases.get(id);
    if (target !== undefined) return { kind: 'alias', target };
    if (this.instances.has(id)) return { kind: 'instance', value: this.instances.get(id) };
    const deferred = this.deferred.get(id);
    if (deferred) return { kind: 'deferred', producer: deferred };
    const factory = this.factories.get(id);
    if (factory) return { kind: 'factory', producer: factory };
    return undefined;
  }

  /** True when `id` is bound to a value or producer (aliases excluded). */
  provides(id: ServiceId): boolean {
    return this.instances.has(id) || this.deferred.has(id) || this.factories.has(id);
  }

  ids(): ServiceId[] {
    return [
      ...this.instances.keys(),
      ...this.deferred.keys(),
      ...this.factories.keys(),
      ...this.aliases.keys(),
    ];
  }

  entries(): Array<[ServiceId, Binding]> {
    const entries: Array<[ServiceId, Binding]> = [];
    for (const id of this.ids()) {
      const binding = this.lookup(id);
      if (binding) entries.push([id, binding]);
    }
    return entries;
  }

  private forget(id: ServiceId): void {
    this.aliases.delete(id);
    this.instances.delete(id);
    this.deferred.delete(id);
    this.factories.delete(id);
  }
}
