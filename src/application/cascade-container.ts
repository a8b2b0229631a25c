import type { Logger } from 'pino';
import { CircularAliasError, CircularDependencyError, ServiceNotFoundError } from '../domain/errors.js';
import type {
  Bindings,
  Callable,
  CascadeOptions,
  Constructor,
  ContainerGraph,
  ContainerInterface,
  ContainerOptions,
  DependencyResolver,
  Invoker,
  ListableContainer,
  ResolutionContext,
  ServiceId,
  ServiceInfo,
} from '../domain/types.js';
import { Validator } from '../domain/validation.js';
import { AutowiringResolver } from '../infrastructure/autowiring-resolver.js';
import { BindingStore } from '../infrastructure/binding-store.js';
import { CycleDetector } from '../infrastructure/cycle-detector.js';
import { defaultLogger } from '../infrastructure/logger.js';
import { NullContainer } from '../infrastructure/null-container.js';
import { decorate, decorateInherited } from './extension.js';
import { Introspection } from './introspection.js';

const validator = new Validator();

/**
 * Layered service container.
 *
 * Lookups check the local bindings in a fixed order (alias, instance, deferred, factory)
 * and fall back to the parent. `cascade()` derives a child layer that sees everything
 * its parent binds, including bindings added later, and can shadow them without
 * touching the parent.
 *
 * @example
 * ```typescript
 * const app = new CascadeContainer();
 * app.set('config', { dsn: 'postgres://localhost/app' });
 * app.deferred('db', inject(['config'], (config: Config) => new Database(config.dsn)));
 * app.alias('db', 'database');
 *
 * const request = app.cascade({ name: 'request' });
 * request.factory('requestId', () => crypto.randomUUID());
 * request.get('database'); // same Database instance as app.get('db')
 * ```
 */
export class CascadeContainer implements ResolutionContext, ListableContainer, Invoker {
  private readonly store = new BindingStore();
  private readonly evaluating = new CycleDetector();
  private readonly parent: ContainerInterface;
  private readonly resolver: DependencyResolver;
  private readonly logger: Logger;
  private readonly introspection: Introspection;

  constructor(options: ContainerOptions = {}) {
    validator.validateOptions(options);
    this.parent = options.parent ?? new NullContainer();
    this.resolver = options.resolver ?? new AutowiringResolver();
    this.logger = options.logger ?? defaultLogger();
    this.introspection = new Introspection(this.store, this.parent, options.name);

    const { instances = {} } = options;
    const entries = instances instanceof Map ? instances.entries() : Object.entries(instances);
    for (const [id, value] of entries) {
      this.store.setInstance(id, value);
    }
  }

  /**
   * Creates a nested layer. Anything bound in the layer stays invisible to this container.
   */
  cascade(options: CascadeOptions = {}): CascadeContainer {
    const layer = new CascadeContainer({
      parent: this,
      resolver: this.resolver,
      logger: options.name ? this.logger.child({ scope: options.name }) : this.logger,
      name: options.name,
    });
    this.logger.debug({ scope: options.name }, 'cascade layer created');
    return layer;
  }

  has(id: ServiceId): boolean {
    const { target, cycle } = this.followAliases(id);
    if (cycle) return false;
    return this.store.provides(target) || this.parent.has(target);
  }

  get(id: ServiceId): unknown {
    const target = this.unalias(id);
    const binding = this.store.lookup(target);

    if (binding?.kind === 'instance') {
      return binding.value;
    }
    if (binding?.kind === 'deferred') {
      const value = this.evaluate(target, binding.producer);
      if (this.store.promote(target, binding.producer, value)) {
        this.logger.debug({ id: target }, 'deferred service promoted');
      }
      return value;
    }
    if (binding?.kind === 'factory') {
      return this.evaluate(target, binding.producer);
    }

    if (this.parent.has(target)) {
      return this.parent.get(target);
    }

    throw this.notFound(target);
  }

  /**
   * Binds an instance, replacing any binding of `id` on this layer.
   */
  set(id: ServiceId, instance: unknown): void {
    this.store.setInstance(id, instance);
    this.logger.debug({ id, kind: 'instance' }, 'binding registered');
  }

  /**
   * Makes `alias` resolve to whatever `id` resolves to, now or later.
   */
  alias(id: ServiceId, alias: ServiceId): void {
    this.store.setAlias(id, alias);
    this.logger.debug({ id: alias, kind: 'alias', target: id }, 'binding registered');
  }

  /**
   * Binds a factory. It runs on every lookup; use `deferred()` to keep the first result.
   */
  factory(id: ServiceId, producer: Callable): void {
    this.store.setFactory(id, producer);
    this.logger.debug({ id, kind: 'factory' }, 'binding registered');
  }

  /**
   * Binds a one-time producer. It runs on the first lookup, and its result is then
   * kept as a regular instance.
   */
  deferred(id: ServiceId, producer: Callable): void {
    this.store.setDeferred(id, producer);
    this.logger.debug({ id, kind: 'deferred' }, 'binding registered');
  }

  /**
   * Returns the bound service if there is one, otherwise asks the resolver to build it.
   */
  resolve(id: ServiceId): unknown {
    if (this.has(id)) {
      return this.get(id);
    }
    return this.resolver.resolve(id, this);
  }

  /**
   * Applies `transform` to the service, keeping the kind of its binding:
   * - an instance is replaced right away by the transformed value;
   * - a deferred producer stays deferred, and the transform runs once;
   * - a factory stays a factory, and the transform runs on every lookup;
   * - a service only the parent binds gets a local deferred binding; the parent is untouched.
   *
   * `transform` receives the previous value as its first argument; other declared
   * parameters are autowired.
   */
  extend(id: ServiceId, transform: Callable): void {
    const target = this.unalias(id);
    const binding = this.store.lookup(target);

    if (binding?.kind === 'instance') {
      this.store.setInstance(target, this.call(transform, [binding.value]));
    } else if (binding?.kind === 'deferred') {
      this.store.setDeferred(target, decorate(this, binding.producer, transform));
    } else if (binding?.kind === 'factory') {
      this.store.setFactory(target, decorate(this, binding.producer, transform));
    } else if (this.parent.has(target)) {
      this.store.setDeferred(target, decorateInherited(this, this.parent, target, transform));
    } else {
      throw this.notFound(target);
    }

    this.logger.debug({ id: target, kind: binding?.kind ?? 'inherited' }, 'binding extended');
  }

  /**
   * Builds a new instance of `type` even if one is already bound, autowiring its
   * constructor from this container.
   */
  construct<T>(type: Constructor<T>, bindings?: Bindings): T;
  construct(type: ServiceId, bindings?: Bindings): unknown;
  construct(type: ServiceId | Constructor, bindings: Bindings = []): unknown {
    // Same call twice: each branch narrows `type` to one resolver overload.
    return typeof type === 'string'
      ? this.resolver.construct(type, bindings, this)
      : this.resolver.construct(type, bindings, this);
  }

  /**
   * Calls `callable`, supplying its parameters from `bindings` first and this container second.
   */
  call<R>(callable: Callable<R>, bindings: Bindings = []): R {
    return this.resolver.call(callable, bindings, this);
  }

  /**
   * Every id this layer can provide, own bindings first, then inherited ones
   * (when the parent can list its ids).
   */
  ids(): ServiceId[] {
    const ids = new Set(this.store.ids());
    if (isListable(this.parent)) {
      for (const id of this.parent.ids()) ids.add(id);
    }
    return [...ids];
  }

  inspect(): ContainerGraph {
    return this.introspection.inspect();
  }

  describe(id: ServiceId): ServiceInfo {
    return this.introspection.describe(id);
  }

  toString(): string {
    return this.introspection.toString();
  }

  private evaluate(id: ServiceId, producer: Callable): unknown {
    if (this.evaluating.isResolving(id)) {
      throw new CircularDependencyError(id, this.evaluating.path());
    }
    this.evaluating.enter(id);
    try {
      return this.call(producer);
    } finally {
      this.evaluating.leave(id);
    }
  }

  private unalias(id: ServiceId): ServiceId {
    const { target, cycle } = this.followAliases(id);
    if (cycle) {
      throw new CircularAliasError(id, cycle);
    }
    return target;
  }

  /** Follows local aliases from `id`; `cycle` is set when the chain loops. */
  private followAliases(id: ServiceId): { target: ServiceId; cycle?: ServiceId[] } {
    const chain = [id];
    let target = id;
    let next = this.store.aliasTarget(target);
    while (next !== undefined) {
      if (chain.includes(next)) {
        return { target, cycle: [...chain, next] };
      }
      chain.push(next);
      target = next;
      next = this.store.aliasTarget(target);
    }
    return { target };
  }

  private notFound(id: ServiceId): ServiceNotFoundError {
    const registered = this.ids();
    return new ServiceNotFoundError(id, registered, validator.suggestKey(id, registered));
  }
}

/** Duck-type check: can the container list its ids? */
function isListable(container: ContainerInterface): container is ListableContainer {
  return 'ids' in container && typeof container.ids === 'function';
}
