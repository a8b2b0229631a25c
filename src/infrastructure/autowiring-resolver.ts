import {
  CannotAutowireArgumentError,
  CannotAutowireDependencyArgumentError,
  CircularDependencyError,
  ClassCannotBeInstantiatedError,
  ContainerConfigError,
} from '../domain/errors.js';
import type {
  Bindings,
  Callable,
  Constructor,
  DependencyResolver,
  ParameterSlot,
  ResolutionContext,
  ServiceId,
} from '../domain/types.js';
import { CycleDetector } from './cycle-detector.js';
import { parametersOf } from './injectable.js';

/**
 * Default autowiring capability.
 *
 * Parameters come from `inject()` declarations rather than runtime reflection.
 * Classes the resolver may build on demand are registered by name, so that
 * `resolve('Mailer')` can construct a `Mailer` nobody bound explicitly.
 *
 * Resolution order for each parameter: explicit binding (position, then name),
 * the container, a registered type, the declared fallback, `undefined` if optional.
 */
export class AutowiringResolver implements DependencyResolver {
  private readonly types = new Map<ServiceId, Constructor>();
  private readonly constructing = new CycleDetector<Constructor>();

  constructor(types: Iterable<Constructor> = []) {
    for (const type of types) this.register(type);
  }

  /**
   * Makes `type` constructible by name. Defaults to the class name.
   */
  register(type: Constructor, name: ServiceId = type.name): this {
    if (name === '') {
      throw new ContainerConfigError('name', 'a type name (anonymous classes need one)', 'an empty string');
    }
    this.types.set(name, type);
    return this;
  }

  isRegistered(name: ServiceId): boolean {
    return this.types.has(name);
  }

  resolve(id: ServiceId, context: ResolutionContext): unknown {
    if (context.has(id)) return context.get(id);
    return this.construct(id, [], context);
  }

  construct<T>(type: Constructor<T>, bindings: Bindings, context: ResolutionContext): T;
  construct(type: ServiceId, bindings: Bindings, context: ResolutionContext): unknown;
  construct(type: ServiceId | Constructor, bindings: Bindings, context: ResolutionContext): unknown {
    const typeName = typeof type === 'string' ? type : nameOf(type);
    const target = typeof type === 'string' ? this.types.get(type) : type;

    if (target === undefined) {
      throw new ClassCannotBeInstantiatedError(typeName, 'no type is registered under this name');
    }
    if (!isConstructible(target)) {
      throw new ClassCannotBeInstantiatedError(typeName, 'it is not a class constructor');
    }
    if (this.constructing.isResolving(target)) {
      throw new CircularDependencyError(typeName, this.constructing.path().map(nameOf));
    }

    this.constructing.enter(target);
    try {
      const args = parametersOf(target, positionalCount(bindings)).map((parameter) =>
        this.argument(parameter, bindings, context, () => {
          throw new CannotAutowireDependencyArgumentError(typeName, parameter.name, parameter.position);
        }),
      );
      return Reflect.construct(target, args);
    } finally {
      this.constructing.leave(target);
    }
  }

  call<R>(callable: Callable<R>, bindings: Bindings, context: ResolutionContext): R {
    const name = callable.name || 'anonymous';
    const args = parametersOf(callable, positionalCount(bindings)).map((parameter) =>
      this.argument(parameter, bindings, context, () => {
        throw new CannotAutowireArgumentError(name, parameter.name, parameter.position);
      }),
    );
    return Reflect.apply(callable, undefined, args);
  }

  private argument(
    parameter: ParameterSlot,
    bindings: Bindings,
    context: ResolutionContext,
    fail: () => never,
  ): unknown {
    const bound = explicitArgument(bindings, parameter);
    if (bound) return bound.value;

    const { service } = parameter;
    if (service !== undefined) {
      if (context.has(service)) return context.get(service);
      if (this.types.has(service)) return context.resolve(service);
    }

    if (parameter.hasFallback) return parameter.fallback;
    if (parameter.optional) return undefined;
    return fail();
  }
}

function isPositional(bindings: Bindings): bindings is readonly unknown[] {
  return Array.isArray(bindings);
}

/** Number of positions covered by explicit bindings: array length, or highest numeric key + 1. */
function positionalCount(bindings: Bindings): number {
  if (isPositional(bindings)) return bindings.length;
  let count = 0;
  for (const key of Object.keys(bindings)) {
    if (/^\d+$/.test(key)) count = Math.max(count, Number(key) + 1);
  }
  return count;
}

/** Explicit binding for a parameter, by position first, then by name. */
function explicitArgument(bindings: Bindings, parameter: ParameterSlot): { value: unknown } | undefined {
  if (isPositional(bindings)) {
    return parameter.position < bindings.length ? { value: bindings[parameter.position] } : undefined;
  }
  const position = String(parameter.position);
  if (Object.hasOwn(bindings, position)) return { value: bindings[position] };
  if (Object.hasOwn(bindings, parameter.name)) return { value: bindings[parameter.name] };
  return undefined;
}

function nameOf(type: Constructor): string {
  return type.name || 'anonymous';
}

/** Arrow functions and methods have no prototype and cannot be called with `new`. */
function isConstructible(value: unknown): value is Constructor {
  return typeof value === 'function' && value.prototype !== undefined;
}
