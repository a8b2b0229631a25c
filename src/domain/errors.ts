import type { ServiceId } from './types.js';

/**
 * Base class for all container errors.
 * Every error includes a human-readable `hint` and structured `details`.
 *
 * @example
 * ```typescript
 * try { container.get('mailer'); }
 * catch (e) {
 *   if (e instanceof ContainerError) {
 *     console.log(e.hint);    // actionable fix
 *     console.log(e.details); // structured context
 *   }
 * }
 * ```
 */
export abstract class ContainerError extends Error {
  abstract readonly hint: string;
  abstract readonly details: Record<string, unknown>;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown when container options or parameter declarations are malformed.
 *
 * @example
 * ```typescript
 * new CascadeContainer({ parent: 42 as never });
 * // ContainerConfigError: Invalid option 'parent': expected an object with has() and get(), got number.
 * ```
 */
export class ContainerConfigError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(option: string, expected: string, actualType: string) {
    super(`Invalid option '${option}': expected ${expected}, got ${actualType}.`);
    this.hint = `Pass ${expected} as '${option}', or leave it out to use the default.`;
    this.details = { option, expected, actualType };
  }
}

/**
 * Thrown when no binding resolves an id, locally or through the parent chain.
 * Includes a fuzzy suggestion if a similar id is bound.
 *
 * @example
 * ```typescript
 * container.get('loger');
 * // ServiceNotFoundError: Service 'loger' is not defined in the container.
 * //
 * // Did you mean 'logger'?
 * ```
 */
export class ServiceNotFoundError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;
  readonly id: ServiceId;

  constructor(id: ServiceId, registered: ServiceId[] = [], suggestion?: ServiceId) {
    const suggestionStr = suggestion ? `\n\nDid you mean '${suggestion}'?` : '';
    super(`Service '${id}' is not defined in the container.${suggestionStr}`);
    this.id = id;
    this.hint = suggestion
      ? `Did you mean '${suggestion}'? Or bind '${id}' first:\n  container.set('${id}', value);`
      : `Bind '${id}' first:\n  container.set('${id}', value);\n  container.deferred('${id}', () => createService());`;
    this.details = { id, registered, suggestion };
  }
}

/**
 * Thrown when a service is aliased to itself.
 *
 * @example
 * ```typescript
 * container.alias('logger', 'logger');
 * // InvalidAliasError: Cannot alias service 'logger' to itself.
 * ```
 */
export class InvalidAliasError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(id: ServiceId) {
    super(`Cannot alias service '${id}' to itself.`);
    this.hint = `Pick an alias name different from '${id}'.`;
    this.details = { id };
  }
}

/**
 * Thrown when following aliases leads back to an alias already visited.
 *
 * @example
 * ```typescript
 * // CircularAliasError: Alias chain for 'a' never reaches a service.
 * // Cycle: a -> b -> a
 * ```
 */
export class CircularAliasError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(id: ServiceId, chain: ServiceId[]) {
    const cycle = chain.join(' -> ');
    super(`Alias chain for '${id}' never reaches a service.\n\nCycle: ${cycle}`);
    this.hint = `Rebind one of [${[...new Set(chain)].join(', ')}] to a service with set(), deferred() or factory().`;
    this.details = { id, chain, cycle };
  }
}

/**
 * Thrown when a producer or constructor needs itself, directly or through its dependencies.
 *
 * @example
 * ```typescript
 * // CircularDependencyError: Circular dependency detected while resolving 'authService'.
 * // Cycle: authService -> userService -> authService
 * ```
 */
export class CircularDependencyError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(key: string, chain: string[]) {
    const cycle = [...chain, key].join(' -> ');
    super(
      `Circular dependency detected while resolving '${chain[0] ?? key}'.\n\nCycle: ${cycle}`,
    );
    this.hint = [
      'To fix:',
      '  1. Extract shared logic into a new service both can use',
      '  2. Restructure so one doesn\'t depend on the other',
      '  3. Resolve one side lazily inside a method instead of at construction',
    ].join('\n');
    this.details = { key, chain, cycle };
  }
}

/**
 * Thrown by `call()` when a parameter of the callable can be provided neither by
 * explicit bindings nor by the container.
 *
 * @example
 * ```typescript
 * container.call(inject(['clock'], (clock: Clock) => clock.now()));
 * // CannotAutowireArgumentError: Cannot autowire argument 'clock' (#0) of 'anonymous'.
 * ```
 */
export class CannotAutowireArgumentError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(callable: string, parameter: string, position: number) {
    super(`Cannot autowire argument '${parameter}' (#${position}) of '${callable}'.`);
    this.hint = `Bind '${parameter}' in the container, pass it explicitly: container.call(fn, { ${parameter}: value }), or declare it optional.`;
    this.details = { callable, parameter, position };
  }
}

/**
 * Thrown by `construct()` when a constructor parameter can be provided neither by
 * explicit bindings nor by the container.
 *
 * @example
 * ```typescript
 * container.construct('Mailer');
 * // CannotAutowireDependencyArgumentError: Cannot autowire argument 'transport' (#0) of 'Mailer' constructor.
 * ```
 */
export class CannotAutowireDependencyArgumentError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(type: string, parameter: string, position: number) {
    super(`Cannot autowire argument '${parameter}' (#${position}) of '${type}' constructor.`);
    this.hint = `Bind '${parameter}' in the container, or pass it explicitly: container.construct('${type}', { ${parameter}: value }).`;
    this.details = { type, parameter, position };
  }
}

/**
 * Thrown when `construct()` or `resolve()` targets something that is not a registered,
 * constructible type.
 *
 * @example
 * ```typescript
 * container.resolve('Mailer');
 * // ClassCannotBeInstantiatedError: Class 'Mailer' cannot be instantiated: no type is registered under this name.
 * ```
 */
export class ClassCannotBeInstantiatedError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(type: string, reason: string) {
    super(`Class '${type}' cannot be instantiated: ${reason}.`);
    this.hint = `Register the class with resolver.register(${type}), or bind '${type}' in the container.`;
    this.details = { type, reason };
  }
}
