import { Validator } from '../domain/validation.js';
import type { Callable, Constructor, Parameter, ParameterSlot } from '../domain/types.js';

const validator = new Validator();

/**
 * Parameter declarations, keyed by the function or class they describe.
 */
const declarations = new WeakMap<Callable | Constructor, readonly ParameterSlot[]>();

/**
 * Declares which services a callable or class constructor receives, in parameter order.
 * Returns the target itself, so it can wrap a function or class inline.
 *
 * A string is a service id that also names the parameter. A descriptor can point
 * the parameter at another service id, mark it optional, or give it a fallback value.
 *
 * @example
 * ```typescript
 * import { CascadeContainer, inject } from 'cascade-container';
 *
 * const container = new CascadeContainer();
 * container.set('clock', new SystemClock());
 * container.deferred('audit', inject(['clock'], (clock: Clock) => new AuditLog(clock)));
 *
 * class Mailer {
 *   constructor(readonly transport: Transport, readonly from: string) {}
 * }
 * inject(['transport', { name: 'from', fallback: 'noreply@example.test' }], Mailer);
 * ```
 */
export function inject<T extends Callable | Constructor>(parameters: readonly Parameter[], target: T): T {
  validator.validateParameters(parameters);
  declarations.set(target, parameters.map(toSlot));
  return target;
}

/** Checks if a callable or class has declared parameters. */
export function isInjectable(target: Callable | Constructor): boolean {
  return declarations.has(target);
}

/**
 * Parameters of `target`: the declared ones, or anonymous positional parameters that
 * only explicit bindings can satisfy. `target.length` ignores rest and defaulted
 * parameters, so at least `positional` of them are reported.
 */
export function parametersOf(target: Callable | Constructor, positional = 0): readonly ParameterSlot[] {
  return (
    declarations.get(target) ??
    Array.from({ length: Math.max(target.length, positional) }, (_, position) => ({
      name: `#${position}`,
      position,
      optional: false,
      hasFallback: false,
      fallback: undefined,
    }))
  );
}

function toSlot(parameter: Parameter, position: number): ParameterSlot {
  if (typeof parameter === 'string') {
    return {
      name: parameter,
      position,
      service: parameter,
      optional: false,
      hasFallback: false,
      fallback: undefined,
    };
  }
  return {
    name: parameter.name,
    position,
    service: parameter.service ?? parameter.name,
    optional: parameter.optional ?? false,
    hasFallback: 'fallback' in parameter,
    fallback: parameter.fallback,
  };
}
