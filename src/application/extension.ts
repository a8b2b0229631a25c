import type { Callable, ContainerInterface, Invoker, ServiceId } from '../domain/types.js';

/**
 * Producer that evaluates `source`, then passes its result to `transform` as the first argument.
 * Both run through `invoker`, so their remaining parameters are autowired.
 *
 * Stored under the same binding kind as `source`: a decorated deferred producer is still
 * promoted on first lookup, a decorated factory still runs on every lookup.
 */
export function decorate(invoker: Invoker, source: Callable, transform: Callable): Callable {
  return () => invoker.call(transform, [invoker.call(source)]);
}

/**
 * Producer that decorates the parent's value for `id`.
 * The parent is read when the producer runs, not when it is created.
 */
export function decorateInherited(
  invoker: Invoker,
  parent: ContainerInterface,
  id: ServiceId,
  transform: Callable,
): Callable {
  return () => invoker.call(transform, [parent.get(id)]);
}
