import type { Logger } from 'pino';

/**
 * Identifier a service is bound under. Class names are common ids,
 * so that `resolve('Mailer')` can fall back to constructing a registered `Mailer`.
 */
export type ServiceId = string;

/**
 * Any function the container can autowire and invoke.
 * Parameters are typed `never` so that every concrete signature is assignable.
 */
export type Callable<R = unknown> = (...args: never[]) => R;

/**
 * A class the resolver can instantiate.
 */
export type Constructor<T = unknown> = new (...args: never[]) => T;

/**
 * Explicit argument bindings for `call()` and `construct()`.
 * Either positional (`[value]`) or keyed by parameter name or position (`{ clock, '1': value }`).
 */
export type Bindings = Readonly<Record<string, unknown>> | readonly unknown[];

/**
 * Minimal read contract shared by every container in a layer chain.
 * Anything exposing `has` and `get` can be used as a parent.
 */
export interface ContainerInterface {
  has(id: ServiceId): boolean;
  get(id: ServiceId): unknown;
}

/**
 * A container able to list the ids it can provide.
 * Used for not-found suggestions and introspection.
 */
export interface ListableContainer extends ContainerInterface {
  ids(): ServiceId[];
}

/**
 * What the dependency resolver sees of the container it resolves against.
 */
export interface ResolutionContext extends ContainerInterface {
  resolve(id: ServiceId): unknown;
}

/**
 * Invokes callables with autowired arguments. Composed producers receive one of these
 * instead of capturing the container they were created by.
 */
export interface Invoker {
  call<R>(callable: Callable<R>, bindings?: Bindings): R;
}

/**
 * Autowiring capability consumed by the container.
 * The same resolver instance is shared by every layer of a cascade chain;
 * the layer being resolved against is passed as `context`.
 */
export interface DependencyResolver {
  resolve(id: ServiceId, context: ResolutionContext): unknown;
  construct<T>(type: Constructor<T>, bindings: Bindings, context: ResolutionContext): T;
  construct(type: ServiceId, bindings: Bindings, context: ResolutionContext): unknown;
  call<R>(callable: Callable<R>, bindings: Bindings, context: ResolutionContext): R;
}

/**
 * Declares how one parameter of an injectable callable or class is supplied.
 */
export interface ParameterDescriptor {
  /** Name matched against named explicit bindings. */
  name: string;
  /** Service id resolved from the container. Defaults to `name`. */
  service?: ServiceId;
  /** Pass `undefined` when nothing can provide the parameter. */
  optional?: boolean;
  /** Value used when nothing can provide the parameter. */
  fallback?: unknown;
}

/**
 * A parameter declaration: a service id (also used as the parameter name) or a descriptor.
 */
export type Parameter = ServiceId | ParameterDescriptor;

/**
 * Normalized parameter as the resolver consumes it.
 */
export interface ParameterSlot {
  name: string;
  position: number;
  /** Absent for undeclared positional parameters, which only explicit bindings can satisfy. */
  service?: ServiceId;
  optional: boolean;
  hasFallback: boolean;
  fallback: unknown;
}

/**
 * Kinds of local bindings. Exactly one kind per id per layer.
 */
export type BindingKind = 'instance' | 'deferred' | 'factory' | 'alias';

/**
 * A local binding, tagged by kind.
 */
export type Binding =
  | { kind: 'instance'; value: unknown }
  | { kind: 'deferred'; producer: Callable }
  | { kind: 'factory'; producer: Callable }
  | { kind: 'alias'; target: ServiceId };

/**
 * Options for creating a container.
 */
export interface ContainerOptions {
  /** Parent container consulted on local misses. Defaults to a `NullContainer`. */
  parent?: ContainerInterface;
  /** Autowiring capability. Defaults to a fresh `AutowiringResolver`. */
  resolver?: DependencyResolver;
  /** Initial service instances. */
  instances?: Record<ServiceId, unknown> | Map<ServiceId, unknown>;
  /** Logger for binding diagnostics. Defaults to a pino logger, silent unless configured. */
  logger?: Logger;
  /** Name shown by `inspect()` and `toString()`. */
  name?: string;
}

/**
 * Options for `cascade()`.
 */
export interface CascadeOptions {
  /**
   * Optional name for the layer, useful for debugging and introspection.
   * If provided, `String(layer)` will return `Scope(name) { ... }`.
   */
  name?: string;
}

/**
 * Local bindings of one container layer.
 */
export interface ContainerGraph {
  /** Optional name of the layer. */
  name?: string;
  /** Local bindings by id. */
  bindings: Record<ServiceId, BindingInfo>;
}

/**
 * Metadata about a single local binding.
 */
export interface BindingInfo {
  id: ServiceId;
  kind: BindingKind;
  /** Alias target, for `alias` bindings. */
  target?: ServiceId;
}

/**
 * Where an id is provided from, as seen by one layer.
 */
export interface ServiceInfo {
  id: ServiceId;
  kind: BindingKind | 'inherited' | 'unbound';
  target?: ServiceId;
}
