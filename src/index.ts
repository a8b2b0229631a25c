/**
 * cascade-container: layered dependency injection.
 * Instances, deferred services, factories, aliases and decorators, with child layers
 * that inherit their parent's bindings and override them without touching the parent.
 *
 * @example
 * ```typescript
 * import { createContainer, inject } from 'cascade-container';
 *
 * const app = createContainer({ config: { dsn: 'postgres://localhost/app' } });
 * app.deferred('db', inject(['config'], (config: Config) => new Database(config.dsn)));
 *
 * const request = app.cascade({ name: 'request' });
 * request.factory('requestId', () => crypto.randomUUID());
 * request.get('db'); // resolved once, shared with app
 * ```
 *
 * @packageDocumentation
 */

// Core API
export { CascadeContainer } from './application/cascade-container.js';
export { createContainer } from './application/create-container.js';
export { decorate, decorateInherited } from './application/extension.js';
export { AutowiringResolver } from './infrastructure/autowiring-resolver.js';
export { inject, isInjectable } from './infrastructure/injectable.js';
export { MapContainer } from './infrastructure/map-container.js';
export { NullContainer } from './infrastructure/null-container.js';
export { createLogger, defaultLogger, LOG_LEVEL_ENV } from './infrastructure/logger.js';

// Types
export type {
  Binding,
  BindingInfo,
  BindingKind,
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
  Parameter,
  ParameterDescriptor,
  ResolutionContext,
  ServiceId,
  ServiceInfo,
} from './domain/types.js';

// Errors (classes, so exported as values)
export {
  ContainerError,
  ContainerConfigError,
  ServiceNotFoundError,
  InvalidAliasError,
  CircularAliasError,
  CircularDependencyError,
  CannotAutowireArgumentError,
  CannotAutowireDependencyArgumentError,
  ClassCannotBeInstantiatedError,
} from './domain/errors.js';
