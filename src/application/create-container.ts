import type { ContainerOptions, ServiceId } from '../domain/types.js';
import { CascadeContainer } from './cascade-container.js';

/**
 * Creates a root container seeded with service instances.
 *
 * @example
 * ```typescript
 * const container = createContainer({
 *   config: { dsn: 'postgres://localhost/app' },
 *   logger: pino(),
 * });
 *
 * container.get('config'); // { dsn: 'postgres://localhost/app' }
 * ```
 */
export function createContainer(
  instances: Record<ServiceId, unknown> | Map<ServiceId, unknown> = {},
  options: Omit<ContainerOptions, 'instances'> = {},
): CascadeContainer {
  return new CascadeContainer({ ...options, instances });
}
