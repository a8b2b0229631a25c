import { ServiceNotFoundError } from '../domain/errors.js';
import type { ListableContainer, ServiceId } from '../domain/types.js';

/**
 * Terminal parent of a layer chain: knows no services.
 */
export class NullContainer implements ListableContainer {
  has(_id: ServiceId): boolean {
    return false;
  }

  get(id: ServiceId): never {
    throw new ServiceNotFoundError(id);
  }

  ids(): ServiceId[] {
    return [];
  }
}
