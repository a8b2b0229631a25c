import { pino } from 'pino';
import { ContainerConfigError } from './errors.js';
import type { ContainerOptions, ParameterDescriptor } from './types.js';

/**
 * Validates container options and parameter declarations, and provides fuzzy id matching.
 *
 * @example
 * ```typescript
 * const validator = new Validator();
 * validator.validateOptions({ parent: 42 });
 * // throws ContainerConfigError
 * ```
 */
export class Validator {
  /**
   * Checks the shape of user-supplied options.
   * `logger` is not inspected; absent options are fine.
   */
  validateOptions(options: { [K in keyof ContainerOptions]?: unknown }): void {
    const { parent, resolver, instances, name } = options;

    if (parent !== undefined && !hasMethods(parent, ['has', 'get'])) {
      throw new ContainerConfigError('parent', 'an object with has() and get()', describeType(parent));
    }
    if (resolver !== undefined && !hasMethods(resolver, ['resolve', 'construct', 'call'])) {
      throw new ContainerConfigError(
        'resolver',
        'an object with resolve(), construct() and call()',
        describeType(resolver),
      );
    }
    if (instances !== undefined && (instances === null || typeof instances !== 'object')) {
      throw new ContainerConfigError('instances', 'a record or Map of service instances', describeType(instances));
    }
    if (name !== undefined && typeof name !== 'string') {
      throw new ContainerConfigError('name', 'a string', describeType(name));
    }
  }

  /**
   * Checks a log level read from configuration against the levels pino knows.
   */
  validateLogLevel(source: string, level: string): void {
    if (level !== 'silent' && !(level in pino.levels.values)) {
      const known = [...Object.keys(pino.levels.values), 'silent'].join(', ');
      throw new ContainerConfigError(source, `one of ${known}`, `'${level}'`);
    }
  }

  /**
   * Checks `inject()` declarations: each entry is a non-empty id or a descriptor with a name.
   */
  validateParameters(parameters: readonly unknown[]): void {
    parameters.forEach((parameter, position) => {
      const option = `parameters[${position}]`;
      if (typeof parameter === 'string') {
        if (parameter.length === 0) {
          throw new ContainerConfigError(option, 'a non-empty service id', 'an empty string');
        }
        return;
      }
      if (!isDescriptor(parameter)) {
        throw new ContainerConfigError(option, 'a service id or { name, service?, optional?, fallback? }', describeType(parameter));
      }
    });
  }

  /**
   * Closest bound id to a missing one, for not-found messages.
   * Only ids at least half similar by edit distance qualify; ties go to the first listed.
   *
   * @example
   * ```typescript
   * validator.suggestKey('userRepo', ['userRepository', 'logger', 'db']);
   * // 'userRepository'
   * ```
   */
  suggestKey(key: string, registered: string[]): string | undefined {
    let best: { id: string; score: number } | undefined;
    for (const id of registered) {
      const score = similarity(key, id);
      if (score >= 0.5 && (best === undefined || score > best.score)) {
        best = { id, score };
      }
    }
    return best?.id;
  }
}

function hasMethods(value: unknown, methods: string[]): boolean {
  if (value === null || typeof value !== 'object') return false;
  return methods.every((method) => typeof Reflect.get(value, method) === 'function');
}

function isDescriptor(value: unknown): value is ParameterDescriptor {
  return (
    value !== null &&
    typeof value === 'object' &&
    typeof Reflect.get(value, 'name') === 'string' &&
    Reflect.get(value, 'name') !== ''
  );
}

function describeType(value: unknown): string {
  return value === null ? 'null' : typeof value;
}

/** 1 for identical ids, 0 when no character lines up. */
function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  return longest === 0 ? 1 : 1 - editDistance(a, b) / longest;
}

/** Levenshtein distance, one row at a time. */
function editDistance(a: string, b: string): number {
  let above = Array.from({ length: b.length + 1 }, (_, column) => column);
  for (let row = 1; row <= a.length; row++) {
    const current = [row];
    for (let column = 1; column <= b.length; column++) {
      const replace = above[column - 1] + (a[row - 1] === b[column - 1] ? 0 : 1);
      current.push(Math.min(above[column] + 1, current[column - 1] + 1, replace));
    }
    above = current;
  }
  return above[b.length];
}
