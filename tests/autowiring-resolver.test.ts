import { describe, expect, it } from 'vitest';
import {
  AutowiringResolver,
  CannotAutowireArgumentError,
  ClassCannotBeInstantiatedError,
  ContainerConfigError,
  MapContainer,
  type ResolutionContext,
  inject,
} from '../src/index.js';

class Transport {}

class Mailer {
  constructor(
    readonly transport: Transport,
    readonly from: string,
  ) {}
}
inject([{ name: 'transport', service: 'Transport' }, { name: 'from', fallback: 'noreply@example.test' }], Mailer);

/** A context over fixed values that delegates `resolve` back to the resolver. */
function contextOf(resolver: AutowiringResolver, values: Record<string, unknown> = {}): ResolutionContext {
  const container = new MapContainer(values);
  const context: ResolutionContext = {
    has: (id) => container.has(id),
    get: (id) => container.get(id),
    resolve: (id) => resolver.resolve(id, context),
  };
  return context;
}

describe('AutowiringResolver', () => {
  describe('register()', () => {
    it('registers types under their class name', () => {
      const resolver = new AutowiringResolver([Transport]);
      expect(resolver.isRegistered('Transport')).toBe(true);
      expect(resolver.isRegistered('Mailer')).toBe(false);
    });

    it('accepts a custom name', () => {
      const resolver = new AutowiringResolver().register(Transport, 'smtp');
      expect(resolver.isRegistered('smtp')).toBe(true);
      expect(resolver.isRegistered('Transport')).toBe(false);
    });

    it('rejects an empty name', () => {
      expect(() => new AutowiringResolver().register(Transport, '')).toThrow(ContainerConfigError);
    });
  });

  describe('resolve()', () => {
    it('prefers a service the context provides', () => {
      const resolver = new AutowiringResolver([Transport]);
      const bound = new Transport();
      expect(resolver.resolve('Transport', contextOf(resolver, { Transport: bound }))).toBe(bound);
    });

    it('constructs registered types with their dependencies', () => {
      const resolver = new AutowiringResolver([Transport, Mailer]);
      const mailer = resolver.resolve('Mailer', contextOf(resolver));

      expect(mailer).toBeInstanceOf(Mailer);
      expect((mailer as Mailer).transport).toBeInstanceOf(Transport);
      expect((mailer as Mailer).from).toBe('noreply@example.test');
    });

    it('throws for unregistered names', () => {
      const resolver = new AutowiringResolver();
      expect(() => resolver.resolve('Mailer', contextOf(resolver))).toThrow(ClassCannotBeInstantiatedError);
    });
  });

  describe('construct()', () => {
    it('always builds a new instance', () => {
      const resolver = new AutowiringResolver([Transport]);
      const context = contextOf(resolver, { Transport: new Transport() });
      const first = resolver.construct(Mailer, [], context);
      const second = resolver.construct(Mailer, [], context);

      expect(first).not.toBe(second);
      expect(first.transport).toBe(second.transport);
    });

    it('uses explicit bindings by name and by position', () => {
      const resolver = new AutowiringResolver([Transport]);
      const transport = new Transport();
      const context = contextOf(resolver);

      const byName = resolver.construct(Mailer, { transport, from: 'ops@example.test' }, context);
      expect(byName.transport).toBe(transport);
      expect(byName.from).toBe('ops@example.test');

      const byPosition = resolver.construct(Mailer, [transport, 'desk@example.test'], context);
      expect(byPosition.from).toBe('desk@example.test');

      const mixed = resolver.construct(Mailer, { '1': 'first@example.test', from: 'second@example.test' }, context);
      expect(mixed.from).toBe('first@example.test');
    });
  });

  describe('call()', () => {
    it('returns what the callable returns', () => {
      const resolver = new AutowiringResolver();
      const greet = inject(['name'], (name: string) => `hello ${name}`);
      expect(resolver.call(greet, [], contextOf(resolver, { name: 'ada' }))).toBe('hello ada');
    });

    it('passes undefined for optional parameters nothing provides', () => {
      const resolver = new AutowiringResolver();
      const describeLogger = inject([{ name: 'logger', optional: true }], (logger?: unknown) => logger === undefined);
      expect(resolver.call(describeLogger, [], contextOf(resolver))).toBe(true);
    });

    it('prefers an explicit undefined over the container', () => {
      const resolver = new AutowiringResolver();
      const read = inject(['value'], (value: unknown) => value);
      expect(resolver.call(read, { value: undefined }, contextOf(resolver, { value: 'bound' }))).toBeUndefined();
    });

    it('fills undeclared parameters positionally', () => {
      const resolver = new AutowiringResolver();
      const join = (...parts: string[]) => parts.join('-');
      expect(resolver.call(join, ['a', 'b', 'c'], contextOf(resolver))).toBe('a-b-c');
      expect(resolver.call(join, { '1': 'y', '0': 'x' }, contextOf(resolver))).toBe('x-y');
    });

    it('fails on undeclared parameters without bindings', () => {
      const resolver = new AutowiringResolver();
      const add = (a: number, b: number) => a + b;
      try {
        resolver.call(add, [1], contextOf(resolver));
        expect.fail('should throw');
      } catch (e) {
        expect(e).toBeInstanceOf(CannotAutowireArgumentError);
        expect((e as CannotAutowireArgumentError).details).toEqual({ callable: 'add', parameter: '#1', position: 1 });
      }
    });
  });
});
