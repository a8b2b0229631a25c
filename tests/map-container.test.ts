import { describe, expect, it } from 'vitest';
import { MapContainer, NullContainer, ServiceNotFoundError } from '../src/index.js';

describe('NullContainer', () => {
  it('knows no services', () => {
    const container = new NullContainer();
    expect(container.has('anything')).toBe(false);
    expect(container.ids()).toEqual([]);
  });

  it('throws ServiceNotFoundError for every id', () => {
    const container = new NullContainer();
    try {
      container.get('db');
      expect.fail('should throw');
    } catch (e) {
      expect(e).toBeInstanceOf(ServiceNotFoundError);
      expect((e as ServiceNotFoundError).id).toBe('db');
    }
  });
});

describe('MapContainer', () => {
  it('serves values from a record', () => {
    const container = new MapContainer({ env: 'test', debug: false });
    expect(container.has('env')).toBe(true);
    expect(container.get('debug')).toBe(false);
    expect(container.ids()).toEqual(['env', 'debug']);
  });

  it('serves values from a Map, including undefined', () => {
    const container = new MapContainer(new Map<string, unknown>([['token', undefined]]));
    expect(container.has('token')).toBe(true);
    expect(container.get('token')).toBeUndefined();
  });

  it('copies the source so later changes are ignored', () => {
    const source = new Map<string, unknown>([['env', 'test']]);
    const container = new MapContainer(source);
    source.set('late', true);
    expect(container.has('late')).toBe(false);
  });

  it('lists its ids when a value is missing', () => {
    const container = new MapContainer({ env: 'test' });
    try {
      container.get('envv');
      expect.fail('should throw');
    } catch (e) {
      expect(e).toBeInstanceOf(ServiceNotFoundError);
      expect((e as ServiceNotFoundError).details.registered).toEqual(['env']);
    }
  });
});
