import { pino } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { CascadeContainer, ContainerConfigError, LOG_LEVEL_ENV, createLogger, defaultLogger } from '../src/index.js';

/** Collects pino records in memory. */
function memoryLogger() {
  const records: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: 'debug', base: null, timestamp: false },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    },
  );
  return { logger, records };
}

describe('logging', () => {
  it('logs bindings at debug level', () => {
    const { logger, records } = memoryLogger();
    const container = new CascadeContainer({ logger });
    container.set('env', 'test');
    container.alias('env', 'environment');

    expect(records).toEqual([
      { level: 20, id: 'env', kind: 'instance', msg: 'binding registered' },
      { level: 20, id: 'environment', kind: 'alias', target: 'env', msg: 'binding registered' },
    ]);
  });

  it('logs promotion and extension', () => {
    const { logger, records } = memoryLogger();
    const container = new CascadeContainer({ logger });
    container.deferred('db', () => 'database');
    container.extend('db', (db: string) => `${db}+`);
    container.get('db');

    expect(records.map((record) => record.msg)).toEqual([
      'binding registered',
      'binding extended',
      'deferred service promoted',
    ]);
    expect(records[1]).toEqual({ level: 20, id: 'db', kind: 'deferred', msg: 'binding extended' });
  });

  it('tags named layers with their scope', () => {
    const { logger, records } = memoryLogger();
    const layer = new CascadeContainer({ logger }).cascade({ name: 'request' });
    layer.set('requestId', 'req-1');

    expect(records).toEqual([
      { level: 20, scope: 'request', msg: 'cascade layer created' },
      { level: 20, scope: 'request', id: 'requestId', kind: 'instance', msg: 'binding registered' },
    ]);
  });

  it('is silent by default', () => {
    expect(createLogger().level).toBe('silent');
  });

  it('takes the default level from the environment', () => {
    vi.stubEnv(LOG_LEVEL_ENV, 'warn');
    expect(createLogger().level).toBe('warn');
  });

  it('takes an explicit level over the environment', () => {
    vi.stubEnv(LOG_LEVEL_ENV, 'warn');
    expect(createLogger('error').level).toBe('error');
  });

  it('shares one default logger between containers created without one', () => {
    const debug = vi.spyOn(defaultLogger(), 'debug');
    new CascadeContainer().set('env', 'test');
    new CascadeContainer().set('port', 8080);

    expect(defaultLogger()).toBe(defaultLogger());
    expect(debug.mock.calls).toEqual([
      [{ id: 'env', kind: 'instance' }, 'binding registered'],
      [{ id: 'port', kind: 'instance' }, 'binding registered'],
    ]);
  });

  it('rejects unknown levels', () => {
    expect(() => createLogger('loud')).toThrow(ContainerConfigError);
  });
});
