import { describe, expect, it } from 'vitest';
import { AutowiringResolver, CascadeContainer, MapContainer, createContainer, inject } from '../src/index.js';

// === Domain ===
interface User {
  id: string;
  name: string;
}

class AuditLog {
  readonly entries: string[] = [];
  record(entry: string) {
    this.entries.push(entry);
  }
}

class InMemoryUserRepo {
  private readonly users = new Map<string, User>([
    ['1', { id: '1', name: 'Alice' }],
    ['2', { id: '2', name: 'Bob' }],
  ]);

  findById(id: string): User {
    const user = this.users.get(id);
    if (!user) throw new Error(`User ${id} not found`);
    return user;
  }
}

class UserService {
  constructor(
    private readonly repo: InMemoryUserRepo,
    private readonly audit: AuditLog,
    private readonly requestId: string,
  ) {}

  getUser(id: string): User {
    this.audit.record(`${this.requestId}: get ${id}`);
    return this.repo.findById(id);
  }
}
inject(['InMemoryUserRepo', 'AuditLog', { name: 'requestId', fallback: 'no-request' }], UserService);

function bootstrap(): CascadeContainer {
  const app = createContainer(
    {},
    {
      parent: new MapContainer({ env: 'test' }),
      resolver: new AutowiringResolver([InMemoryUserRepo, UserService]),
    },
  );
  app.deferred('AuditLog', () => new AuditLog());
  app.alias('AuditLog', 'audit');
  return app;
}

describe('integration: request layers', () => {
  it('shares application services across requests', () => {
    const app = bootstrap();
    let sequence = 0;

    const handle = (userId: string) => {
      const request = app.cascade({ name: `request-${++sequence}` });
      request.set('requestId', `req-${sequence}`);
      request.deferred('UserService', () => request.construct(UserService));
      return request.get('UserService');
    };

    const first = handle('1');
    const second = handle('2');

    expect(first).toBeInstanceOf(UserService);
    expect(first).not.toBe(second);
    expect((first as UserService).getUser('1')).toEqual({ id: '1', name: 'Alice' });
    expect((second as UserService).getUser('2')).toEqual({ id: '2', name: 'Bob' });
    expect((app.get('audit') as AuditLog).entries).toEqual(['req-1: get 1', 'req-2: get 2']);
    expect(app.has('requestId')).toBe(false);
  });

  it('builds services nobody bound, from the calling layer', () => {
    const app = bootstrap();
    const request = app.cascade();
    request.set('requestId', 'req-9');

    const fromRequest = request.resolve('UserService') as UserService;
    const fromApp = app.resolve('UserService') as UserService;

    fromRequest.getUser('1');
    fromApp.getUser('2');
    expect((app.get('AuditLog') as AuditLog).entries).toEqual(['req-9: get 1', 'no-request: get 2']);
  });

  it('decorates a shared service for one layer only', () => {
    const app = bootstrap();
    const tenant = app.cascade({ name: 'tenant-a' });
    tenant.extend('audit', (audit: AuditLog) => {
      audit.record('tenant-a attached');
      return audit;
    });

    expect(tenant.describe('audit').kind).toBe('deferred');
    expect(tenant.describe('AuditLog').kind).toBe('inherited');
    const audit = tenant.get('audit') as AuditLog;
    expect(audit).toBe(app.get('AuditLog'));
    expect(audit.entries).toEqual(['tenant-a attached']);
    expect(tenant.get('env')).toBe('test');
  });
});
