/**
 * Example 01: Request layers
 *
 * Showcases: deferred services, aliases, one cascade layer per request,
 * autowired construction from the request layer, fuzzy not-found errors.
 */
import { randomUUID } from 'node:crypto';
import { AutowiringResolver, CascadeContainer, MapContainer, ServiceNotFoundError, inject } from '../src/index.js';

// ── Services ────────────────────────────────────────────────────────────────

class Database {
  constructor(readonly dsn: string) {}
  query(sql: string) {
    return `result of: ${sql}`;
  }
}

class UserController {
  constructor(
    private readonly db: Database,
    private readonly requestId: string,
  ) {}

  show(id: string) {
    return `[${this.requestId}] ${this.db.query(`SELECT * FROM users WHERE id = '${id}'`)}`;
  }
}
inject(['database', 'requestId'], UserController);

// ── Application layer ───────────────────────────────────────────────────────

const app = new CascadeContainer({
  parent: new MapContainer({ dsn: 'postgres://localhost/app' }),
  resolver: new AutowiringResolver([UserController]),
  name: 'app',
});
app.deferred('db', inject(['dsn'], (dsn: string) => new Database(dsn)));
app.alias('db', 'database');

// ── Main ────────────────────────────────────────────────────────────────────

function handle(userId: string) {
  const request = app.cascade({ name: 'http-request' });
  request.set('requestId', randomUUID());
  const controller = request.resolve('UserController');
  return controller instanceof UserController ? controller.show(userId) : 'no controller';
}

console.log('=== Requests ===');
console.log(handle('42'));
console.log(handle('43'));

console.log('\n=== Application layer ===');
console.log(String(app));
console.log(`requestId visible to app: ${app.has('requestId')}`);

console.log('\n=== Fuzzy suggestion ===');
try {
  app.get('databse');
} catch (e) {
  if (e instanceof ServiceNotFoundError) {
    console.log(`error: ${e.message.split('\n')[0]}`);
    console.log(`hint: ${e.hint.split('\n')[0]}`);
  }
}
