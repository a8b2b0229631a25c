/**
 * Example 02: Decorating services
 *
 * Showcases: extend() on each binding kind, decorating a parent service
 * inside one layer, explicit bindings for call().
 */
import { CascadeContainer, inject } from '../src/index.js';

interface Mailer {
  send(to: string, body: string): string;
}

const smtp: Mailer = {
  send: (to, body) => `smtp -> ${to}: ${body}`,
};

const root = new CascadeContainer();
root.set('mailer', smtp);
root.factory('timestamp', () => new Date().toISOString());

// Instances are replaced on the spot.
root.extend('mailer', (inner: Mailer): Mailer => ({
  send: (to, body) => inner.send(to, body.trim()),
}));

// Factories stay factories: the transform runs on every lookup.
root.extend('timestamp', (iso: string) => iso.slice(0, 19));

// A staging layer redirects mail without touching the root.
const staging = root.cascade({ name: 'staging' });
staging.extend(
  'mailer',
  inject(['mailer', 'timestamp'], (inner: Mailer, timestamp: string): Mailer => ({
    send: (_to, body) => inner.send('sink@example.test', `${body} (${timestamp})`),
  })),
);

const notify = inject(['mailer', { name: 'to' }], (mailer: Mailer, to: string) => mailer.send(to, '  hello  '));

console.log('=== Root ===');
console.log(root.call(notify, { to: 'ada@example.test' }));
console.log(root.describe('mailer'));

console.log('\n=== Staging ===');
console.log(staging.call(notify, { to: 'ada@example.test' }));
console.log(staging.describe('mailer'));
console.log(String(staging));
