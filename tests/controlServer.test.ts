import assert from 'node:assert/strict';
import type { Server } from 'node:http';
import test from 'node:test';

import { listPatterns } from '../src/patterns/registry.js';
import { closeControlServer, routeControlRequest, startControlServer } from '../src/server/index.js';
import { FakeController } from './helpers/fakeController.js';
import { silentLogger } from './helpers/fakeTimers.js';

test('health and pattern listing', () => {
  const controller = new FakeController();
  assert.deepEqual(routeControlRequest('GET', '/health', undefined, controller), {
    status: 200,
    body: { status: 'ok' },
  });
  assert.deepEqual(routeControlRequest('GET', '/patterns', undefined, controller), {
    status: 200,
    body: { status: 'ok', active: 'chase', patterns: listPatterns() },
  });
});

test('status merges the controller status', () => {
  const controller = new FakeController();
  const { status, body } = routeControlRequest('GET', '/status', undefined, controller);
  assert.equal(status, 200);
  assert.deepEqual(body, { status: 'ok', ...controller.status() });
});

test('POST /pattern queues a switch by name or index', () => {
  const controller = new FakeController();
  assert.deepEqual(routeControlRequest('POST', '/pattern', { pattern: 'Music-Color' }, controller), {
    status: 202,
    body: { status: 'ok', pattern: 'music_color' },
  });
  assert.deepEqual(routeControlRequest('POST', '/pattern', { pattern: 12 }, controller), {
    status: 202,
    body: { status: 'ok', pattern: 'all_on' },
  });
  assert.deepEqual(controller.requested, ['music_color', 'all_on']);
});

test('POST /pattern rejects bad requests', () => {
  const controller = new FakeController();
  assert.deepEqual(routeControlRequest('POST', '/pattern', {}, controller), {
    status: 400,
    body: { status: 'error', message: 'pattern requires a "pattern" name or 1-based index.' },
  });
  assert.deepEqual(routeControlRequest('POST', '/pattern', { pattern: 'disco' }, controller), {
    status: 400,
    body: { status: 'error', message: 'Unknown pattern "disco"' },
  });
  assert.deepEqual(routeControlRequest('POST', '/pattern', { pattern: 19 }, controller), {
    status: 400,
    body: { status: 'error', message: 'Pattern index 19 is out of range (1-18)' },
  });
  controller.accepting = false;
  assert.deepEqual(routeControlRequest('POST', '/pattern', { pattern: 'swirl' }, controller), {
    status: 409,
    body: { status: 'error', message: 'Session is stopping; pattern unchanged.' },
  });
  assert.deepEqual(controller.requested, []);
});

test('unknown routes are 404', () => {
  const controller = new FakeController();
  const notFound = { status: 404, body: { status: 'error', message: 'Not found' } };
  assert.deepEqual(routeControlRequest('GET', '/pattern', undefined, controller), notFound);
  assert.deepEqual(routeControlRequest('DELETE', '/health', undefined, controller), notFound);
});

const baseUrl = (server: Server): string => {
  const address = server.address();
  assert.ok(address !== null && typeof address === 'object');
  return `http://127.0.0.1:${address.port}`;
};

test('the HTTP server serves the routes', async () => {
  const controller = new FakeController();
  const log = silentLogger();
  const server = await startControlServer({ controller, port: 0, host: '127.0.0.1', logger: log.logger });
  try {
    const url = baseUrl(server);
    assert.deepEqual(log.lines, [{ level: 'log', message: `[control] listening on ${url}` }]);

    const health = await fetch(`${url}/health`);
    assert.equal(health.status, 200);
    assert.equal(health.headers.get('content-type'), 'application/json');
    assert.deepEqual(await health.json(), { status: 'ok' });

    const switched = await fetch(`${url}/pattern`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ pattern: 'swirl' }),
    });
    assert.equal(switched.status, 202);
    assert.deepEqual(await switched.json(), { status: 'ok', pattern: 'swirl' });
    assert.equal(controller.currentPattern(), 'swirl');

    const malformed = await fetch(`${url}/pattern`, { method: 'POST', body: '{"pattern":' });
    assert.equal(malformed.status, 400);
    const payload: unknown = await malformed.json();
    assert.ok(payload !== null && typeof payload === 'object' && 'message' in payload);
    assert.match(String(payload.message), /^Invalid JSON payload: /);

    const missing = await fetch(`${url}/nothing`);
    assert.equal(missing.status, 404);
    await missing.arrayBuffer();
  } finally {
    await closeControlServer(server);
  }
  assert.equal(server.listening, false);
});
