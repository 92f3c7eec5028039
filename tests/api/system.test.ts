import express from 'express';
import { createApp, createAppContext } from '../../src/server';
import { createMemoryStore } from '../../src/storage/memory-store';
import { APP_VERSION } from '../../src/version';
import { RecordingNotifier, captureLogs, request, testConfig } from '../helpers';

describe('System API', () => {
  beforeAll(() => {
    captureLogs();
  });

  test('GET /system/health is public and ok when the store answers', async () => {
    const app = createApp(createAppContext(testConfig(), { notifier: new RecordingNotifier() }));
    const res = await request(app, 'GET', '/system/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.version).toBe(APP_VERSION);
    expect(res.body.checks).toEqual([
      { name: 'store', critical: true, state: 'up', latencyMs: res.body.checks[0].latencyMs },
    ]);
  });

  test('a store outage answers 503 with status down', async () => {
    const store = createMemoryStore({ ping: async () => Promise.reject(new Error('connection refused')) });
    const app = createApp(createAppContext(testConfig(), { store, notifier: new RecordingNotifier() }));
    const res = await request(app, 'GET', '/system/health');

    expect(res.status).toBe(503);
    expect(res.body.status).toBe('down');
    expect(res.body.checks[0].error).toBe('store: connection refused');
  });

  test('a failing optional dependency degrades but still answers 200', async () => {
    const dependency = express();
    dependency.get('/ping', (_req, res) => {
      res.status(500).end();
    });
    const server = dependency.listen(0);
    try {
      await new Promise<void>((resolve) => server.once('listening', () => resolve()));
      const addr = server.address();
      if (addr === null || typeof addr === 'string') throw new Error('Server has no TCP address');

      const config = testConfig({ HEALTH_DEPENDENCIES: `mailer=http://127.0.0.1:${addr.port}/ping` });
      const app = createApp(createAppContext(config, { notifier: new RecordingNotifier() }));
      const res = await request(app, 'GET', '/system/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('degraded');
      expect(res.body.checks.map((c: { name: string; state: string }) => [c.name, c.state])).toEqual([
        ['store', 'up'],
        ['mailer', 'down'],
      ]);
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });

  test('requests get an id, honouring a well-formed inbound one', async () => {
    const app = createApp(createAppContext(testConfig(), { notifier: new RecordingNotifier() }));
    const echoed = await request(app, 'GET', '/system/health', undefined, { 'x-request-id': 'trace-123' });
    expect(echoed.headers.get('x-request-id')).toBe('trace-123');

    const replaced = await request(app, 'GET', '/system/health', undefined, { 'x-request-id': 'bad id!' });
    expect(replaced.headers.get('x-request-id')).toMatch(/^req_/);
  });

  test('unknown routes answer 404', async () => {
    const app = createApp(createAppContext(testConfig(), { notifier: new RecordingNotifier() }));
    const res = await request(app, 'GET', '/nope');
    expect(res.status).toBe(404);
    expect(res.body.error).toMatchObject({ code: 'VALIDATION.NOT_FOUND', message: 'Route not found: GET /nope' });
  });

  test('malformed JSON answers 400', async () => {
    const app = createApp(createAppContext(testConfig(), { notifier: new RecordingNotifier() }));
    const res = await request(app, 'POST', '/auth/register', '{"email":');
    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe('Request body is not valid JSON');
  });
});
