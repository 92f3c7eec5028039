import express from 'express';
import type { Server } from 'http';
import { HealthProbe, HealthService, httpProbe, storeProbe } from '../../src/health/health-service';
import { createLogger } from '../../src/logger';
import { createMemoryStore } from '../../src/storage/memory-store';
import { captureLogs } from '../helpers';

function probe(name: string, critical: boolean, run: HealthProbe['run']): HealthProbe {
  return { name, critical, run };
}

const up = (name: string, critical = false) => probe(name, critical, async () => undefined);
const down = (name: string, critical = false, reason = 'connection refused') =>
  probe(name, critical, async () => {
    throw new Error(reason);
  });

function service(probes: HealthProbe[], timeoutMs = 200): HealthService {
  return new HealthService(probes, createLogger({ component: 'health' }), {
    timeoutMs,
    version: '9.9.9',
    startedAt: Date.now() - 1000,
  });
}

describe('HealthService', () => {
  let logs: ReturnType<typeof captureLogs>;

  beforeAll(() => {
    logs = captureLogs();
  });

  beforeEach(() => {
    logs.length = 0;
  });

  test('all probes up is ok', async () => {
    const report = await service([storeProbe(createMemoryStore()), up('search')]).check();
    expect(report.status).toBe('ok');
    expect(report.version).toBe('9.9.9');
    expect(report.uptimeMs).toBeGreaterThanOrEqual(1000);
    expect(report.checks.map((c) => [c.name, c.critical, c.state])).toEqual([
      ['store', true, 'up'],
      ['search', false, 'up'],
    ]);
    expect(logs.filter((e) => e.message === 'Health check not ok')).toEqual([]);
  });

  test('a failed critical probe is down', async () => {
    const store = createMemoryStore({ ping: async () => Promise.reject(new Error('connection refused')) });
    const report = await service([storeProbe(store), up('search')]).check();

    expect(report.status).toBe('down');
    expect(report.checks[0]).toMatchObject({ name: 'store', state: 'down', error: 'store: connection refused' });
    const warning = logs.find((e) => e.message === 'Health check not ok');
    expect(warning?.context).toMatchObject({ status: 'down', down: ['store'] });
  });

  test('a failed non-critical probe is degraded', async () => {
    const report = await service([up('store', true), down('search', false, 'HTTP 500')]).check();
    expect(report.status).toBe('degraded');
    expect(report.checks[1].error).toBe('search: HTTP 500');
  });

  test('a hanging probe is cut off at the timeout and aborted', async () => {
    let aborted = false;
    const hanging = probe('slow', true, (signal) => {
      signal.addEventListener('abort', () => {
        aborted = true;
      });
      return new Promise<void>(() => undefined);
    });

    const started = Date.now();
    const report = await service([hanging, up('other')], 50).check();

    expect(Date.now() - started).toBeLessThan(1000);
    expect(report.status).toBe('down');
    expect(report.checks[0]).toMatchObject({ state: 'down', error: 'slow: Timed out after 50ms' });
    expect(aborted).toBe(true);
  });

  test('a probe that rejects with a non-error value does not break the check', async () => {
    const odd = probe('odd', false, () => Promise.reject('nope'));
    await expect(service([odd]).check()).resolves.toMatchObject({
      status: 'degraded',
      checks: [{ name: 'odd', state: 'down', error: 'odd: Unknown error' }],
    });
  });

  test('a probe that throws before returning a promise is down and leaves no timer behind', async () => {
    jest.useFakeTimers();
    try {
      const sync = probe('sync', false, () => {
        throw new Error('boom');
      });
      const report = await service([sync], 5000).check();
      expect(report.checks).toMatchObject([{ name: 'sync', state: 'down', error: 'sync: boom' }]);
      expect(jest.getTimerCount()).toBe(0);
    } finally {
      jest.useRealTimers();
    }
  });

  test('no probes is ok', async () => {
    expect((await service([]).check()).status).toBe('ok');
  });
});

describe('httpProbe', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = express();
    app.get('/ok', (_req, res) => {
      res.status(204).end();
    });
    app.get('/broken', (_req, res) => {
      res.status(503).end();
    });
    server = app.listen(0);
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const addr = server.address();
    if (addr === null || typeof addr === 'string') throw new Error('Server has no TCP address');
    baseUrl = `http://127.0.0.1:${addr.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  test('2xx answers are up, others down', async () => {
    const report = await service([
      httpProbe({ name: 'cdn', url: `${baseUrl}/ok` }),
      httpProbe({ name: 'billing', url: `${baseUrl}/broken` }),
    ]).check();

    expect(report.status).toBe('degraded');
    expect(report.checks.map((c) => [c.name, c.critical, c.state, c.error])).toEqual([
      ['cdn', false, 'up', undefined],
      ['billing', false, 'down', 'billing: HTTP 503'],
    ]);
  });
});
