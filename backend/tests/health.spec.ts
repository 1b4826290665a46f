import request from 'supertest';

import { setReady, setShuttingDown } from '../config/lifecycle.js';
import { createTestHarness } from './helpers.js';

describe('health', () => {
  afterEach(() => {
    setReady(false);
    setShuttingDown(false);
  });

  it('GET /health/live answers without touching storage', async () => {
    const { app } = await createTestHarness();

    const res = await request(app).get('/health/live');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'alive' });
  });

  it('GET /health/ready waits for startup to finish', async () => {
    const { app } = await createTestHarness();

    const starting = await request(app).get('/health/ready');
    expect(starting.status).toBe(503);
    expect(starting.body).toEqual({ status: 'not_ready', checks: { server: 'starting', database: 'connected' } });

    setReady(true);
    const ready = await request(app).get('/health/ready');
    expect(ready.status).toBe(200);
    expect(ready.body).toEqual({ status: 'ready', checks: { server: 'up', database: 'connected' } });
  });

  it('GET /health/ready drops out of rotation once shutdown begins', async () => {
    const { app } = await createTestHarness();
    setReady(true);
    setShuttingDown(true);

    const res = await request(app).get('/health/ready');

    expect(res.status).toBe(503);
    expect(res.body).toEqual({ status: 'not_ready', checks: { server: 'shutting_down', database: 'connected' } });
  });

  it('GET /health reports the storage backend', async () => {
    const { app } = await createTestHarness();

    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: 'ok',
      timestamp: '2026-03-02T09:00:00.000Z',
      database: { status: 'connected', kind: 'memory' },
    });
    expect(typeof res.headers['x-request-id']).toBe('string');
    expect(String(res.headers['x-request-id'])).toBeTruthy();
  });

  it('reports degraded when storage stops answering', async () => {
    const { app, ctx } = await createTestHarness();
    vi.spyOn(ctx.stores.requests, 'ping').mockRejectedValue(new Error('connection reset'));

    const res = await request(app).get('/health');

    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({ status: 'degraded', database: { status: 'disconnected' } });
  });

  it('echoes X-Request-Id when provided', async () => {
    const { app } = await createTestHarness();

    const res = await request(app).get('/health').set('x-request-id', 'test-request-id-123');

    expect(res.status).toBe(200);
    expect(res.headers['x-request-id']).toBe('test-request-id-123');
  });

  it('replaces malformed request ids', async () => {
    const { app } = await createTestHarness();

    const res = await request(app).get('/health/live').set('x-request-id', 'bad id with spaces');

    expect(res.headers['x-request-id']).not.toBe('bad id with spaces');
    expect(String(res.headers['x-request-id'])).toMatch(/^[0-9a-f-]{36}$/);
  });
});
