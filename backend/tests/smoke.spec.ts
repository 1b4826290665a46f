import request from 'supertest';

import { createTestHarness } from './helpers.js';

describe('smoke', () => {
  it('serves the public pages', async () => {
    const { app } = await createTestHarness({ EXTRA_CATEGORIES: 'Badge Request' });

    const home = await request(app).get('/').set('Accept', 'text/html');
    expect(home.status).toBe(200);
    expect(home.text).toContain('<h2>Need help from IT?</h2>');

    const form = await request(app).get('/submit').set('Accept', 'text/html');
    expect(form.status).toBe(200);
    expect(form.text).toContain('<h2>Submit a service request</h2>');
    expect(form.text).toContain('<option value="Badge Request">Badge Request</option>');
  });

  it('sends hardening headers', async () => {
    const { app } = await createTestHarness();

    const res = await request(app).get('/');

    expect(res.headers['x-powered-by']).toBeUndefined();
    expect(res.headers['x-content-type-options']).toBe('nosniff');
    expect(res.headers['referrer-policy']).toBe('strict-origin-when-cross-origin');
    expect(res.headers['permissions-policy']).toBe('camera=(), microphone=(), geolocation=()');
    expect(res.headers['cache-control']).toBe('no-store, no-cache, must-revalidate, private');
    expect(res.headers['content-security-policy']).toContain("default-src 'self'");
    expect(res.headers['content-security-policy']).not.toContain('upgrade-insecure-requests');
  });

  it('answers unknown routes with NOT_FOUND', async () => {
    const { app } = await createTestHarness();

    const res = await request(app).get('/api/nothing-here');

    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ code: 'NOT_FOUND', message: 'Route not found: GET /api/nothing-here' });
  });
});
