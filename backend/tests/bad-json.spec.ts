import request from 'supertest';

import { createTestHarness } from './helpers.js';

describe('malformed JSON handling', () => {
  it('returns 400 BAD_JSON for malformed JSON bodies', async () => {
    const { app } = await createTestHarness();

    const res = await request(app)
      .post('/admin/login')
      .set('content-type', 'application/json')
      .send('{"username":"admin",');

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      error: {
        code: 'BAD_JSON',
      },
    });
    expect(typeof res.headers['x-request-id']).toBe('string');
    expect(String(res.headers['x-request-id'])).toBeTruthy();
  });

  it('returns 413 for bodies over the configured limit', async () => {
    const { app } = await createTestHarness({ REQUEST_BODY_LIMIT: '1kb' });

    const res = await request(app)
      .post('/submit')
      .send({ requester_name: 'Alice', contact: 'alice@example.com', category: 'Other', description: 'x'.repeat(4096) });

    expect(res.status).toBe(413);
    expect(res.body.error.code).toBe('PAYLOAD_TOO_LARGE');
  });
});
