import type { Express } from 'express';
import request from 'supertest';
import { vi } from 'vitest';

import { createApp } from '../app.js';
import { loadEnv, type Env } from '../config/env.js';
import { buildContext, type AppContext } from '../context.js';
import { createMemoryStores } from '../database/memoryStores.js';
import { seedAdminIfEmpty } from '../seeds/admin.js';
import type { Clock } from '../utils/clock.js';

export const START = new Date('2026-03-02T09:00:00.000Z');

/** A clock tests move by hand. */
export function fakeClock(start: Date = START) {
  let now = start.getTime();
  const clock: Clock = () => new Date(now);
  return {
    clock,
    advance(ms: number) {
      now += ms;
    },
    set(date: Date) {
      now = date.getTime();
    },
  };
}

export function testEnv(overrides: Record<string, string> = {}): Env {
  return loadEnv({
    NODE_ENV: 'test',
    MONGODB_URI: '<REPLACE_ME>',
    SECRET_KEY: 'test-secret-key-for-session-signing-only',
    BCRYPT_ROUNDS: '4',
    ...overrides,
  });
}

export type FetchCall = { url: string; init: RequestInit };

export type TestHarness = {
  env: Env;
  app: Express;
  ctx: AppContext;
  time: ReturnType<typeof fakeClock>;
  fetchCalls: FetchCall[];
};

/**
 * App on in-memory stores with the bootstrap admin (admin / admin123),
 * a hand-driven clock, and a fetch stub that records Mailgun calls.
 */
export async function createTestHarness(overrides: Record<string, string> = {}): Promise<TestHarness> {
  const env = testEnv(overrides);
  const time = fakeClock();
  const stores = createMemoryStores(time.clock);
  await seedAdminIfEmpty(env, stores.admins);

  const fetchCalls: FetchCall[] = [];
  const fetchImpl = vi.fn(async (url: string, init: RequestInit) => {
    fetchCalls.push({ url, init });
    return new Response('{"message":"Queued. Thank you."}', { status: 200 });
  });

  const ctx = buildContext(env, stores, { clock: time.clock, fetchImpl });
  const app = createApp(env, ctx);
  return { env, app, ctx, time, fetchCalls };
}

export async function loginToken(app: Express, username = 'admin', password = 'admin123'): Promise<string> {
  const res = await request(app).post('/admin/login').send({ username, password });
  if (res.status !== 200 || typeof res.body.token !== 'string') {
    throw new Error(`login failed with ${res.status}`);
  }
  return res.body.token;
}

export const validSubmission = {
  requester_name: 'Alice',
  contact: 'alice@example.com',
  category: 'Printer Issue',
  description: 'Jam',
};

/** The admin session Set-Cookie line from a login response. */
export function sessionSetCookie(res: request.Response): string {
  const raw: unknown = res.headers['set-cookie'];
  const lines = Array.isArray(raw) ? raw : [raw];
  const found = lines.find((line): line is string => typeof line === 'string' && line.startsWith('admin_session='));
  if (!found) throw new Error('response did not set admin_session');
  return found;
}

/** Cookie header value carrying the admin session from a form login. */
export async function loginCookie(app: Express, username = 'admin', password = 'admin123'): Promise<string> {
  const res = await request(app).post('/admin/login').type('form').send({ username, password });
  return sessionSetCookie(res).split(';')[0];
}
