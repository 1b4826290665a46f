import { ZodError } from 'zod';

import { MemoryRequestStore } from '../database/memoryStores.js';
import type { AdminPrincipal } from '../models/AdminUser.js';
import type { NotificationDispatcher, NotificationEvent } from '../services/notifications.js';
import {
  assertTransition,
  makeRequestLifecycle,
  normalizeStatus,
} from '../services/requestLifecycle.js';
import { buildCategorySet } from '../validations/requests.js';
import { parsePagination } from '../utils/pagination.js';
import { AppError } from '../middleware/errors.js';
import { START, fakeClock, validSubmission } from './helpers.js';

const actor: AdminPrincipal = {
  id: 'admin-1',
  username: 'admin',
  email: 'admin@example.com',
  fullName: 'System Administrator',
  isSuperAdmin: true,
};

function recordingNotifier() {
  const events: Array<{ event: NotificationEvent; id: number }> = [];
  const notifier: NotificationDispatcher = {
    enabled: true,
    notify(event, request) {
      events.push({ event, id: request.id });
    },
    idle: async () => {},
  };
  return { notifier, events };
}

function setup(extraCategories: string[] = []) {
  const time = fakeClock();
  const requests = new MemoryRequestStore();
  const { notifier, events } = recordingNotifier();
  const lifecycle = makeRequestLifecycle({
    requests,
    notifier,
    clock: time.clock,
    categories: buildCategorySet(extraCategories),
  });
  return { time, requests, lifecycle, events };
}

describe('status graph', () => {
  it('allows the forward path and the reopen edges only', () => {
    expect(() => assertTransition('Open', 'In Progress')).not.toThrow();
    expect(() => assertTransition('In Progress', 'Resolved')).not.toThrow();
    expect(() => assertTransition('Resolved', 'Closed')).not.toThrow();
    expect(() => assertTransition('Resolved', 'Open')).not.toThrow();
    expect(() => assertTransition('Closed', 'Open')).not.toThrow();

    expect(() => assertTransition('Open', 'Closed')).toThrow(AppError);
    expect(() => assertTransition('Open', 'Resolved')).toThrow(AppError);
    expect(() => assertTransition('In Progress', 'Open')).toThrow(AppError);
    expect(() => assertTransition('Closed', 'Resolved')).toThrow(AppError);
    expect(() => assertTransition('Open', 'Open')).toThrow(AppError);
  });

  it('normalizes status spellings', () => {
    expect(normalizeStatus('InProgress')).toBe('In Progress');
    expect(normalizeStatus('in_progress')).toBe('In Progress');
    expect(normalizeStatus(' in-progress ')).toBe('In Progress');
    expect(normalizeStatus('IN PROGRESS')).toBe('In Progress');
    expect(normalizeStatus('pending')).toBe('Open');
    expect(normalizeStatus('closed')).toBe('Closed');
    expect(normalizeStatus('Done')).toBeNull();
  });
});

describe('request lifecycle', () => {
  it('creates submissions as Open with equal timestamps and notifies', async () => {
    const { lifecycle, events } = setup();

    const created = await lifecycle.submit(validSubmission);

    expect(created).toMatchObject({
      id: 1,
      requesterName: 'Alice',
      contact: 'alice@example.com',
      category: 'Printer Issue',
      description: 'Jam',
      status: 'Open',
      priority: 'Medium',
      contactPreference: 'email',
      department: null,
      assignedTo: null,
      resolvedAt: null,
    });
    expect(created.createdAt.toISOString()).toBe(START.toISOString());
    expect(created.updatedAt.getTime()).toBe(created.createdAt.getTime());
    expect(events).toEqual([{ event: { type: 'RequestCreated' }, id: 1 }]);
  });

  it('accepts legacy field names and case-insensitive choices', async () => {
    const { lifecycle } = setup();

    const created = await lifecycle.submit({
      name: '  Bob  ',
      email: 'Bob@Example.com',
      department: 'it',
      category: 'printer issue',
      description: 'Toner empty',
      priority: 'high',
      contact_preference: 'Teams',
    });

    expect(created.requesterName).toBe('Bob');
    expect(created.contact).toBe('bob@example.com');
    expect(created.department).toBe('IT');
    expect(created.category).toBe('Printer Issue');
    expect(created.priority).toBe('High');
    expect(created.contactPreference).toBe('teams');
  });

  it('rejects invalid submissions without storing anything', async () => {
    const { lifecycle, requests, events } = setup();

    await expect(lifecycle.submit({ ...validSubmission, category: 'Coffee Machine' })).rejects.toBeInstanceOf(ZodError);
    await expect(lifecycle.submit({ ...validSubmission, description: '   ' })).rejects.toBeInstanceOf(ZodError);
    await expect(lifecycle.submit({ ...validSubmission, requester_name: 'x'.repeat(101) })).rejects.toBeInstanceOf(ZodError);
    await expect(lifecycle.submit({ ...validSubmission, contact: 'not-an-email' })).rejects.toBeInstanceOf(ZodError);
    await expect(lifecycle.submit({ ...validSubmission, priority: 'Urgent' })).rejects.toBeInstanceOf(ZodError);

    expect(await requests.count()).toBe(0);
    expect(events).toEqual([]);
  });

  it('accepts configured extra categories', async () => {
    const { lifecycle } = setup(['Badge Access']);

    const created = await lifecycle.submit({ ...validSubmission, category: 'Badge Access' });

    expect(created.category).toBe('Badge Access');
    expect(lifecycle.categories()).toContain('Badge Access');
    expect(lifecycle.categories()).toContain('Other');
  });

  it('moves forward with strictly increasing updatedAt even when the clock stands still', async () => {
    const { lifecycle, events } = setup();
    const created = await lifecycle.submit(validSubmission);

    const inProgress = await lifecycle.transition(created.id, 'InProgress', actor);
    const resolved = await lifecycle.transition(created.id, 'Resolved', actor);
    const closed = await lifecycle.transition(created.id, 'Closed', actor);

    expect(inProgress.status).toBe('In Progress');
    expect(resolved.status).toBe('Resolved');
    expect(closed.status).toBe('Closed');

    expect(inProgress.updatedAt.getTime()).toBe(START.getTime() + 1);
    expect(resolved.updatedAt.getTime()).toBe(START.getTime() + 2);
    expect(closed.updatedAt.getTime()).toBe(START.getTime() + 3);

    expect(resolved.resolvedAt?.getTime()).toBe(START.getTime() + 2);
    expect(closed.resolvedAt?.getTime()).toBe(START.getTime() + 2);
    expect(closed.createdAt.getTime()).toBe(START.getTime());

    expect(events.map((e) => e.event)).toEqual([
      { type: 'RequestCreated' },
      { type: 'StatusChanged', from: 'Open', to: 'In Progress' },
      { type: 'StatusChanged', from: 'In Progress', to: 'Resolved' },
      { type: 'StatusChanged', from: 'Resolved', to: 'Closed' },
    ]);
  });

  it('uses the clock when it is ahead of the previous update', async () => {
    const { lifecycle, time } = setup();
    const created = await lifecycle.submit(validSubmission);

    time.advance(60_000);
    const updated = await lifecycle.transition(created.id, 'In Progress', actor);

    expect(updated.updatedAt.getTime()).toBe(START.getTime() + 60_000);
  });

  it('reopens from Closed with a fresh updatedAt and clears resolvedAt', async () => {
    const { lifecycle, time } = setup();
    const created = await lifecycle.submit(validSubmission);
    await lifecycle.transition(created.id, 'In Progress', actor);
    await lifecycle.transition(created.id, 'Resolved', actor);
    const closed = await lifecycle.transition(created.id, 'Closed', actor);

    time.advance(5_000);
    const reopened = await lifecycle.transition(created.id, 'Open', actor);

    expect(reopened.status).toBe('Open');
    expect(reopened.resolvedAt).toBeNull();
    expect(reopened.updatedAt.getTime()).toBeGreaterThan(closed.updatedAt.getTime());
    expect(reopened.updatedAt.getTime()).toBe(START.getTime() + 5_000);
  });

  it('rejects an illegal edge and leaves the stored request untouched', async () => {
    const { lifecycle, requests, events } = setup();
    const created = await lifecycle.submit(validSubmission);

    await expect(lifecycle.transition(created.id, 'Closed', actor)).rejects.toMatchObject({
      statusCode: 409,
      code: 'ILLEGAL_TRANSITION',
      details: { from: 'Open', to: 'Closed' },
    });

    const stored = await requests.findById(created.id);
    expect(stored?.status).toBe('Open');
    expect(stored?.updatedAt.getTime()).toBe(created.updatedAt.getTime());
    expect(events).toHaveLength(1);
  });

  it('does not allow reopening a request that is still in progress', async () => {
    const { lifecycle } = setup();
    const created = await lifecycle.submit(validSubmission);
    await lifecycle.transition(created.id, 'In Progress', actor);

    await expect(lifecycle.transition(created.id, 'Open', actor)).rejects.toMatchObject({
      code: 'ILLEGAL_TRANSITION',
      details: { from: 'In Progress', to: 'Open' },
    });
  });

  it('reports unknown statuses and unknown ids', async () => {
    const { lifecycle } = setup();
    const created = await lifecycle.submit(validSubmission);

    await expect(lifecycle.transition(created.id, 'Done', actor)).rejects.toMatchObject({
      statusCode: 400,
      code: 'INVALID_STATUS',
    });
    await expect(lifecycle.transition(42, 'In Progress', actor)).rejects.toMatchObject({
      statusCode: 404,
      code: 'REQUEST_NOT_FOUND',
    });
    await expect(lifecycle.get(42)).rejects.toMatchObject({ statusCode: 404, code: 'REQUEST_NOT_FOUND' });
  });

  it('stores the assignee given with a status update', async () => {
    const { lifecycle } = setup();
    const created = await lifecycle.submit(validSubmission);

    const updated = await lifecycle.transition(created.id, 'in_progress', actor, { assignedTo: 'Bob' });

    expect(updated.assignedTo).toBe('Bob');
    expect((await lifecycle.get(created.id)).assignedTo).toBe('Bob');
  });

  it('lets exactly one of two competing transitions win', async () => {
    const { lifecycle, requests } = setup();
    const created = await lifecycle.submit(validSubmission);
    await lifecycle.transition(created.id, 'In Progress', actor);
    await lifecycle.transition(created.id, 'Resolved', actor);

    const results = await Promise.allSettled([
      lifecycle.transition(created.id, 'Closed', actor),
      lifecycle.transition(created.id, 'Open', actor),
    ]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.reason).toMatchObject({ statusCode: 409, code: 'STATUS_CONFLICT' });

    const stored = await requests.findById(created.id);
    expect(stored?.status).toBe('Closed');
  });

  it('lists newest first with filters and paging', async () => {
    const { lifecycle, time } = setup();
    await lifecycle.submit(validSubmission);
    time.advance(1_000);
    await lifecycle.submit({ ...validSubmission, category: 'Network Problem', priority: 'Critical' });
    time.advance(1_000);
    await lifecycle.submit({ ...validSubmission, department: 'HR' });

    const all = await lifecycle.list({}, parsePagination({}));
    expect(all.total).toBe(3);
    expect(all.items.map((r) => r.id)).toEqual([3, 2, 1]);

    const printers = await lifecycle.list({ category: 'Printer Issue' }, parsePagination({}));
    expect(printers.items.map((r) => r.id)).toEqual([3, 1]);

    const critical = await lifecycle.list({ priority: 'critical' }, parsePagination({}));
    expect(critical.items.map((r) => r.id)).toEqual([2]);

    const hr = await lifecycle.list({ department: 'hr' }, parsePagination({}));
    expect(hr.items.map((r) => r.id)).toEqual([3]);

    const secondPage = await lifecycle.list({}, parsePagination({ page: '2', per_page: '2' }));
    expect(secondPage.total).toBe(3);
    expect(secondPage.items.map((r) => r.id)).toEqual([1]);

    await expect(lifecycle.list({ status: 'bogus' }, parsePagination({}))).rejects.toMatchObject({
      code: 'INVALID_STATUS',
    });
    await expect(lifecycle.list({ department: 'Legal' }, parsePagination({}))).rejects.toMatchObject({
      statusCode: 400,
      code: 'BAD_REQUEST',
    });
  });

  it('computes dashboard statistics', async () => {
    const { lifecycle, time } = setup();
    const a = await lifecycle.submit({ ...validSubmission, priority: 'Low', department: 'IT' });
    time.advance(60_000);
    await lifecycle.submit({ ...validSubmission, category: 'Network Problem', priority: 'Critical' });
    time.advance(60_000);
    await lifecycle.submit({ ...validSubmission, priority: 'High', department: 'HR' });

    time.set(new Date(START.getTime() + 2 * 60 * 60 * 1000));
    await lifecycle.transition(a.id, 'In Progress', actor);
    await lifecycle.transition(a.id, 'Resolved', actor);

    const stats = await lifecycle.stats();

    expect(stats.total).toBe(3);
    expect(stats.byStatus).toEqual({ Open: 2, 'In Progress': 0, Resolved: 1, Closed: 0 });
    expect(stats.byPriority).toEqual({ Low: 1, Medium: 0, High: 1, Critical: 1 });
    expect(stats.byCategory).toEqual({ 'Printer Issue': 2, 'Network Problem': 1 });
    expect(stats.byDepartment).toEqual({ IT: 1, Unspecified: 1, HR: 1 });
    expect(stats.averageResolutionSeconds).toBe(7200);
    expect(stats.recent.map((r) => r.id)).toEqual([3, 2, 1]);
    expect(stats.queue.map((r) => r.id)).toEqual([2, 3]);
    expect(stats.trend).toHaveLength(7);
    expect(stats.trend[0]).toEqual({ date: '2026-02-24', count: 0 });
    expect(stats.trend[6]).toEqual({ date: '2026-03-02', count: 3 });
  });

  it('keeps old urgent requests at the head of the work queue', async () => {
    const { lifecycle, time } = setup();
    const critical = await lifecycle.submit({ ...validSubmission, priority: 'Critical' });
    time.advance(1_000);
    const started = await lifecycle.submit({ ...validSubmission, priority: 'High' });
    await lifecycle.transition(started.id, 'In Progress', actor);
    for (let i = 0; i < 120; i++) {
      time.advance(1_000);
      await lifecycle.submit({ ...validSubmission, priority: 'Low' });
    }

    const stats = await lifecycle.stats();

    expect(stats.queue).toHaveLength(10);
    expect(stats.queue.map((r) => r.id)).toEqual([critical.id, started.id, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it('reports no average resolution time before anything is resolved', async () => {
    const { lifecycle } = setup();
    await lifecycle.submit(validSubmission);

    const stats = await lifecycle.stats();

    expect(stats.averageResolutionSeconds).toBeNull();
    expect(stats.trend.reduce((sum, p) => sum + p.count, 0)).toBe(1);
  });
});
