import { AppError } from '../middleware/errors.js';
import type { PageRequest } from '../utils/pagination.js';
import { laterThan, type Clock } from '../utils/clock.js';
import type { RequestFilter, RequestStore } from '../database/stores.js';
import {
  Departments,
  RequestPriorities,
  RequestStatuses,
  type RequestStatus,
  type ServiceRequest,
} from '../models/ServiceRequest.js';
import type { AdminPrincipal } from '../models/AdminUser.js';
import { buildSubmissionSchema } from '../validations/requests.js';
import { logChangeEvent } from '../config/appLogs.js';
import { businessLog } from '../config/logger.js';
import type { NotificationDispatcher } from './notifications.js';

const ALLOWED: Record<RequestStatus, RequestStatus[]> = {
  Open: ['In Progress'],
  'In Progress': ['Resolved'],
  Resolved: ['Closed', 'Open'], // reopen
  Closed: ['Open'], // reopen
};

export function canTransition(from: RequestStatus, to: RequestStatus): boolean {
  return ALLOWED[from].includes(to);
}

export function allowedTransitions(from: RequestStatus): RequestStatus[] {
  return [...ALLOWED[from]];
}

export function assertTransition(from: RequestStatus, to: RequestStatus) {
  if (!canTransition(from, to)) {
    throw new AppError(409, 'ILLEGAL_TRANSITION', `Illegal status transition: ${from} -> ${to}`, { from, to });
  }
}

const STATUS_ALIASES: Record<string, RequestStatus> = {
  open: 'Open',
  pending: 'Open',
  inprogress: 'In Progress',
  resolved: 'Resolved',
  closed: 'Closed',
};

/** Maps user input ("in_progress", "InProgress", " closed ") onto a status, or null. */
export function normalizeStatus(raw: string): RequestStatus | null {
  const key = raw.trim().toLowerCase().replace(/[\s_-]+/g, '');
  return STATUS_ALIASES[key] ?? null;
}

function requireStatus(raw: string): RequestStatus {
  const status = normalizeStatus(raw);
  if (!status) {
    throw new AppError(400, 'INVALID_STATUS', `Unknown status: ${raw}`, { allowed: RequestStatuses });
  }
  return status;
}

function matchIgnoringCase<T extends string>(allowed: readonly T[], raw: string, field: string): T {
  const wanted = raw.trim().toLowerCase();
  const hit = allowed.find((a) => a.toLowerCase() === wanted);
  if (!hit) throw new AppError(400, 'BAD_REQUEST', `Unknown ${field}: ${raw}`, { allowed });
  return hit;
}

export type ListFilterInput = {
  status?: string;
  category?: string;
  department?: string;
  priority?: string;
};

export type TrendPoint = { date: string; count: number };

export interface RequestStats {
  total: number;
  byStatus: Record<RequestStatus, number>;
  byPriority: Record<string, number>;
  byCategory: Record<string, number>;
  byDepartment: Record<string, number>;
  averageResolutionSeconds: number | null;
  recent: ServiceRequest[];
  /** Unresolved requests ordered by urgency. */
  queue: ServiceRequest[];
  trend: TrendPoint[];
}

export type TransitionOptions = {
  assignedTo?: string;
  requestId?: string;
};

export interface RequestLifecycleDeps {
  requests: RequestStore;
  notifier: NotificationDispatcher;
  clock: Clock;
  categories: readonly string[];
}

const RECENT_LIMIT = 10;
const TREND_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

export type RequestLifecycle = ReturnType<typeof makeRequestLifecycle>;

export function makeRequestLifecycle(deps: RequestLifecycleDeps) {
  const { requests, notifier, clock } = deps;
  const categories = [...deps.categories];
  const submissionSchema = buildSubmissionSchema(categories);

  async function load(id: number): Promise<ServiceRequest> {
    const found = await requests.findById(id);
    if (!found) throw new AppError(404, 'REQUEST_NOT_FOUND', 'Service request not found');
    return found;
  }

  function toFilter(input: ListFilterInput): RequestFilter {
    const filter: RequestFilter = {};
    if (input.status) filter.status = requireStatus(input.status);
    if (input.category) filter.category = input.category.trim();
    if (input.department) filter.department = matchIgnoringCase(Departments, input.department, 'department');
    if (input.priority) filter.priority = matchIgnoringCase(RequestPriorities, input.priority, 'priority');
    return filter;
  }

  return {
    categories(): string[] {
      return [...categories];
    },

    /** Validates raw submission fields; throws ZodError on bad input. */
    async submit(fields: unknown, ctx: { requestId?: string } = {}): Promise<ServiceRequest> {
      const input = submissionSchema.parse(fields);
      const now = clock();

      const created = await requests.create({
        requesterName: input.requester_name,
        contact: input.contact,
        department: input.department ?? null,
        category: input.category,
        description: input.description,
        priority: input.priority,
        contactPreference: input.contact_preference,
        status: 'Open',
        assignedTo: null,
        createdAt: now,
        updatedAt: now,
        resolvedAt: null,
      });

      logChangeEvent({
        entityType: 'ServiceRequest',
        entityId: String(created.id),
        action: 'REQUEST_CREATED',
        after: { status: created.status, category: created.category, priority: created.priority },
        requestId: ctx.requestId,
      });
      notifier.notify({ type: 'RequestCreated' }, created);
      return created;
    },

    async transition(
      id: number,
      rawStatus: string,
      actor: AdminPrincipal,
      options: TransitionOptions = {}
    ): Promise<ServiceRequest> {
      const to = requireStatus(rawStatus);
      const current = await load(id);
      assertTransition(current.status, to);

      const now = laterThan(clock(), current.updatedAt);
      const resolvedAt = to === 'Resolved' ? now : to === 'Open' ? null : current.resolvedAt;

      const updated = await requests.updateStatusIf(id, current.status, {
        status: to,
        updatedAt: now,
        resolvedAt,
        ...(options.assignedTo !== undefined ? { assignedTo: options.assignedTo } : {}),
      });

      if (!updated) {
        // Someone else moved it between our read and the conditional write.
        const latest = await requests.findById(id);
        if (!latest) throw new AppError(404, 'REQUEST_NOT_FOUND', 'Service request not found');
        throw new AppError(409, 'STATUS_CONFLICT', 'Request status changed concurrently', {
          expected: current.status,
          actual: latest.status,
        });
      }

      const changedFields = ['status', 'updatedAt'];
      if (resolvedAt !== current.resolvedAt) changedFields.push('resolvedAt');
      if (options.assignedTo !== undefined && options.assignedTo !== current.assignedTo) changedFields.push('assignedTo');

      logChangeEvent({
        actorId: actor.id,
        actorName: actor.username,
        entityType: 'ServiceRequest',
        entityId: String(id),
        action: 'REQUEST_STATUS_CHANGE',
        before: { status: current.status, assignedTo: current.assignedTo },
        after: { status: updated.status, assignedTo: updated.assignedTo },
        changedFields,
        requestId: options.requestId,
      });
      notifier.notify({ type: 'StatusChanged', from: current.status, to }, updated);
      return updated;
    },

    async list(input: ListFilterInput, page: PageRequest): Promise<{ items: ServiceRequest[]; total: number }> {
      return requests.list(toFilter(input), { skip: page.skip, limit: page.perPage });
    },

    async get(id: number): Promise<ServiceRequest> {
      return load(id);
    },

    async stats(): Promise<RequestStats> {
      const now = clock();
      const todayStart = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
      const since = new Date(todayStart - (TREND_DAYS - 1) * DAY_MS);

      const [total, statusRows, priorityRows, categoryRows, departmentRows, avgMs, recent, queue, createdDates] =
        await Promise.all([
          requests.count(),
          requests.countBy('status'),
          requests.countBy('priority'),
          requests.countBy('category'),
          requests.countBy('department'),
          requests.averageResolutionMs(),
          requests.list({}, { skip: 0, limit: RECENT_LIMIT }),
          requests.listActiveByUrgency(RECENT_LIMIT),
          requests.createdSince(since),
        ]);

      const byStatus: Record<RequestStatus, number> = { Open: 0, 'In Progress': 0, Resolved: 0, Closed: 0 };
      for (const row of statusRows) {
        const status = RequestStatuses.find((s) => s === row.key);
        if (status) byStatus[status] = row.count;
      }

      const byPriority: Record<string, number> = Object.fromEntries(RequestPriorities.map((p) => [p, 0]));
      for (const row of priorityRows) if (row.key) byPriority[row.key] = row.count;

      const byCategory: Record<string, number> = {};
      for (const row of categoryRows) if (row.key) byCategory[row.key] = row.count;

      const byDepartment: Record<string, number> = {};
      for (const row of departmentRows) {
        const key = row.key ?? 'Unspecified';
        byDepartment[key] = (byDepartment[key] ?? 0) + row.count;
      }

      const trend: TrendPoint[] = [];
      const buckets = new Map<string, number>();
      for (let i = 0; i < TREND_DAYS; i++) {
        const day = new Date(since.getTime() + i * DAY_MS).toISOString().slice(0, 10);
        buckets.set(day, 0);
      }
      for (const createdAt of createdDates) {
        const day = createdAt.toISOString().slice(0, 10);
        const current = buckets.get(day);
        if (current !== undefined) buckets.set(day, current + 1);
      }
      for (const [date, count] of buckets) trend.push({ date, count });

      businessLog.debug('Computed request stats', { total });

      return {
        total,
        byStatus,
        byPriority,
        byCategory,
        byDepartment,
        averageResolutionSeconds: avgMs === null ? null : Math.round(avgMs / 1000),
        recent: recent.items,
        queue,
        trend,
      };
    },
  };
}
