import { ActiveStatuses, compareUrgency, type NewServiceRequest, type ServiceRequest } from '../models/ServiceRequest.js';
import type { AdminAccount, AdminLoginState, NewAdminAccount } from '../models/AdminUser.js';
import type {
  AdminStore,
  GroupCount,
  GroupField,
  PageWindow,
  RequestFilter,
  RequestStore,
  StatusUpdate,
  Stores,
} from './stores.js';

// Process-local stores. Used by the test suite and by development runs
// without a MongoDB URI. Records are copied in and out so callers never
// hold a live reference to stored state.

function copyRequest(r: ServiceRequest): ServiceRequest {
  return {
    ...r,
    createdAt: new Date(r.createdAt),
    updatedAt: new Date(r.updatedAt),
    resolvedAt: r.resolvedAt ? new Date(r.resolvedAt) : null,
  };
}

function copyAdmin(a: AdminAccount): AdminAccount {
  return {
    ...a,
    createdAt: new Date(a.createdAt),
    lastLoginAt: a.lastLoginAt ? new Date(a.lastLoginAt) : null,
    lockedUntil: a.lockedUntil ? new Date(a.lockedUntil) : null,
  };
}

function matches(r: ServiceRequest, filter: RequestFilter): boolean {
  if (filter.status && r.status !== filter.status) return false;
  if (filter.category && r.category !== filter.category) return false;
  if (filter.department && r.department !== filter.department) return false;
  if (filter.priority && r.priority !== filter.priority) return false;
  return true;
}

export class MemoryRequestStore implements RequestStore {
  private readonly rows = new Map<number, ServiceRequest>();
  private seq = 0;

  async create(input: NewServiceRequest): Promise<ServiceRequest> {
    this.seq += 1;
    const row: ServiceRequest = { ...input, id: this.seq };
    this.rows.set(row.id, copyRequest(row));
    return copyRequest(row);
  }

  async findById(id: number): Promise<ServiceRequest | null> {
    const row = this.rows.get(id);
    return row ? copyRequest(row) : null;
  }

  async list(filter: RequestFilter, window: PageWindow): Promise<{ items: ServiceRequest[]; total: number }> {
    const all = Array.from(this.rows.values())
      .filter((r) => matches(r, filter))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
    return {
      items: all.slice(window.skip, window.skip + window.limit).map(copyRequest),
      total: all.length,
    };
  }

  async updateStatusIf(id: number, expected: ServiceRequest['status'], update: StatusUpdate): Promise<ServiceRequest | null> {
    // Check and write happen in one synchronous step, like a conditional UPDATE.
    const row = this.rows.get(id);
    if (!row || row.status !== expected) return null;
    const next: ServiceRequest = {
      ...row,
      status: update.status,
      updatedAt: new Date(update.updatedAt),
      resolvedAt: update.resolvedAt ? new Date(update.resolvedAt) : null,
      ...(update.assignedTo !== undefined ? { assignedTo: update.assignedTo } : {}),
    };
    this.rows.set(id, next);
    return copyRequest(next);
  }

  async listActiveByUrgency(limit: number): Promise<ServiceRequest[]> {
    return Array.from(this.rows.values())
      .filter((r) => ActiveStatuses.includes(r.status))
      .sort(compareUrgency)
      .slice(0, limit)
      .map(copyRequest);
  }

  async countBy(field: GroupField): Promise<GroupCount[]> {
    const counts = new Map<string | null, number>();
    for (const r of this.rows.values()) {
      const key = r[field];
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return Array.from(counts, ([key, count]) => ({ key, count }));
  }

  async count(filter: RequestFilter = {}): Promise<number> {
    let n = 0;
    for (const r of this.rows.values()) if (matches(r, filter)) n++;
    return n;
  }

  async averageResolutionMs(): Promise<number | null> {
    const durations: number[] = [];
    for (const r of this.rows.values()) {
      if (r.resolvedAt) durations.push(r.resolvedAt.getTime() - r.createdAt.getTime());
    }
    if (!durations.length) return null;
    return durations.reduce((sum, d) => sum + d, 0) / durations.length;
  }

  async createdSince(since: Date): Promise<Date[]> {
    const out: Date[] = [];
    for (const r of this.rows.values()) {
      if (r.createdAt.getTime() >= since.getTime()) out.push(new Date(r.createdAt));
    }
    return out;
  }

  async ping(): Promise<boolean> {
    return true;
  }
}

export class MemoryAdminStore implements AdminStore {
  private readonly rows = new Map<string, AdminAccount>();
  private seq = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async count(): Promise<number> {
    return this.rows.size;
  }

  async findByUsername(username: string): Promise<AdminAccount | null> {
    const wanted = username.trim().toLowerCase();
    for (const a of this.rows.values()) {
      if (a.username === wanted) return copyAdmin(a);
    }
    return null;
  }

  async findById(id: string): Promise<AdminAccount | null> {
    const row = this.rows.get(id);
    return row ? copyAdmin(row) : null;
  }

  async create(input: NewAdminAccount): Promise<AdminAccount> {
    const username = input.username.trim().toLowerCase();
    if (await this.findByUsername(username)) {
      throw Object.assign(new Error(`Admin username '${username}' already exists`), { code: 11000 });
    }
    this.seq += 1;
    const row: AdminAccount = {
      id: `admin-${this.seq}`,
      username,
      passwordHash: input.passwordHash,
      email: input.email.trim().toLowerCase(),
      fullName: input.fullName,
      isActive: input.isActive ?? true,
      isSuperAdmin: input.isSuperAdmin ?? false,
      lastLoginAt: null,
      loginAttempts: 0,
      lockedUntil: null,
      createdAt: this.clock(),
    };
    this.rows.set(row.id, row);
    return copyAdmin(row);
  }

  async updateLoginState(id: string, patch: AdminLoginState): Promise<void> {
    const row = this.rows.get(id);
    if (!row) return;
    this.rows.set(id, { ...row, ...patch });
  }
}

export function createMemoryStores(clock?: () => Date): Stores {
  return {
    requests: new MemoryRequestStore(),
    admins: new MemoryAdminStore(clock),
    kind: 'memory',
  };
}
