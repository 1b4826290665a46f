import mongoose, { type FilterQuery, type Types } from 'mongoose';
import {
  ServiceRequestModel,
  ActiveStatuses,
  PRIORITY_WEIGHT,
  RequestStatuses,
  RequestPriorities,
  ContactPreferences,
  Departments,
  type ServiceRequest,
  type ServiceRequestDoc,
  type NewServiceRequest,
} from '../models/ServiceRequest.js';
import { AdminUserModel, type AdminAccount, type AdminLoginState, type NewAdminAccount } from '../models/AdminUser.js';
import { nextSequence } from '../models/Counter.js';
import { pingMongo } from './mongo.js';
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

type RequestRow = {
  requestId: number;
  requesterName: string;
  contact: string;
  department?: string | null;
  category: string;
  description: string;
  priority?: string | null;
  contactPreference?: string | null;
  status?: string | null;
  assignedTo?: string | null;
  createdAt: Date;
  updatedAt: Date;
  resolvedAt?: Date | null;
};

type AdminRow = {
  _id: Types.ObjectId;
  username: string;
  passwordHash: string;
  email: string;
  fullName: string;
  isActive?: boolean | null;
  isSuperAdmin?: boolean | null;
  lastLoginAt?: Date | null;
  loginAttempts?: number | null;
  lockedUntil?: Date | null;
  createdAt?: Date | null;
};

function pick<T extends string>(allowed: readonly T[], value: unknown, fallback: T): T {
  return allowed.find((v) => v === value) ?? fallback;
}

function toServiceRequest(row: RequestRow): ServiceRequest {
  const status = RequestStatuses.find((s) => s === row.status);
  if (!status) throw new Error(`Stored request ${row.requestId} has unknown status ${String(row.status)}`);
  return {
    id: row.requestId,
    requesterName: row.requesterName,
    contact: row.contact,
    department: Departments.find((d) => d === row.department) ?? null,
    category: row.category,
    description: row.description,
    priority: pick(RequestPriorities, row.priority, 'Medium'),
    contactPreference: pick(ContactPreferences, row.contactPreference, 'email'),
    status,
    assignedTo: row.assignedTo ?? null,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    resolvedAt: row.resolvedAt ?? null,
  };
}

function toAdminAccount(row: AdminRow): AdminAccount {
  return {
    id: String(row._id),
    username: row.username,
    passwordHash: row.passwordHash,
    email: row.email,
    fullName: row.fullName,
    isActive: row.isActive ?? true,
    isSuperAdmin: row.isSuperAdmin ?? false,
    lastLoginAt: row.lastLoginAt ?? null,
    loginAttempts: row.loginAttempts ?? 0,
    lockedUntil: row.lockedUntil ?? null,
    createdAt: row.createdAt ?? row._id.getTimestamp(),
  };
}

function toQuery(filter: RequestFilter): FilterQuery<ServiceRequestDoc> {
  const query: FilterQuery<ServiceRequestDoc> = {};
  if (filter.status) query.status = filter.status;
  if (filter.category) query.category = filter.category;
  if (filter.department) query.department = filter.department;
  if (filter.priority) query.priority = filter.priority;
  return query;
}

export class MongoRequestStore implements RequestStore {
  async create(input: NewServiceRequest): Promise<ServiceRequest> {
    const requestId = await nextSequence('serviceRequest');
    const doc = await ServiceRequestModel.create({ ...input, requestId, priorityWeight: PRIORITY_WEIGHT[input.priority] });
    return toServiceRequest(doc.toObject());
  }

  async findById(id: number): Promise<ServiceRequest | null> {
    const row = await ServiceRequestModel.findOne({ requestId: id }).lean();
    return row ? toServiceRequest(row) : null;
  }

  async list(filter: RequestFilter, window: PageWindow): Promise<{ items: ServiceRequest[]; total: number }> {
    const query = toQuery(filter);
    const [rows, total] = await Promise.all([
      ServiceRequestModel.find(query).sort({ createdAt: -1, requestId: -1 }).skip(window.skip).limit(window.limit).lean(),
      ServiceRequestModel.countDocuments(query),
    ]);
    return { items: rows.map(toServiceRequest), total };
  }

  async updateStatusIf(id: number, expected: ServiceRequest['status'], update: StatusUpdate): Promise<ServiceRequest | null> {
    // Single conditional write: a concurrent transition makes this match nothing.
    const row = await ServiceRequestModel.findOneAndUpdate(
      { requestId: id, status: expected },
      {
        $set: {
          status: update.status,
          updatedAt: update.updatedAt,
          resolvedAt: update.resolvedAt,
          ...(update.assignedTo !== undefined ? { assignedTo: update.assignedTo } : {}),
        },
      },
      { new: true, lean: true }
    );
    return row ? toServiceRequest(row) : null;
  }

  async listActiveByUrgency(limit: number): Promise<ServiceRequest[]> {
    const rows = await ServiceRequestModel.find({ status: { $in: [...ActiveStatuses] } })
      .sort({ priorityWeight: -1, createdAt: 1, requestId: 1 })
      .limit(limit)
      .lean();
    return rows.map(toServiceRequest);
  }

  async countBy(field: GroupField): Promise<GroupCount[]> {
    const rows = await ServiceRequestModel.aggregate<{ _id: string | null; count: number }>([
      { $group: { _id: `$${field}`, count: { $sum: 1 } } },
    ]);
    return rows.map((r) => ({ key: r._id ?? null, count: r.count }));
  }

  async count(filter: RequestFilter = {}): Promise<number> {
    return ServiceRequestModel.countDocuments(toQuery(filter));
  }

  async averageResolutionMs(): Promise<number | null> {
    const [row] = await ServiceRequestModel.aggregate<{ avgMs: number | null }>([
      { $match: { resolvedAt: { $ne: null } } },
      { $group: { _id: null, avgMs: { $avg: { $subtract: ['$resolvedAt', '$createdAt'] } } } },
    ]);
    return row?.avgMs ?? null;
  }

  async createdSince(since: Date): Promise<Date[]> {
    const rows = await ServiceRequestModel.find({ createdAt: { $gte: since } }).select({ createdAt: 1 }).lean();
    return rows.map((r) => r.createdAt);
  }

  async ping(): Promise<boolean> {
    return pingMongo();
  }
}

export class MongoAdminStore implements AdminStore {
  async count(): Promise<number> {
    return AdminUserModel.countDocuments({});
  }

  async findByUsername(username: string): Promise<AdminAccount | null> {
    const row = await AdminUserModel.findOne({ username: username.trim().toLowerCase() }).lean();
    return row ? toAdminAccount(row) : null;
  }

  async findById(id: string): Promise<AdminAccount | null> {
    if (!mongoose.isValidObjectId(id)) return null;
    const row = await AdminUserModel.findById(id).lean();
    return row ? toAdminAccount(row) : null;
  }

  async create(input: NewAdminAccount): Promise<AdminAccount> {
    const doc = await AdminUserModel.create(input);
    return toAdminAccount(doc.toObject());
  }

  async updateLoginState(id: string, patch: AdminLoginState): Promise<void> {
    if (!mongoose.isValidObjectId(id)) return;
    await AdminUserModel.updateOne({ _id: id }, { $set: patch });
  }
}

export function createMongoStores(): Stores {
  return {
    requests: new MongoRequestStore(),
    admins: new MongoAdminStore(),
    kind: 'mongo',
  };
}
