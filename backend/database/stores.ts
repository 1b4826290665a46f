import type {
  Department,
  NewServiceRequest,
  RequestPriority,
  RequestStatus,
  ServiceRequest,
} from '../models/ServiceRequest.js';
import type { AdminAccount, AdminLoginState, NewAdminAccount } from '../models/AdminUser.js';

export interface RequestFilter {
  status?: RequestStatus;
  category?: string;
  department?: Department;
  priority?: RequestPriority;
}

export interface PageWindow {
  skip: number;
  limit: number;
}

export interface StatusUpdate {
  status: RequestStatus;
  updatedAt: Date;
  resolvedAt: Date | null;
  assignedTo?: string | null;
}

export type GroupField = 'status' | 'category' | 'department' | 'priority';

export interface GroupCount {
  key: string | null;
  count: number;
}

export interface RequestStore {
  create(input: NewServiceRequest): Promise<ServiceRequest>;
  findById(id: number): Promise<ServiceRequest | null>;
  /** Newest first. */
  list(filter: RequestFilter, window: PageWindow): Promise<{ items: ServiceRequest[]; total: number }>;
  /**
   * Applies `update` only while the stored status still equals `expected`.
   * Resolves null when no row matched (missing, or changed by someone else).
   */
  updateStatusIf(id: number, expected: RequestStatus, update: StatusUpdate): Promise<ServiceRequest | null>;
  /** Open and In Progress requests, most urgent first, then oldest first. */
  listActiveByUrgency(limit: number): Promise<ServiceRequest[]>;
  countBy(field: GroupField): Promise<GroupCount[]>;
  count(filter?: RequestFilter): Promise<number>;
  /** Mean of resolvedAt - createdAt in ms over requests that have a resolvedAt, or null. */
  averageResolutionMs(): Promise<number | null>;
  createdSince(since: Date): Promise<Date[]>;
  ping(): Promise<boolean>;
}

export interface AdminStore {
  count(): Promise<number>;
  findByUsername(username: string): Promise<AdminAccount | null>;
  findById(id: string): Promise<AdminAccount | null>;
  create(input: NewAdminAccount): Promise<AdminAccount>;
  updateLoginState(id: string, patch: AdminLoginState): Promise<void>;
}

export interface Stores {
  requests: RequestStore;
  admins: AdminStore;
  kind: 'mongo' | 'memory';
}
