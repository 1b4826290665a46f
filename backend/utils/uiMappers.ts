// Shapes returned by the JSON API. Keys are snake_case for existing clients.
import type { ServiceRequest } from '../models/ServiceRequest.js';
import type { AdminPrincipal } from '../models/AdminUser.js';
import type { RequestStats } from '../services/requestLifecycle.js';

/** ISO string, or null for absent or invalid dates. */
export function safeIso(val: Date | null | undefined): string | null {
  if (!val) return null;
  return Number.isNaN(val.getTime()) ? null : val.toISOString();
}

export function toApiRequest(r: ServiceRequest) {
  return {
    id: r.id,
    requester_name: r.requesterName,
    contact: r.contact,
    department: r.department,
    category: r.category,
    description: r.description,
    priority: r.priority,
    contact_preference: r.contactPreference,
    status: r.status,
    assigned_to: r.assignedTo,
    created_at: safeIso(r.createdAt),
    updated_at: safeIso(r.updatedAt),
    resolved_at: safeIso(r.resolvedAt),
  };
}

export type ApiRequest = ReturnType<typeof toApiRequest>;

export function toApiAdmin(a: AdminPrincipal) {
  return {
    id: a.id,
    username: a.username,
    email: a.email,
    full_name: a.fullName,
    is_super_admin: a.isSuperAdmin,
  };
}

export function toApiStats(s: RequestStats) {
  return {
    total: s.total,
    by_status: s.byStatus,
    by_priority: s.byPriority,
    by_category: s.byCategory,
    by_department: s.byDepartment,
    average_resolution_seconds: s.averageResolutionSeconds,
    recent: s.recent.map(toApiRequest),
    queue: s.queue.map(toApiRequest),
    trend: s.trend,
  };
}
