/**
 * Application log layer on top of logger.ts.
 *
 *   1. AUTHENTICATION / ACCESS: logins, logouts, session checks, resource reads.
 *   2. CHANGE: request submissions, status transitions, admin bootstrap.
 *   3. ERROR: categorized, severity-classified failures.
 *   4. AVAILABILITY: startup, shutdown, storage connectivity.
 *   5. SECURITY: rate limits, CORS violations, lockouts, bad tokens.
 *
 * Every helper funnels through logEvent(); no extra winston instances.
 */
import { logEvent, getSystemMetrics, sanitize } from './logger.js';
import type { LogDomain } from './logger.js';

// ═══════════════════════════════════════════════════════════════════════════════
//  1.  AUTHENTICATION / ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

export type AuthEventType =
  | 'LOGIN_SUCCESS'
  | 'LOGIN_FAILURE'
  | 'LOGOUT'
  | 'SESSION_REJECTED'
  | 'ACCOUNT_LOCKED';

export interface AuthEventPayload {
  adminId?: string;
  /** Username the client presented. */
  identifier?: string;
  ip?: string;
  route?: string;
  requestId?: string;
  reason?: string;
  metadata?: Record<string, unknown>;
}

export function logAuthEvent(type: AuthEventType, payload: AuthEventPayload): void {
  const isFailure = type !== 'LOGIN_SUCCESS' && type !== 'LOGOUT';
  const who = payload.identifier || payload.adminId || 'unknown';

  const message = (() => {
    switch (type) {
      case 'LOGIN_SUCCESS':
        return `Admin ${who} logged in`;
      case 'LOGIN_FAILURE':
        return `Login failed for ${who}: ${payload.reason || 'invalid credentials'}`;
      case 'LOGOUT':
        return `Admin ${who} logged out`;
      case 'SESSION_REJECTED':
        return `Admin session rejected: ${payload.reason || 'unauthorized'}`;
      case 'ACCOUNT_LOCKED':
        return `Admin account ${who} locked after repeated failures`;
    }
  })();

  logEvent(isFailure ? 'warn' : 'info', message, {
    domain: 'auth',
    eventCategory: 'authentication',
    eventName: type,
    userId: payload.adminId,
    ip: payload.ip,
    route: payload.route,
    requestId: payload.requestId,
    metadata: {
      identifier: payload.identifier,
      reason: payload.reason,
      ...payload.metadata,
    },
  });
}

export type AccessEventType = 'RESOURCE_ACCESS' | 'RESOURCE_DENIED' | 'ADMIN_ACTION';

export interface AccessEventPayload {
  adminId?: string;
  ip?: string;
  method?: string;
  route?: string;
  resource: string;
  requestId?: string;
  metadata?: Record<string, unknown>;
}

export function logAccessEvent(type: AccessEventType, payload: AccessEventPayload): void {
  const isDenied = type === 'RESOURCE_DENIED';
  const who = payload.adminId ? `admin ${payload.adminId.slice(0, 8)}` : 'anonymous';
  const message = isDenied
    ? `Access DENIED for ${who} on ${payload.resource}`
    : `${who} accessed ${payload.resource}`;

  logEvent(isDenied ? 'warn' : 'info', message, {
    domain: isDenied ? 'security' : 'http',
    eventCategory: 'authorization',
    eventName: type,
    userId: payload.adminId,
    ip: payload.ip,
    method: payload.method,
    route: payload.route,
    requestId: payload.requestId,
    metadata: { resource: payload.resource, ...payload.metadata },
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
//  2.  CHANGE
// ═══════════════════════════════════════════════════════════════════════════════

export type ChangeAction = 'REQUEST_CREATED' | 'REQUEST_STATUS_CHANGE' | 'ADMIN_BOOTSTRAPPED';

export interface ChangeEventPayload {
  actorId?: string;
  actorName?: string;
  entityType: 'ServiceRequest' | 'AdminAccount';
  entityId?: string;
  action: ChangeAction;
  before?: Record<string, unknown>;
  after?: Record<string, unknown>;
  changedFields?: string[];
  requestId?: string;
  metadata?: Record<string, unknown>;
}

export function logChangeEvent(payload: ChangeEventPayload): void {
  const who = payload.actorName || payload.actorId || 'anonymous';
  const eid = payload.entityId ? ` #${payload.entityId}` : '';
  const message = (() => {
    switch (payload.action) {
      case 'REQUEST_CREATED':
        return `Service request${eid} submitted`;
      case 'REQUEST_STATUS_CHANGE':
        return `Admin ${who} moved request${eid} ${String(payload.before?.status ?? '?')} → ${String(payload.after?.status ?? '?')}`;
      case 'ADMIN_BOOTSTRAPPED':
        return `Bootstrap admin account${eid} created`;
    }
  })();

  logEvent(payload.action === 'ADMIN_BOOTSTRAPPED' ? 'warn' : 'info', message, {
    domain: 'business',
    eventCategory: 'change',
    eventName: `CHANGE_${payload.action}`,
    userId: payload.actorId,
    requestId: payload.requestId,
    metadata: {
      entityType: payload.entityType,
      entityId: payload.entityId,
      action: payload.action,
      changedFields: payload.changedFields,
      before: payload.before ? sanitize(payload.before) : undefined,
      after: payload.after ? sanitize(payload.after) : undefined,
      ...payload.metadata,
    },
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
//  3.  ERROR
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  | 'VALIDATION'
  | 'DATABASE'
  | 'NETWORK'
  | 'AUTHENTICATION'
  | 'AUTHORIZATION'
  | 'BUSINESS_LOGIC'
  | 'EXTERNAL_SERVICE'
  | 'SYSTEM'
  | 'CONFIGURATION';

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ErrorEventPayload {
  category: ErrorCategory;
  severity: ErrorSeverity;
  error?: unknown;
  message: string;
  errorCode?: string;
  /** What was being attempted, e.g. "PUT /api/requests/7/status". */
  operation?: string;
  requestId?: string;
  adminId?: string;
  ip?: string;
  method?: string;
  route?: string;
  userFacing?: boolean;
  retryable?: boolean;
  metadata?: Record<string, unknown>;
}

function errorCodeOf(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && (typeof err.code === 'string' || typeof err.code === 'number')) {
    return String(err.code);
  }
  return undefined;
}

export function logErrorEvent(payload: ErrorEventPayload): void {
  const level = payload.severity === 'critical' || payload.severity === 'high' ? 'error' : 'warn';
  const err = payload.error instanceof Error ? payload.error : undefined;

  logEvent(level, payload.message, {
    domain: mapErrorCategoryToDomain(payload.category),
    eventCategory: 'error',
    eventName: `ERROR_${payload.category}`,
    errorCode: payload.errorCode || errorCodeOf(err),
    stack: err?.stack,
    userId: payload.adminId,
    ip: payload.ip,
    method: payload.method,
    route: payload.route,
    requestId: payload.requestId,
    metadata: {
      category: payload.category,
      severity: payload.severity,
      operation: payload.operation,
      errorName: err?.name,
      userFacing: payload.userFacing,
      retryable: payload.retryable,
      ...payload.metadata,
    },
  });
}

function mapErrorCategoryToDomain(category: ErrorCategory): LogDomain {
  switch (category) {
    case 'DATABASE':
      return 'db';
    case 'AUTHENTICATION':
    case 'AUTHORIZATION':
      return 'security';
    case 'EXTERNAL_SERVICE':
      return 'notifications';
    case 'BUSINESS_LOGIC':
    case 'VALIDATION':
      return 'business';
    default:
      return 'system';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
//  4.  AVAILABILITY
// ═══════════════════════════════════════════════════════════════════════════════

export type AvailabilityEventType =
  | 'APPLICATION_STARTING'
  | 'APPLICATION_READY'
  | 'APPLICATION_SHUTDOWN_START'
  | 'APPLICATION_SHUTDOWN_COMPLETE'
  | 'DATABASE_CONNECTED'
  | 'DATABASE_DISCONNECTED'
  | 'DATABASE_ERROR'
  | 'HEALTH_CHECK_FAIL';

export interface AvailabilityEventPayload {
  component?: string;
  status?: 'up' | 'down' | 'degraded' | 'starting' | 'stopping';
  responseTimeMs?: number;
  metadata?: Record<string, unknown>;
}

export function logAvailabilityEvent(
  type: AvailabilityEventType,
  payload: AvailabilityEventPayload = {}
): void {
  const isError = type === 'DATABASE_ERROR' || type === 'DATABASE_DISCONNECTED' || type === 'HEALTH_CHECK_FAIL';
  const component = payload.component || 'application';

  const message = (() => {
    switch (type) {
      case 'APPLICATION_STARTING':
        return `${component} starting…`;
      case 'APPLICATION_READY':
        return `${component} is ready and accepting traffic`;
      case 'APPLICATION_SHUTDOWN_START':
        return `${component} shutting down…`;
      case 'APPLICATION_SHUTDOWN_COMPLETE':
        return `${component} shutdown complete`;
      case 'DATABASE_CONNECTED':
        return `Database connected (${payload.responseTimeMs ?? '?'}ms)`;
      case 'DATABASE_DISCONNECTED':
        return `Database disconnected (${payload.status || 'down'})`;
      case 'DATABASE_ERROR':
        return `Database error: ${component}`;
      case 'HEALTH_CHECK_FAIL':
        return `Health check failed: ${component}`;
    }
  })();

  logEvent(isError ? 'error' : 'info', message, {
    domain: 'system',
    eventCategory: 'availability',
    eventName: type,
    metadata: {
      component: payload.component,
      status: payload.status,
      responseTimeMs: payload.responseTimeMs,
      uptimeSeconds: Math.floor(process.uptime()),
      ...getSystemMetrics(),
      ...payload.metadata,
    },
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
//  5.  SECURITY
// ═══════════════════════════════════════════════════════════════════════════════

export type SecurityEventType =
  | 'BRUTE_FORCE_DETECTED'
  | 'RATE_LIMIT_HIT'
  | 'INVALID_TOKEN'
  | 'CORS_VIOLATION'
  | 'INSECURE_DEFAULT_CREDENTIALS';

export interface SecurityEventPayload {
  severity: 'low' | 'medium' | 'high' | 'critical';
  ip?: string;
  adminId?: string;
  route?: string;
  method?: string;
  requestId?: string;
  attemptCount?: number;
  metadata?: Record<string, unknown>;
}

export function logSecurityIncident(type: SecurityEventType, payload: SecurityEventPayload): void {
  const level = payload.severity === 'critical' || payload.severity === 'high' ? 'error' : 'warn';

  logEvent(level, `SECURITY: ${type} from ${payload.ip || 'unknown'}`, {
    domain: 'security',
    eventCategory: 'security_incident',
    eventName: type,
    userId: payload.adminId,
    ip: payload.ip,
    method: payload.method,
    route: payload.route,
    requestId: payload.requestId,
    metadata: {
      severity: payload.severity,
      attemptCount: payload.attemptCount,
      ...payload.metadata,
    },
  });
}
