import type { NextFunction, Request, Response } from 'express';
import type { AdminPrincipal } from '../models/AdminUser.js';
import type { SessionGuard } from '../services/sessionGuard.js';
import { logAccessEvent, logAuthEvent, logSecurityIncident } from '../config/appLogs.js';
import { AppError, prefersHtml } from './errors.js';

export const SESSION_COOKIE = 'admin_session';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      admin?: AdminPrincipal;
      sessionToken?: string;
    }
  }
}

/** Reads one cookie from the raw Cookie header. */
export function readCookie(req: Request, name: string): string | undefined {
  const header = req.header('cookie');
  if (!header) return undefined;
  for (const part of header.split(';')) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;
    if (part.slice(0, eq).trim() !== name) continue;
    const raw = part.slice(eq + 1).trim();
    try {
      return decodeURIComponent(raw);
    } catch {
      return raw;
    }
  }
  return undefined;
}

/** Bearer header first, then the session cookie set by the login form. */
export function extractSessionToken(req: Request): string | undefined {
  const header = req.header('authorization') || '';
  if (header.toLowerCase().startsWith('bearer ')) {
    const token = header.slice(7).trim();
    if (token) return token;
  }
  return readCookie(req, SESSION_COOKIE) || undefined;
}

export type RequireAdminOptions = {
  /** Send browsers to the login form instead of a 401 page. */
  redirectToLogin?: boolean;
};

export function requireAdmin(guard: SessionGuard, options: RequireAdminOptions = {}) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const token = extractSessionToken(req);
    try {
      req.admin = await guard.authorize(token);
      req.sessionToken = token;
      next();
    } catch (err) {
      if (!(err instanceof AppError)) {
        next(err);
        return;
      }

      const requestId = String(res.locals.requestId || '');
      logAccessEvent('RESOURCE_DENIED', {
        ip: req.ip,
        method: req.method,
        route: req.originalUrl,
        resource: req.baseUrl + req.path,
        requestId,
        metadata: { reason: token ? 'invalid_session' : 'no_session' },
      });
      if (token) {
        logAuthEvent('SESSION_REJECTED', {
          ip: req.ip,
          route: req.originalUrl,
          requestId,
          reason: 'invalid_or_expired_session',
        });
        logSecurityIncident('INVALID_TOKEN', {
          severity: 'low',
          ip: req.ip,
          route: req.originalUrl,
          method: req.method,
          requestId,
        });
      }

      if (options.redirectToLogin && req.method === 'GET' && prefersHtml(req)) {
        res.redirect(303, `/admin/login?next=${encodeURIComponent(req.originalUrl)}`);
        return;
      }
      next(err);
    }
  };
}
