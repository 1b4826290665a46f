import type { CookieOptions, NextFunction, Request, Response } from 'express';
import type { Env } from '../config/env.js';
import type { AppContext } from '../context.js';
import { AppError, prefersHtml } from '../middleware/errors.js';
import { SESSION_COOKIE, extractSessionToken } from '../middleware/auth.js';
import { loginSchema } from '../validations/auth.js';
import { toApiAdmin } from '../utils/uiMappers.js';
import { renderLoginPage } from '../views/pages.js';
import { logAuthEvent } from '../config/appLogs.js';

const DEFAULT_LANDING = '/dashboard';

/** Only same-site absolute paths are followed after login. */
export function safeNextPath(raw: unknown): string {
  if (typeof raw !== 'string') return DEFAULT_LANDING;
  const value = raw.trim();
  if (!value.startsWith('/') || value.startsWith('//') || value.startsWith('/\\')) return DEFAULT_LANDING;
  return value;
}

function isFormPost(req: Request): boolean {
  return Boolean(req.is('application/x-www-form-urlencoded'));
}

export function makeAdminController(env: Env, ctx: AppContext) {
  const { guard } = ctx;

  const cookieOptions: CookieOptions = {
    httpOnly: true,
    sameSite: 'strict',
    secure: env.NODE_ENV === 'production',
    path: '/',
  };

  return {
    loginPage: (req: Request, res: Response) => {
      const next = typeof req.query.next === 'string' ? safeNextPath(req.query.next) : undefined;
      res.type('html').send(renderLoginPage({ next }));
    },

    login: async (req: Request, res: Response, next: NextFunction) => {
      const form = isFormPost(req);
      try {
        const body = loginSchema.parse(req.body);
        const result = await guard.login(body.username, body.password, {
          ip: req.ip,
          route: req.originalUrl,
          requestId: String(res.locals.requestId || ''),
        });

        if (form) {
          res.cookie(SESSION_COOKIE, result.token, { ...cookieOptions, maxAge: env.SESSION_TTL_SECONDS * 1000 });
          res.redirect(303, safeNextPath(body.next));
          return;
        }

        res.json({
          success: true,
          token: result.token,
          expires_at: result.expiresAt.toISOString(),
          admin: toApiAdmin(result.admin),
        });
      } catch (err) {
        if (form && err instanceof AppError && (err.statusCode === 401 || err.statusCode === 423)) {
          const username = typeof req.body?.username === 'string' ? req.body.username : undefined;
          const nextPath = typeof req.body?.next === 'string' ? safeNextPath(req.body.next) : undefined;
          res.status(err.statusCode).type('html').send(renderLoginPage({ error: err.message, username, next: nextPath }));
          return;
        }
        next(err);
      }
    },

    // Idempotent: an unknown or expired session still ends signed out.
    logout: (req: Request, res: Response) => {
      const removed = guard.logout(extractSessionToken(req));
      if (removed) {
        logAuthEvent('LOGOUT', {
          ip: req.ip,
          route: req.originalUrl,
          requestId: String(res.locals.requestId || ''),
        });
      }

      res.clearCookie(SESSION_COOKIE, cookieOptions);
      if (prefersHtml(req) || isFormPost(req)) {
        res.redirect(303, '/admin/login');
        return;
      }
      res.status(204).end();
    },
  };
}
