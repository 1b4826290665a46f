import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import crypto from 'node:crypto';

import type { Env } from './config/env.js';
import { parseCorsOrigins } from './config/env.js';
import { httpLog, logEvent } from './config/logger.js';
import { logSecurityIncident } from './config/appLogs.js';
import type { AppContext } from './context.js';
import { healthRoutes } from './routes/healthRoutes.js';
import { publicRoutes } from './routes/publicRoutes.js';
import { adminRoutes } from './routes/adminRoutes.js';
import { apiRoutes } from './routes/apiRoutes.js';
import { AppError, errorHandler, notFoundHandler } from './middleware/errors.js';
import { securityAuditMiddleware } from './middleware/security.js';

function isOriginAllowed(origin: string, allowed: string[]): boolean {
  if (!origin) return true;
  if (!allowed.length) return true;
  if (allowed.includes('*')) return true;

  let originUrl: URL | null = null;
  try {
    originUrl = new URL(origin);
  } catch {
    // If Origin is not a valid URL, fail closed.
    return false;
  }

  const originHost = originUrl.hostname;

  return allowed.some((entryRaw) => {
    const entry = String(entryRaw || '').trim();
    if (!entry) return false;

    // Exact match (full origin string).
    if (!entry.includes('*') && (entry.startsWith('http://') || entry.startsWith('https://'))) {
      return entry === origin;
    }

    // Wildcard support.
    // Examples:
    // - https://*.example.com
    // - *.example.com
    if (entry.includes('*')) {
      const escaped = entry
        .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
        .replace(/\*/g, '.*');
      const re = new RegExp(`^${escaped}$`);
      return re.test(origin) || re.test(originHost);
    }

    // Hostname-only entry support.
    // Examples:
    // - desk.example.com
    // - .example.com (suffix)
    if (entry.startsWith('.')) return originHost.endsWith(entry);
    return originHost === entry;
  });
}

/** Same-origin browser form posts carry an Origin header matching our own host. */
function isSameOrigin(origin: string, host: string | undefined): boolean {
  if (!host) return false;
  try {
    return new URL(origin).host === host;
  } catch {
    return false;
  }
}

export function createApp(env: Env, ctx: AppContext) {
  const app = express();

  app.disable('x-powered-by');

  // Every response carries a request identifier for log correlation.
  // Validate format to prevent log injection / CRLF attacks.
  const REQUEST_ID_PATTERN = /^[a-zA-Z0-9._-]{1,128}$/;
  app.use((req, res, next) => {
    const provided = String(req.header('x-request-id') || '').trim();
    const requestId = provided && REQUEST_ID_PATTERN.test(provided) ? provided : crypto.randomUUID();
    res.setHeader('x-request-id', requestId);
    res.locals.requestId = requestId;
    next();
  });

  // Usually deployed behind a reverse proxy; keeps `req.ip` and rate limits correct.
  app.set('trust proxy', 1);

  // Structured request logging. Silent in tests.
  const SLOW_REQUEST_THRESHOLD_MS = 3000;
  app.use((req, res, next) => {
    const start = Date.now();
    const requestId = String(res.locals.requestId || '');

    res.on('finish', () => {
      const ms = Date.now() - start;
      const status = res.statusCode;
      const level = status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info';

      logEvent(level, `${req.method} ${req.originalUrl} -> ${status}`, {
        domain: 'http',
        eventName: 'REQUEST_COMPLETED',
        requestId,
        method: req.method,
        route: req.originalUrl,
        statusCode: status,
        duration: ms,
        ip: req.ip,
        userId: req.admin?.id,
        metadata: {
          userAgent: req.get('user-agent'),
          contentLength: res.get('content-length'),
        },
      });

      if (ms > SLOW_REQUEST_THRESHOLD_MS) {
        httpLog.warn(`Slow request detected: ${req.method} ${req.originalUrl} took ${ms}ms`, {
          requestId,
          durationMs: ms,
          threshold: SLOW_REQUEST_THRESHOLD_MS,
        });
      }
    });
    next();
  });

  // Pages are rendered here, so Helmet's default CSP stays on. No scripts are served.
  app.use(
    helmet({
      contentSecurityPolicy: {
        useDefaults: true,
        directives: {
          'upgrade-insecure-requests': env.NODE_ENV === 'production' ? [] : null,
        },
      },
      crossOriginEmbedderPolicy: false,
      hsts: env.NODE_ENV === 'production' ? { maxAge: 31_536_000, includeSubDomains: true, preload: true } : false,
      referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    })
  );
  app.use((_req, res, next) => {
    res.setHeader('Permissions-Policy', 'camera=(), microphone=(), geolocation=()');
    // Request data includes contact details; keep it out of shared caches.
    res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate, private');
    res.setHeader('Pragma', 'no-cache');
    next();
  });

  // Safety net against hung handlers.
  app.use((req, res, next) => {
    const timer = setTimeout(() => {
      if (!res.headersSent) {
        httpLog.warn('Request timeout', {
          method: req.method,
          path: req.originalUrl,
          timeoutMs: env.REQUEST_TIMEOUT_MS,
          ip: req.ip,
        });
        res.status(504).json({
          error: { code: 'GATEWAY_TIMEOUT', message: 'The request took too long. Please try again.' },
        });
      }
    }, env.REQUEST_TIMEOUT_MS);
    timer.unref();
    res.on('close', () => clearTimeout(timer));
    next();
  });

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: env.NODE_ENV === 'production' ? 300 : 10_000,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.path.startsWith('/health'),
      handler: (req, res) => {
        httpLog.warn('Rate limit exceeded', { ip: req.ip });
        logSecurityIncident('RATE_LIMIT_HIT', {
          severity: 'medium',
          ip: req.ip,
          route: req.originalUrl,
          method: req.method,
          requestId: String(res.locals.requestId || ''),
        });
        res.setHeader('Retry-After', '60');
        res.status(429).json({
          error: { code: 'RATE_LIMITED', message: 'Too many requests. Please wait a moment and try again.' },
        });
      },
    })
  );

  const corsOrigins = parseCorsOrigins(env.CORS_ORIGINS);

  // A request presenting a disallowed Origin fails closed, even where the
  // CORS middleware alone would only omit headers.
  app.use((req, res, next) => {
    const origin = req.header('origin');
    if (origin && !isSameOrigin(origin, req.get('host')) && !isOriginAllowed(origin, corsOrigins)) {
      logSecurityIncident('CORS_VIOLATION', {
        severity: 'medium',
        ip: req.ip,
        route: req.originalUrl,
        method: req.method,
        requestId: String(res.locals.requestId || ''),
        metadata: { origin },
      });
      next(new AppError(403, 'ORIGIN_NOT_ALLOWED', 'Origin not allowed'));
      return;
    }
    next();
  });
  app.use(
    cors({
      origin: (origin, cb) => cb(null, isOriginAllowed(String(origin || ''), corsOrigins)),
      credentials: true,
      optionsSuccessStatus: 204,
    })
  );

  app.use(express.json({ limit: env.REQUEST_BODY_LIMIT }));
  app.use(express.urlencoded({ extended: false, limit: env.REQUEST_BODY_LIMIT }));

  // Log and block suspicious patterns (after body parsing).
  app.use(securityAuditMiddleware());

  app.use('/', healthRoutes(ctx));
  app.use('/api', apiRoutes(ctx));
  app.use('/admin', adminRoutes(env, ctx));
  app.use('/', publicRoutes(env, ctx));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
