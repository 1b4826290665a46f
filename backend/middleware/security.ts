/**
 * Request hardening beyond Helmet:
 * - Suspicious pattern detection (NoSQL/SQL injection, XSS, path traversal)
 * - Blocking of unambiguous attacks (null bytes anywhere, path traversal in the URL)
 * - Security audit logging
 */
import type { NextFunction, Request, Response } from 'express';
import { securityLog } from '../config/logger.js';
import { AppError } from './errors.js';

// Logged, not blocked. Request descriptions are free text and trip these legitimately.
const SUSPICIOUS_PATTERNS = [
  /(\$where|\$gt|\$lt|\$ne|\$regex|\$in|\$nin|\$or|\$and|\$not)/i, // NoSQL injection
  /(<script[^>]*>|javascript:|on\w+\s*=)/i, // XSS vectors
  /(\.\.[/\\]){2,}/, // Path traversal
  /(union\s+select|insert\s+into|drop\s+table|delete\s+from)/i, // SQL injection
  /(\x00|\x1a|\x7f)/, // Null bytes
];

const CONTROL_CHARS = /(\x00|\x1a|\x7f)/; // Null bytes / control characters
const PATH_TRAVERSAL = /(\.\.[/\\]){2,}/; // ../../ or ..\..\

// Body fields hold free text (a user may quote a share path), so traversal there is only audited.
const URL_BLOCK_PATTERNS = [PATH_TRAVERSAL, CONTROL_CHARS];
const BODY_BLOCK_PATTERNS = [CONTROL_CHARS];

const MAX_DEPTH = 5;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstMatch(patterns: RegExp[], value: string): string | null {
  for (const pattern of patterns) {
    if (pattern.test(value)) return pattern.source;
  }
  return null;
}

function auditObject(obj: Record<string, unknown>, location: string, req: Request, res: Response, depth = 0): void {
  if (depth > MAX_DEPTH) return;
  for (const [key, value] of Object.entries(obj)) {
    const hits = [
      { where: 'key', match: firstMatch(SUSPICIOUS_PATTERNS, key) },
      { where: 'value', match: typeof value === 'string' ? firstMatch(SUSPICIOUS_PATTERNS, value) : null },
    ];
    for (const hit of hits) {
      if (!hit.match) continue;
      securityLog.warn(`Suspicious pattern in request ${hit.where}`, {
        requestId: String(res.locals.requestId || ''),
        pattern: hit.match,
        location: `${location}.${key}`,
        ip: req.ip,
        method: req.method,
        url: req.originalUrl,
      });
    }
    if (isRecord(value)) auditObject(value, `${location}.${key}`, req, res, depth + 1);
  }
}

function findBlockable(patterns: RegExp[], obj: Record<string, unknown>, depth = 0): string | null {
  if (depth > MAX_DEPTH) return null;
  for (const value of Object.values(obj)) {
    const match =
      typeof value === 'string' ? firstMatch(patterns, value) : isRecord(value) ? findBlockable(patterns, value, depth + 1) : null;
    if (match) return match;
  }
  return null;
}

function safeDecode(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch {
    return path;
  }
}

/**
 * Rejects requests with unambiguously malicious values (400 BAD_REQUEST) and
 * logs other suspicious patterns for the audit trail.
 */
export function securityAuditMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const sources: Array<{ data: Record<string, unknown>; label: string; block: RegExp[] }> = [];
    sources.push({ data: { path: safeDecode(req.path) }, label: 'path', block: URL_BLOCK_PATTERNS });
    if (isRecord(req.query)) sources.push({ data: req.query, label: 'query', block: URL_BLOCK_PATTERNS });
    if (isRecord(req.body)) sources.push({ data: req.body, label: 'body', block: BODY_BLOCK_PATTERNS });

    for (const source of sources) {
      const blockMatch = findBlockable(source.block, source.data);
      if (blockMatch) {
        securityLog.warn('Blocked malicious request pattern', {
          requestId: String(res.locals.requestId || ''),
          pattern: blockMatch,
          location: source.label,
          ip: req.ip,
          method: req.method,
          url: req.originalUrl,
        });
        next(new AppError(400, 'BAD_REQUEST', 'The request contains invalid characters.'));
        return;
      }
    }

    for (const source of sources) {
      if (source.label !== 'path') auditObject(source.data, source.label, req, res);
    }
    next();
  };
}
