/**
 * Structured winston logging for the service desk backend.
 *
 * - JSON entries with service metadata and correlation ids in production
 * - Daily rotated combined/error files (winston-daily-rotate-file) in production
 * - Colored single-line console output in development
 * - Silent under NODE_ENV=test
 * - Redaction of credentials and partial masking of email addresses
 * - Throttling of repeated warn/error messages
 *
 * Log domains: http | auth | db | business | system | security | notifications
 */
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';

const { combine, timestamp, printf, errors, json, metadata } = winston.format;

const SERVICE_NAME = 'service-desk-backend';
const SERVICE_VERSION = process.env.npm_package_version || '0.1.0';
const HOSTNAME = os.hostname();
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const LOG_DIR = process.env.LOG_DIR || path.resolve(__dirname, '..', 'logs');
const nodeEnv = process.env.NODE_ENV || 'development';
const isTest = nodeEnv === 'test';
const isProd = nodeEnv === 'production';

const MAX_PAYLOAD_SIZE = 4096;
const MAX_SERIALIZE_DEPTH = 6;

if (isProd) {
  try {
    fs.mkdirSync(LOG_DIR, { recursive: true });
  } catch (err) {
    process.stderr.write(`[logger] cannot create ${LOG_DIR}: ${String(err)}\n`);
  }
}

// ─── Redaction ───────────────────────────────────────────────────────────────
const REDACTED = '[REDACTED]';
const SENSITIVE_KEYS = new Set([
  'password', 'passwd', 'pass', 'secret', 'token', 'accesstoken', 'sessiontoken',
  'authorization', 'cookie', 'setcookie', 'apikey', 'apisecret', 'jwt',
  'secretkey', 'privatekey', 'passwordhash', 'mailgunapikey', 'mongodburi',
]);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase().replace(/[-_]/g, ''));
}

/** jo***@example.com */
function maskEmail(email: string): string {
  const atIdx = email.indexOf('@');
  if (atIdx <= 2) return `***${email.slice(atIdx)}`;
  return `${email.slice(0, 2)}***${email.slice(atIdx)}`;
}

/**
 * Deep-clone with sensitive keys redacted. Cuts circular references,
 * deep nesting, long strings and long arrays.
 */
function sanitize(obj: unknown, depth = 0, seen = new WeakSet<object>()): unknown {
  if (depth > MAX_SERIALIZE_DEPTH) return '[MAX_DEPTH]';
  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') {
    if (obj.length > MAX_PAYLOAD_SIZE) {
      return obj.slice(0, MAX_PAYLOAD_SIZE) + `...[truncated ${obj.length - MAX_PAYLOAD_SIZE} chars]`;
    }
    return obj;
  }

  if (typeof obj !== 'object') return obj;
  if (obj instanceof Date) return obj.toISOString();

  if (seen.has(obj)) return '[CIRCULAR]';
  seen.add(obj);

  if (Array.isArray(obj)) {
    if (obj.length > 100) {
      return [
        ...obj.slice(0, 100).map((item) => sanitize(item, depth + 1, seen)),
        `...[${obj.length - 100} more items]`,
      ];
    }
    return obj.map((item) => sanitize(item, depth + 1, seen));
  }

  if (obj instanceof Error) {
    const code = 'code' in obj ? obj.code : undefined;
    return {
      name: obj.name,
      message: obj.message,
      stack: obj.stack,
      ...(code !== undefined ? { code } : {}),
    };
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key)) {
      result[key] = REDACTED;
      continue;
    }
    if (typeof value === 'string') {
      const lower = key.toLowerCase();
      if ((lower.includes('email') || lower === 'contact' || lower === 'to') && value.includes('@')) {
        result[key] = maskEmail(value);
        continue;
      }
    }
    result[key] = sanitize(value, depth + 1, seen);
  }
  return result;
}

function getSystemMetrics() {
  const mem = process.memoryUsage();
  return {
    memoryMB: Math.round(mem.rss / 1024 / 1024),
    heapUsedMB: Math.round(mem.heapUsed / 1024 / 1024),
    heapTotalMB: Math.round(mem.heapTotal / 1024 / 1024),
  };
}

// ─── Log storm throttling ────────────────────────────────────────────────────
const errorThrottleMap = new Map<string, { count: number; lastLogged: number }>();
const THROTTLE_WINDOW_MS = 60_000;
const THROTTLE_MAX_PER_WINDOW = 10;

function shouldThrottleError(message: string): { throttled: boolean; suppressed: number } {
  const now = Date.now();
  const key = message.slice(0, 200);
  const entry = errorThrottleMap.get(key);

  if (!entry || now - entry.lastLogged > THROTTLE_WINDOW_MS) {
    errorThrottleMap.set(key, { count: 1, lastLogged: now });
    return { throttled: false, suppressed: 0 };
  }

  entry.count++;
  if (entry.count <= THROTTLE_MAX_PER_WINDOW) {
    entry.lastLogged = now;
    return { throttled: false, suppressed: 0 };
  }

  return { throttled: true, suppressed: entry.count - THROTTLE_MAX_PER_WINDOW };
}

const throttleCleanup = setInterval(() => {
  const now = Date.now();
  for (const [key, entry] of errorThrottleMap) {
    if (now - entry.lastLogged > THROTTLE_WINDOW_MS * 2) {
      errorThrottleMap.delete(key);
    }
  }
}, 5 * 60_000);
throttleCleanup.unref();

// ─── Formats ─────────────────────────────────────────────────────────────────
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const redactFormat = winston.format((info) => {
  if (isRecord(info.metadata)) {
    info.metadata = sanitize(info.metadata);
  }
  if (info.error && typeof info.error === 'object') {
    info.error = sanitize(info.error);
  }
  return info;
});

const structuredEnrich = winston.format((info) => {
  info.serviceName = SERVICE_NAME;
  info.environment = nodeEnv;
  info.version = SERVICE_VERSION;
  info.hostname = HOSTNAME;
  info.pid = process.pid;

  const meta = isRecord(info.metadata) ? info.metadata : undefined;
  if (!info.correlationId) {
    info.correlationId = meta?.correlationId || meta?.requestId || undefined;
  }
  if (!info.requestId) {
    info.requestId = meta?.requestId || info.correlationId || undefined;
  }
  return info;
});

const throttleFormat = winston.format((info) => {
  if (info.level === 'error' || info.level === 'warn') {
    const { throttled, suppressed } = shouldThrottleError(String(info.message));
    if (throttled) {
      if (suppressed % 100 === 0) {
        info.message = `[THROTTLED x${suppressed}] ${String(info.message)}`;
        return info;
      }
      return false;
    }
  }
  return info;
});

const levelColors: Record<string, string> = {
  error: '\x1b[31m',
  warn: '\x1b[33m',
  info: '\x1b[36m',
  http: '\x1b[35m',
  debug: '\x1b[90m',
};
const reset = '\x1b[0m';
const bold = '\x1b[1m';
const dim = '\x1b[2m';

const devFormat = printf((info) => {
  const level = String(info.level);
  const requestId = info.requestId;
  const durationMs = info.durationMs;
  const color = levelColors[level] || '';
  const tag = info.module ? `${dim}[${String(info.module)}]${reset} ` : '';
  const reqId = typeof requestId === 'string' ? `${dim}(${requestId.slice(0, 8)})${reset} ` : '';
  const dur = typeof durationMs === 'number' ? ` ${dim}${durationMs}ms${reset}` : '';
  const evt = info.eventName ? ` ${dim}«${String(info.eventName)}»${reset}` : '';
  const dom = info.domain ? `${dim}{${String(info.domain)}}${reset} ` : '';

  const meta: Record<string, unknown> = isRecord(info.metadata) ? { ...info.metadata } : {};
  for (const k of ['module', 'requestId', 'durationMs', 'domain', 'eventName', 'correlationId', 'service', 'pid']) {
    delete meta[k];
  }
  const extra = Object.keys(meta).length
    ? `\n  ${dim}${JSON.stringify(meta, null, 2).replace(/\n/g, '\n  ')}${reset}`
    : '';

  return `${dim}${String(info.timestamp)}${reset} ${color}${bold}${level.toUpperCase().padEnd(5)}${reset} ${dom}${tag}${reqId}${String(info.message)}${evt}${dur}${extra}`;
});

const prodJsonFormat = combine(
  timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  errors({ stack: true }),
  metadata({ fillExcept: ['message', 'level', 'timestamp', 'serviceName', 'environment', 'version', 'hostname', 'pid', 'correlationId', 'requestId'] }),
  structuredEnrich(),
  redactFormat(),
  throttleFormat(),
  json()
);

const devConsoleFormat = combine(
  timestamp({ format: 'HH:mm:ss.SSS' }),
  errors({ stack: true }),
  metadata({ fillExcept: ['message', 'level', 'timestamp', 'module', 'requestId', 'durationMs', 'domain', 'eventName'] }),
  redactFormat(),
  devFormat
);

// ─── Transports ──────────────────────────────────────────────────────────────
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: isProd ? prodJsonFormat : devConsoleFormat,
  }),
];

if (isProd) {
  transports.push(
    new DailyRotateFile({
      dirname: LOG_DIR,
      filename: 'combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      format: prodJsonFormat,
      zippedArchive: true,
    }),
    new DailyRotateFile({
      dirname: LOG_DIR,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '90d',
      format: prodJsonFormat,
      zippedArchive: true,
    })
  );
}

const logger = winston.createLogger({
  level: isProd ? 'info' : 'debug',
  silent: isTest,
  defaultMeta: { service: SERVICE_NAME, pid: process.pid },
  transports,
  exitOnError: false,
});

export default logger;

// ─── Structured event logger ─────────────────────────────────────────────────

export type LogDomain = 'http' | 'auth' | 'db' | 'business' | 'system' | 'security' | 'notifications';

export interface LogEvent {
  domain: LogDomain;
  eventCategory?: string;
  eventName: string;
  correlationId?: string;
  requestId?: string;
  userId?: string;
  role?: string;
  ip?: string;
  method?: string;
  route?: string;
  statusCode?: number;
  duration?: number;
  errorCode?: string;
  stack?: string;
  metadata?: Record<string, unknown>;
}

export function logEvent(level: 'debug' | 'info' | 'warn' | 'error', message: string, event: LogEvent): void {
  const metrics = level === 'error' || level === 'warn' ? getSystemMetrics() : undefined;
  logger.log(level, message, {
    domain: event.domain,
    eventCategory: event.eventCategory,
    eventName: event.eventName,
    correlationId: event.correlationId,
    requestId: event.requestId,
    userId: event.userId,
    role: event.role,
    ip: event.ip,
    method: event.method,
    route: event.route,
    statusCode: event.statusCode,
    durationMs: event.duration,
    errorCode: event.errorCode,
    stack: event.stack,
    ...(metrics ? { memoryMB: metrics.memoryMB, heapUsedMB: metrics.heapUsedMB } : {}),
    ...event.metadata,
  });
}

// ─── Module-scoped child loggers ─────────────────────────────────────────────

export const httpLog = logger.child({ module: 'http' });
export const dbLog = logger.child({ module: 'db' });
export const notifLog = logger.child({ module: 'notifications' });
export const seedLog = logger.child({ module: 'seed' });
export const startupLog = logger.child({ module: 'startup' });
export const securityLog = logger.child({ module: 'security' });
export const businessLog = logger.child({ module: 'business' });

export { sanitize, getSystemMetrics, maskEmail };
