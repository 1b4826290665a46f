import { z } from 'zod';
import crypto from 'node:crypto';

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().min(1).optional()
);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),

  // Express body parser limits.
  // Use values supported by the `bytes` package syntax (e.g. '1mb', '500kb').
  REQUEST_BODY_LIMIT: z.string().trim().min(1).default('1mb'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  MONGODB_URI: z.string().min(1),
  MONGODB_DBNAME: optionalString,

  SECRET_KEY: z.string().optional(),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60 * 24),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
  LOGIN_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  LOGIN_LOCK_MINUTES: z.coerce.number().int().positive().default(30),

  // Mailgun (optional). Both must be set to enable email notifications.
  MAILGUN_DOMAIN: optionalString,
  MAILGUN_API_KEY: optionalString,
  MAILGUN_BASE_URL: z.string().url().default('https://api.mailgun.net'),
  MAIL_FROM: optionalString,
  ADMIN_NOTIFICATION_EMAIL: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().trim().email().optional()
  ),
  NOTIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // First-boot admin bootstrap.
  ADMIN_SEED_USERNAME: z.string().trim().min(1).default('admin'),
  ADMIN_SEED_PASSWORD: z.string().min(1).default('admin123'),
  ADMIN_SEED_EMAIL: z.string().trim().email().default('admin@example.com'),
  ADMIN_SEED_NAME: z.string().trim().min(1).default('System Administrator'),

  CORS_ORIGINS: z.string().default(''),

  EXTRA_CATEGORIES: z.string().default(''),
});

type EnvSchema = z.infer<typeof envSchema>;

export type Env = Omit<EnvSchema, 'SECRET_KEY'> & {
  SECRET_KEY: string;
};

export function looksPlaceholder(value: string | undefined): boolean {
  if (!value) return true;
  const v = value.trim();
  if (!v) return true;
  if (v.includes('REPLACE_ME')) return true;
  if (v.startsWith('<') && v.endsWith('>')) return true;
  return false;
}

export function loadEnv(processEnv: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(processEnv);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${message}`);
  }

  const data = parsed.data;

  const ensureSecret = (value: string | undefined): string => {
    if (data.NODE_ENV === 'production') {
      if (!value || value.length < 32 || looksPlaceholder(value)) {
        throw new Error(
          'Invalid environment configuration:\nSECRET_KEY: must be set to a secure random string (>= 32 chars) in production'
        );
      }
      return value;
    }
    // Outside production a provided value is used as-is so sessions survive restarts.
    if (value && !looksPlaceholder(value)) return value;
    return crypto.randomBytes(32).toString('hex');
  };

  const env: Env = { ...data, SECRET_KEY: ensureSecret(data.SECRET_KEY) };

  if (Boolean(env.MAILGUN_DOMAIN) !== Boolean(env.MAILGUN_API_KEY)) {
    throw new Error(
      'Invalid environment configuration:\nMAILGUN_DOMAIN, MAILGUN_API_KEY: must be set together'
    );
  }

  if (env.NODE_ENV === 'production' && looksPlaceholder(env.MONGODB_URI)) {
    throw new Error(
      'Invalid environment configuration:\nMONGODB_URI: must be set to a real MongoDB connection string in production'
    );
  }

  // Production: an explicit allowlist, never "allow all origins".
  if (env.NODE_ENV === 'production') {
    const cors = parseCorsOrigins(env.CORS_ORIGINS);
    if (!cors.length) {
      throw new Error(
        'Invalid environment configuration:\nCORS_ORIGINS: must be set to a comma-separated list of allowed origins/hosts in production'
      );
    }
  }

  return env;
}

export function parseCorsOrigins(raw: string): string[] {
  const stripOuterQuotes = (value: string) => {
    const v = value.trim();
    if ((v.startsWith('"') && v.endsWith('"')) || (v.startsWith("'") && v.endsWith("'"))) {
      return v.slice(1, -1).trim();
    }
    return v;
  };

  const normalizeEntry = (value: string): string | null => {
    let v = stripOuterQuotes(value);
    if (!v) return null;

    v = v.replace(/\/+$/, '');
    if (!v) return null;

    // Concrete URLs collapse to their origin ("https://desk.example.com/app" -> "https://desk.example.com").
    if ((v.startsWith('http://') || v.startsWith('https://')) && !v.includes('*')) {
      try {
        const url = new URL(v);
        return `${url.protocol}//${url.host}`;
      } catch {
        // Not a parseable URL; treat it like a hostname entry below.
      }
    }

    const slashIdx = v.indexOf('/');
    if (slashIdx !== -1) v = v.slice(0, slashIdx);

    v = v.replace(/\/+$/, '').trim();
    return v || null;
  };

  return raw
    .split(',')
    .map((s) => normalizeEntry(s))
    .filter((s): s is string => Boolean(s));
}

/** Comma list of extra categories, trimmed and de-duplicated. */
export function parseExtraCategories(raw: string): string[] {
  const seen = new Set<string>();
  for (const entry of raw.split(',')) {
    const v = entry.trim();
    if (v && v.length <= 100) seen.add(v);
  }
  return Array.from(seen);
}
