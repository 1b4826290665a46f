import { loadEnv, parseCorsOrigins, parseExtraCategories } from '../config/env.js';

const base = { NODE_ENV: 'test', MONGODB_URI: '<REPLACE_ME>' };

const production = {
  NODE_ENV: 'production',
  MONGODB_URI: 'mongodb://db.internal:27017/desk',
  SECRET_KEY: 'test-secret-test-secret-test-secret-0000',
  CORS_ORIGINS: 'https://desk.example.com',
};

describe('environment configuration', () => {
  it('applies defaults', () => {
    const env = loadEnv(base);

    expect(env).toMatchObject({
      PORT: 8080,
      SESSION_TTL_SECONDS: 86_400,
      BCRYPT_ROUNDS: 12,
      LOGIN_MAX_ATTEMPTS: 5,
      LOGIN_LOCK_MINUTES: 30,
      MAILGUN_BASE_URL: 'https://api.mailgun.net',
      ADMIN_SEED_USERNAME: 'admin',
      ADMIN_SEED_PASSWORD: 'admin123',
    });
    expect(env.MAILGUN_DOMAIN).toBeUndefined();
  });

  it('reads the shutdown budget from the environment', () => {
    expect(loadEnv(base).SHUTDOWN_TIMEOUT_MS).toBe(30_000);
    expect(loadEnv({ ...base, SHUTDOWN_TIMEOUT_MS: '5000' }).SHUTDOWN_TIMEOUT_MS).toBe(5000);
    expect(() => loadEnv({ ...base, SHUTDOWN_TIMEOUT_MS: '0' })).toThrow();
  });

  it('generates a signing secret outside production when none is set', () => {
    const a = loadEnv(base);
    const b = loadEnv({ ...base, SECRET_KEY: '<REPLACE_ME>' });

    expect(a.SECRET_KEY).toMatch(/^[0-9a-f]{64}$/);
    expect(b.SECRET_KEY).toMatch(/^[0-9a-f]{64}$/);
    expect(a.SECRET_KEY).not.toBe(b.SECRET_KEY);
    expect(loadEnv({ ...base, SECRET_KEY: 'short-dev-secret' }).SECRET_KEY).toBe('short-dev-secret');
  });

  it('accepts a complete production configuration', () => {
    expect(loadEnv(production).SECRET_KEY).toBe(production.SECRET_KEY);
  });

  it('rejects weak production settings', () => {
    expect(() => loadEnv({ ...production, SECRET_KEY: 'too-short' })).toThrow(/SECRET_KEY/);
    expect(() => loadEnv({ ...production, MONGODB_URI: '<REPLACE_ME>' })).toThrow(/MONGODB_URI/);
    expect(() => loadEnv({ ...production, CORS_ORIGINS: '' })).toThrow(/CORS_ORIGINS/);
  });

  it('requires the Mailgun domain and key together', () => {
    expect(() => loadEnv({ ...base, MAILGUN_DOMAIN: 'mg.example.com' })).toThrow(
      /MAILGUN_DOMAIN, MAILGUN_API_KEY: must be set together/
    );
    expect(loadEnv({ ...base, MAILGUN_DOMAIN: 'mg.example.com', MAILGUN_API_KEY: 'test-key' }).MAILGUN_DOMAIN).toBe(
      'mg.example.com'
    );
  });

  it('reports invalid values by name', () => {
    expect(() => loadEnv({ ...base, PORT: 'eighty' })).toThrow(/PORT/);
    expect(() => loadEnv({ ...base, ADMIN_NOTIFICATION_EMAIL: 'nobody' })).toThrow(/ADMIN_NOTIFICATION_EMAIL/);
  });
});

describe('parseCorsOrigins', () => {
  it('normalizes entries', () => {
    expect(parseCorsOrigins(' https://desk.example.com/app/ , "intranet.example.com", , *.example.org')).toEqual([
      'https://desk.example.com',
      'intranet.example.com',
      '*.example.org',
    ]);
  });
});

describe('parseExtraCategories', () => {
  it('trims and de-duplicates', () => {
    expect(parseExtraCategories('VPN Access, Badge Request,VPN Access,  ')).toEqual(['VPN Access', 'Badge Request']);
  });
});
