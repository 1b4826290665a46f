import type { Env } from '../config/env.js';
import { looksPlaceholder } from '../config/env.js';
import type { AdminStore } from '../database/stores.js';
import { toAdminPrincipal, type AdminAccount, type AdminPrincipal } from '../models/AdminUser.js';
import { hashPassword } from '../services/passwords.js';
import { seedLog } from '../config/logger.js';
import { logChangeEvent, logSecurityIncident } from '../config/appLogs.js';

/** Documented first-boot password. Accepted outside production only, and always flagged. */
export const DEFAULT_ADMIN_PASSWORD = 'admin123';

function isDuplicateKey(err: unknown): boolean {
  return typeof err === 'object' && err !== null && Reflect.get(err, 'code') === 11000;
}

export type SeedAdminResult =
  | { created: false; existingAdmins: number }
  | { created: true; admin: AdminPrincipal; insecureDefault: boolean };

/**
 * Creates one admin account when the admin store is empty; a no-op otherwise.
 * Production refuses the documented default or a placeholder password.
 */
export async function seedAdminIfEmpty(env: Env, admins: AdminStore): Promise<SeedAdminResult> {
  const existingAdmins = await admins.count();
  if (existingAdmins > 0) {
    seedLog.debug('Admin accounts present; skipping bootstrap', { existingAdmins });
    return { created: false, existingAdmins };
  }

  const username = env.ADMIN_SEED_USERNAME.trim().toLowerCase();
  const password = env.ADMIN_SEED_PASSWORD;
  const insecureDefault = password === DEFAULT_ADMIN_PASSWORD;

  if (env.NODE_ENV === 'production' && (insecureDefault || looksPlaceholder(password))) {
    throw new Error('seedAdminIfEmpty: ADMIN_SEED_PASSWORD must be set to a non-default value in production');
  }

  let created: AdminAccount;
  try {
    created = await admins.create({
      username,
      passwordHash: await hashPassword(password, env.BCRYPT_ROUNDS),
      email: env.ADMIN_SEED_EMAIL,
      fullName: env.ADMIN_SEED_NAME,
      isSuperAdmin: true,
    });
  } catch (err) {
    // Another instance bootstrapped the same account first.
    if (isDuplicateKey(err)) {
      seedLog.info('Bootstrap admin created concurrently; skipping', { username });
      return { created: false, existingAdmins: await admins.count() };
    }
    throw err;
  }

  logChangeEvent({
    entityType: 'AdminAccount',
    entityId: created.id,
    action: 'ADMIN_BOOTSTRAPPED',
    after: { username: created.username, isSuperAdmin: created.isSuperAdmin },
  });

  if (insecureDefault) {
    seedLog.warn(
      `Bootstrap admin '${username}' uses the default password. Change it before exposing this service.`
    );
    logSecurityIncident('INSECURE_DEFAULT_CREDENTIALS', {
      severity: 'high',
      adminId: created.id,
      metadata: { username },
    });
  }

  return { created: true, admin: toAdminPrincipal(created), insecureDefault };
}
