import crypto from 'node:crypto';
import { AppError } from '../middleware/errors.js';
import type { AdminStore } from '../database/stores.js';
import { toAdminPrincipal, type AdminAccount, type AdminPrincipal } from '../models/AdminUser.js';
import { logAuthEvent, logSecurityIncident } from '../config/appLogs.js';
import type { Clock } from '../utils/clock.js';
import { burnPasswordCheck, verifyPassword } from './passwords.js';
import type { SessionStore } from './sessionStore.js';
import { signSessionToken, verifySessionToken } from './tokens.js';

export interface SessionGuardOptions {
  admins: AdminStore;
  sessions: SessionStore;
  secret: string;
  ttlSeconds: number;
  clock: Clock;
  maxLoginAttempts: number;
  lockMinutes: number;
  bcryptRounds: number;
}

export interface LoginResult {
  token: string;
  expiresAt: Date;
  admin: AdminPrincipal;
}

/** Request metadata carried into the auth logs. */
export interface AuthAttemptContext {
  ip?: string;
  route?: string;
  requestId?: string;
}

export type SessionGuard = ReturnType<typeof createSessionGuard>;

// One error for every rejected session so callers cannot tell unknown, expired
// and forged tokens apart.
function unauthorized(): AppError {
  return new AppError(401, 'UNAUTHORIZED', 'Admin session required');
}

function invalidCredentials(): AppError {
  return new AppError(401, 'INVALID_CREDENTIALS', 'Invalid username or password');
}

export function createSessionGuard(options: SessionGuardOptions) {
  const { admins, sessions, secret, ttlSeconds, clock } = options;

  function isLocked(admin: AdminAccount, now: Date): boolean {
    return Boolean(admin.lockedUntil && admin.lockedUntil.getTime() > now.getTime());
  }

  async function recordFailure(admin: AdminAccount, now: Date, ctx: AuthAttemptContext): Promise<void> {
    // A lock that has run out starts a fresh count.
    const previous = admin.lockedUntil ? 0 : admin.loginAttempts;
    const attempts = previous + 1;

    if (attempts >= options.maxLoginAttempts) {
      const lockedUntil = new Date(now.getTime() + options.lockMinutes * 60_000);
      await admins.updateLoginState(admin.id, { loginAttempts: attempts, lockedUntil });
      sessions.revokeAdmin(admin.id);
      logAuthEvent('ACCOUNT_LOCKED', {
        adminId: admin.id,
        identifier: admin.username,
        ip: ctx.ip,
        route: ctx.route,
        requestId: ctx.requestId,
        metadata: { attempts, lockedUntil: lockedUntil.toISOString() },
      });
      logSecurityIncident('BRUTE_FORCE_DETECTED', {
        severity: 'high',
        ip: ctx.ip,
        adminId: admin.id,
        route: ctx.route,
        requestId: ctx.requestId,
        attemptCount: attempts,
      });
      return;
    }

    await admins.updateLoginState(admin.id, { loginAttempts: attempts, lockedUntil: null });
  }

  return {
    async login(username: string, password: string, ctx: AuthAttemptContext = {}): Promise<LoginResult> {
      const now = clock();
      const admin = await admins.findByUsername(username);

      if (!admin || !admin.isActive) {
        // Same bcrypt cost as a real account.
        await burnPasswordCheck(password, options.bcryptRounds);
        logAuthEvent('LOGIN_FAILURE', {
          identifier: username,
          ip: ctx.ip,
          route: ctx.route,
          requestId: ctx.requestId,
          reason: admin ? 'account_inactive' : 'unknown_username',
        });
        throw invalidCredentials();
      }

      if (isLocked(admin, now)) {
        logAuthEvent('ACCOUNT_LOCKED', {
          adminId: admin.id,
          identifier: admin.username,
          ip: ctx.ip,
          route: ctx.route,
          requestId: ctx.requestId,
          reason: 'login_while_locked',
        });
        throw new AppError(423, 'ACCOUNT_LOCKED', 'Account is temporarily locked. Try again later.', {
          lockedUntil: admin.lockedUntil?.toISOString(),
        });
      }

      const ok = await verifyPassword(password, admin.passwordHash);
      if (!ok) {
        await recordFailure(admin, now, ctx);
        logAuthEvent('LOGIN_FAILURE', {
          adminId: admin.id,
          identifier: admin.username,
          ip: ctx.ip,
          route: ctx.route,
          requestId: ctx.requestId,
          reason: 'invalid_password',
        });
        throw invalidCredentials();
      }

      await admins.updateLoginState(admin.id, { loginAttempts: 0, lockedUntil: null, lastLoginAt: now });

      const sessionId = crypto.randomUUID();
      const expiresAt = new Date(now.getTime() + ttlSeconds * 1000);
      sessions.put({ sessionId, adminId: admin.id, username: admin.username, issuedAt: now, expiresAt });
      const token = signSessionToken(secret, { sessionId, username: admin.username }, now, ttlSeconds);

      logAuthEvent('LOGIN_SUCCESS', {
        adminId: admin.id,
        identifier: admin.username,
        ip: ctx.ip,
        route: ctx.route,
        requestId: ctx.requestId,
      });

      return { token, expiresAt, admin: toAdminPrincipal(admin) };
    },

    /** Resolves the admin behind a live session or throws 401 UNAUTHORIZED. */
    async authorize(token: string | undefined): Promise<AdminPrincipal> {
      if (!token) throw unauthorized();
      const claims = verifySessionToken(secret, token, clock());
      if (!claims) throw unauthorized();

      const session = sessions.get(claims.sessionId);
      if (!session || session.username !== claims.username) throw unauthorized();

      const admin = await admins.findById(session.adminId);
      if (!admin || !admin.isActive) {
        sessions.delete(session.sessionId);
        throw unauthorized();
      }
      return toAdminPrincipal(admin);
    },

    /** Invalidates the session behind `token`. Unknown or forged tokens are a no-op. */
    logout(token: string | undefined): boolean {
      if (!token) return false;
      const claims = verifySessionToken(secret, token, clock());
      if (!claims) return false;
      return sessions.delete(claims.sessionId);
    },
  };
}
