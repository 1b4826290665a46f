import type { Env } from './config/env.js';
import { parseExtraCategories } from './config/env.js';
import type { Stores } from './database/stores.js';
import { buildCategorySet } from './validations/requests.js';
import { systemClock, type Clock } from './utils/clock.js';
import { SessionStore } from './services/sessionStore.js';
import { createSessionGuard, type SessionGuard } from './services/sessionGuard.js';
import { makeRequestLifecycle, type RequestLifecycle } from './services/requestLifecycle.js';
import {
  createMailgunNotifier,
  mailgunConfigFromEnv,
  type NotificationDispatcher,
} from './services/notifications.js';

/** Collaborators shared by every handler. Built once per process (or per test). */
export interface AppContext {
  stores: Stores;
  clock: Clock;
  sessions: SessionStore;
  guard: SessionGuard;
  lifecycle: RequestLifecycle;
  notifier: NotificationDispatcher;
}

export type ContextOverrides = {
  clock?: Clock;
  notifier?: NotificationDispatcher;
  fetchImpl?: (input: string, init: RequestInit) => Promise<Response>;
};

export function buildContext(env: Env, stores: Stores, overrides: ContextOverrides = {}): AppContext {
  const clock = overrides.clock ?? systemClock;
  const notifier = overrides.notifier ?? createMailgunNotifier(mailgunConfigFromEnv(env), overrides.fetchImpl);
  const sessions = new SessionStore({ clock });

  const guard = createSessionGuard({
    admins: stores.admins,
    sessions,
    secret: env.SECRET_KEY,
    ttlSeconds: env.SESSION_TTL_SECONDS,
    clock,
    maxLoginAttempts: env.LOGIN_MAX_ATTEMPTS,
    lockMinutes: env.LOGIN_LOCK_MINUTES,
    bcryptRounds: env.BCRYPT_ROUNDS,
  });

  const lifecycle = makeRequestLifecycle({
    requests: stores.requests,
    notifier,
    clock,
    categories: buildCategorySet(parseExtraCategories(env.EXTRA_CATEGORIES)),
  });

  return { stores, clock, sessions, guard, lifecycle, notifier };
}
