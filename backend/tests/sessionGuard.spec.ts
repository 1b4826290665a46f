import jwt from 'jsonwebtoken';

import { MemoryAdminStore } from '../database/memoryStores.js';
import { hashPassword } from '../services/passwords.js';
import { createSessionGuard } from '../services/sessionGuard.js';
import { SessionStore } from '../services/sessionStore.js';
import { signSessionToken } from '../services/tokens.js';
import { START, fakeClock } from './helpers.js';

const SECRET = 'test-secret-key-for-session-signing-only';
const TTL_SECONDS = 3600;

async function setup() {
  const time = fakeClock();
  const admins = new MemoryAdminStore(time.clock);
  const sessions = new SessionStore({ clock: time.clock });
  const admin = await admins.create({
    username: 'Admin',
    passwordHash: await hashPassword('test-password', 4),
    email: 'admin@example.com',
    fullName: 'System Administrator',
  });
  const guard = createSessionGuard({
    admins,
    sessions,
    secret: SECRET,
    ttlSeconds: TTL_SECONDS,
    clock: time.clock,
    maxLoginAttempts: 3,
    lockMinutes: 30,
    bcryptRounds: 4,
  });
  return { time, admins, sessions, admin, guard };
}

const rejected = { statusCode: 401, code: 'UNAUTHORIZED', message: 'Admin session required' };
const badCredentials = { statusCode: 401, code: 'INVALID_CREDENTIALS', message: 'Invalid username or password' };

describe('session guard', () => {
  it('issues a session on login and authorizes it', async () => {
    const { guard, admin, admins } = await setup();

    const result = await guard.login('admin', 'test-password');

    expect(result.expiresAt.getTime()).toBe(START.getTime() + TTL_SECONDS * 1000);
    expect(result.admin).toEqual({
      id: admin.id,
      username: 'admin',
      email: 'admin@example.com',
      fullName: 'System Administrator',
      isSuperAdmin: false,
    });
    expect(await guard.authorize(result.token)).toEqual(result.admin);

    const stored = await admins.findById(admin.id);
    expect(stored?.lastLoginAt?.getTime()).toBe(START.getTime());
    expect(stored?.loginAttempts).toBe(0);
  });

  it('rejects a wrong password and an unknown username with the same error', async () => {
    const { guard } = await setup();

    await expect(guard.login('admin', 'wrong-password')).rejects.toMatchObject(badCredentials);
    await expect(guard.login('nobody', 'test-password')).rejects.toMatchObject(badCredentials);
  });

  it('refuses inactive accounts', async () => {
    const { guard, admins } = await setup();
    await admins.create({
      username: 'retired',
      passwordHash: await hashPassword('test-password', 4),
      email: 'retired@example.com',
      fullName: 'Retired Admin',
      isActive: false,
    });

    await expect(guard.login('retired', 'test-password')).rejects.toMatchObject(badCredentials);
  });

  it('rejects missing, forged, expired and logged-out tokens identically', async () => {
    const { guard, time } = await setup();

    await expect(guard.authorize(undefined)).rejects.toMatchObject(rejected);
    await expect(guard.authorize('not-a-jwt')).rejects.toMatchObject(rejected);

    const foreign = signSessionToken('another-secret-another-secret-xx', { sessionId: 's1', username: 'admin' }, START, TTL_SECONDS);
    await expect(guard.authorize(foreign)).rejects.toMatchObject(rejected);

    // Correctly signed, but no such session.
    const orphan = signSessionToken(SECRET, { sessionId: 'unknown-session', username: 'admin' }, START, TTL_SECONDS);
    await expect(guard.authorize(orphan)).rejects.toMatchObject(rejected);

    const wrongType = jwt.sign({ typ: 'refresh' }, SECRET, { algorithm: 'HS256', subject: 'admin', jwtid: 'x' });
    await expect(guard.authorize(wrongType)).rejects.toMatchObject(rejected);

    const loggedOut = await guard.login('admin', 'test-password');
    expect(guard.logout(loggedOut.token)).toBe(true);
    await expect(guard.authorize(loggedOut.token)).rejects.toMatchObject(rejected);

    const expiring = await guard.login('admin', 'test-password');
    time.advance(TTL_SECONDS * 1000 + 1000);
    await expect(guard.authorize(expiring.token)).rejects.toMatchObject(rejected);
  });

  it('treats logout of unknown tokens as a no-op', async () => {
    const { guard } = await setup();

    expect(guard.logout(undefined)).toBe(false);
    expect(guard.logout('garbage')).toBe(false);
  });

  it('locks the account after repeated failures and unlocks after the lock period', async () => {
    const { guard, admins, admin, time } = await setup();
    const live = await guard.login('admin', 'test-password');

    await expect(guard.login('admin', 'bad-1')).rejects.toMatchObject(badCredentials);
    await expect(guard.login('admin', 'bad-2')).rejects.toMatchObject(badCredentials);
    await expect(guard.login('admin', 'bad-3')).rejects.toMatchObject(badCredentials);

    const locked = await admins.findById(admin.id);
    expect(locked?.loginAttempts).toBe(3);
    expect(locked?.lockedUntil?.getTime()).toBe(START.getTime() + 30 * 60_000);

    // Even the right password is refused while locked, and existing sessions are revoked.
    await expect(guard.login('admin', 'test-password')).rejects.toMatchObject({
      statusCode: 423,
      code: 'ACCOUNT_LOCKED',
    });
    await expect(guard.authorize(live.token)).rejects.toMatchObject(rejected);

    time.advance(31 * 60_000);
    await expect(guard.login('admin', 'bad-4')).rejects.toMatchObject(badCredentials);
    expect((await admins.findById(admin.id))?.loginAttempts).toBe(1);

    await guard.login('admin', 'test-password');
    const unlocked = await admins.findById(admin.id);
    expect(unlocked?.loginAttempts).toBe(0);
    expect(unlocked?.lockedUntil).toBeNull();
  });

  it('resets the failure counter on success', async () => {
    const { guard, admins, admin } = await setup();

    await expect(guard.login('admin', 'bad-1')).rejects.toMatchObject(badCredentials);
    await expect(guard.login('admin', 'bad-2')).rejects.toMatchObject(badCredentials);
    await guard.login('admin', 'test-password');
    await expect(guard.login('admin', 'bad-3')).rejects.toMatchObject(badCredentials);

    expect((await admins.findById(admin.id))?.loginAttempts).toBe(1);
  });
});
