import bcrypt from 'bcryptjs';
import * as crypto from 'crypto';

export const DEFAULT_ROUNDS = 12;
const BCRYPT_MAX_BYTES = 72;

/**
 * Pre-hash long passwords with SHA-256 to avoid bcrypt's silent 72-byte truncation.
 * This ensures distinct passwords longer than 72 bytes still produce distinct hashes.
 */
function normalizePassword(plaintext: string): string {
  if (Buffer.byteLength(plaintext, 'utf-8') > BCRYPT_MAX_BYTES) {
    return crypto.createHash('sha256').update(plaintext).digest('base64');
  }
  return plaintext;
}

export async function hashPassword(plaintext: string, rounds = DEFAULT_ROUNDS): Promise<string> {
  return bcrypt.hash(normalizePassword(plaintext), rounds);
}

export async function verifyPassword(plaintext: string, hash: string): Promise<boolean> {
  return bcrypt.compare(normalizePassword(plaintext), hash);
}

const dummyHashes = new Map<number, Promise<string>>();

/**
 * Spends one bcrypt comparison against a throwaway hash so that a login for an
 * unknown username costs the same as one for a real account. Always false.
 */
export async function burnPasswordCheck(plaintext: string, rounds = DEFAULT_ROUNDS): Promise<false> {
  let dummy = dummyHashes.get(rounds);
  if (!dummy) {
    dummy = hashPassword(crypto.randomUUID(), rounds);
    dummyHashes.set(rounds, dummy);
  }
  await bcrypt.compare(normalizePassword(plaintext), await dummy);
  return false;
}
