/**
 * In-memory TTL map from session id to the authenticated admin.
 *
 * - Expiry is checked on every read; expired entries are dropped on access.
 * - `purgeExpired()` sweeps the rest and runs on an unref'd interval when started.
 * - FIFO eviction once `maxEntries` is reached.
 */
import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';

export interface SessionRecord {
  sessionId: string;
  adminId: string;
  username: string;
  issuedAt: Date;
  expiresAt: Date;
}

export interface SessionStoreOptions {
  clock?: Clock;
  maxEntries?: number;
}

export class SessionStore {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly clock: Clock;
  private readonly maxEntries: number;
  private sweeper: ReturnType<typeof setInterval> | null = null;
  private hits = 0;
  private misses = 0;

  constructor(options: SessionStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.maxEntries = options.maxEntries ?? 5000;
  }

  put(record: SessionRecord): void {
    if (this.sessions.size >= this.maxEntries && !this.sessions.has(record.sessionId)) {
      const oldest = this.sessions.keys().next().value;
      if (oldest !== undefined) this.sessions.delete(oldest);
    }
    this.sessions.set(record.sessionId, { ...record });
  }

  /** The live session, or undefined when unknown or expired. */
  get(sessionId: string): SessionRecord | undefined {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (this.clock().getTime() >= entry.expiresAt.getTime()) {
      this.sessions.delete(sessionId);
      this.misses++;
      return undefined;
    }
    this.hits++;
    return { ...entry };
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /** Drops every session belonging to one admin, e.g. after a lockout. */
  revokeAdmin(adminId: string): number {
    let removed = 0;
    for (const [id, entry] of this.sessions) {
      if (entry.adminId === adminId) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  purgeExpired(): number {
    const now = this.clock().getTime();
    let removed = 0;
    for (const [id, entry] of this.sessions) {
      if (now >= entry.expiresAt.getTime()) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  startSweeper(intervalMs = 5 * 60_000): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => this.purgeExpired(), intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  stats() {
    return {
      size: this.sessions.size,
      hits: this.hits,
      misses: this.misses,
    };
  }
}
