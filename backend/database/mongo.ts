import mongoose from 'mongoose';
import type { Env } from '../config/env.js';
import { looksPlaceholder } from '../config/env.js';
import { dbLog } from '../config/logger.js';
import { logAvailabilityEvent } from '../config/appLogs.js';

/**
 * Used when MONGODB_DBNAME is unset and the URI has no database path.
 * Without it mongoose falls back to "test".
 */
const DEFAULT_DBNAME = 'service_desk';

let isIntentionalDisconnect = false;
let connectInFlight: Promise<void> | null = null;
let handlersAttached = false;

const onMongoError = (err: unknown) => {
  dbLog.error('MongoDB connection error', { error: err });
  logAvailabilityEvent('DATABASE_ERROR', { component: 'mongodb', status: 'degraded' });
};

const onMongoDisconnected = () => {
  if (isIntentionalDisconnect) return;
  dbLog.warn('MongoDB disconnected. Attempting reconnection...');
  logAvailabilityEvent('DATABASE_DISCONNECTED', { component: 'mongodb', status: 'down' });
};

const onMongoReconnected = () => {
  dbLog.info('MongoDB reconnected');
};

/** True when the configured URI is a placeholder and the in-memory stores should be used instead. */
export function shouldUseMemoryStores(env: Env): boolean {
  return env.NODE_ENV !== 'production' && looksPlaceholder(env.MONGODB_URI);
}

export function resolveDbName(env: Env): string | undefined {
  if (env.MONGODB_DBNAME) return env.MONGODB_DBNAME;
  try {
    const parsed = new URL(env.MONGODB_URI);
    const dbFromUri = parsed.pathname.replace(/^\//, '').split('/')[0];
    if (dbFromUri && dbFromUri !== 'test') return undefined; // URI path wins
  } catch {
    // Non-URL connection strings fall through to the default name.
  }
  return DEFAULT_DBNAME;
}

export async function connectMongo(env: Env): Promise<void> {
  if (mongoose.connection.readyState === 1) return;
  if (connectInFlight) return connectInFlight;

  connectInFlight = (async () => {
    isIntentionalDisconnect = false;
    mongoose.set('strictQuery', true);

    // connectMongo() may be called more than once; attach handlers a single time.
    if (!handlersAttached) {
      mongoose.connection.on('error', onMongoError);
      mongoose.connection.on('disconnected', onMongoDisconnected);
      mongoose.connection.on('reconnected', onMongoReconnected);
      handlersAttached = true;
    }

    const dbName = resolveDbName(env);
    dbLog.info(`MongoDB: connecting to db "${dbName ?? '(from URI)'}"`);

    const started = Date.now();
    await mongoose.connect(env.MONGODB_URI, {
      autoIndex: env.NODE_ENV !== 'production',
      ...(dbName ? { dbName } : {}),
      maxPoolSize: 20,
      minPoolSize: 2,
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
      family: 4,
    });
    logAvailabilityEvent('DATABASE_CONNECTED', { component: 'mongodb', status: 'up', responseTimeMs: Date.now() - started });
  })().finally(() => {
    connectInFlight = null;
  });

  return connectInFlight;
}

export async function pingMongo(): Promise<boolean> {
  const db = mongoose.connection.db;
  if (mongoose.connection.readyState !== 1 || !db) return false;
  try {
    await db.admin().ping();
    return true;
  } catch (err) {
    dbLog.warn('MongoDB ping failed', { error: err });
    return false;
  }
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  isIntentionalDisconnect = true;
  await mongoose.disconnect();
}
