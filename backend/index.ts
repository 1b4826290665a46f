import { loadDotenv } from './config/dotenvLoader.js';

loadDotenv();
import { loadEnv } from './config/env.js';
import { connectMongo, disconnectMongo, shouldUseMemoryStores } from './database/mongo.js';
import { createMongoStores } from './database/mongoStores.js';
import { createMemoryStores } from './database/memoryStores.js';
import type { Stores } from './database/stores.js';
import { buildContext, type AppContext } from './context.js';
import { seedAdminIfEmpty } from './seeds/admin.js';
import { createApp } from './app.js';
import type { Server } from 'node:http';
import { startupLog, logEvent, getSystemMetrics } from './config/logger.js';
import { logAvailabilityEvent } from './config/appLogs.js';
import { isShuttingDown, setReady, setShuttingDown } from './config/lifecycle.js';

// ── Lifecycle state ──────────────────────────────────────────────────
let server: Server | null = null;
let context: AppContext | null = null;
// Replaced by env.SHUTDOWN_TIMEOUT_MS once main() has loaded the environment.
let shutdownTimeoutMs = 30_000;

// ── In-flight request tracking ───────────────────────────────────────
// Allows graceful shutdown to wait for active requests to complete.
let inFlightRequests = 0;
let drainResolve: (() => void) | null = null;

function onRequestStart() { inFlightRequests++; }
function onRequestEnd() {
  inFlightRequests--;
  if (inFlightRequests <= 0 && drainResolve) drainResolve();
}

function waitForDrain(timeoutMs: number): Promise<void> {
  if (inFlightRequests <= 0) return Promise.resolve();
  return new Promise<void>((resolve) => {
    drainResolve = resolve;
    setTimeout(resolve, timeoutMs);
  });
}

// ── Graceful shutdown ────────────────────────────────────────────────
async function shutdown(signal: string) {
  if (isShuttingDown()) return;
  setShuttingDown(true);
  setReady(false); // immediately stop accepting new traffic via health probes

  startupLog.info(`Received ${signal}. Shutting down gracefully…`, {
    inFlightRequests,
    shutdownTimeoutMs,
  });
  logAvailabilityEvent('APPLICATION_SHUTDOWN_START', { metadata: { signal, inFlightRequests } });

  const forceTimer = setTimeout(() => {
    startupLog.error('Force shutdown after timeout', { inFlightRequests });
    process.exit(1);
  }, shutdownTimeoutMs);
  forceTimer.unref();

  try {
    // 1. Stop accepting new connections
    await new Promise<void>((resolve) => {
      if (!server) return resolve();
      server.close(() => resolve());
    });

    // 2. Wait for in-flight requests to drain (up to 60% of the shutdown budget)
    const drainBudget = Math.floor(shutdownTimeoutMs * 0.6);
    if (inFlightRequests > 0) {
      startupLog.info(`Draining ${inFlightRequests} in-flight request(s)…`, { drainBudget });
      await waitForDrain(drainBudget);
    }
  } catch (err) {
    startupLog.error('Error while closing HTTP server', { error: err });
  }

  if (context) {
    context.sessions.stopSweeper();
    // 3. Let queued notification emails finish (each is bounded by NOTIFY_TIMEOUT_MS).
    await context.notifier.idle();
  }

  try {
    await disconnectMongo();
  } catch (err) {
    startupLog.error('Error while disconnecting MongoDB', { error: err });
  } finally {
    clearTimeout(forceTimer);
    logAvailabilityEvent('APPLICATION_SHUTDOWN_COMPLETE', {});
    startupLog.info('Shutdown complete.');
  }
}

// ── Main ─────────────────────────────────────────────────────────────
async function main() {
  const env = loadEnv();
  shutdownTimeoutMs = env.SHUTDOWN_TIMEOUT_MS;
  logAvailabilityEvent('APPLICATION_STARTING', { metadata: { nodeEnv: env.NODE_ENV } });

  let stores: Stores;
  if (shouldUseMemoryStores(env)) {
    startupLog.warn('MONGODB_URI is a placeholder; using in-memory stores. Data is lost on restart.');
    stores = createMemoryStores();
  } else {
    await connectMongo(env);
    stores = createMongoStores();
  }

  await seedAdminIfEmpty(env, stores.admins);

  const ctx = buildContext(env, stores);
  ctx.sessions.startSweeper();
  context = ctx;

  const app = createApp(env, ctx);

  const listening = app.listen(env.PORT, () => {
    // Default keepAliveTimeout (5s) is shorter than most LB idle timeouts (60s),
    // causing 502 errors. Set to 65s to outlast them.
    listening.keepAliveTimeout = 65_000;
    listening.headersTimeout = 66_000; // must exceed keepAliveTimeout

    // Mark ready; health probes can now return 200.
    setReady(true);
    logAvailabilityEvent('APPLICATION_READY', { status: 'up' });

    const metrics = getSystemMetrics();
    logEvent('info', `Service desk listening on :${env.PORT}`, {
      domain: 'system',
      eventName: 'APPLICATION_STARTED',
      metadata: {
        nodeEnv: env.NODE_ENV,
        port: env.PORT,
        storage: stores.kind,
        emailEnabled: ctx.notifier.enabled,
        nodeVersion: process.version,
        pid: process.pid,
        shutdownTimeoutMs,
        ...metrics,
      },
    });
  });

  // Track in-flight requests for graceful draining.
  listening.on('request', (_req, res) => {
    onRequestStart();
    res.on('close', onRequestEnd);
  });
  server = listening;
}

function errorCodeOf(err: Error): string | undefined {
  const code: unknown = Reflect.get(err, 'code');
  return typeof code === 'string' ? code : undefined;
}

// ── Process event handlers ───────────────────────────────────────────
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('unhandledRejection', (reason) => {
  logEvent('error', 'Unhandled promise rejection', {
    domain: 'system',
    eventName: 'UNHANDLED_REJECTION',
    stack: reason instanceof Error ? reason.stack : String(reason),
    metadata: { reason: String(reason), ...getSystemMetrics() },
  });
  process.exitCode = 1;
  void shutdown('unhandledRejection');
});
process.on('uncaughtException', (err) => {
  logEvent('error', `Uncaught exception: ${err.message}`, {
    domain: 'system',
    eventName: 'UNCAUGHT_EXCEPTION',
    errorCode: errorCodeOf(err),
    stack: err.stack,
    metadata: { name: err.name, ...getSystemMetrics() },
  });
  process.exitCode = 1;
  void shutdown('uncaughtException');
});
// Log deprecation warnings in dev/staging so they're caught before production.
process.on('warning', (warning) => {
  if (warning.name === 'DeprecationWarning') {
    startupLog.warn(`Node.js deprecation: ${warning.message}`, { code: errorCodeOf(warning) });
  }
});
main().catch((err: unknown) => {
  logEvent('error', `Fatal startup error: ${err instanceof Error ? err.message : String(err)}`, {
    domain: 'system',
    eventName: 'STARTUP_FATAL',
    stack: err instanceof Error ? err.stack : undefined,
    metadata: { ...getSystemMetrics() },
  });
  process.exitCode = 1;
});
