import { Router } from 'express';
import type { AppContext } from '../context.js';
import { isReady, isShuttingDown } from '../config/lifecycle.js';
import { logAvailabilityEvent } from '../config/appLogs.js';

// Build-time metadata, injected via env.
const BUILD_SHA = process.env.GIT_SHA || 'unknown';

export function healthRoutes(ctx: AppContext): Router {
  const router = Router();

  async function storageOk(): Promise<boolean> {
    try {
      return await ctx.stores.requests.ping();
    } catch {
      return false;
    }
  }

  // Liveness: no I/O, cannot hang.
  router.get('/health/live', (_req, res) => {
    res.status(200).json({ status: 'alive' });
  });

  // Readiness: fully started, not shutting down, storage reachable.
  router.get('/health/ready', async (_req, res) => {
    const started = Date.now();
    const dbOk = await storageOk();
    const ready = isReady() && dbOk;
    if (!dbOk) {
      logAvailabilityEvent('HEALTH_CHECK_FAIL', {
        component: ctx.stores.kind,
        status: 'down',
        responseTimeMs: Date.now() - started,
      });
    }
    res.status(ready ? 200 : 503).json({
      status: ready ? 'ready' : 'not_ready',
      checks: {
        server: isShuttingDown() ? 'shutting_down' : isReady() ? 'up' : 'starting',
        database: dbOk ? 'connected' : 'disconnected',
      },
    });
  });

  router.get('/health', async (req, res) => {
    const dbOk = await storageOk();
    const base = {
      status: dbOk ? 'ok' : 'degraded',
      timestamp: ctx.clock().toISOString(),
      database: { status: dbOk ? 'connected' : 'disconnected', kind: ctx.stores.kind },
    };

    // Diagnostics only for local callers.
    const isLocal = req.ip === '127.0.0.1' || req.ip === '::1' || req.ip === '::ffff:127.0.0.1';
    if (!isLocal) {
      res.status(dbOk ? 200 : 503).json(base);
      return;
    }

    const mem = process.memoryUsage();
    res.status(dbOk ? 200 : 503).json({
      ...base,
      version: BUILD_SHA,
      uptime: Math.floor(process.uptime()),
      memoryMB: Math.round(mem.rss / 1024 / 1024),
      sessions: ctx.sessions.stats().size,
      pid: process.pid,
      nodeVersion: process.version,
    });
  });

  return router;
}
