import { Router } from 'express';
import rateLimit from 'express-rate-limit';
import type { Env } from '../config/env.js';
import type { AppContext } from '../context.js';
import { makeAdminController } from '../controllers/adminController.js';

export function adminRoutes(env: Env, ctx: AppContext): Router {
  const router = Router();
  const admin = makeAdminController(env, ctx);

  // Stricter limiter for login to reduce brute-force risk.
  const authLimiter = rateLimit({
    windowMs: 5 * 60_000,
    limit: env.NODE_ENV === 'production' ? 30 : 1000,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      res.setHeader('Retry-After', '300');
      res.status(429).json({
        error: { code: 'AUTH_RATE_LIMITED', message: 'Too many login attempts. Please wait a few minutes and try again.' },
      });
    },
  });

  router.get('/login', admin.loginPage);
  router.post('/login', authLimiter, admin.login);
  router.post('/logout', admin.logout);
  router.get('/logout', admin.logout);

  return router;
}
