import { Router } from 'express';
import rateLimit from 'express-rate-limit';
import type { Env } from '../config/env.js';
import type { AppContext } from '../context.js';
import { requireAdmin } from '../middleware/auth.js';
import { makePagesController } from '../controllers/pagesController.js';
import { makeRequestsController } from '../controllers/requestsController.js';

export function publicRoutes(env: Env, ctx: AppContext): Router {
  const router = Router();
  const pages = makePagesController(ctx);
  const requests = makeRequestsController(ctx);
  const adminPage = requireAdmin(ctx.guard, { redirectToLogin: true });

  // Rate-limit submissions to prevent spam.
  const submitLimiter = rateLimit({
    windowMs: 60_000,
    limit: env.NODE_ENV === 'production' ? 15 : 1000,
    standardHeaders: true,
    legacyHeaders: false,
  });

  router.get('/', pages.home);
  router.get('/submit', pages.submitForm);
  router.post('/submit', submitLimiter, pages.submit);
  router.get('/submission-success/:id', pages.submissionSuccess);

  router.get('/requests', adminPage, requests.listPage);
  router.post('/update-status/:id', adminPage, requests.formUpdateStatus);
  router.get('/dashboard', adminPage, requests.dashboard);

  return router;
}
