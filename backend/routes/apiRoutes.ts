import { Router } from 'express';
import type { AppContext } from '../context.js';
import { requireAdmin } from '../middleware/auth.js';
import { makeRequestsController } from '../controllers/requestsController.js';

export function apiRoutes(ctx: AppContext): Router {
  const router = Router();
  const requests = makeRequestsController(ctx);
  const admin = requireAdmin(ctx.guard);

  // Read endpoints are public; see DESIGN.md on contact data exposure.
  router.get('/requests', requests.apiList);
  router.get('/requests/:id', requests.apiGet);
  router.put('/requests/:id/status', admin, requests.apiUpdateStatus);
  router.get('/stats', admin, requests.apiStats);

  return router;
}
