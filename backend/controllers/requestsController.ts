import type { NextFunction, Request, Response } from 'express';
import type { AppContext } from '../context.js';
import { AppError, prefersHtml } from '../middleware/errors.js';
import { listQuerySchema, statusUpdateSchema } from '../validations/requests.js';
import { parsePagination, paginationMeta } from '../utils/pagination.js';
import { toApiRequest, toApiStats } from '../utils/uiMappers.js';
import { renderDashboardPage, renderRequestsPage } from '../views/pages.js';
import { logAccessEvent } from '../config/appLogs.js';

export function parseRequestId(raw: unknown): number {
  const value = String(raw ?? '').trim();
  const id = /^\d{1,15}$/.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new AppError(400, 'INVALID_REQUEST_ID', 'Request id must be a positive integer');
  }
  return id;
}

function requireSignedIn(req: Request) {
  if (!req.admin) throw new AppError(401, 'UNAUTHORIZED', 'Admin session required');
  return req.admin;
}

export function makeRequestsController(ctx: AppContext) {
  const { lifecycle } = ctx;

  async function listRequests(req: Request) {
    const filter = listQuerySchema.parse(req.query);
    const page = parsePagination(req.query);
    const { items, total } = await lifecycle.list(filter, page);
    return { filter, items, pagination: paginationMeta(page, total) };
  }

  async function applyStatusUpdate(req: Request, res: Response) {
    const admin = requireSignedIn(req);
    const id = parseRequestId(req.params.id);
    const body = statusUpdateSchema.parse(req.body);
    const updated = await lifecycle.transition(id, body.status, admin, {
      assignedTo: body.assigned_to,
      requestId: String(res.locals.requestId || ''),
    });
    logAccessEvent('ADMIN_ACTION', {
      adminId: admin.id,
      ip: req.ip,
      method: req.method,
      route: req.originalUrl,
      resource: `ServiceRequest#${id}`,
      requestId: String(res.locals.requestId || ''),
      metadata: { action: 'STATUS_UPDATE', status: updated.status },
    });
    return updated;
  }

  return {
    // GET /api/requests (public)
    apiList: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { items, pagination } = await listRequests(req);
        res.json({ success: true, requests: items.map(toApiRequest), pagination });
      } catch (err) {
        next(err);
      }
    },

    // GET /api/requests/:id (public)
    apiGet: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const request = await lifecycle.get(parseRequestId(req.params.id));
        res.json({ success: true, request: toApiRequest(request) });
      } catch (err) {
        next(err);
      }
    },

    // PUT /api/requests/:id/status
    apiUpdateStatus: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const updated = await applyStatusUpdate(req, res);
        res.json({
          success: true,
          message: `Request #${updated.id} status updated to ${updated.status}`,
          request: toApiRequest(updated),
        });
      } catch (err) {
        next(err);
      }
    },

    // GET /api/stats
    apiStats: async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const stats = await lifecycle.stats();
        res.json({ success: true, stats: toApiStats(stats) });
      } catch (err) {
        next(err);
      }
    },

    // GET /requests
    listPage: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const admin = requireSignedIn(req);
        const { filter, items, pagination } = await listRequests(req);
        if (!prefersHtml(req)) {
          res.json({ success: true, requests: items.map(toApiRequest), pagination });
          return;
        }
        res.type('html').send(
          renderRequestsPage({ requests: items, pagination, filter, categories: lifecycle.categories(), admin })
        );
      } catch (err) {
        next(err);
      }
    },

    // POST /update-status/:id (HTML form)
    formUpdateStatus: async (req: Request, res: Response, next: NextFunction) => {
      try {
        await applyStatusUpdate(req, res);
        res.redirect(303, '/requests');
      } catch (err) {
        next(err);
      }
    },

    // GET /dashboard
    dashboard: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const admin = requireSignedIn(req);
        const stats = await lifecycle.stats();
        if (!prefersHtml(req)) {
          res.json({ success: true, stats: toApiStats(stats) });
          return;
        }
        res.type('html').send(renderDashboardPage({ stats, admin }));
      } catch (err) {
        next(err);
      }
    },
  };
}
