import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import type { AppContext } from '../context.js';
import { toApiRequest } from '../utils/uiMappers.js';
import { renderHomePage, renderSubmissionSuccess, renderSubmitForm } from '../views/pages.js';
import { parseRequestId } from './requestsController.js';

function isFormPost(req: Request): boolean {
  return Boolean(req.is('application/x-www-form-urlencoded'));
}

/** Echo posted string fields back into the form after a validation error. */
function formValues(body: unknown): Record<string, string> {
  const values: Record<string, string> = {};
  if (typeof body !== 'object' || body === null) return values;
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') values[key] = value;
  }
  return values;
}

export function makePagesController(ctx: AppContext) {
  const { lifecycle } = ctx;

  return {
    home: (_req: Request, res: Response) => {
      res.type('html').send(renderHomePage());
    },

    submitForm: (_req: Request, res: Response) => {
      res.type('html').send(renderSubmitForm({ categories: lifecycle.categories() }));
    },

    // POST /submit: urlencoded forms get a redirect, JSON clients get 201.
    submit: async (req: Request, res: Response, next: NextFunction) => {
      const form = isFormPost(req);
      try {
        const created = await lifecycle.submit(req.body, { requestId: String(res.locals.requestId || '') });
        if (form) {
          res.redirect(303, `/submission-success/${created.id}`);
          return;
        }
        res.status(201).json({ success: true, request: toApiRequest(created) });
      } catch (err) {
        if (form && err instanceof ZodError) {
          res
            .status(400)
            .type('html')
            .send(
              renderSubmitForm({
                categories: lifecycle.categories(),
                values: formValues(req.body),
                errors: err.issues.map((i) => i.message),
              })
            );
          return;
        }
        next(err);
      }
    },

    submissionSuccess: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const request = await lifecycle.get(parseRequestId(req.params.id));
        res.type('html').send(renderSubmissionSuccess(request));
      } catch (err) {
        next(err);
      }
    },
  };
}
