import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import mongoose from 'mongoose';
import logger from '../config/logger.js';
import { logErrorEvent } from '../config/appLogs.js';
import type { ErrorCategory, ErrorSeverity } from '../config/appLogs.js';
import { renderErrorPage } from '../views/pages.js';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;
  public readonly isOperational: boolean;

  constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.isOperational = true;
  }
}

type ErrorBody = {
  code: string;
  message: string;
  details?: unknown;
  requestId?: string;
};

/** Browsers get a rendered page, every other client gets JSON. */
export function prefersHtml(req: Request): boolean {
  return req.accepts(['json', 'html']) === 'html';
}

function send(req: Request, res: Response, status: number, body: ErrorBody): void {
  if (prefersHtml(req)) {
    res.status(status).type('html').send(renderErrorPage(status, body.message));
    return;
  }
  res.status(status).json({ error: body });
}

function propertyOf(err: unknown, key: string): unknown {
  if (typeof err !== 'object' || err === null) return undefined;
  return Reflect.get(err, key);
}

export function notFoundHandler(req: Request, res: Response): void {
  const isProd = process.env.NODE_ENV === 'production';
  send(req, res, 404, {
    code: 'NOT_FOUND',
    message: isProd ? 'The requested page does not exist.' : `Route not found: ${req.method} ${req.path}`,
  });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  // requestId is for log correlation; only AppErrors and 500s echo it back.
  const requestId = String(res.locals.requestId || res.getHeader('x-request-id') || '').trim();
  const operation = `${req.method} ${req.originalUrl}`;
  const adminId = req.admin?.id;

  const log = (
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    errorCode: string,
    retryable = false
  ) =>
    logErrorEvent({
      category,
      severity,
      error: err,
      message,
      errorCode,
      operation,
      requestId,
      adminId,
      ip: req.ip,
      method: req.method,
      route: req.originalUrl,
      userFacing: true,
      retryable,
    });

  if (res.headersSent) {
    logger.error('Error after headers sent; cannot respond', {
      requestId,
      method: req.method,
      route: req.originalUrl,
      error: err instanceof Error ? err.message : String(err),
    });
    return;
  }

  if (err instanceof AppError) {
    const severity = err.statusCode >= 500 ? 'high' : err.statusCode === 423 ? 'medium' : 'low';
    const category = err.statusCode === 401 || err.statusCode === 423 ? 'AUTHORIZATION' : 'BUSINESS_LOGIC';
    log(category, severity, `AppError ${err.statusCode}: ${err.code} - ${err.message}`, err.code, err.statusCode === 503);
    send(req, res, err.statusCode, {
      code: err.code,
      message: err.message,
      ...(err.details !== undefined ? { details: err.details } : {}),
      ...(requestId ? { requestId } : {}),
    });
    return;
  }

  if (err instanceof z.ZodError) {
    log('VALIDATION', 'low', `Validation failed: ${err.issues.map((i) => i.path.join('.')).join(', ')}`, 'ZOD_VALIDATION');
    send(req, res, 400, {
      code: 'BAD_REQUEST',
      message: 'Please check your input and try again.',
      details: err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
    return;
  }

  // body-parser failures carry a `type` discriminator.
  const parserType = propertyOf(err, 'type');
  if (parserType === 'entity.parse.failed') {
    log('VALIDATION', 'low', 'Malformed JSON in request body', 'BAD_JSON');
    send(req, res, 400, {
      code: 'BAD_JSON',
      message: 'The request body contains invalid JSON. Please check and try again.',
    });
    return;
  }
  if (parserType === 'entity.too.large') {
    log('VALIDATION', 'medium', `Payload too large: ${operation}`, 'PAYLOAD_TOO_LARGE');
    send(req, res, 413, {
      code: 'PAYLOAD_TOO_LARGE',
      message: 'The submitted data is too large.',
    });
    return;
  }

  if (err instanceof mongoose.Error.CastError) {
    log('VALIDATION', 'low', `Invalid value for ${err.path}`, 'CAST_ERROR');
    send(req, res, 400, { code: 'BAD_REQUEST', message: 'The provided data is not valid.' });
    return;
  }

  if (propertyOf(err, 'code') === 11000) {
    log('DATABASE', 'low', 'Duplicate key on insert', 'DUPLICATE_ENTRY');
    send(req, res, 409, {
      code: 'DUPLICATE_ENTRY',
      message: 'This entry already exists.',
    });
    return;
  }

  const networkCodes = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN']);
  const code = propertyOf(err, 'code');
  const networkCode = typeof code === 'string' && networkCodes.has(code) ? code : undefined;
  if (networkCode || (err instanceof Error && err.name === 'MongooseServerSelectionError')) {
    log('DATABASE', 'high', `Storage unreachable: ${networkCode ?? 'server selection failed'}`, networkCode ?? 'SERVER_SELECTION', true);
    res.setHeader('Retry-After', '10');
    send(req, res, 503, {
      code: 'SERVICE_UNAVAILABLE',
      message: 'The service is temporarily unavailable. Please try again shortly.',
    });
    return;
  }

  log(
    'SYSTEM',
    'critical',
    `Unhandled error: ${err instanceof Error ? err.message : String(err)}`,
    typeof code === 'string' ? code : 'UNHANDLED'
  );

  const isProd = process.env.NODE_ENV === 'production';
  const message = isProd
    ? 'Something went wrong. Please try again later.'
    : (err instanceof Error ? err.message : String(err)) || 'Something went wrong. Please try again later.';
  send(req, res, 500, {
    code: 'INTERNAL_SERVER_ERROR',
    message,
    ...(requestId ? { requestId } : {}),
  });
}
