// apps/http/src/errors.ts
import type { FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { ERROR_STATUS, isAppError, type ErrorCode, type FieldErrors } from '@erdbase/core';

export interface ClassifiedError {
  code: ErrorCode;
  status: number;
  message: string;
  errors?: FieldErrors;
  details?: Array<{ path: string; msg: string }>;
}

function messageOf(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === 'object' && e !== null && 'message' in e && typeof e.message === 'string') return e.message;
  return String(e);
}

function statusCodeOf(e: unknown): number | undefined {
  if (typeof e === 'object' && e !== null && 'statusCode' in e && typeof e.statusCode === 'number') {
    return e.statusCode;
  }
  return undefined;
}

export function classifyError(e: unknown): ClassifiedError {
  if (isAppError(e)) {
    return { code: e.code, status: e.status, message: e.message, ...(e.details ? { errors: e.details } : {}) };
  }
  if (e instanceof ZodError) {
    const details = e.issues.map((i) => ({ path: i.path.join('.'), msg: i.message }));
    return { code: 'VALIDATION', status: 400, message: 'Invalid request', details };
  }
  const msg = messageOf(e);
  // fastify's own 4xx (bad JSON, schema mismatch, rate limit, ...)
  const status = statusCodeOf(e);
  if (status !== undefined && status >= 400 && status < 500) {
    const code: ErrorCode =
      status === 401 ? 'UNAUTHORIZED' :
      status === 403 ? 'FORBIDDEN' :
      status === 404 ? 'NOT_FOUND' :
      status === 409 ? 'CONFLICT' :
      status === 429 ? 'RATE_LIMITED' : 'VALIDATION';
    return { code, status, message: msg };
  }
  if (/sql|mysql|pool|connection|ECONNREFUSED|ETIMEDOUT/i.test(msg)) {
    return { code: 'ADAPTER', status: ERROR_STATUS.ADAPTER, message: msg };
  }
  return { code: 'INTERNAL', status: ERROR_STATUS.INTERNAL, message: msg };
}

export function shouldDebug(req: FastifyRequest, always: boolean): boolean {
  const q = req.query;
  const flag = typeof q === 'object' && q !== null && 'debug' in q ? String(q.debug) : '';
  return always || flag === '1' || req.headers['x-debug'] === '1';
}

export function sendError(req: FastifyRequest, reply: FastifyReply, e: unknown, debugAlways: boolean) {
  const c = classifyError(e);
  if (c.status >= 500) req.log.error({ err: e, requestId: req.id }, 'request-error');
  else req.log.info({ code: c.code, requestId: req.id }, 'request-rejected');
  return reply.status(c.status).send({
    code: c.code,
    message: 'Request failed',
    error: c.message,
    requestId: req.id,
    ...(c.errors ? { errors: c.errors } : {}),
    ...(c.details ? { details: c.details } : {}),
    ...(shouldDebug(req, debugAlways) ? { trace: { errorCode: c.code } } : {}),
  });
}
