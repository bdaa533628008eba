import { ZodError } from 'zod';
import { ConflictError, NotFoundError, RunPreconditionError } from './errors.js';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { ApiErrorBody } from '../../shared/discussion.js';

/** Express 4 does not forward rejected promises from handlers; this does. */
export function asyncRoute(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function statusFor(err: unknown): number {
  if (err instanceof NotFoundError) return 404;
  if (err instanceof RunPreconditionError) return err.code === 'not_found' ? 404 : 400;
  if (err instanceof ConflictError) return 409;
  if (err instanceof ZodError) return 400;
  if (isBodyParseError(err)) return 400;
  return 500;
}

export function errorBody(err: unknown): ApiErrorBody {
  if (err instanceof NotFoundError) return { error: err.code, detail: err.message };
  if (err instanceof RunPreconditionError) return { error: err.code, detail: err.message };
  if (err instanceof ConflictError) return { error: err.code, detail: err.message };
  if (err instanceof ZodError) {
    return {
      error: 'bad_request',
      details: err.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`),
    };
  }
  if (isBodyParseError(err)) return { error: 'bad_request', detail: 'Request body is not valid JSON' };
  return { error: 'internal_error' };
}

/** Final express middleware: one place that turns errors into responses. */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status = statusFor(err);
  if (status === 500) {
    console.error(`[HTTP] ${req.method} ${req.originalUrl} failed:`, err);
  }
  if (!res.headersSent) {
    res.status(status).json(errorBody(err));
  }
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}
