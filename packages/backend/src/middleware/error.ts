import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import type { ErrorEnvelope } from '@crm/shared';
import { logger } from '../lib/logger.js';
import { ApiError, BadRequestError, NotFoundError } from '../lib/errors.js';
import { summarize_issues } from '../lib/validation.js';

// body-parser errors carry an HTTP status and a `type` such as 'entity.parse.failed'
interface HttpError {
  status: number;
  type?: string;
  message: string;
}

function is_http_error(err: unknown): err is HttpError {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 600
  );
}

export function to_api_error(err: unknown): ApiError {
  if (err instanceof ApiError) {
    return err;
  }
  if (err instanceof ZodError) {
    return new BadRequestError('Invalid request', summarize_issues(err.issues));
  }
  if (is_http_error(err)) {
    if (err.type === 'entity.parse.failed') {
      return new BadRequestError('Malformed JSON body');
    }
    if (err.status === 413) {
      return new ApiError(413, 'payload_too_large', 'Request body too large');
    }
    if (err.status < 500) {
      return new ApiError(err.status, 'bad_request', err.message);
    }
  }
  return new ApiError(500, 'internal_error', 'Internal server error', undefined, { cause: err });
}

export function not_found_middleware(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route not found: ${req.method} ${req.originalUrl}`));
}

export function error_middleware(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const api_error = to_api_error(err);

  const log_context: Record<string, unknown> = {
    request_id: req.request_id,
    method: req.method,
    path: req.originalUrl || req.path,
    error: api_error.message,
    error_type: err instanceof Error ? err.name : typeof err,
    status_code: api_error.status_code,
  };

  if (api_error.status_code >= 500) {
    const source = api_error.cause ?? api_error;
    log_context.cause = source instanceof Error ? source.message : String(source);
    log_context.stack = source instanceof Error ? source.stack : undefined;
    logger.error('request error', log_context);
  } else {
    logger.warn('request error', log_context);
  }

  const body: ErrorEnvelope = {
    status: 'error',
    timestamp: new Date().toISOString(),
    error: {
      code: api_error.code,
      message: api_error.message,
      ...(api_error.details !== undefined ? { details: api_error.details } : {}),
    },
    request_id: req.request_id,
  };

  res.status(api_error.status_code).json(body);
}
