/**
 * Express middleware for Tidewater.
 */

import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import {
  TidewaterError,
  FlowValidationError,
  FlowNotFoundError,
  InstanceNotFoundError,
  PropertyValidationError,
  DuplicateInstanceError,
  SchedulerHaltedError,
  createLogger,
  getAjv,
  type Logger,
  type JSONSchema,
} from '@tidewater/core';
import type { ServiceContainer } from './container';
import type { ServiceToken } from './tokens';

/**
 * Context attached to Express requests.
 */
export interface TidewaterContext {
  container: ServiceContainer;
  /** Caller identity, if the app authenticates requests */
  userId?: string;
  metadata: Record<string, unknown>;
}

declare global {
  namespace Express {
    interface Request {
      tidewater?: TidewaterContext;
    }
  }
}

export interface ContextMiddlewareOptions {
  getUserId?: (req: Request) => string | undefined;
  getMetadata?: (req: Request) => Record<string, unknown>;
}

/**
 * Create middleware that attaches the Tidewater context to requests.
 */
export function createContextMiddleware(
  container: ServiceContainer,
  options: ContextMiddlewareOptions = {}
): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    req.tidewater = {
      container,
      userId: options.getUserId?.(req),
      metadata: options.getMetadata?.(req) ?? {},
    };
    next();
  };
}

/**
 * Request body or query did not match what the route accepts.
 */
export class RequestValidationError extends TidewaterError {
  constructor(
    message: string,
    public readonly details?: unknown
  ) {
    super('BAD_REQUEST', message);
    this.name = 'RequestValidationError';
  }
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

interface MappedError {
  status: number;
  body: ErrorResponse;
}

function mapError(err: unknown): MappedError {
  const fail = (status: number, code: string, message: string, details?: unknown): MappedError => ({
    status,
    body: { error: details === undefined ? { code, message } : { code, message, details } },
  });

  if (err instanceof FlowValidationError) return fail(400, err.code, err.message, err.issues);
  if (err instanceof PropertyValidationError) {
    return fail(400, err.code, err.message, { contactId: err.contactId, key: err.key, reason: err.reason });
  }
  if (err instanceof RequestValidationError) return fail(400, err.code, err.message, err.details);
  if (err instanceof FlowNotFoundError || err instanceof InstanceNotFoundError) {
    return fail(404, err.code, err.message);
  }
  if (err instanceof DuplicateInstanceError) {
    return fail(409, err.code, err.message, { existingInstanceId: err.existingInstanceId });
  }
  if (err instanceof SchedulerHaltedError) return fail(503, err.code, err.message);
  // body-parser rejects malformed JSON with a SyntaxError
  if (err instanceof SyntaxError) return fail(400, 'INVALID_JSON', err.message);

  const message = err instanceof Error && err.message ? err.message : 'An unexpected error occurred';
  return fail(500, 'INTERNAL_ERROR', message);
}

/**
 * Create error handling middleware for Tidewater routes.
 */
export function createErrorHandler(logger: Logger = createLogger('Express')): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = mapError(err);
    if (status >= 500) {
      logger.error(`${req.method} ${req.originalUrl} failed: ${body.error.message}`, err);
    } else {
      logger.warn(`${req.method} ${req.originalUrl} -> ${status} ${body.error.code}`);
    }
    res.status(status).json(body);
  };
}

export function requireTidewaterContext(
  req: Request
): asserts req is Request & { tidewater: TidewaterContext } {
  if (!req.tidewater) {
    throw new Error('Tidewater context not attached. Did you forget the middleware?');
  }
}

/**
 * Async handler wrapper to catch errors.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Compile a body check. The returned function narrows `body` or throws
 * RequestValidationError.
 */
export function bodyValidator<T>(schema: JSONSchema): (body: unknown) => T {
  const validate = getAjv().compile<T>(schema);
  return (body: unknown): T => {
    if (validate(body)) return body;
    const first = validate.errors?.[0];
    const where = first?.instancePath ? `body${first.instancePath.replace(/\//g, '.')}` : 'body';
    throw new RequestValidationError(`${where} ${first?.message ?? 'is invalid'}`, validate.errors);
  };
}

/**
 * Validate that required services are registered.
 */
export function validateServices(container: ServiceContainer, tokens: readonly ServiceToken[]): void {
  const missing = tokens.filter(token => !container.has(token));
  if (missing.length > 0) {
    throw new Error(`Missing required services: ${missing.join(', ')}`);
  }
}
