/**
 * Centralized Error Middleware
 * Keeps raw upstream errors and stack traces away from clients
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../lib/logger/structured-logger.js';

/**
 * Application Error - structured error with metadata
 * Use this for all known error cases
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown,
    public readonly exposeMessage: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

interface ErrorResponse {
  error: string;
  code: string;
  traceId: string;
  details?: unknown;
  stack?: string;
}

/**
 * Must be registered LAST in the Express app (after all routes)
 *
 * Production: no stack traces, no raw upstream messages unless exposeMessage=true
 * Development: includes details and stack
 */
export function createErrorMiddleware(options: { production: boolean }) {
  return function errorMiddleware(
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
  ): void {
    if (res.headersSent) {
      return next(err);
    }

    const appError = err instanceof AppError ? err : undefined;
    const bodyParserStatus = getBodyParserStatus(err);
    const traceId = req.traceId || 'unknown';

    const statusCode = appError?.statusCode ?? bodyParserStatus ?? 500;
    const code = appError?.code ?? (bodyParserStatus ? 'VALIDATION_ERROR' : 'INTERNAL_ERROR');

    let clientMessage: string;
    if (appError?.exposeMessage) {
      clientMessage = appError.message;
    } else if (appError || bodyParserStatus) {
      clientMessage = getGenericMessage(statusCode);
    } else {
      clientMessage = options.production ? 'Internal server error' : err.message || 'Internal server error';
    }

    const log = req.log ?? logger;
    const logContext = {
      error: { name: err.name, message: err.message, stack: err.stack, code, statusCode },
      method: req.method,
      path: req.path,
    };
    if (statusCode >= 500) {
      log.error(logContext, 'Request error');
    } else {
      log.warn(logContext, 'Request error');
    }

    const response: ErrorResponse = { error: clientMessage, code, traceId };

    if (!options.production) {
      if (appError?.details !== undefined) {
        response.details = appError.details;
      }
      if (err.stack) {
        response.stack = err.stack;
      }
    }

    res.status(statusCode).json(response);
  };
}

// express.json()/express.raw() failures carry a 4xx status
function getBodyParserStatus(err: Error): number | undefined {
  if ('type' in err && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

function getGenericMessage(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Invalid request';
    case 401:
      return 'Unauthorized';
    case 404:
      return 'Not found';
    case 409:
      return 'Conflict';
    case 413:
      return 'Payload too large';
    case 502:
      return 'Upstream service error';
    case 504:
      return 'Gateway timeout';
    default:
      return statusCode >= 500 ? 'Internal server error' : 'Bad request';
  }
}

/**
 * Forward async handler rejections to the error middleware
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function createValidationError(message: string, details?: unknown): AppError {
  return new AppError(message, 400, 'VALIDATION_ERROR', details, true);
}

export function createNotFoundError(message: string): AppError {
  return new AppError(message, 404, 'NOT_FOUND', undefined, true);
}

export function createConflictError(message: string, code: string = 'CONFLICT'): AppError {
  return new AppError(message, 409, code, undefined, true);
}

/**
 * Upstream provider error - never exposes upstream details
 */
export function createUpstreamError(internalMessage: string, details?: unknown): AppError {
  return new AppError(internalMessage, 502, 'UPSTREAM_ERROR', details, false);
}
