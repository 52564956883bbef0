/**
 * Request Context Middleware
 *
 * Every request gets a traceId (client x-trace-id when it looks sane, else a
 * UUID) and a child logger on req.log. Signed webhook deliveries also carry
 * their delivery id in the log context so retries can be correlated.
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger, type Logger } from '../lib/logger/structured-logger.js';

declare global {
  namespace Express {
    interface Request {
      traceId: string;
      log: Logger;
    }
  }
}

const TRACE_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === 'string' && value ? value : undefined;
}

export function requestContextMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const incoming = headerValue(req, 'x-trace-id');
  const traceId = incoming && TRACE_ID_PATTERN.test(incoming) ? incoming : uuidv4();
  const webhookId = headerValue(req, 'webhook-id') ?? headerValue(req, 'svix-id');

  req.traceId = traceId;
  req.log = logger.child(webhookId ? { traceId, webhookId } : { traceId });
  res.setHeader('x-trace-id', traceId);

  next();
}
