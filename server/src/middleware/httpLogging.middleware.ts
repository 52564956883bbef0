/**
 * HTTP Logging Middleware
 * Static assets and health checks log at debug; everything else at info,
 * with the response level following the status code.
 */

import type { Request, Response, NextFunction } from 'express';

const QUIET_PATHS = ['/static/', '/healthz'];

function isQuiet(path: string): boolean {
  return QUIET_PATHS.some(prefix => path.startsWith(prefix));
}

export function httpLoggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();
  const quiet = isQuiet(req.path);

  req.log[quiet ? 'debug' : 'info']({ method: req.method, path: req.path }, 'HTTP request');

  res.on('finish', () => {
    const level = res.statusCode >= 500 ? 'error'
      : res.statusCode >= 400 ? 'warn'
      : quiet ? 'debug' : 'info';

    req.log[level]({
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime,
      contentLength: res.getHeader('content-length'),
    }, 'HTTP response');
  });

  next();
}
