/**
 * Request logging middleware - one line per finished response
 *
 * Format: `METHOD path status content-length duration`
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../types.ts';

/**
 * Logging middleware configuration
 */
export interface LoggingMiddlewareOptions {
  /** Logger receiving one info line per request */
  logger: Logger;
  /** @default performance.now */
  now?: () => number;
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms.toFixed(1)}ms` : `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Create Express middleware that logs each request once its response has finished
 *
 * Aborted responses (client gone before the body was sent) are logged at warn.
 *
 * @example
 * ```typescript
 * const app = express();
 * app.use(createLoggingMiddleware({ logger }));
 * app.use(createStaticFileRouter({ documentRoot }, { logger }));
 * ```
 */
export function createLoggingMiddleware(options: LoggingMiddlewareOptions): RequestHandler {
  const { logger, now = () => performance.now() } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = now();
    const resource = req.originalUrl;

    const describe = () => {
      const contentLength = res.getHeader('Content-Length') ?? '-';
      return `${req.method} ${resource} ${res.statusCode} ${String(contentLength)} ${formatDuration(now() - startTime)}`;
    };

    const onFinish = () => {
      res.off('close', onClose);
      logger.info(describe());
    };
    const onClose = () => {
      res.off('finish', onFinish);
      logger.warn(`${describe()} (aborted)`);
    };

    res.once('finish', onFinish);
    res.once('close', onClose);
    next();
  };
}
