import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import { createNodeExchange } from '../transports/node-http.ts';
import { createStaticFileHandler } from './handler.ts';
import type { StaticFileOptions, StaticFileRouterConfig } from './types.ts';

const SERVED_METHODS = new Set(['GET', 'HEAD']);

/**
 * Decode a URL-encoded request path.
 * Returns null when the encoding is malformed.
 */
export function decodeRequestPath(rawPath: string): string | null {
  try {
    return decodeURIComponent(rawPath);
  } catch {
    return null;
  }
}

/**
 * Create an Express router serving files from a document root
 *
 * Features:
 * - GET and HEAD for any path below the mount point; other methods fall through
 * - ETag / If-None-Match validation (304)
 * - Single byte ranges (206), 416 for unsatisfiable ranges, 500 for multi-range requests
 * - Bodies streamed in bounded chunks with per-chunk backpressure
 * - Paths normalised so requests cannot escape the document root
 *
 * @param config - Router configuration (documentRoot)
 * @param options - Handler options (defaultFile, chunkSize, contentType, logger)
 * @returns Express router ready to mount on an Express app
 *
 * @example
 * const router = createStaticFileRouter({ documentRoot: '/srv/media' }, { logger });
 * app.use('/media', router);
 *
 * @example
 * // Smaller chunks and a custom index file
 * const router = createStaticFileRouter(
 *   { documentRoot: './public' },
 *   { defaultFile: 'default.htm', chunkSize: 64 * 1024 }
 * );
 * app.use(router);
 */
export function createStaticFileRouter(config: StaticFileRouterConfig, options: StaticFileOptions = {}): Router {
  const { documentRoot } = config;
  const handler = createStaticFileHandler(options);

  const router = express.Router();

  router.use((req: Request, res: Response, next: NextFunction) => {
    if (!SERVED_METHODS.has(req.method)) {
      next();
      return;
    }

    const path = decodeRequestPath(req.path);
    if (path === null) {
      res.status(400).send('Bad request: malformed path');
      return;
    }

    const { request, response } = createNodeExchange(req, res, { documentRoot, path });
    handler.handleRequest(request, response).catch(next);
  });

  return router;
}
