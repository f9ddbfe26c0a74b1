/**
 * Static file serving with ETags and byte ranges
 *
 * Serves disk-resident files to a host HTTP layer once a request has been routed here.
 * Large files are streamed in bounded chunks instead of being read into memory.
 *
 * ## Request pipeline
 * 1. Resolve - `resolveFile()` maps the request path under the document root, appending the
 *    default filename to paths ending in '/', and opens the file (404 otherwise)
 * 2. Evaluate - `evaluateRequest()` picks 206 / 304 / 200 (or 416 / 500 for ranges that
 *    cannot be served) and `applyPlan()` writes status and headers
 * 3. Stream - `FileStreamer` pushes the selected bytes chunk by chunk, waiting for the
 *    transport between chunks
 *
 * ## API Overview
 * - `createStaticFileHandler()` - transport-agnostic handler over `HostRequest`/`HostResponse`
 * - `createStaticFileRouter()` - Express router around the handler
 * - `parseRangeHeader()`, `computeETag()` - building blocks, exported for reuse
 *
 * @module file-serving
 *
 * @example
 * // Express
 * import { createStaticFileRouter } from 'range-file-server';
 *
 * app.use('/media', createStaticFileRouter({ documentRoot: '/srv/media' }, { logger }));
 *
 * @example
 * // Plain Node http
 * import { createNodeExchange, createStaticFileHandler } from 'range-file-server';
 *
 * const handler = createStaticFileHandler({ chunkSize: 64 * 1024 });
 * http.createServer((req, res) => {
 *   const { request, response } = createNodeExchange(req, res, { documentRoot: '/srv/media' });
 *   handler.handleRequest(request, response).catch((error) => res.destroy(error));
 * });
 */

export * from './config.ts';
export * from './etag.ts';
export * from './evaluator.ts';
export * from './file-resource.ts';
export * from './handler.ts';
export * from './range.ts';
export * from './resolver.ts';
export * from './router.ts';
export * from './streamer.ts';
export * from './types.ts';
