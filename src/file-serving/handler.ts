import type { HostRequest, HostResponse } from '../types.ts';
import { resolveStaticFileOptions } from './config.ts';
import { computeETag } from './etag.ts';
import { applyPlan, evaluateRequest } from './evaluator.ts';
import type { FileResource } from './file-resource.ts';
import { rangeLength } from './range.ts';
import { resolveFile } from './resolver.ts';
import { FileStreamer } from './streamer.ts';
import type { ResolvedStaticFileOptions, StaticFileOptions } from './types.ts';

export interface StaticFileHandler {
  readonly options: ResolvedStaticFileOptions;
  /**
   * Serve one request. Once called, the handler owns the response until it is completed;
   * the returned promise settles after completion.
   */
  handleRequest(request: HostRequest, response: HostResponse): Promise<void>;
}

/**
 * Create a handler serving files below each request's document root
 *
 * @example
 * const handler = createStaticFileHandler({ logger: console });
 * await handler.handleRequest(
 *   { method: 'GET', path: '/movie.mp4', documentRoot: '/srv/media', header: (name) => headers[name.toLowerCase()] },
 *   response
 * );
 */
export function createStaticFileHandler(input: StaticFileOptions = {}): StaticFileHandler {
  const options = resolveStaticFileOptions(input);
  const { logger } = options;

  async function handleRequest(request: HostRequest, response: HostResponse): Promise<void> {
    const resolved = await resolveFile(options.fileSystem, request.documentRoot, request.path, options.defaultFile);

    if (resolved.type === 'error') {
      if (resolved.code === 'OPEN_FAILURE') {
        logger.warn(`Failed to open ${resolved.requestPath}`, resolved.cause instanceof Error ? { message: resolved.cause.message } : { error: String(resolved.cause) });
      }
      logger.debug(`${request.method} ${resolved.requestPath} -> 404 (${resolved.code})`);
      response.status = 404;
      response.setHeader('Content-Type', 'text/plain; charset=utf-8');
      response.appendBody(resolved.error);
      response.completed();
      return;
    }

    const { file } = resolved;
    try {
      await sendFile(request, response, file, resolved.requestPath);
    } finally {
      try {
        await file.close();
      } catch (error) {
        logger.warn(`Failed to close ${resolved.requestPath}`, error instanceof Error ? { message: error.message } : { error: String(error) });
      }
      response.completed();
    }
  }

  async function sendFile(request: HostRequest, response: HostResponse, file: FileResource, requestPath: string): Promise<void> {
    const plan = evaluateRequest({
      size: file.size,
      rangeHeader: request.header('Range'),
      ifNoneMatch: request.header('If-None-Match'),
      etag: () => computeETag(file.path, file.mtime),
    });

    const range = applyPlan(response, plan, { size: file.size, contentType: options.contentType(file.path) });

    if (!range || request.method.toUpperCase() === 'HEAD') {
      logger.debug(`${request.method} ${requestPath} -> ${response.status} (${plan.type})`);
      return;
    }

    file.marker = range.lower;
    const streamer = new FileStreamer({ file, response, chunkSize: options.chunkSize });
    const outcome = await streamer.run(rangeLength(range));

    if (outcome.type === 'error') {
      logger.warn(`${request.method} ${requestPath} aborted after ${outcome.bytesSent} bytes: ${outcome.error}`, outcome.cause instanceof Error ? { code: outcome.code, message: outcome.cause.message } : { code: outcome.code });
      return;
    }

    logger.debug(`${request.method} ${requestPath} -> ${response.status} (${outcome.bytesSent} bytes)`);
  }

  return { options, handleRequest };
}
