import express from 'express';
import * as http from 'http';
import type { AddressInfo } from 'net';
import { createStaticFileRouter } from '../file-serving/router.ts';
import type { StaticFileOptions } from '../file-serving/types.ts';
import { createLoggingMiddleware } from '../middleware/logging.ts';
import type { Logger, SetupHttpServerResult } from '../types.ts';

export interface ConnectHttpOptions {
  logger: Logger;
  documentRoot: string;
  /** 0 binds an ephemeral port, reported back in the result */
  port: number;
  app?: express.Application;
  handler?: Omit<StaticFileOptions, 'logger'>;
}

/**
 * Start an HTTP server serving documentRoot at '/'
 *
 * Request logging is mounted ahead of the file router; the same logger is handed to the
 * file handler.
 *
 * @example
 * ```typescript
 * const { close, port } = await connectHttp({
 *   logger: console,
 *   documentRoot: './public',
 *   port: 8080,
 * });
 * ```
 */
export async function connectHttp(options: ConnectHttpOptions): Promise<SetupHttpServerResult> {
  const { logger, documentRoot, port, app = express(), handler = {} } = options;

  app.use(createLoggingMiddleware({ logger }));
  app.use(createStaticFileRouter({ documentRoot }, { ...handler, logger }));

  const httpServer = http.createServer(app);

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use. Stop the process holding it or pass a different --port.`));
      } else {
        reject(err);
      }
    });

    httpServer.listen(port, () => {
      httpServer.removeAllListeners('error');
      resolve();
    });
  });

  const address = httpServer.address();
  const boundPort = isAddressInfo(address) ? address.port : port;
  logger.info(`Serving ${documentRoot} on port ${boundPort}`);

  const close = async () => {
    logger.info('Shutting down HTTP server...');
    httpServer.closeAllConnections();
    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
    });
  };

  return { close, httpServer, port: boundPort };
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return address !== null && typeof address === 'object';
}
