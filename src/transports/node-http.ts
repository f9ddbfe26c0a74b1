import type * as http from 'http';
import type { HostRequest, HostResponse } from '../types.ts';

export interface NodeExchangeOptions {
  documentRoot: string;
  /** Decoded path to serve; defaults to the pathname of req.url */
  path?: string;
}

export interface NodeExchange {
  request: HostRequest;
  response: HostResponse;
}

/**
 * Adapt a Node request/response pair to the file handler's host interfaces
 *
 * push() resolves on the write callback, which is the transport's "ready for more" signal.
 * If the response closes before that, or was already destroyed, push() resolves false.
 */
export function createNodeExchange(req: http.IncomingMessage, res: http.ServerResponse, options: NodeExchangeOptions): NodeExchange {
  const { documentRoot } = options;
  const path = options.path ?? new URL(req.url ?? '/', 'http://localhost').pathname;

  const request: HostRequest = {
    method: req.method ?? 'GET',
    path,
    documentRoot,
    header(name: string): string | undefined {
      const value = req.headers[name.toLowerCase()];
      return Array.isArray(value) ? value.join(', ') : value;
    },
  };

  let pending: Buffer[] = [];
  let done = false;

  const takePending = (): Buffer => {
    const chunk = pending.length === 1 && pending[0] ? pending[0] : Buffer.concat(pending);
    pending = [];
    return chunk;
  };

  const response: HostResponse = {
    get status() {
      return res.statusCode;
    },
    set status(code: number) {
      if (!res.headersSent) res.statusCode = code;
    },

    setHeader(name: string, value: string) {
      if (!res.headersSent) res.setHeader(name, value);
    },

    appendBody(chunk: Uint8Array | string) {
      pending.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength));
    },

    push(): Promise<boolean> {
      const chunk = takePending();
      if (done || res.destroyed || res.writableEnded) {
        return Promise.resolve(false);
      }

      return new Promise<boolean>((resolve) => {
        let settled = false;
        const settle = (ok: boolean) => {
          if (settled) return;
          settled = true;
          res.off('close', onClose);
          resolve(ok);
        };
        const onClose = () => settle(false);

        res.once('close', onClose);
        res.write(chunk, (error) => settle(!error));
      });
    },

    completed() {
      if (done) return;
      done = true;
      const rest = takePending();
      if (res.destroyed || res.writableEnded) return;
      if (rest.length > 0) {
        res.end(rest);
      } else {
        res.end();
      }
    },
  };

  return { request, response };
}
