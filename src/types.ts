import type * as http from 'http';

export type Logger = Pick<Console, 'info' | 'error' | 'warn' | 'debug'>;

/** Request surface consumed by the file handler once the host has routed a request to it */
export interface HostRequest {
  method: string;
  /** URL path relative to the mount point, already decoded */
  path: string;
  documentRoot: string;
  /** Case-insensitive header lookup; must expose at least Range and If-None-Match */
  header(name: string): string | undefined;
}

/**
 * Response surface the file handler writes to.
 *
 * Transitions are one-directional: status and headers, then body chunks, then completion.
 */
export interface HostResponse {
  status: number;
  setHeader(name: string, value: string): void;
  /** Queue bytes for the next push */
  appendBody(chunk: Uint8Array | string): void;
  /**
   * Flush queued bytes to the transport.
   * Resolves once the transport is ready for more data; false when the write failed.
   */
  push(): Promise<boolean>;
  /** Terminal signal. Only the first call takes effect. */
  completed(): void;
}

export type ErrorCode = 'NOT_FOUND' | 'OPEN_FAILURE' | 'UNSUPPORTED_MULTI_RANGE' | 'RANGE_NOT_SATISFIABLE' | 'STREAM_READ_FAILURE' | 'STREAM_WRITE_FAILURE';

/**
 * Error branch type for discriminated union results
 */
export interface ErrorBranch<C extends ErrorCode = ErrorCode> {
  type: 'error';
  code: C;
  error: string;
  cause?: unknown;
}

export function createErrorBranch<C extends ErrorCode>(code: C, error: string, cause?: unknown): ErrorBranch<C> {
  const result: ErrorBranch<C> = {
    type: 'error',
    code,
    error,
  };
  if (cause !== undefined) result.cause = cause;
  return result;
}

export interface SetupHttpServerResult {
  httpServer: http.Server;
  /** Port the server is bound to (resolved when listening on port 0) */
  port: number;
  close: () => Promise<void>;
}
