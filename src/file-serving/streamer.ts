import { createErrorBranch, type ErrorBranch, type HostResponse } from '../types.ts';
import type { FileResource } from './file-resource.ts';

export type StreamPhase = 'idle' | 'reading' | 'flushing' | 'done' | 'failed';

export type StreamOutcome = { type: 'success'; bytesSent: number } | (ErrorBranch<'STREAM_READ_FAILURE' | 'STREAM_WRITE_FAILURE'> & { bytesSent: number });

export interface FileStreamerOptions {
  file: FileResource;
  response: HostResponse;
  chunkSize: number;
}

/**
 * Pumps bytes from a positioned file into a response in chunks of at most chunkSize.
 *
 * Each chunk is read, appended, and pushed; the next read starts only after the push has
 * resolved, so at most one chunk per request is in flight. The loop is iterative, so stack
 * depth does not grow with file size.
 *
 * Closing the file and completing the response are left to the caller.
 */
export class FileStreamer {
  private readonly file: FileResource;
  private readonly response: HostResponse;
  private readonly chunkSize: number;
  private current: StreamPhase = 'idle';

  constructor({ file, response, chunkSize }: FileStreamerOptions) {
    this.file = file;
    this.response = response;
    this.chunkSize = chunkSize;
  }

  get phase(): StreamPhase {
    return this.current;
  }

  /**
   * Deliver exactly count bytes starting at the file's marker
   * @throws Error if called more than once
   */
  async run(count: number): Promise<StreamOutcome> {
    if (this.current !== 'idle') {
      throw new Error(`FileStreamer.run called in phase '${this.current}'`);
    }

    let remaining = count;
    let bytesSent = 0;

    while (remaining > 0) {
      this.current = 'reading';
      let chunk: Buffer;
      try {
        chunk = await this.file.readSome(Math.min(this.chunkSize, remaining));
      } catch (error) {
        return this.fail('STREAM_READ_FAILURE', `Read failed at offset ${this.file.marker} of ${this.file.path}`, bytesSent, error);
      }
      if (chunk.length === 0) {
        return this.fail('STREAM_READ_FAILURE', `Unexpected end of ${this.file.path} with ${remaining} bytes outstanding`, bytesSent);
      }

      this.current = 'flushing';
      this.response.appendBody(chunk);
      const ok = await this.response.push();
      if (!ok) {
        return this.fail('STREAM_WRITE_FAILURE', `Transport rejected a chunk after ${bytesSent} bytes`, bytesSent);
      }

      bytesSent += chunk.length;
      remaining -= chunk.length;
    }

    this.current = 'done';
    return { type: 'success', bytesSent };
  }

  private fail(code: 'STREAM_READ_FAILURE' | 'STREAM_WRITE_FAILURE', message: string, bytesSent: number, cause?: unknown): StreamOutcome {
    this.current = 'failed';
    return { ...createErrorBranch(code, message, cause), bytesSent };
  }
}
