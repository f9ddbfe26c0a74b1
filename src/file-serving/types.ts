import type { Logger } from '../types.ts';

/** Subset of file metadata the handler relies on */
export interface FileStats {
  size: number;
  mtime: Date;
  isFile(): boolean;
}

/**
 * Open descriptor for a single file
 */
export interface FileDescriptor {
  stat(): Promise<FileStats>;
  /** Positioned read into buffer[0..length); resolves with the number of bytes read */
  read(buffer: Buffer, position: number, length: number): Promise<number>;
  close(): Promise<void>;
}

/**
 * Filesystem collaborator
 *
 * The default implementation wraps `fs/promises`; tests swap in wrappers that count opens,
 * reads and closes.
 */
export interface FileSystem {
  exists(path: string): Promise<boolean>;
  open(path: string): Promise<FileDescriptor>;
}

/**
 * Half-open interval [lower, upper) over file offsets
 */
export interface ByteRange {
  lower: number;
  upper: number;
}

/**
 * Options accepted by createStaticFileHandler
 *
 * @example
 * const handler = createStaticFileHandler({
 *   defaultFile: 'index.htm',
 *   chunkSize: 64 * 1024,
 *   logger: console,
 * });
 */
export interface StaticFileOptions {
  /** @default 'index.html' - appended to paths ending in '/' */
  defaultFile?: string;
  /** @default 204800 (200 KiB) - upper bound on bytes read and pushed per step */
  chunkSize?: number;
  /** @default mime-types lookup by extension, falling back to application/octet-stream */
  contentType?: (filePath: string) => string;
  /** @default Node fs/promises */
  fileSystem?: FileSystem;
  /** @default silent */
  logger?: Logger;
}

export type ResolvedStaticFileOptions = Required<StaticFileOptions>;

/**
 * Outcome of the conditional and range evaluation
 */
export type ResponsePlan =
  | { type: 'partial'; range: ByteRange }
  | { type: 'full'; range: ByteRange; etag: string }
  | { type: 'not-modified' }
  | { type: 'multi-range'; count: number }
  | { type: 'unsatisfiable' };

/**
 * Configuration for the Express router
 */
export interface StaticFileRouterConfig {
  /** Directory files are served from */
  documentRoot: string;
}
