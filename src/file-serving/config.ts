import { lookup } from 'mime-types';
import { z } from 'zod';
import type { Logger } from '../types.ts';
import { nodeFileSystem } from './file-resource.ts';
import type { ResolvedStaticFileOptions, StaticFileOptions } from './types.ts';

export const DEFAULT_FILE = 'index.html';
export const DEFAULT_CHUNK_SIZE = 200 * 1024;
const FALLBACK_CONTENT_TYPE = 'application/octet-stream';

/**
 * Serialisable part of the handler options, shared with the CLI parser
 */
export const staticFileOptionsSchema = z.object({
  defaultFile: z
    .string()
    .min(1, 'defaultFile must not be empty')
    .refine((value) => !value.includes('/'), 'defaultFile must be a bare filename')
    .default(DEFAULT_FILE),
  chunkSize: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
});

const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function contentTypeForPath(filePath: string): string {
  return lookup(filePath) || FALLBACK_CONTENT_TYPE;
}

/**
 * Validate options and fill in defaults
 * @throws ZodError when defaultFile or chunkSize is invalid
 */
export function resolveStaticFileOptions(options: StaticFileOptions = {}): ResolvedStaticFileOptions {
  const { defaultFile, chunkSize } = staticFileOptionsSchema.parse({
    defaultFile: options.defaultFile,
    chunkSize: options.chunkSize,
  });

  return {
    defaultFile,
    chunkSize,
    contentType: options.contentType ?? contentTypeForPath,
    fileSystem: options.fileSystem ?? nodeFileSystem,
    logger: options.logger ?? silentLogger,
  };
}
